/**
 * cellMap.ts
 *
 * Read/write helpers for sparse cell maps. Absence of a key is the only
 * representation of "unassigned": every write goes through writeCell, which
 * turns the Empty sentinel into a delete.
 */

import { EMPTY_REGION_ID } from "@/lib/constants"
import { cellKey } from "./geometry"
import type { CellKey, CellMap, CellRange, RegionId } from "@/types/planner"

/** Map the Empty sentinel and absent values onto null ("erase") */
export function normalizeRegionId(regionId: RegionId | null | undefined): RegionId | null {
  if (regionId === undefined || regionId === null || regionId === EMPTY_REGION_ID) return null
  return regionId
}

export function readCell(cells: ReadonlyMap<CellKey, RegionId>, key: CellKey): RegionId | null {
  return normalizeRegionId(cells.get(key))
}

export function writeCell(cells: CellMap, key: CellKey, regionId: RegionId | null | undefined): void {
  const value = normalizeRegionId(regionId)
  if (value === null) {
    cells.delete(key)
  } else {
    cells.set(key, value)
  }
}

/**
 * Prior value of every cell in range whose assignment differs from target.
 * Does not modify the map.
 */
export function collectFillChanges(
  cells: ReadonlyMap<CellKey, RegionId>,
  range: CellRange,
  target: RegionId | null,
): Map<CellKey, RegionId | null> {
  const previous = new Map<CellKey, RegionId | null>()
  for (let x = range.minX; x <= range.maxX; x++) {
    for (let y = range.minY; y <= range.maxY; y++) {
      const key = cellKey(x, y)
      const prev = readCell(cells, key)
      if (prev !== target) {
        previous.set(key, prev)
      }
    }
  }
  return previous
}

/** Keys currently assigned to regionId */
export function keysWithRegion(cells: ReadonlyMap<CellKey, RegionId>, regionId: RegionId): CellKey[] {
  const keys: CellKey[] = []
  for (const [key, value] of cells) {
    if (value === regionId) keys.push(key)
  }
  return keys
}

/** Copy that drops any stray sentinel values */
export function copyCells(cells: ReadonlyMap<CellKey, RegionId>): CellMap {
  const copy: CellMap = new Map()
  for (const [key, value] of cells) {
    writeCell(copy, key, value)
  }
  return copy
}
