/**
 * reproject.ts
 *
 * Resample a cell map from one grid descriptor onto another. Each old cell's
 * world footprint is painted onto every new cell it overlaps, so a finer grid
 * expands one cell into many and a coarser grid collapses many into one
 * (last write wins in iteration order).
 */

import { REPROJECT_EPSILON } from "@/lib/constants"
import { boundsOf, cellKey, cellOf, parseCellKey, sameGrid } from "./geometry"
import { copyCells, writeCell } from "./cellMap"
import type { CellKey, CellMap, GridDescriptor, RegionId } from "@/types/planner"

export function reprojectCells(
  cells: ReadonlyMap<CellKey, RegionId>,
  oldGrid: GridDescriptor,
  newGrid: GridDescriptor,
): CellMap {
  if (sameGrid(oldGrid, newGrid)) return copyCells(cells)

  const result: CellMap = new Map()
  for (const [key, regionId] of cells) {
    const coord = parseCellKey(key)
    if (!coord) {
      console.warn("[Reproject] skipping malformed cell key:", key)
      continue
    }
    const { topLeft, bottomRight } = boundsOf(oldGrid, coord.x, coord.y)
    const first = cellOf(newGrid, topLeft.x, topLeft.y)
    const last = cellOf(
      newGrid,
      bottomRight.x - REPROJECT_EPSILON,
      bottomRight.y - REPROJECT_EPSILON,
    )
    for (let x = first.x; x <= last.x; x++) {
      for (let y = first.y; y <= last.y; y++) {
        writeCell(result, cellKey(x, y), regionId)
      }
    }
  }
  return result
}
