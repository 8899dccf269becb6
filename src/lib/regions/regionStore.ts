/**
 * regionStore.ts
 *
 * Region bookkeeping on a workspace: id allocation, validation, immutable
 * region records and the dense display ordering of non-empty regions.
 *
 * Region records are frozen and replaced on every change, so a command may
 * hold on to one without it changing underneath.
 */

import { EMPTY_REGION, EMPTY_REGION_ID } from "@/lib/constants"
import { PlannerError } from "@/lib/errors"
import type {
  Color,
  ColorInput,
  Region,
  RegionChangeType,
  RegionId,
  RegionProps,
  WorkspaceState,
} from "@/types/planner"

function clampChannel(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback
  return Math.min(1, Math.max(0, value))
}

export function normalizeColor(color: ColorInput): Color {
  return Object.freeze({
    r: clampChannel(color.r, 0),
    g: clampChannel(color.g, 0),
    b: clampChannel(color.b, 0),
    a: clampChannel(color.a, 1),
  })
}

export function colorsEqual(a: Readonly<Color>, b: Readonly<Color>): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a
}

export function createRegion(id: RegionId, name: string, color: ColorInput, order: number): Region {
  return Object.freeze({ id, name, color: normalizeColor(color), order })
}

export function regionProps(region: Region): RegionProps {
  return { name: region.name, color: { ...region.color } }
}

/**
 * Insert (or reinsert) a region, keeping the id allocator above every id
 * ever handed out.
 */
export function insertRegion(workspace: WorkspaceState, region: Region): void {
  workspace.regions.set(region.id, region)
  if (region.id >= workspace.nextRegionId) {
    workspace.nextRegionId = region.id + 1
  }
}

export function allocateRegionId(workspace: WorkspaceState): RegionId {
  const id = workspace.nextRegionId
  workspace.nextRegionId = id + 1
  return id
}

/** Non-empty regions by display order, ties broken by id */
export function orderedRegions(workspace: WorkspaceState): Region[] {
  const regions: Region[] = []
  for (const region of workspace.regions.values()) {
    if (region.id !== EMPTY_REGION_ID) regions.push(region)
  }
  return regions.sort((a, b) => a.order - b.order || a.id - b.id)
}

export function countRegions(workspace: WorkspaceState): number {
  let count = 0
  for (const id of workspace.regions.keys()) {
    if (id !== EMPTY_REGION_ID) count++
  }
  return count
}

export function captureOrders(workspace: WorkspaceState): Map<RegionId, number> {
  const orders = new Map<RegionId, number>()
  for (const region of workspace.regions.values()) {
    if (region.id !== EMPTY_REGION_ID) orders.set(region.id, region.order)
  }
  return orders
}

/** Apply a captured order map. Regions that no longer exist are skipped. */
export function applyOrders(workspace: WorkspaceState, orders: ReadonlyMap<RegionId, number>): void {
  for (const [id, order] of orders) {
    const region = workspace.regions.get(id)
    if (!region) {
      console.warn("[Regions] cannot reorder missing region:", id)
      continue
    }
    if (region.order !== order) {
      workspace.regions.set(id, Object.freeze({ ...region, order }))
    }
  }
}

/** Reassign dense orders 1..N following the current ordering */
export function renumberOrders(workspace: WorkspaceState): void {
  const dense = new Map<RegionId, number>()
  orderedRegions(workspace).forEach((region, index) => dense.set(region.id, index + 1))
  applyOrders(workspace, dense)
}

/**
 * Orders before and after moving a region by delta positions. The target is
 * nudged by delta ± 0.5 so it lands strictly between its new neighbours,
 * then everything is renumbered densely. Does not modify the workspace.
 */
export function planMove(
  workspace: WorkspaceState,
  regionId: RegionId,
  delta: number,
): { before: Map<RegionId, number>; after: Map<RegionId, number> } {
  const before = captureOrders(workspace)
  const nudge = delta > 0 ? delta + 0.5 : delta - 0.5
  const ranked = orderedRegions(workspace).map((region, index) => ({
    id: region.id,
    order: region.id === regionId ? index + 1 + nudge : index + 1,
  }))
  ranked.sort((a, b) => a.order - b.order)

  const after = new Map<RegionId, number>()
  ranked.forEach((entry, index) => after.set(entry.id, index + 1))
  return { before, after }
}

/**
 * Look up a region that the caller intends to change. The reserved Empty
 * region and unknown ids are rejected.
 */
export function requireMutableRegion(
  workspace: WorkspaceState,
  regionId: RegionId,
  op: string,
  verb: string,
): Region {
  if (regionId === EMPTY_REGION_ID) {
    throw new PlannerError("reserved-region", op, `cannot ${verb} reserved region`, { regionId })
  }
  const region = workspace.regions.get(regionId)
  if (!region) {
    throw new PlannerError("region-not-found", op, "region not found", { regionId })
  }
  return region
}

export function regionName(workspace: WorkspaceState, regionId: RegionId | null): string {
  if (regionId === null) return EMPTY_REGION.name
  return workspace.regions.get(regionId)?.name ?? String(regionId)
}

/**
 * Change event type for an edit, or null when nothing differs. Name-only
 * edits are reported separately so consumers can skip recoloring.
 */
export function classifyEdit(before: RegionProps, after: RegionProps): RegionChangeType | null {
  const nameChanged = before.name !== after.name
  const colorChanged = !colorsEqual(before.color, after.color)
  if (colorChanged) return "modified"
  if (nameChanged) return "name-modified"
  return null
}
