/**
 * create.ts
 *
 * Command factories. Each one validates its preconditions against the current
 * workspace and throws PlannerError before anything changes, then captures
 * the before/after snapshots the command needs. Factories return null when
 * the action would change nothing, so no-ops never reach the undo stack.
 */

import { PlannerError } from "@/lib/errors"
import { collectFillChanges, copyCells, keysWithRegion, normalizeRegionId } from "@/lib/grid/cellMap"
import { cellRangeOf, resolveGrid, sameGrid } from "@/lib/grid/geometry"
import { reprojectCells } from "@/lib/grid/reproject"
import {
  allocateRegionId,
  captureOrders,
  classifyEdit,
  createRegion,
  normalizeColor,
  planMove,
  regionProps,
  requireMutableRegion,
} from "@/lib/regions/regionStore"
import type {
  FillCellsCommand,
  GridChangeCommand,
  RegionAddCommand,
  RegionDeleteCommand,
  RegionEditCommand,
  RegionMoveCommand,
  ReprojectCommand,
} from "@/types/commands"
import type {
  CellKey,
  ColorInput,
  GridDescriptor,
  RegionId,
  SurfaceId,
  UserId,
  WorkspaceId,
  WorldPosition,
} from "@/types/planner"
import type { CommandContext } from "./context"

export function createRegionAdd(
  { store }: CommandContext,
  workspaceId: WorkspaceId,
  userId: UserId,
  name: string,
  color: ColorInput,
): RegionAddCommand {
  const workspace = store.ensureWorkspace(workspaceId)
  const regionId = allocateRegionId(workspace)
  return {
    type: "region-add",
    workspaceId,
    userId,
    timestamp: store.nextTimestamp(),
    region: createRegion(regionId, name, color, regionId),
  }
}

export function createRegionEdit(
  { store }: CommandContext,
  workspaceId: WorkspaceId,
  userId: UserId,
  regionId: RegionId,
  changes: { name?: string; color?: ColorInput },
): RegionEditCommand | null {
  const workspace = store.ensureWorkspace(workspaceId)
  const region = requireMutableRegion(workspace, regionId, "editRegion", "edit")
  const before = regionProps(region)
  const after = {
    name: changes.name ?? region.name,
    color: changes.color
      ? { ...normalizeColor({ ...changes.color, a: changes.color.a ?? region.color.a }) }
      : { ...region.color },
  }
  if (classifyEdit(before, after) === null) return null
  return {
    type: "region-edit",
    workspaceId,
    userId,
    timestamp: store.nextTimestamp(),
    regionId,
    before,
    after,
  }
}

export function createRegionDelete(
  { store }: CommandContext,
  workspaceId: WorkspaceId,
  userId: UserId,
  regionId: RegionId,
  replacementId?: RegionId | null,
): RegionDeleteCommand {
  const workspace = store.ensureWorkspace(workspaceId)
  const region = requireMutableRegion(workspace, regionId, "deleteRegion", "delete")
  const replacement = normalizeRegionId(replacementId)
  if (replacement === regionId) {
    throw new PlannerError(
      "invalid-argument",
      "deleteRegion",
      "a region cannot replace itself",
      { regionId },
    )
  }
  if (replacement !== null && !workspace.regions.has(replacement)) {
    throw new PlannerError(
      "replacement-not-found",
      "deleteRegion",
      "replacement region not found",
      { regionId, replacementId: replacement },
    )
  }

  const affectedCells = new Map<SurfaceId, CellKey[]>()
  for (const [surfaceId, cells] of workspace.images) {
    affectedCells.set(surfaceId, keysWithRegion(cells, regionId))
  }

  return {
    type: "region-delete",
    workspaceId,
    userId,
    timestamp: store.nextTimestamp(),
    region,
    replacementId: replacement,
    affectedCells,
    beforeOrders: captureOrders(workspace),
  }
}

export function createRegionMove(
  { store }: CommandContext,
  workspaceId: WorkspaceId,
  userId: UserId,
  regionId: RegionId,
  delta: number,
): RegionMoveCommand | null {
  const workspace = store.ensureWorkspace(workspaceId)
  requireMutableRegion(workspace, regionId, "moveRegion", "move")
  if (!Number.isInteger(delta)) {
    throw new PlannerError("invalid-argument", "moveRegion", "delta must be an integer", { delta })
  }
  if (delta === 0) return null

  const { before, after } = planMove(workspace, regionId, delta)
  if (sameOrders(before, after)) return null
  return {
    type: "region-move",
    workspaceId,
    userId,
    timestamp: store.nextTimestamp(),
    regionId,
    delta,
    beforeOrders: before,
    afterOrders: after,
  }
}

function sameOrders(a: ReadonlyMap<RegionId, number>, b: ReadonlyMap<RegionId, number>): boolean {
  if (a.size !== b.size) return false
  for (const [id, order] of a) {
    if (b.get(id) !== order) return false
  }
  return true
}

export function createFillCells(
  { store }: CommandContext,
  workspaceId: WorkspaceId,
  userId: UserId,
  surfaceId: SurfaceId,
  regionId: RegionId | null | undefined,
  corner1: WorldPosition,
  corner2: WorldPosition,
): FillCellsCommand | null {
  const workspace = store.ensureWorkspace(workspaceId)
  const target = normalizeRegionId(regionId)
  if (target !== null && !workspace.regions.has(target)) {
    throw new PlannerError("region-not-found", "fillRectangle", "region not found", {
      regionId: target,
    })
  }
  for (const corner of [corner1, corner2]) {
    if (!Number.isFinite(corner.x) || !Number.isFinite(corner.y)) {
      throw new PlannerError("invalid-argument", "fillRectangle", "corners must be finite", {
        corner: { x: corner.x, y: corner.y },
      })
    }
  }
  const grid = store.ensureGrid(workspace, surfaceId)
  const cells = workspace.images.get(surfaceId) ?? new Map<CellKey, RegionId>()
  const previous = collectFillChanges(cells, cellRangeOf(grid, corner1, corner2), target)
  if (previous.size === 0) return null
  return {
    type: "fill-cells",
    workspaceId,
    userId,
    timestamp: store.nextTimestamp(),
    surfaceId,
    regionId: target,
    previous,
  }
}

export function createGridChange(
  { store }: CommandContext,
  workspaceId: WorkspaceId,
  userId: UserId,
  surfaceId: SurfaceId,
  patch: Partial<GridDescriptor>,
): GridChangeCommand | null {
  const workspace = store.ensureWorkspace(workspaceId)
  const before = store.ensureGrid(workspace, surfaceId)
  const after = resolveGrid(before, patch, "setGrid")
  if (sameGrid(before, after)) return null
  return {
    type: "grid-change",
    workspaceId,
    userId,
    timestamp: store.nextTimestamp(),
    surfaceId,
    before,
    after,
  }
}

export function createReproject(
  { store }: CommandContext,
  workspaceId: WorkspaceId,
  userId: UserId,
  surfaceId: SurfaceId,
  patch: Partial<GridDescriptor>,
): ReprojectCommand | null {
  const workspace = store.ensureWorkspace(workspaceId)
  const beforeGrid = store.ensureGrid(workspace, surfaceId)
  const afterGrid = resolveGrid(beforeGrid, patch, "setGrid")
  if (sameGrid(beforeGrid, afterGrid)) return null
  const cells = workspace.images.get(surfaceId) ?? new Map<CellKey, RegionId>()
  return {
    type: "reproject",
    workspaceId,
    userId,
    timestamp: store.nextTimestamp(),
    surfaceId,
    beforeGrid,
    afterGrid,
    beforeCells: copyCells(cells),
    afterCells: reprojectCells(cells, beforeGrid, afterGrid),
  }
}
