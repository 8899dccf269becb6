/**
 * apply.ts
 *
 * perform / undo / describe for every command type. Commands were validated
 * when created, so these never throw: state that went missing in the
 * meantime (e.g. another user deleted a region) is logged and that step is
 * skipped, keeping the rest of the history usable.
 */

import { EMPTY_REGION_ID } from "@/lib/constants"
import { copyCells, keysWithRegion, readCell, writeCell } from "@/lib/grid/cellMap"
import {
  applyOrders,
  classifyEdit,
  countRegions,
  insertRegion,
  normalizeColor,
  regionName,
  renumberOrders,
} from "@/lib/regions/regionStore"
import type {
  Command,
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
  GridDescriptor,
  RegionId,
  RegionProps,
  SurfaceId,
  WorkspaceId,
} from "@/types/planner"
import type { CommandContext } from "./context"

function unknownCommand(command: never): false {
  console.warn("[Commands] unknown command type, skipping:", command)
  return false
}

/** Apply a command. Returns false only for a command the engine cannot handle. */
export function performCommand(ctx: CommandContext, command: Command): boolean {
  switch (command.type) {
    case "region-add":
      return addRegion(ctx, command)
    case "region-edit":
      return applyRegionProps(ctx, command, command.before, command.after)
    case "region-delete":
      return deleteRegion(ctx, command)
    case "region-move":
      return applyMove(ctx, command, command.afterOrders)
    case "fill-cells":
      return fillCells(ctx, command)
    case "grid-change":
      return applyGrid(ctx, command, command.after)
    case "reproject":
      return applyReprojection(ctx, command, command.afterCells, command.afterGrid)
    default:
      return unknownCommand(command)
  }
}

export function undoCommand(ctx: CommandContext, command: Command): boolean {
  switch (command.type) {
    case "region-add":
      return removeAddedRegion(ctx, command)
    case "region-edit":
      return applyRegionProps(ctx, command, command.after, command.before)
    case "region-delete":
      return restoreDeletedRegion(ctx, command)
    case "region-move":
      return applyMove(ctx, command, command.beforeOrders)
    case "fill-cells":
      return restoreCells(ctx, command)
    case "grid-change":
      return applyGrid(ctx, command, command.before)
    case "reproject":
      return applyReprojection(ctx, command, command.beforeCells, command.beforeGrid)
    default:
      return unknownCommand(command)
  }
}

/** Human-readable label for tooltips */
export function describeCommand({ store }: CommandContext, command: Command): string {
  switch (command.type) {
    case "region-add":
      return `Add region '${command.region.name}'`
    case "region-edit":
      return `Edit region '${command.before.name}'`
    case "region-delete": {
      const workspace = store.ensureWorkspace(command.workspaceId)
      return `Delete region '${command.region.name}' -> ${regionName(workspace, command.replacementId)}`
    }
    case "region-move": {
      const workspace = store.ensureWorkspace(command.workspaceId)
      const direction = command.delta < 0 ? "up" : "down"
      return `Move region '${regionName(workspace, command.regionId)}' ${direction}`
    }
    case "fill-cells": {
      if (command.regionId === null) return "Erase rectangle"
      const workspace = store.ensureWorkspace(command.workspaceId)
      return `Fill rectangle with '${regionName(workspace, command.regionId)}'`
    }
    case "grid-change":
      return "Update grid properties"
    case "reproject":
      return "Reproject grid assignments"
    default:
      unknownCommand(command)
      return "Unknown action"
  }
}

// Selection helpers -------------------------------------------------------------

/** Users in the workspace still on Empty get the first region selected */
function autoSelectFirstRegion(
  { store, notifier }: CommandContext,
  workspaceId: WorkspaceId,
  regionId: RegionId,
): void {
  for (const userId of store.membersOf(workspaceId)) {
    const player = store.ensurePlayer(userId)
    if (player.selectedRegionId !== EMPTY_REGION_ID) continue
    const next = store.updatePlayer(userId, { selectedRegionId: regionId })
    notifier.notifyPlayerChanged(userId, next, "player-selection-changed")
  }
}

/** Users in the workspace with a now-missing region selected fall back to Empty */
function clearSelections(
  { store, notifier }: CommandContext,
  workspaceId: WorkspaceId,
  regionId: RegionId,
): void {
  for (const userId of store.membersOf(workspaceId)) {
    const player = store.ensurePlayer(userId)
    if (player.selectedRegionId !== regionId) continue
    const next = store.updatePlayer(userId, { selectedRegionId: EMPTY_REGION_ID })
    notifier.notifyPlayerChanged(userId, next, "player-selection-changed")
  }
}

// Regions -----------------------------------------------------------------------

function addRegion(ctx: CommandContext, command: RegionAddCommand): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  insertRegion(workspace, command.region)
  renumberOrders(workspace)

  if (countRegions(workspace) === 1) {
    autoSelectFirstRegion(ctx, command.workspaceId, command.region.id)
  }

  ctx.notifier.notifyRegionsChanged(command.workspaceId, {
    type: "added",
    regionId: command.region.id,
    regionName: command.region.name,
  })
  return true
}

function removeAddedRegion(ctx: CommandContext, command: RegionAddCommand): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  if (!workspace.regions.delete(command.region.id)) {
    console.warn("[Commands] region to remove is already gone:", command.region.id)
    return true
  }
  renumberOrders(workspace)
  clearSelections(ctx, command.workspaceId, command.region.id)
  ctx.notifier.notifyRegionsChanged(command.workspaceId, {
    type: "deleted",
    regionId: command.region.id,
    regionName: command.region.name,
    before: command.region,
  })
  return true
}

function applyRegionProps(
  ctx: CommandContext,
  command: RegionEditCommand,
  from: Readonly<RegionProps>,
  to: Readonly<RegionProps>,
): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  const region = workspace.regions.get(command.regionId)
  if (!region) {
    console.warn("[Commands] cannot edit missing region:", command.regionId)
    return true
  }
  workspace.regions.set(
    region.id,
    Object.freeze({ ...region, name: to.name, color: normalizeColor(to.color) }),
  )
  ctx.notifier.notifyRegionsChanged(command.workspaceId, {
    type: classifyEdit(from, to) ?? "modified",
    regionId: region.id,
    regionName: to.name,
    before: { name: from.name, color: { ...from.color } },
    after: { name: to.name, color: { ...to.color } },
  })
  return true
}

/**
 * Cells a delete remapped that were painted with the region after the
 * command was captured, per command instance, so undo can put them back.
 */
const uncapturedCells = new WeakMap<
  RegionDeleteCommand,
  { replacementId: RegionId | null; keys: Map<SurfaceId, CellKey[]> }
>()

function deleteRegion(ctx: CommandContext, command: RegionDeleteCommand): boolean {
  const { store, notifier } = ctx
  const workspace = store.ensureWorkspace(command.workspaceId)
  const regionId = command.region.id

  let replacementId = command.replacementId
  if (replacementId !== null && !workspace.regions.has(replacementId)) {
    console.warn("[Commands] replacement region is gone, unassigning cells:", replacementId)
    replacementId = null
  }

  const touched = new Set<SurfaceId>()
  for (const [surfaceId, keys] of command.affectedCells) {
    const cells = store.ensureImage(workspace, surfaceId)
    for (const key of keys) {
      if (readCell(cells, key) === regionId) writeCell(cells, key, replacementId)
    }
    touched.add(surfaceId)
  }
  const stray = new Map<SurfaceId, CellKey[]>()
  for (const [surfaceId, cells] of workspace.images) {
    const keys = keysWithRegion(cells, regionId)
    if (keys.length === 0) continue
    console.warn(`[Commands] remapping ${keys.length} uncaptured cells of region ${regionId}`)
    for (const key of keys) writeCell(cells, key, replacementId)
    stray.set(surfaceId, keys)
    touched.add(surfaceId)
  }
  uncapturedCells.set(command, { replacementId, keys: stray })

  workspace.regions.delete(regionId)
  renumberOrders(workspace)
  clearSelections(ctx, command.workspaceId, regionId)

  for (const surfaceId of touched) {
    notifier.notifyCellsChanged(command.workspaceId, surfaceId, null, null)
  }
  notifier.notifyRegionsChanged(command.workspaceId, {
    type: "deleted",
    regionId,
    regionName: command.region.name,
    before: command.region,
  })
  return true
}

function restoreDeletedRegion(ctx: CommandContext, command: RegionDeleteCommand): boolean {
  const { store, notifier } = ctx
  const workspace = store.ensureWorkspace(command.workspaceId)
  const regionId = command.region.id

  insertRegion(workspace, command.region)
  applyOrders(workspace, command.beforeOrders)
  renumberOrders(workspace)

  const touched = new Set<SurfaceId>()
  for (const [surfaceId, keys] of command.affectedCells) {
    const cells = store.ensureImage(workspace, surfaceId)
    for (const key of keys) writeCell(cells, key, regionId)
    touched.add(surfaceId)
  }
  // Only cells nobody repainted since the delete go back
  const uncaptured = uncapturedCells.get(command)
  if (uncaptured) {
    for (const [surfaceId, keys] of uncaptured.keys) {
      const cells = store.ensureImage(workspace, surfaceId)
      for (const key of keys) {
        if (readCell(cells, key) === uncaptured.replacementId) writeCell(cells, key, regionId)
      }
      touched.add(surfaceId)
    }
  }
  uncapturedCells.delete(command)

  for (const surfaceId of touched) {
    notifier.notifyCellsChanged(command.workspaceId, surfaceId, null, null)
  }
  notifier.notifyRegionsChanged(command.workspaceId, {
    type: "added",
    regionId,
    regionName: command.region.name,
  })
  return true
}

function applyMove(
  ctx: CommandContext,
  command: RegionMoveCommand,
  orders: ReadonlyMap<RegionId, number>,
): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  applyOrders(workspace, orders)
  renumberOrders(workspace)
  ctx.notifier.notifyRegionsChanged(command.workspaceId, {
    type: "order-changed",
    regionId: command.regionId,
    regionName: regionName(workspace, command.regionId),
  })
  return true
}

// Cells and grids ---------------------------------------------------------------

function fillCells(ctx: CommandContext, command: FillCellsCommand): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  const cells = ctx.store.ensureImage(workspace, command.surfaceId)
  if (command.regionId !== null && !workspace.regions.has(command.regionId)) {
    console.warn("[Commands] filling with missing region, skipping:", command.regionId)
    return true
  }
  const changed = new Set<CellKey>()
  for (const key of command.previous.keys()) {
    writeCell(cells, key, command.regionId)
    changed.add(key)
  }
  ctx.notifier.notifyCellsChanged(command.workspaceId, command.surfaceId, changed, command.regionId)
  return true
}

function restoreCells(ctx: CommandContext, command: FillCellsCommand): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  const cells = ctx.store.ensureImage(workspace, command.surfaceId)
  const changed = new Set<CellKey>()
  for (const [key, previous] of command.previous) {
    if (previous !== null && !workspace.regions.has(previous)) {
      console.warn("[Commands] cannot restore cell to missing region:", key, previous)
      continue
    }
    writeCell(cells, key, previous)
    changed.add(key)
  }
  ctx.notifier.notifyCellsChanged(command.workspaceId, command.surfaceId, changed, null)
  return true
}

function applyGrid(
  ctx: CommandContext,
  command: GridChangeCommand,
  grid: GridDescriptor,
): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  workspace.grids.set(command.surfaceId, grid)
  ctx.notifier.notifyGridChanged(command.workspaceId, command.surfaceId)
  return true
}

function applyReprojection(
  ctx: CommandContext,
  command: ReprojectCommand,
  cells: ReadonlyMap<CellKey, RegionId>,
  grid: GridDescriptor,
): boolean {
  const workspace = ctx.store.ensureWorkspace(command.workspaceId)
  // Copy so later fills cannot reach into the command's snapshot
  workspace.images.set(command.surfaceId, copyCells(cells))
  workspace.grids.set(command.surfaceId, grid)
  ctx.notifier.notifyCellsChanged(command.workspaceId, command.surfaceId, null, null)
  ctx.notifier.notifyGridChanged(command.workspaceId, command.surfaceId)
  return true
}
