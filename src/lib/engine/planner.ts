/**
 * planner.ts
 *
 * GridPlanner is the surface collaborators talk to: queries for renderers and
 * UI, mutations that become commands on the acting user's history, player
 * preferences and the administrative resets.
 *
 * Every mutation records the acting user as a member of the workspace before
 * anything else happens, so workspace-wide side effects (auto-selecting the
 * first region, clearing a deleted selection) reach them.
 */

import { DEFAULT_SURFACE_ID, EMPTY_REGION, EMPTY_REGION_ID } from "@/lib/constants"
import {
  createFillCells,
  createGridChange,
  createRegionAdd,
  createRegionDelete,
  createRegionEdit,
  createRegionMove,
  createReproject,
} from "@/lib/commands/create"
import type { CommandContext } from "@/lib/commands/context"
import { PlannerError } from "@/lib/errors"
import { copyCells, normalizeRegionId, readCell } from "@/lib/grid/cellMap"
import { boundsOf, cellKey, cellOf } from "@/lib/grid/geometry"
import { ChangeNotifier } from "@/lib/notifications/notifier"
import { orderedRegions } from "@/lib/regions/regionStore"
import { plannerFromDocument, plannerToDocument } from "@/lib/storage/serialize"
import type { PlannerDocument } from "@/lib/storage/types"
import { PlannerStore, toVisibilityLevel, type PlannerStoreOptions } from "@/stores/plannerStore"
import type { Command } from "@/types/commands"
import type {
  CellCoord,
  CellKey,
  ColorInput,
  GridDescriptor,
  PlayerState,
  Region,
  RegionId,
  SurfaceId,
  UserId,
  VisibilityLevel,
  WorkspaceId,
  WorldPosition,
} from "@/types/planner"
import { CommandEngine, type HistoryStepResult } from "./commandEngine"

export interface GridPlannerOptions extends PlannerStoreOptions {
  /** Existing state to operate on; the store options are ignored when given */
  store?: PlannerStore
  notifier?: ChangeNotifier
}

export interface SetGridOptions {
  /** Resample existing cell assignments onto the new grid */
  reproject?: boolean
}

export class GridPlanner {
  readonly store: PlannerStore
  readonly notifier: ChangeNotifier

  private readonly ctx: CommandContext
  private readonly engine: CommandEngine

  constructor(options: GridPlannerOptions = {}) {
    this.store = options.store ?? new PlannerStore(options)
    this.notifier = options.notifier ?? new ChangeNotifier()
    this.ctx = { store: this.store, notifier: this.notifier }
    this.engine = new CommandEngine(this.ctx)
  }

  static fromDocument(doc: PlannerDocument, options: Omit<GridPlannerOptions, "store"> = {}): GridPlanner {
    return new GridPlanner({ ...options, store: plannerFromDocument(doc, options) })
  }

  toDocument(savedAt?: number): PlannerDocument {
    return plannerToDocument(this.store, savedAt)
  }

  // Queries ----------------------------------------------------------------------

  getGrid(workspaceId: WorkspaceId, surfaceId: SurfaceId = DEFAULT_SURFACE_ID): GridDescriptor {
    return this.store.ensureGrid(this.store.ensureWorkspace(workspaceId), surfaceId)
  }

  /** Empty first, then regions in display order */
  getRegions(workspaceId: WorkspaceId): Region[] {
    return [EMPTY_REGION, ...orderedRegions(this.store.ensureWorkspace(workspaceId))]
  }

  getRegion(workspaceId: WorkspaceId, regionId: RegionId): Region | null {
    return this.store.ensureWorkspace(workspaceId).regions.get(regionId) ?? null
  }

  /** Region assigned to a cell, null when unassigned */
  cellAt(workspaceId: WorkspaceId, surfaceId: SurfaceId, cellX: number, cellY: number): RegionId | null {
    const cells = this.store.findWorkspace(workspaceId)?.images.get(surfaceId)
    return cells ? readCell(cells, cellKey(cellX, cellY)) : null
  }

  /** Copy of a surface's assignments */
  getCells(workspaceId: WorkspaceId, surfaceId: SurfaceId): Map<CellKey, RegionId> {
    const cells = this.store.findWorkspace(workspaceId)?.images.get(surfaceId)
    return cells ? copyCells(cells) : new Map()
  }

  tileToCell(workspaceId: WorkspaceId, surfaceId: SurfaceId, worldX: number, worldY: number): CellCoord {
    return cellOf(this.getGrid(workspaceId, surfaceId), worldX, worldY)
  }

  cellBounds(
    workspaceId: WorkspaceId,
    surfaceId: SurfaceId,
    cellX: number,
    cellY: number,
  ): { topLeft: WorldPosition; bottomRight: WorldPosition } {
    return boundsOf(this.getGrid(workspaceId, surfaceId), cellX, cellY)
  }

  getPlayer(userId: UserId): PlayerState {
    return this.store.ensurePlayer(userId)
  }

  canUndo(userId: UserId): boolean {
    return this.engine.canUndo(userId)
  }

  canRedo(userId: UserId): boolean {
    return this.engine.canRedo(userId)
  }

  peekUndoDescription(userId: UserId): string | null {
    return this.engine.peekUndoDescription(userId)
  }

  peekRedoDescription(userId: UserId): string | null {
    return this.engine.peekRedoDescription(userId)
  }

  // Mutations --------------------------------------------------------------------

  private join(userId: UserId, workspaceId: WorkspaceId): void {
    if (this.store.ensurePlayer(userId).workspaceId !== workspaceId) {
      this.store.updatePlayer(userId, { workspaceId })
    }
  }

  private run(userId: UserId, command: Command): boolean {
    return this.engine.execute(userId, command).status === "performed"
  }

  /**
   * Assign every cell touched by the world rectangle to a region (null or the
   * Empty id erases). Returns the number of cells that changed.
   */
  fillRectangle(
    workspaceId: WorkspaceId,
    userId: UserId,
    surfaceId: SurfaceId,
    regionId: RegionId | null | undefined,
    corner1: WorldPosition,
    corner2: WorldPosition,
  ): number {
    this.join(userId, workspaceId)
    const command = createFillCells(this.ctx, workspaceId, userId, surfaceId, regionId, corner1, corner2)
    if (!command) return 0
    return this.run(userId, command) ? command.previous.size : 0
  }

  addRegion(workspaceId: WorkspaceId, userId: UserId, name: string, color: ColorInput): Region {
    this.join(userId, workspaceId)
    const command = createRegionAdd(this.ctx, workspaceId, userId, name, color)
    this.run(userId, command)
    return this.getRegion(workspaceId, command.region.id) ?? command.region
  }

  /** Returns the updated region, or null when nothing differed */
  editRegion(
    workspaceId: WorkspaceId,
    userId: UserId,
    regionId: RegionId,
    changes: { name?: string; color?: ColorInput },
  ): Region | null {
    this.join(userId, workspaceId)
    const command = createRegionEdit(this.ctx, workspaceId, userId, regionId, changes)
    if (!command) return null
    this.run(userId, command)
    return this.getRegion(workspaceId, regionId)
  }

  /** Cells of the region move to the replacement, or become unassigned */
  deleteRegion(
    workspaceId: WorkspaceId,
    userId: UserId,
    regionId: RegionId,
    replacementId?: RegionId | null,
  ): void {
    this.join(userId, workspaceId)
    this.run(userId, createRegionDelete(this.ctx, workspaceId, userId, regionId, replacementId))
  }

  /** Negative deltas move towards the top of the list. Returns whether the order changed. */
  moveRegion(workspaceId: WorkspaceId, userId: UserId, regionId: RegionId, delta: number): boolean {
    this.join(userId, workspaceId)
    const command = createRegionMove(this.ctx, workspaceId, userId, regionId, delta)
    return command ? this.run(userId, command) : false
  }

  /** Returns false when the resulting grid equals the current one */
  setGrid(
    workspaceId: WorkspaceId,
    userId: UserId,
    surfaceId: SurfaceId,
    patch: Partial<GridDescriptor>,
    { reproject = false }: SetGridOptions = {},
  ): boolean {
    this.join(userId, workspaceId)
    const command = reproject
      ? createReproject(this.ctx, workspaceId, userId, surfaceId, patch)
      : createGridChange(this.ctx, workspaceId, userId, surfaceId, patch)
    return command ? this.run(userId, command) : false
  }

  undo(userId: UserId): HistoryStepResult {
    return this.engine.undo(userId)
  }

  redo(userId: UserId): HistoryStepResult {
    return this.engine.redo(userId)
  }

  // Player preferences -------------------------------------------------------------

  /** Floors and clamps into 0..3; returns the stored level */
  setVisibility(userId: UserId, level: number): VisibilityLevel {
    const next = toVisibilityLevel(level)
    if (this.store.ensurePlayer(userId).boundaryVisibilityLevel !== next) {
      const player = this.store.updatePlayer(userId, { boundaryVisibilityLevel: next })
      this.notifier.notifyPlayerChanged(userId, player, "player-visibility-changed")
    }
    return next
  }

  /** null selects Empty. Unknown regions are rejected. */
  setSelectedRegion(userId: UserId, workspaceId: WorkspaceId, regionId: RegionId | null): void {
    const selected = normalizeRegionId(regionId) ?? EMPTY_REGION_ID
    if (!this.store.ensureWorkspace(workspaceId).regions.has(selected)) {
      throw new PlannerError("region-not-found", "setSelectedRegion", "region not found", {
        regionId: selected,
      })
    }
    this.join(userId, workspaceId)
    if (this.store.ensurePlayer(userId).selectedRegionId === selected) return
    const player = this.store.updatePlayer(userId, { selectedRegionId: selected })
    this.notifier.notifyPlayerChanged(userId, player, "player-selection-changed")
  }

  setSelectedTool(userId: UserId, tool: string | null): void {
    if (this.store.ensurePlayer(userId).selectedTool === tool) return
    const player = this.store.updatePlayer(userId, { selectedTool: tool })
    this.notifier.notifyPlayerChanged(userId, player, "player-selection-changed")
  }

  // Administrative resets (irreversible, not recorded in history) ------------------

  private surfacesOf(workspaceId: WorkspaceId): SurfaceId[] {
    return [...(this.store.findWorkspace(workspaceId)?.images.keys() ?? [])]
  }

  /** Full refresh for every surface of a dropped workspace */
  private notifyCleared(workspaceId: WorkspaceId, surfaceIds: readonly SurfaceId[]): void {
    for (const surfaceId of surfaceIds) {
      this.notifier.notifyCellsChanged(workspaceId, surfaceId, null, null)
    }
    this.notifier.notifyGridChanged(workspaceId, null)
  }

  resetWorkspace(workspaceId: WorkspaceId): void {
    if (!this.store.findWorkspace(workspaceId)) return
    const surfaceIds = this.surfacesOf(workspaceId)
    this.store.resetWorkspace(workspaceId)
    this.notifyCleared(workspaceId, surfaceIds)
  }

  resetSurface(workspaceId: WorkspaceId, surfaceId: SurfaceId): void {
    this.store.resetSurface(workspaceId, surfaceId)
    this.notifier.notifyCellsChanged(workspaceId, surfaceId, null, null)
  }

  resetPlayer(userId: UserId): void {
    this.store.resetPlayer(userId)
    this.notifier.notifyHistoryChanged(userId)
  }

  resetAll(): void {
    const surfaces = new Map(
      this.store.workspaceIds().map((id): [WorkspaceId, SurfaceId[]] => [id, this.surfacesOf(id)]),
    )
    const userIds = this.store.playerIds()
    this.store.resetAll()
    for (const [workspaceId, surfaceIds] of surfaces) this.notifyCleared(workspaceId, surfaceIds)
    for (const userId of userIds) this.notifier.notifyHistoryChanged(userId)
  }
}
