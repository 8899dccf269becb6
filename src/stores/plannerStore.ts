import { map } from "nanostores"
import {
  DEFAULT_GRID,
  DEFAULT_REGIONS,
  DEFAULT_UNDO_CAPACITY,
  DEFAULT_VISIBILITY_LEVEL,
  EMPTY_REGION,
  EMPTY_REGION_ID,
  MAX_VISIBILITY_LEVEL,
} from "@/lib/constants"
import { allocateRegionId, createRegion, insertRegion } from "@/lib/regions/regionStore"
import { HistoryStore } from "./historyStore"
import type {
  CellMap,
  GridDescriptor,
  PlayerState,
  SurfaceId,
  UserId,
  VisibilityLevel,
  WorkspaceId,
  WorkspaceState,
} from "@/types/planner"

export interface PlannerStoreOptions {
  /** Max undo entries kept per user */
  undoCapacity?: number
  /** Seed fresh workspaces with the default region list */
  seedDefaultRegions?: boolean
  /** Wall-clock source for command timestamps */
  clock?: () => number
}

/** Floor and clamp an arbitrary number into 0..3 */
export function toVisibilityLevel(level: number): VisibilityLevel {
  const n = Number.isFinite(level) ? Math.floor(level) : DEFAULT_VISIBILITY_LEVEL
  if (n <= 0) return 0
  if (n === 1) return 1
  if (n === 2) return 2
  return MAX_VISIBILITY_LEVEL
}

export function createPlayerState(): PlayerState {
  return {
    workspaceId: null,
    selectedRegionId: EMPTY_REGION_ID,
    selectedTool: null,
    boundaryVisibilityLevel: DEFAULT_VISIBILITY_LEVEL,
  }
}

export function createWorkspaceState(id: WorkspaceId, seedDefaultRegions: boolean): WorkspaceState {
  const workspace: WorkspaceState = {
    id,
    nextRegionId: 1,
    regions: new Map([[EMPTY_REGION_ID, EMPTY_REGION]]),
    grids: new Map(),
    images: new Map(),
  }
  if (seedDefaultRegions) {
    for (const def of DEFAULT_REGIONS) {
      const regionId = allocateRegionId(workspace)
      insertRegion(workspace, createRegion(regionId, def.name, def.color, regionId))
    }
  }
  return workspace
}

/**
 * Owner of all planner state: workspaces (regions, grids, cell maps), per-user
 * selection state and per-user history. Workspaces and players are created
 * lazily on first access.
 *
 * Workspace internals are mutated in place by commands and announced through
 * the ChangeNotifier; `$players` and the history store are replaced on every
 * change and can be subscribed to directly.
 */
export class PlannerStore {
  readonly $workspaces = map<Record<WorkspaceId, WorkspaceState>>({})
  readonly $players = map<Record<UserId, PlayerState>>({})
  readonly history: HistoryStore
  readonly seedDefaultRegions: boolean

  private readonly clock: () => number
  private lastTimestamp = 0

  constructor(options: PlannerStoreOptions = {}) {
    this.history = new HistoryStore(options.undoCapacity ?? DEFAULT_UNDO_CAPACITY)
    this.seedDefaultRegions = options.seedDefaultRegions ?? true
    this.clock = options.clock ?? Date.now
  }

  get undoCapacity(): number {
    return this.history.capacity
  }

  // Workspaces -----------------------------------------------------------------

  ensureWorkspace(workspaceId: WorkspaceId): WorkspaceState {
    const existing = this.$workspaces.get()[workspaceId]
    if (existing) return existing
    const workspace = createWorkspaceState(workspaceId, this.seedDefaultRegions)
    this.$workspaces.setKey(workspaceId, workspace)
    return workspace
  }

  findWorkspace(workspaceId: WorkspaceId): WorkspaceState | undefined {
    return this.$workspaces.get()[workspaceId]
  }

  /** Install a fully built workspace (snapshot loading). */
  putWorkspace(workspace: WorkspaceState): void {
    this.$workspaces.setKey(workspace.id, workspace)
  }

  workspaceIds(): WorkspaceId[] {
    return Object.keys(this.$workspaces.get())
  }

  ensureGrid(workspace: WorkspaceState, surfaceId: SurfaceId): GridDescriptor {
    let grid = workspace.grids.get(surfaceId)
    if (!grid) {
      grid = DEFAULT_GRID
      workspace.grids.set(surfaceId, grid)
    }
    return grid
  }

  ensureImage(workspace: WorkspaceState, surfaceId: SurfaceId): CellMap {
    let cells = workspace.images.get(surfaceId)
    if (!cells) {
      cells = new Map()
      workspace.images.set(surfaceId, cells)
    }
    return cells
  }

  // Players --------------------------------------------------------------------

  ensurePlayer(userId: UserId): PlayerState {
    const existing = this.$players.get()[userId]
    if (existing) return existing
    const player = createPlayerState()
    this.$players.setKey(userId, player)
    return player
  }

  findPlayer(userId: UserId): PlayerState | undefined {
    return this.$players.get()[userId]
  }

  updatePlayer(userId: UserId, patch: Partial<PlayerState>): PlayerState {
    const next = { ...this.ensurePlayer(userId), ...patch }
    this.$players.setKey(userId, next)
    return next
  }

  playerIds(): UserId[] {
    return Object.keys(this.$players.get())
  }

  /** Users whose last action was in the workspace */
  membersOf(workspaceId: WorkspaceId): UserId[] {
    return Object.entries(this.$players.get())
      .filter(([, player]) => player.workspaceId === workspaceId)
      .map(([userId]) => userId)
  }

  // Clock ----------------------------------------------------------------------

  /** Strictly increasing timestamp, seeded from the wall clock */
  nextTimestamp(): number {
    const now = Math.floor(this.clock())
    this.lastTimestamp = now > this.lastTimestamp ? now : this.lastTimestamp + 1
    return this.lastTimestamp
  }

  // Administrative resets (irreversible, bypass history) -----------------------

  resetWorkspace(workspaceId: WorkspaceId): void {
    const next = { ...this.$workspaces.get() }
    delete next[workspaceId]
    this.$workspaces.set(next)
  }

  resetSurface(workspaceId: WorkspaceId, surfaceId: SurfaceId): void {
    const workspace = this.ensureWorkspace(workspaceId)
    workspace.images.set(surfaceId, new Map())
  }

  resetPlayer(userId: UserId): void {
    const next = { ...this.$players.get() }
    delete next[userId]
    this.$players.set(next)
    this.history.clear(userId)
  }

  resetAll(): void {
    this.$workspaces.set({})
    this.$players.set({})
    this.history.clearAll()
  }
}
