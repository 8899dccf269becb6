/**
 * types.ts
 *
 * Snapshot schema for persisted planner state.
 *
 * Primary responsibilities:
 * - Define JSON-safe shapes for workspaces, players and their command history
 * - Define SnapshotMetadata used to list stored snapshots
 */

import type { SCHEMA_VERSION } from "@/lib/constants"
import type {
  CellKey,
  Color,
  RegionId,
  RegionProps,
  SurfaceId,
  UserId,
  WorkspaceId,
} from "@/types/planner"

export interface RegionData {
  id: RegionId
  name: string
  color: Color
  order: number
}

export interface GridData {
  width: number
  height: number
  xOffset: number
  yOffset: number
}

export interface ImageData {
  /** "x:y" → region id; unassigned cells are absent */
  cells: Record<CellKey, RegionId>
}

export interface WorkspaceDocument {
  nextRegionId: RegionId
  /** Keyed by region id, including the reserved Empty region */
  regions: Record<string, RegionData>
  grids: Record<SurfaceId, GridData>
  images: Record<SurfaceId, ImageData>
}

interface CommandDataBase {
  workspaceId: WorkspaceId
  userId: UserId
  timestamp: number
}

export type CommandData = CommandDataBase &
  (
    | { type: "region-add"; region: RegionData }
    | { type: "region-edit"; regionId: RegionId; before: RegionProps; after: RegionProps }
    | {
        type: "region-delete"
        region: RegionData
        replacementId: RegionId | null
        affectedCells: Record<SurfaceId, CellKey[]>
        beforeOrders: Record<string, number>
      }
    | {
        type: "region-move"
        regionId: RegionId
        delta: number
        beforeOrders: Record<string, number>
        afterOrders: Record<string, number>
      }
    | {
        type: "fill-cells"
        surfaceId: SurfaceId
        regionId: RegionId | null
        /** null marks a cell that was unassigned */
        previous: Record<CellKey, RegionId | null>
      }
    | { type: "grid-change"; surfaceId: SurfaceId; before: GridData; after: GridData }
    | {
        type: "reproject"
        surfaceId: SurfaceId
        beforeGrid: GridData
        afterGrid: GridData
        beforeCells: Record<CellKey, RegionId>
        afterCells: Record<CellKey, RegionId>
      }
  )

export interface HistoryEntryData {
  command: CommandData
  description: string
}

export interface PlayerDocument {
  workspaceId: WorkspaceId | null
  selectedRegionId: RegionId
  selectedTool: string | null
  boundaryVisibilityLevel: number
  undo: HistoryEntryData[]
  redo: HistoryEntryData[]
}

export interface PlannerDocument {
  version: typeof SCHEMA_VERSION
  /** Timestamp (ms since epoch) of the snapshot */
  savedAt: number
  undoCapacity: number
  workspaces: Record<WorkspaceId, WorkspaceDocument>
  players: Record<UserId, PlayerDocument>
}

/**
 * Metadata for a stored snapshot
 */
export interface SnapshotMetadata {
  /** Snapshot identifier (e.g. a session or save-slot name) */
  id: string
  version: number
  savedAt: number
}
