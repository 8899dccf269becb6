/**
 * commands.ts
 *
 * Closed set of undoable mutations. Every command carries the before/after
 * snapshots it needs to be performed and reversed without consulting
 * history; snapshots are copies, never live references into a workspace.
 */

import type {
  CellKey,
  GridDescriptor,
  Region,
  RegionId,
  RegionProps,
  SurfaceId,
  UserId,
  WorkspaceId,
} from "./planner"

interface CommandBase {
  readonly workspaceId: WorkspaceId
  readonly userId: UserId
  readonly timestamp: number
}

export interface RegionAddCommand extends CommandBase {
  readonly type: "region-add"
  readonly region: Region
}

export interface RegionEditCommand extends CommandBase {
  readonly type: "region-edit"
  readonly regionId: RegionId
  readonly before: Readonly<RegionProps>
  readonly after: Readonly<RegionProps>
}

export interface RegionDeleteCommand extends CommandBase {
  readonly type: "region-delete"
  readonly region: Region
  /** null reassigns affected cells to Empty */
  readonly replacementId: RegionId | null
  /** Keys per surface that held the deleted region's id */
  readonly affectedCells: ReadonlyMap<SurfaceId, readonly CellKey[]>
  /** Orders of every non-empty region before the delete */
  readonly beforeOrders: ReadonlyMap<RegionId, number>
}

export interface RegionMoveCommand extends CommandBase {
  readonly type: "region-move"
  readonly regionId: RegionId
  readonly delta: number
  readonly beforeOrders: ReadonlyMap<RegionId, number>
  readonly afterOrders: ReadonlyMap<RegionId, number>
}

export interface FillCellsCommand extends CommandBase {
  readonly type: "fill-cells"
  readonly surfaceId: SurfaceId
  /** null erases */
  readonly regionId: RegionId | null
  /** Prior assignment of every touched cell, null = unassigned */
  readonly previous: ReadonlyMap<CellKey, RegionId | null>
}

export interface GridChangeCommand extends CommandBase {
  readonly type: "grid-change"
  readonly surfaceId: SurfaceId
  readonly before: GridDescriptor
  readonly after: GridDescriptor
}

export interface ReprojectCommand extends CommandBase {
  readonly type: "reproject"
  readonly surfaceId: SurfaceId
  readonly beforeGrid: GridDescriptor
  readonly afterGrid: GridDescriptor
  readonly beforeCells: ReadonlyMap<CellKey, RegionId>
  readonly afterCells: ReadonlyMap<CellKey, RegionId>
}

export type Command =
  | RegionAddCommand
  | RegionEditCommand
  | RegionDeleteCommand
  | RegionMoveCommand
  | FillCellsCommand
  | GridChangeCommand
  | ReprojectCommand

export type CommandType = Command["type"]

export const COMMAND_TYPES = [
  "region-add",
  "region-edit",
  "region-delete",
  "region-move",
  "fill-cells",
  "grid-change",
  "reproject",
] as const satisfies readonly CommandType[]

/** A performed command as kept on the undo/redo stacks */
export interface HistoryEntry {
  readonly command: Command
  readonly description: string
}
