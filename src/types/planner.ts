/**
 * planner.ts
 *
 * Domain types shared by the planner stores, commands and storage layer.
 */

export type WorkspaceId = string
export type UserId = string
export type SurfaceId = string
export type RegionId = number

/** Composite "x:y" key of a grid cell */
export type CellKey = string

/** Sparse cell assignments. A missing key means "unassigned". */
export type CellMap = Map<CellKey, RegionId>

export interface WorldPosition {
  x: number
  y: number
}

export interface CellCoord {
  x: number
  y: number
}

/** Inclusive range of cell coordinates */
export interface CellRange {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

/** RGBA, every channel in [0, 1] */
export interface Color {
  r: number
  g: number
  b: number
  a: number
}

/** Color as accepted from callers; alpha defaults to 1 */
export interface ColorInput {
  r: number
  g: number
  b: number
  a?: number
}

export interface Region {
  readonly id: RegionId
  readonly name: string
  readonly color: Readonly<Color>
  readonly order: number
}

export interface GridDescriptor {
  readonly width: number
  readonly height: number
  readonly xOffset: number
  readonly yOffset: number
}

export interface WorkspaceState {
  id: WorkspaceId
  /** Next id handed out by addRegion; never decreases */
  nextRegionId: RegionId
  regions: Map<RegionId, Region>
  grids: Map<SurfaceId, GridDescriptor>
  images: Map<SurfaceId, CellMap>
}

/** 0 = boundaries hidden, 1..3 = increasingly visible */
export type VisibilityLevel = 0 | 1 | 2 | 3

export interface PlayerState {
  /** Workspace the user last acted in, or null before any action */
  workspaceId: WorkspaceId | null
  selectedRegionId: RegionId
  selectedTool: string | null
  boundaryVisibilityLevel: VisibilityLevel
}

export type RegionChangeType =
  | "added"
  | "deleted"
  | "modified"
  | "name-modified"
  | "order-changed"

export interface RegionProps {
  name: string
  color: Color
}

export interface RegionChangeEvent {
  type: RegionChangeType
  regionId: RegionId
  regionName: string
  before?: RegionProps | Region
  after?: RegionProps | Region
}
