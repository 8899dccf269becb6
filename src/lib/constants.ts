/**
 * Planner-wide constants and defaults
 */

import type { ColorInput, GridDescriptor, Region, VisibilityLevel } from "@/types/planner"

// Reserved id of the built-in "(Empty)" region; never stored in a cell map
export const EMPTY_REGION_ID = 0

export const EMPTY_REGION: Region = Object.freeze({
  id: EMPTY_REGION_ID,
  name: "(Empty)",
  color: Object.freeze({ r: 0, g: 0, b: 0, a: 0 }),
  order: 0,
})

export const DEFAULT_GRID: GridDescriptor = Object.freeze({
  width: 8,
  height: 8,
  xOffset: 0,
  yOffset: 0,
})

export const DEFAULT_SURFACE_ID = "default"

export const DEFAULT_UNDO_CAPACITY = 100

export const DEFAULT_VISIBILITY_LEVEL: VisibilityLevel = 2
export const MAX_VISIBILITY_LEVEL: VisibilityLevel = 3

// Pulled off a cell's far edge during reprojection so an edge lying exactly
// on a new grid line stays in the lower cell
export const REPROJECT_EPSILON = 0.0001

export const SCHEMA_VERSION = 2

export const DEFAULT_REGIONS: ReadonlyArray<{ name: string; color: ColorInput }> = [
  { name: "Belts", color: { r: 1, g: 0.8, b: 0 } },
  { name: "Trains", color: { r: 0.9, g: 0.8, b: 0.7 } },
  { name: "Stations", color: { r: 0.7, g: 0.6, b: 0.5 } },
  { name: "Primary Products", color: { r: 0.5, g: 0.5, b: 1.0 } },
  { name: "Intermediate Products", color: { r: 0.4, g: 1.0, b: 0.4 } },
  { name: "End Products", color: { r: 1, g: 0.5, b: 0.33 } },
  { name: "Research", color: { r: 0.5, g: 0.75, b: 1.0 } },
  { name: "Power", color: { r: 1.0, g: 1.0, b: 0.5 } },
  { name: "Military", color: { r: 0.8, g: 0.2, b: 0.2 } },
  { name: "Utility", color: { r: 0.9, g: 0.4, b: 0.8 } },
]
