/**
 * geometry.ts
 *
 * Mapping between continuous world coordinates and integer cell coordinates
 * of a grid descriptor. Pure functions; the descriptor is the only input
 * besides the coordinates.
 */

import { PlannerError } from "@/lib/errors"
import type {
  CellCoord,
  CellKey,
  CellRange,
  GridDescriptor,
  WorldPosition,
} from "@/types/planner"

const CELL_KEY_PATTERN = /^(-?\d+):(-?\d+)$/

/** floor(a / b), with -0 folded into 0 so keys and comparisons stay stable */
function floorDiv(a: number, b: number): number {
  return Math.floor(a / b) + 0
}

/** Cell containing the world position. Uses floor, so -1 maps to cell -1. */
export function cellOf(grid: GridDescriptor, worldX: number, worldY: number): CellCoord {
  return {
    x: floorDiv(worldX - grid.xOffset, grid.width),
    y: floorDiv(worldY - grid.yOffset, grid.height),
  }
}

/** World-space corners of a cell */
export function boundsOf(
  grid: GridDescriptor,
  cellX: number,
  cellY: number,
): { topLeft: WorldPosition; bottomRight: WorldPosition } {
  const left = cellX * grid.width + grid.xOffset
  const top = cellY * grid.height + grid.yOffset
  return {
    topLeft: { x: left, y: top },
    bottomRight: { x: left + grid.width, y: top + grid.height },
  }
}

/**
 * Inclusive cell range covered by a world rectangle. Corners may be given
 * in any order.
 */
export function cellRangeOf(
  grid: GridDescriptor,
  corner1: WorldPosition,
  corner2: WorldPosition,
): CellRange {
  const a = cellOf(grid, corner1.x, corner1.y)
  const b = cellOf(grid, corner2.x, corner2.y)
  return {
    minX: Math.min(a.x, b.x),
    minY: Math.min(a.y, b.y),
    maxX: Math.max(a.x, b.x),
    maxY: Math.max(a.y, b.y),
  }
}

export function cellKey(x: number, y: number): CellKey {
  return `${x}:${y}`
}

export function parseCellKey(key: string): CellCoord | null {
  const match = CELL_KEY_PATTERN.exec(key)
  if (!match) return null
  return { x: Number(match[1]), y: Number(match[2]) }
}

export function sameGrid(a: GridDescriptor, b: GridDescriptor): boolean {
  return (
    a.width === b.width &&
    a.height === b.height &&
    a.xOffset === b.xOffset &&
    a.yOffset === b.yOffset
  )
}

/**
 * Merge a partial update onto the current descriptor and validate the result.
 * Throws PlannerError("invalid-grid") for non-positive or non-finite values.
 */
export function resolveGrid(
  current: GridDescriptor,
  patch: Partial<GridDescriptor>,
  op = "setGrid",
): GridDescriptor {
  const next: GridDescriptor = {
    width: patch.width ?? current.width,
    height: patch.height ?? current.height,
    xOffset: patch.xOffset ?? current.xOffset,
    yOffset: patch.yOffset ?? current.yOffset,
  }
  validateGrid(next, op)
  return Object.freeze(next)
}

export function validateGrid(grid: GridDescriptor, op = "setGrid"): void {
  if (!Number.isFinite(grid.width) || grid.width <= 0) {
    throw new PlannerError("invalid-grid", op, "grid width must be greater than zero", {
      width: grid.width,
    })
  }
  if (!Number.isFinite(grid.height) || grid.height <= 0) {
    throw new PlannerError("invalid-grid", op, "grid height must be greater than zero", {
      height: grid.height,
    })
  }
  if (!Number.isFinite(grid.xOffset) || !Number.isFinite(grid.yOffset)) {
    throw new PlannerError("invalid-grid", op, "grid offsets must be finite numbers", {
      xOffset: grid.xOffset,
      yOffset: grid.yOffset,
    })
  }
}
