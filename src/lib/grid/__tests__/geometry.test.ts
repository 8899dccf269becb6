import { describe, it, expect } from "vitest"
import {
  boundsOf,
  cellOf,
  cellRangeOf,
  parseCellKey,
  resolveGrid,
} from "../geometry"
import { DEFAULT_GRID } from "@/lib/constants"
import { PlannerError } from "@/lib/errors"
import type { GridDescriptor } from "@/types/planner"

const grid32: GridDescriptor = { width: 32, height: 32, xOffset: 0, yOffset: 0 }

describe("Grid geometry", () => {
  describe("cellOf", () => {
    it("should floor positive coordinates", () => {
      expect(cellOf(grid32, 0, 0)).toEqual({ x: 0, y: 0 })
      expect(cellOf(grid32, 31.9, 31.9)).toEqual({ x: 0, y: 0 })
      expect(cellOf(grid32, 32, 64)).toEqual({ x: 1, y: 2 })
    })

    it("should floor negative coordinates towards minus infinity", () => {
      expect(cellOf(grid32, -1, -0.5)).toEqual({ x: -1, y: -1 })
      expect(cellOf(grid32, -32, -32)).toEqual({ x: -1, y: -1 })
      expect(cellOf(grid32, -32.1, 0)).toEqual({ x: -2, y: 0 })
    })

    it("should never produce negative zero", () => {
      const { x } = cellOf(grid32, -0, 0)
      expect(Object.is(x, -0)).toBe(false)
    })

    it("should apply offsets before dividing", () => {
      const grid = { width: 10, height: 4, xOffset: 5, yOffset: -2 }
      expect(cellOf(grid, 4, -2)).toEqual({ x: -1, y: 0 })
      expect(cellOf(grid, 5, 2)).toEqual({ x: 0, y: 1 })
    })
  })

  describe("boundsOf", () => {
    it("should return the world corners of a cell", () => {
      expect(boundsOf(grid32, -1, 2)).toEqual({
        topLeft: { x: -32, y: 64 },
        bottomRight: { x: 0, y: 96 },
      })
    })

    it("should bracket every coordinate mapped into the cell", () => {
      const grid = { width: 3, height: 5, xOffset: 1, yOffset: 2 }
      for (const x of [-7.5, -1, 0, 1, 2.9, 4, 13.25]) {
        const cell = cellOf(grid, x, 0)
        const { topLeft, bottomRight } = boundsOf(grid, cell.x, cell.y)
        expect(topLeft.x).toBeLessThanOrEqual(x)
        expect(bottomRight.x).toBeGreaterThan(x)
      }
    })
  })

  describe("cellRangeOf", () => {
    it("should normalize corners given in any order", () => {
      expect(cellRangeOf(grid32, { x: 63, y: 31 }, { x: 0, y: 0 })).toEqual({
        minX: 0,
        minY: 0,
        maxX: 1,
        maxY: 0,
      })
    })
  })

  describe("parseCellKey", () => {
    it("should parse signed integer keys", () => {
      expect(parseCellKey("3:-4")).toEqual({ x: 3, y: -4 })
    })

    it("should reject malformed keys", () => {
      expect(parseCellKey("a:b")).toBeNull()
      expect(parseCellKey("1,2")).toBeNull()
    })
  })

  describe("resolveGrid", () => {
    it("should keep fields missing from the patch", () => {
      const grid = resolveGrid(DEFAULT_GRID, { width: 16 })
      expect(grid).toEqual({ width: 16, height: 8, xOffset: 0, yOffset: 0 })
      expect(Object.isFrozen(grid)).toBe(true)
    })

    it("should reject non-positive sizes", () => {
      expect(() => resolveGrid(DEFAULT_GRID, { width: 0 })).toThrow(PlannerError)
      expect(() => resolveGrid(DEFAULT_GRID, { height: -2 })).toThrow(
        "grid height must be greater than zero",
      )
    })

    it("should reject non-finite offsets", () => {
      try {
        resolveGrid(DEFAULT_GRID, { xOffset: Number.NaN })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(PlannerError)
        expect(error).toMatchObject({ code: "invalid-grid", op: "setGrid" })
      }
    })
  })
})
