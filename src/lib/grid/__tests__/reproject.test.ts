import { describe, it, expect, vi } from "vitest"
import { reprojectCells } from "../reproject"
import { collectFillChanges, copyCells, writeCell } from "../cellMap"
import type { CellMap, GridDescriptor } from "@/types/planner"

const grid = (size: number, offset = 0): GridDescriptor => ({
  width: size,
  height: size,
  xOffset: offset,
  yOffset: offset,
})

function cells(entries: Array<[string, number]>): CellMap {
  return new Map(entries)
}

describe("Cell map helpers", () => {
  it("should delete the key when writing the Empty id or null", () => {
    const map = cells([["0:0", 3], ["1:0", 4]])
    writeCell(map, "0:0", 0)
    writeCell(map, "1:0", null)
    expect(map.size).toBe(0)
  })

  it("should collect only cells that differ from the target", () => {
    const map = cells([["0:0", 2], ["1:0", 5]])
    const changes = collectFillChanges(map, { minX: 0, minY: 0, maxX: 2, maxY: 0 }, 5)
    expect([...changes]).toEqual([
      ["0:0", 2],
      ["2:0", null],
    ])
  })
})

describe("reprojectCells", () => {
  it("should return an equal copy for identical grids", () => {
    const source = cells([["0:0", 1], ["-3:2", 2]])
    const result = reprojectCells(source, grid(32), grid(32))
    expect(result).toEqual(source)
    expect(result).not.toBe(source)
  })

  it("should expand each cell onto every finer cell it covers", () => {
    const result = reprojectCells(cells([["0:0", 7]]), grid(32), grid(16))
    expect([...result.keys()].sort()).toEqual(["0:0", "0:1", "1:0", "1:1"])
    expect(new Set(result.values())).toEqual(new Set([7]))
  })

  it("should not spill into the next cell when edges line up", () => {
    const result = reprojectCells(cells([["1:1", 4]]), grid(16), grid(32))
    // Cell 1:1 of a 16 grid spans 16..32, entirely inside cell 0:0 of a 32 grid
    expect([...result]).toEqual([["0:0", 4]])
  })

  it("should collapse onto a coarser grid without growing", () => {
    const source = cells([
      ["0:0", 1],
      ["1:0", 1],
      ["0:1", 2],
      ["1:1", 2],
      ["2:0", 3],
    ])
    const result = reprojectCells(source, grid(16), grid(32))
    expect(result.size).toBeLessThanOrEqual(source.size)
    expect([...result.keys()].sort()).toEqual(["0:0", "1:0"])
    expect([1, 2]).toContain(result.get("0:0"))
    expect(result.get("1:0")).toBe(3)
  })

  it("should follow offsets of both grids", () => {
    const result = reprojectCells(cells([["0:0", 9]]), grid(10), grid(10, 5))
    // World 0..10 overlaps cells -1 (-5..5) and 0 (5..15) of the shifted grid
    expect([...result.keys()].sort()).toEqual(["-1:-1", "-1:0", "0:-1", "0:0"])
  })

  it("should skip malformed keys with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const result = reprojectCells(cells([["bad", 1], ["0:0", 2]]), grid(8), grid(4))
    expect(result.size).toBe(4)
    expect(warn).toHaveBeenCalledWith("[Reproject] skipping malformed cell key:", "bad")
    warn.mockRestore()
  })

  it("should not alias the input map", () => {
    const source = cells([["0:0", 1]])
    const result = copyCells(source)
    result.set("0:0", 2)
    expect(source.get("0:0")).toBe(1)
  })
})
