import { describe, it, expect, vi, afterEach } from "vitest"
import { upgradeDocument } from "../migrations"
import { GridPlanner } from "@/lib/engine/planner"
import { PlannerError } from "@/lib/errors"

const red = { r: 1, g: 0, b: 0 }

function buildPlanner(): GridPlanner {
  const planner = new GridPlanner({ seedDefaultRegions: false, undoCapacity: 5, clock: () => 1000 })
  const a = planner.addRegion("team", "alice", "A", red)
  const b = planner.addRegion("team", "alice", "B", { r: 0, g: 1, b: 0, a: 0.5 })
  planner.setGrid("team", "alice", "nauvis", { width: 16, height: 16 })
  planner.fillRectangle("team", "alice", "nauvis", a.id, { x: 0, y: 0 }, { x: 31, y: 0 })
  planner.fillRectangle("team", "alice", "nauvis", b.id, { x: 16, y: 0 }, { x: 16, y: 0 })
  planner.deleteRegion("team", "alice", b.id, a.id)
  planner.setGrid("team", "alice", "nauvis", { width: 8, height: 8 }, { reproject: true })
  planner.moveRegion("team", "alice", a.id, 0)
  planner.setVisibility("alice", 1)
  planner.setSelectedTool("alice", "brush")
  planner.undo("alice")
  return planner
}

/** Through JSON text, the way every store persists documents */
function roundTrip(planner: GridPlanner): GridPlanner {
  const text = JSON.stringify(planner.toDocument(5000))
  return GridPlanner.fromDocument(upgradeDocument(JSON.parse(text)))
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("Snapshots", () => {
  it("should restore workspace state", () => {
    const planner = buildPlanner()
    const loaded = roundTrip(planner)

    expect(loaded.getRegions("team")).toEqual(planner.getRegions("team"))
    expect(loaded.getGrid("team", "nauvis")).toEqual({ width: 16, height: 16, xOffset: 0, yOffset: 0 })
    expect(loaded.getCells("team", "nauvis")).toEqual(
      new Map([
        ["0:0", 1],
        ["1:0", 1],
      ]),
    )
    expect(loaded.store.undoCapacity).toBe(5)
  })

  it("should restore players and their history", () => {
    const loaded = roundTrip(buildPlanner())

    expect(loaded.getPlayer("alice")).toEqual({
      workspaceId: "team",
      selectedRegionId: 1,
      selectedTool: "brush",
      boundaryVisibilityLevel: 1,
    })
    expect(loaded.peekUndoDescription("alice")).toBe("Delete region 'B' -> A")
    expect(loaded.peekRedoDescription("alice")).toBe("Reproject grid assignments")
  })

  it("should keep restored history usable", () => {
    const loaded = roundTrip(buildPlanner())

    expect(loaded.redo("alice").status).toBe("redone")
    expect(loaded.getCells("team", "nauvis").size).toBe(8)

    loaded.undo("alice")
    loaded.undo("alice")
    expect(loaded.getRegion("team", 2)?.color).toEqual({ r: 0, g: 1, b: 0, a: 0.5 })
    expect(loaded.cellAt("team", "nauvis", 1, 0)).toBe(2)

    // Ids stay unique after the restored delete is undone
    expect(loaded.addRegion("team", "alice", "C", red).id).toBe(3)
  })

  it("should store savedAt, version and capacity", () => {
    const doc = buildPlanner().toDocument(1234)
    expect(doc.version).toBe(2)
    expect(doc.savedAt).toBe(1234)
    expect(doc.undoCapacity).toBe(5)
    expect(doc.workspaces.team.images.nauvis.cells).toEqual({ "0:0": 1, "1:0": 1 })
  })

  describe("upgradeDocument", () => {
    const legacyRegions = {
      "0": { id: 0, name: "(Empty)", color: { r: 0, g: 0, b: 0, a: 0 }, order: 0 },
      "1": { id: 1, name: "A", color: { r: 1, g: 0, b: 0 }, order: 1 },
    }

    it("should copy a version 1 grid onto every surface with an image", () => {
      vi.spyOn(console, "log").mockImplementation(() => {})
      const doc = upgradeDocument({
        version: 1,
        workspaces: {
          team: {
            nextRegionId: 2,
            regions: legacyRegions,
            grid: { width: 32, height: 32, xOffset: 1, yOffset: 2 },
            images: { nauvis: { cells: { "0:0": 1 } }, vulcanus: { cells: {} } },
          },
        },
      })

      expect(doc.version).toBe(2)
      expect(doc.undoCapacity).toBe(100)
      expect(doc.players).toEqual({})
      expect(Object.keys(doc.workspaces.team.grids).sort()).toEqual(["nauvis", "vulcanus"])
      expect(doc.workspaces.team.grids.vulcanus).toEqual({ width: 32, height: 32, xOffset: 1, yOffset: 2 })
      expect(doc.workspaces.team.regions["1"].color).toEqual({ r: 1, g: 0, b: 0, a: 1 })
    })

    it("should put a version 1 grid on the default surface when there are no images", () => {
      vi.spyOn(console, "log").mockImplementation(() => {})
      const doc = upgradeDocument({
        version: 1,
        workspaces: {
          team: {
            nextRegionId: 1,
            regions: {},
            grid: { width: 4, height: 4, xOffset: 0, yOffset: 0 },
            images: {},
          },
        },
      })

      expect(doc.workspaces.team.grids).toEqual({
        default: { width: 4, height: 4, xOffset: 0, yOffset: 0 },
      })
    })

    it("should reject versions newer than supported", () => {
      expect(() => upgradeDocument({ version: 3, workspaces: {} })).toThrow("unsupported snapshot version 3")
    })

    it("should name the offending path of malformed documents", () => {
      try {
        upgradeDocument({
          version: 2,
          workspaces: { team: { nextRegionId: 1, regions: {}, grids: { main: { width: 0 } }, images: {} } },
        })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(PlannerError)
        expect(error).toMatchObject({
          code: "invalid-argument",
          message: "invalid snapshot: snapshot.workspaces.team.grids.main.height must be a finite number",
        })
      }
    })

    it("should drop unreadable history entries", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
      const doc = upgradeDocument({
        version: 2,
        workspaces: {},
        players: {
          alice: {
            workspaceId: null,
            selectedRegionId: 0,
            selectedTool: null,
            boundaryVisibilityLevel: 2,
            undo: [
              { command: { type: "teleport" }, description: "Teleport" },
              {
                description: "Update grid properties",
                command: {
                  type: "grid-change",
                  workspaceId: "team",
                  userId: "alice",
                  timestamp: 1,
                  surfaceId: "main",
                  before: { width: 8, height: 8, xOffset: 0, yOffset: 0 },
                  after: { width: 4, height: 4, xOffset: 0, yOffset: 0 },
                },
              },
            ],
            redo: [],
          },
        },
      })

      expect(doc.players.alice.undo.map((entry) => entry.description)).toEqual(["Update grid properties"])
      expect(warn).toHaveBeenCalledTimes(1)
    })
  })
})
