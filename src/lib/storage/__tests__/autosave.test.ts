import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { Autosaver } from "../autosave"
import { MemorySnapshotStore } from "../store"
import { GridPlanner } from "@/lib/engine/planner"

const red = { r: 1, g: 0, b: 0 }

describe("Autosaver", () => {
  let planner: GridPlanner
  let store: MemorySnapshotStore
  let autosaver: Autosaver

  beforeEach(() => {
    vi.useFakeTimers()
    vi.spyOn(console, "log").mockImplementation(() => {})
    planner = new GridPlanner({ seedDefaultRegions: false })
    store = new MemorySnapshotStore()
    autosaver = new Autosaver(planner, store, { snapshotId: "session", debounceMs: 500 })
    autosaver.start()
  })

  afterEach(() => {
    autosaver.stop()
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it("should save once after changes settle", async () => {
    const save = vi.spyOn(store, "save")
    planner.addRegion("team", "alice", "A", red)
    await vi.advanceTimersByTimeAsync(300)
    planner.addRegion("team", "alice", "B", red)
    await vi.advanceTimersByTimeAsync(300)
    expect(save).not.toHaveBeenCalled()
    expect(autosaver.isDirty).toBe(true)

    await vi.advanceTimersByTimeAsync(200)
    expect(save).toHaveBeenCalledTimes(1)
    expect(autosaver.isDirty).toBe(false)

    const saved = await store.get("session")
    expect(Object.keys(saved?.workspaces.team.regions ?? {})).toEqual(["0", "1", "2"])
  })

  it("should not save without changes", async () => {
    const save = vi.spyOn(store, "save")
    await autosaver.flush()
    await vi.advanceTimersByTimeAsync(1000)
    expect(save).not.toHaveBeenCalled()
  })

  it("should save immediately on flush", async () => {
    planner.addRegion("team", "alice", "A", red)
    await autosaver.flush()

    expect((await store.list()).map((entry) => entry.id)).toEqual(["session"])
    expect(autosaver.isDirty).toBe(false)
  })

  it("should stay dirty when saving fails", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    vi.spyOn(store, "save").mockRejectedValueOnce(new Error("disk full"))
    planner.addRegion("team", "alice", "A", red)
    await vi.advanceTimersByTimeAsync(500)

    expect(autosaver.isDirty).toBe(true)
    expect(error).toHaveBeenCalledWith("[Autosave] save failed:", new Error("disk full"))

    await autosaver.flush()
    expect(await store.get("session")).not.toBeNull()
  })

  it("should stop listening after stop", async () => {
    const save = vi.spyOn(store, "save")
    autosaver.stop()
    planner.addRegion("team", "alice", "A", red)
    await vi.advanceTimersByTimeAsync(1000)

    expect(autosaver.isDirty).toBe(false)
    expect(save).not.toHaveBeenCalled()
  })
})
