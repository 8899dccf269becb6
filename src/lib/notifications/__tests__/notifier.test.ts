import { describe, it, expect, vi, afterEach } from "vitest"
import { ChangeNotifier, guardReentrant, type BackendChange } from "../notifier"

afterEach(() => {
  vi.restoreAllMocks()
})

describe("ChangeNotifier", () => {
  it("should keep notifying other consumers when one throws", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    const notifier = new ChangeNotifier()
    const received: string[] = []
    notifier.subscribe({
      onCellsChanged: () => {
        throw new Error("render failed")
      },
    })
    notifier.subscribe({
      onCellsChanged: (workspaceId, surfaceId, keys, regionId) => {
        received.push(`${workspaceId}/${surfaceId}/${keys ? [...keys].join(",") : "all"}/${regionId}`)
      },
    })

    notifier.notifyCellsChanged("ws", "main", new Set(["0:0", "1:0"]), 3)

    expect(received).toEqual(["ws/main/0:0,1:0/3"])
    expect(error).toHaveBeenCalledTimes(1)
    expect(error.mock.calls[0][0]).toBe("[Notifier] consumer failed during cells-changed:")
  })

  it("should follow every specific callback with a backend change", () => {
    const notifier = new ChangeNotifier()
    const changes: BackendChange[] = []
    notifier.subscribe({ onBackendChanged: (change) => changes.push(change) })

    notifier.notifyGridChanged("ws", null)
    notifier.notifyHistoryChanged("alice")

    expect(changes).toEqual([
      { kind: "grid-changed", workspaceId: "ws", surfaceId: null },
      { kind: "undo-redo-changed", userId: "alice" },
    ])
  })

  it("should stop calling a consumer after unsubscribe", () => {
    const notifier = new ChangeNotifier()
    const onGridChanged = vi.fn()
    const unsubscribe = notifier.subscribe({ onGridChanged })

    notifier.notifyGridChanged("ws", "main")
    unsubscribe()
    notifier.notifyGridChanged("ws", "main")

    expect(onGridChanged).toHaveBeenCalledTimes(1)
    expect(notifier.size).toBe(0)
  })
})

describe("guardReentrant", () => {
  it("should drop calls made while the wrapped function runs", () => {
    const calls: number[] = []
    let nested: boolean | undefined
    const rebuild = guardReentrant((depth: number) => {
      calls.push(depth)
      if (depth === 0) nested = rebuild(1)
    })

    expect(rebuild(0)).toBe(true)
    expect(nested).toBe(false)
    expect(calls).toEqual([0])
  })

  it("should run again after a call that threw", () => {
    let fail = true
    const rebuild = guardReentrant(() => {
      if (fail) throw new Error("boom")
    })

    expect(() => rebuild()).toThrow("boom")
    fail = false
    expect(rebuild()).toBe(true)
  })
})
