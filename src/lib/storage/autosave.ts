/**
 * autosave.ts
 *
 * Saves a planner snapshot a fixed delay after the last backend change.
 */

import { DEFAULT_AUTOSAVE_MS } from "@/lib/config"
import type { GridPlanner } from "@/lib/engine/planner"
import type { SnapshotStore } from "./store"

export interface AutosaveOptions {
  snapshotId: string
  debounceMs?: number
}

export class Autosaver {
  private readonly planner: GridPlanner
  private readonly store: SnapshotStore
  private readonly snapshotId: string
  private readonly debounceMs: number

  private unsubscribe: (() => void) | null = null
  private timeout: ReturnType<typeof setTimeout> | null = null
  private dirty = false

  constructor(planner: GridPlanner, store: SnapshotStore, options: AutosaveOptions) {
    this.planner = planner
    this.store = store
    this.snapshotId = options.snapshotId
    this.debounceMs = options.debounceMs ?? DEFAULT_AUTOSAVE_MS
  }

  get isDirty(): boolean {
    return this.dirty
  }

  start(): void {
    if (this.unsubscribe) return
    this.unsubscribe = this.planner.notifier.subscribe({
      onBackendChanged: () => this.markDirty(),
    })
  }

  markDirty(): void {
    this.dirty = true
    this.cancelTimer()
    this.timeout = setTimeout(() => {
      this.timeout = null
      this.flush().catch((error: unknown) => {
        console.error("[Autosave] save failed:", error)
      })
    }, this.debounceMs)
  }

  /** Save now if anything changed since the last save */
  async flush(): Promise<void> {
    this.cancelTimer()
    if (!this.dirty) return
    this.dirty = false
    try {
      await this.store.save(this.snapshotId, this.planner.toDocument())
    } catch (error) {
      this.dirty = true
      throw error
    }
    console.log("[Autosave] saved snapshot:", this.snapshotId)
  }

  /** Cancel pending work and stop listening; unsaved changes are not written */
  stop(): void {
    this.cancelTimer()
    this.unsubscribe?.()
    this.unsubscribe = null
  }

  private cancelTimer(): void {
    if (this.timeout !== null) {
      clearTimeout(this.timeout)
      this.timeout = null
    }
  }
}
