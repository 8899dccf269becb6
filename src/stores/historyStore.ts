import { map } from "nanostores"
import { DEFAULT_UNDO_CAPACITY } from "@/lib/constants"
import type { HistoryEntry } from "@/types/commands"
import type { UserId } from "@/types/planner"

export interface HistoryState {
  undo: readonly HistoryEntry[]
  redo: readonly HistoryEntry[]
}

const EMPTY_HISTORY: HistoryState = Object.freeze({ undo: [], redo: [] })

/**
 * Per-user undo/redo stacks. Each user's stacks are replaced (never mutated)
 * on change so `$history` subscribers see every update.
 */
export class HistoryStore {
  readonly $history = map<Record<UserId, HistoryState>>({})
  readonly capacity: number

  constructor(capacity: number = DEFAULT_UNDO_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity))
  }

  get(userId: UserId): HistoryState {
    return this.$history.get()[userId] ?? EMPTY_HISTORY
  }

  /**
   * Record a newly performed entry: push onto undo, dropping the oldest
   * entries beyond capacity, and discard the redo line.
   */
  push(userId: UserId, entry: HistoryEntry): void {
    const { undo } = this.get(userId)
    this.$history.setKey(userId, { undo: this.bounded([...undo, entry]), redo: [] })
  }

  /** Pop the most recent undo entry; undefined when there is none. */
  popUndo(userId: UserId): HistoryEntry | undefined {
    const { undo, redo } = this.get(userId)
    if (undo.length === 0) return undefined
    const entry = undo[undo.length - 1]
    this.$history.setKey(userId, { undo: undo.slice(0, -1), redo })
    return entry
  }

  popRedo(userId: UserId): HistoryEntry | undefined {
    const { undo, redo } = this.get(userId)
    if (redo.length === 0) return undefined
    const entry = redo[redo.length - 1]
    this.$history.setKey(userId, { undo, redo: redo.slice(0, -1) })
    return entry
  }

  pushRedo(userId: UserId, entry: HistoryEntry): void {
    const { undo, redo } = this.get(userId)
    this.$history.setKey(userId, { undo, redo: [...redo, entry] })
  }

  /** Push onto undo while keeping the redo line (used when redoing). */
  pushUndoKeepingRedo(userId: UserId, entry: HistoryEntry): void {
    const { undo, redo } = this.get(userId)
    this.$history.setKey(userId, { undo: this.bounded([...undo, entry]), redo })
  }

  canUndo(userId: UserId): boolean {
    return this.get(userId).undo.length > 0
  }

  canRedo(userId: UserId): boolean {
    return this.get(userId).redo.length > 0
  }

  peekUndoDescription(userId: UserId): string | null {
    const { undo } = this.get(userId)
    return undo.length > 0 ? undo[undo.length - 1].description : null
  }

  peekRedoDescription(userId: UserId): string | null {
    const { redo } = this.get(userId)
    return redo.length > 0 ? redo[redo.length - 1].description : null
  }

  /** Replace a user's stacks wholesale (snapshot loading). */
  restore(userId: UserId, state: HistoryState): void {
    this.$history.setKey(userId, {
      undo: this.bounded([...state.undo]),
      redo: [...state.redo],
    })
  }

  clear(userId: UserId): void {
    const next = { ...this.$history.get() }
    delete next[userId]
    this.$history.set(next)
  }

  clearAll(): void {
    this.$history.set({})
  }

  private bounded(undo: HistoryEntry[]): HistoryEntry[] {
    return undo.length > this.capacity ? undo.slice(undo.length - this.capacity) : undo
  }
}
