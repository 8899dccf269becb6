/**
 * commandEngine.ts
 *
 * Per-user command history: execute pushes onto the bounded undo stack and
 * drops the redo line, undo/redo move entries between the two stacks.
 */

import { describeCommand, performCommand, undoCommand } from "@/lib/commands/apply"
import type { CommandContext } from "@/lib/commands/context"
import type { Command } from "@/types/commands"
import type { UserId } from "@/types/planner"

export type ExecuteResult =
  | { status: "performed"; description: string }
  | { status: "failed" }

export type HistoryStepResult =
  | { status: "undone" | "redone"; description: string }
  /** Nothing to undo/redo */
  | { status: "empty" }
  /** The entry could not be applied and was dropped */
  | { status: "discarded"; description: string }

export class CommandEngine {
  private readonly ctx: CommandContext

  constructor(ctx: CommandContext) {
    this.ctx = ctx
  }

  execute(userId: UserId, command: Command): ExecuteResult {
    if (!performCommand(this.ctx, command)) {
      return { status: "failed" }
    }
    const description = describeCommand(this.ctx, command)
    this.ctx.store.history.push(userId, { command, description })
    this.ctx.notifier.notifyHistoryChanged(userId)
    return { status: "performed", description }
  }

  undo(userId: UserId): HistoryStepResult {
    const { history } = this.ctx.store
    const entry = history.popUndo(userId)
    if (!entry) return { status: "empty" }

    if (!undoCommand(this.ctx, entry.command)) {
      console.warn("[CommandEngine] discarded undo entry:", entry.description)
      this.ctx.notifier.notifyHistoryChanged(userId)
      return { status: "discarded", description: entry.description }
    }
    history.pushRedo(userId, entry)
    this.ctx.notifier.notifyHistoryChanged(userId)
    return { status: "undone", description: entry.description }
  }

  redo(userId: UserId): HistoryStepResult {
    const { history } = this.ctx.store
    const entry = history.popRedo(userId)
    if (!entry) return { status: "empty" }

    if (!performCommand(this.ctx, entry.command)) {
      console.warn("[CommandEngine] discarded redo entry:", entry.description)
      this.ctx.notifier.notifyHistoryChanged(userId)
      return { status: "discarded", description: entry.description }
    }
    history.pushUndoKeepingRedo(userId, entry)
    this.ctx.notifier.notifyHistoryChanged(userId)
    return { status: "redone", description: entry.description }
  }

  canUndo(userId: UserId): boolean {
    return this.ctx.store.history.canUndo(userId)
  }

  canRedo(userId: UserId): boolean {
    return this.ctx.store.history.canRedo(userId)
  }

  peekUndoDescription(userId: UserId): string | null {
    return this.ctx.store.history.peekUndoDescription(userId)
  }

  peekRedoDescription(userId: UserId): string | null {
    return this.ctx.store.history.peekRedoDescription(userId)
  }
}
