/**
 * notifier.ts
 *
 * Change notification from the planner to its consumers (renderer, UI).
 * Every committed mutation is announced here; consumers are called one by
 * one and a throwing consumer is logged and skipped so it can neither undo
 * the mutation nor starve the remaining consumers.
 */

import type {
  CellKey,
  PlayerState,
  RegionChangeEvent,
  RegionId,
  SurfaceId,
  UserId,
  WorkspaceId,
} from "@/types/planner"

export type BackendChange =
  | { kind: "cells-changed"; workspaceId: WorkspaceId; surfaceId: SurfaceId }
  | { kind: "regions-changed"; workspaceId: WorkspaceId; event: RegionChangeEvent }
  | { kind: "grid-changed"; workspaceId: WorkspaceId; surfaceId: SurfaceId | null }
  | { kind: "player-visibility-changed"; userId: UserId }
  | { kind: "player-selection-changed"; userId: UserId }
  | { kind: "undo-redo-changed"; userId: UserId }

export type PlayerChangeKind = "player-visibility-changed" | "player-selection-changed"

export interface PlannerConsumer {
  /**
   * `changedKeys` null means "many or unknown cells changed, refresh the
   * whole surface". `newRegionId` is the region written to every changed key
   * when known, null otherwise (erase, undo, full refresh).
   */
  onCellsChanged?(
    workspaceId: WorkspaceId,
    surfaceId: SurfaceId,
    changedKeys: ReadonlySet<CellKey> | null,
    newRegionId: RegionId | null,
  ): void
  onRegionsChanged?(workspaceId: WorkspaceId, event: RegionChangeEvent): void
  /** `surfaceId` null means every surface of the workspace */
  onGridChanged?(workspaceId: WorkspaceId, surfaceId: SurfaceId | null): void
  onPlayerChanged?(userId: UserId, player: PlayerState, kind: PlayerChangeKind): void
  /** Coarse hook fired after every specific callback */
  onBackendChanged?(change: BackendChange): void
}

export class ChangeNotifier {
  private consumers = new Set<PlannerConsumer>()

  subscribe(consumer: PlannerConsumer): () => void {
    this.consumers.add(consumer)
    return () => {
      this.consumers.delete(consumer)
    }
  }

  get size(): number {
    return this.consumers.size
  }

  notifyCellsChanged(
    workspaceId: WorkspaceId,
    surfaceId: SurfaceId,
    changedKeys: ReadonlySet<CellKey> | null,
    newRegionId: RegionId | null,
  ): void {
    this.dispatch("cells-changed", (consumer) =>
      consumer.onCellsChanged?.(workspaceId, surfaceId, changedKeys, newRegionId),
    )
    this.dispatchBackend({ kind: "cells-changed", workspaceId, surfaceId })
  }

  notifyRegionsChanged(workspaceId: WorkspaceId, event: RegionChangeEvent): void {
    this.dispatch("regions-changed", (consumer) => consumer.onRegionsChanged?.(workspaceId, event))
    this.dispatchBackend({ kind: "regions-changed", workspaceId, event })
  }

  notifyGridChanged(workspaceId: WorkspaceId, surfaceId: SurfaceId | null): void {
    this.dispatch("grid-changed", (consumer) => consumer.onGridChanged?.(workspaceId, surfaceId))
    this.dispatchBackend({ kind: "grid-changed", workspaceId, surfaceId })
  }

  notifyPlayerChanged(userId: UserId, player: PlayerState, kind: PlayerChangeKind): void {
    this.dispatch(kind, (consumer) => consumer.onPlayerChanged?.(userId, player, kind))
    this.dispatchBackend({ kind, userId })
  }

  notifyHistoryChanged(userId: UserId): void {
    this.dispatchBackend({ kind: "undo-redo-changed", userId })
  }

  private dispatchBackend(change: BackendChange): void {
    this.dispatch(change.kind, (consumer) => consumer.onBackendChanged?.(change))
  }

  private dispatch(label: string, call: (consumer: PlannerConsumer) => void): void {
    // Snapshot so consumers may unsubscribe while being notified
    for (const consumer of [...this.consumers]) {
      try {
        call(consumer)
      } catch (error) {
        console.error(`[Notifier] consumer failed during ${label}:`, error)
      }
    }
  }
}

/**
 * Wrap a rebuild function so a call arriving while a previous call is still
 * running (e.g. a notification fired from inside the rebuild) is dropped.
 * Returns whether the call ran.
 */
export function guardReentrant<Args extends unknown[]>(
  fn: (...args: Args) => void,
): (...args: Args) => boolean {
  let running = false
  return (...args: Args) => {
    if (running) return false
    running = true
    try {
      fn(...args)
    } finally {
      running = false
    }
    return true
  }
}
