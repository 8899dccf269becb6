/**
 * store.ts
 *
 * Storage interface for planner snapshots
 *
 * Primary responsibilities:
 * - Define SnapshotStore interface
 * - Provide MemorySnapshotStore implementation
 */

import { upgradeDocument } from "./migrations"
import type { PlannerDocument, SnapshotMetadata } from "./types"

/**
 * Interface for persistent snapshot storage operations
 */
export interface SnapshotStore {
  /** List all saved snapshot metadata */
  list(): Promise<SnapshotMetadata[]>
  /** Retrieve a snapshot by ID, upgraded to the current schema */
  get(id: string): Promise<PlannerDocument | null>
  /** Save or replace a snapshot */
  save(id: string, doc: PlannerDocument): Promise<void>
  /** Delete a snapshot by ID */
  delete(id: string): Promise<void>
  /** Clear all saved snapshots */
  clear(): Promise<void>
}

export function snapshotMetadata(id: string, doc: PlannerDocument): SnapshotMetadata {
  return { id, version: doc.version, savedAt: doc.savedAt }
}

/**
 * In-process store. Documents are kept as JSON text so callers never share
 * references with what is stored.
 */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly entries = new Map<string, string>()

  async list(): Promise<SnapshotMetadata[]> {
    const metadata: SnapshotMetadata[] = []
    for (const id of this.entries.keys()) {
      const doc = await this.get(id)
      if (doc) metadata.push(snapshotMetadata(id, doc))
    }
    return metadata
  }

  async get(id: string): Promise<PlannerDocument | null> {
    const json = this.entries.get(id)
    if (json === undefined) return null
    return upgradeDocument(JSON.parse(json))
  }

  async save(id: string, doc: PlannerDocument): Promise<void> {
    this.entries.set(id, JSON.stringify(doc))
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id)
  }

  async clear(): Promise<void> {
    this.entries.clear()
  }
}
