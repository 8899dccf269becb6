/**
 * Hybrid storage implementation
 *
 * Orchestrates between a local store (fast, immediate) and a cloud store
 * - Writes go to the local store immediately
 * - Syncs to the cloud in background with a per-snapshot debounce
 * - Reads take the newer of local and cloud (last-write-wins on savedAt)
 * - Without a cloud store it behaves as the local store alone
 */

import { atom } from 'nanostores'
import type { SnapshotStore } from './store'
import type { PlannerDocument, SnapshotMetadata } from './types'

/**
 * Debounce delay for syncing to the cloud (ms)
 * Waits this long after the last save of a snapshot before syncing
 */
export const SYNC_DEBOUNCE_MS = 2000

export interface SyncStatus {
  isSyncing: boolean
  lastSyncAt: number | null
  error: string | null
}

export interface HybridStoreOptions {
  syncDebounceMs?: number
}

interface PendingSync {
  timeout: ReturnType<typeof setTimeout>
  doc: PlannerDocument
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Sync failed'
}

export class HybridSnapshotStore implements SnapshotStore {
  readonly $syncStatus = atom<SyncStatus>({ isSyncing: false, lastSyncAt: null, error: null })

  private readonly localStore: SnapshotStore
  private cloudStore: SnapshotStore | null
  private readonly syncDebounceMs: number
  private readonly pending = new Map<string, PendingSync>()
  private readonly inFlight = new Set<Promise<void>>()

  constructor(localStore: SnapshotStore, cloudStore: SnapshotStore | null, options: HybridStoreOptions = {}) {
    this.localStore = localStore
    this.cloudStore = cloudStore
    this.syncDebounceMs = options.syncDebounceMs ?? SYNC_DEBOUNCE_MS
    console.log('[HybridStore] Initialized', cloudStore ? 'with cloud sync' : 'local-only')
  }

  get hasCloudSync(): boolean {
    return this.cloudStore !== null
  }

  /**
   * Enable/disable cloud sync. Pending syncs are dropped when disabling.
   */
  setCloudStore(cloudStore: SnapshotStore | null): void {
    if (!cloudStore) this.cancelPending()
    this.cloudStore = cloudStore
    console.log('[HybridStore] Cloud sync', cloudStore ? 'enabled' : 'disabled')
  }

  private setSyncStatus(status: Partial<SyncStatus>): void {
    this.$syncStatus.set({ ...this.$syncStatus.get(), ...status })
  }

  private cancelPending(id?: string): void {
    for (const [pendingId, { timeout }] of this.pending) {
      if (id !== undefined && pendingId !== id) continue
      clearTimeout(timeout)
      this.pending.delete(pendingId)
    }
  }

  /** Upload one snapshot; failures are recorded in $syncStatus, never thrown */
  private syncOne(cloudStore: SnapshotStore, id: string, doc: PlannerDocument): Promise<void> {
    const run = async () => {
      try {
        this.setSyncStatus({ isSyncing: true, error: null })
        await cloudStore.save(id, doc)
        this.setSyncStatus({ isSyncing: false, lastSyncAt: Date.now(), error: null })
        console.log('[HybridStore] Synced to cloud:', id)
      } catch (error) {
        console.error('[HybridStore] Error syncing to cloud:', error)
        this.setSyncStatus({ isSyncing: false, error: errorMessage(error) })
      }
    }
    const promise = run().finally(() => {
      this.inFlight.delete(promise)
    })
    this.inFlight.add(promise)
    return promise
  }

  /**
   * List all snapshots (merge local and cloud, preferring newer savedAt)
   */
  async list(): Promise<SnapshotMetadata[]> {
    const local = await this.localStore.list()
    if (!this.cloudStore) return local

    let cloud: SnapshotMetadata[]
    try {
      cloud = await this.cloudStore.list()
    } catch (error) {
      console.error('[HybridStore] Error listing cloud snapshots:', error)
      return local
    }

    const merged = new Map<string, SnapshotMetadata>()
    for (const entry of local) merged.set(entry.id, entry)
    for (const entry of cloud) {
      const existing = merged.get(entry.id)
      if (!existing || entry.savedAt > existing.savedAt) merged.set(entry.id, entry)
    }
    return Array.from(merged.values())
  }

  /**
   * Get a snapshot (newer of local and cloud; a newer cloud copy is stored locally)
   */
  async get(id: string): Promise<PlannerDocument | null> {
    const localDoc = await this.localStore.get(id)
    if (!this.cloudStore) return localDoc

    let cloudDoc: PlannerDocument | null
    try {
      cloudDoc = await this.cloudStore.get(id)
    } catch (error) {
      console.error('[HybridStore] Error getting cloud snapshot:', error)
      return localDoc
    }

    if (!cloudDoc) return localDoc
    if (localDoc && localDoc.savedAt >= cloudDoc.savedAt) return localDoc

    await this.localStore.save(id, cloudDoc)
    console.log('[HybridStore] Updated local from cloud:', id)
    return cloudDoc
  }

  /**
   * Save a snapshot (immediate to local, debounced to cloud)
   */
  async save(id: string, doc: PlannerDocument): Promise<void> {
    await this.localStore.save(id, doc)

    const cloudStore = this.cloudStore
    if (!cloudStore) return

    this.cancelPending(id)
    const timeout = setTimeout(() => {
      this.pending.delete(id)
      void this.syncOne(cloudStore, id, doc)
    }, this.syncDebounceMs)
    this.pending.set(id, { timeout, doc })
  }

  /**
   * Delete a snapshot (from both local and cloud)
   */
  async delete(id: string): Promise<void> {
    this.cancelPending(id)
    await this.localStore.delete(id)
    if (this.cloudStore) {
      try {
        await this.cloudStore.delete(id)
      } catch (error) {
        // Local copy is gone either way
        console.error('[HybridStore] Error deleting from cloud:', error)
      }
    }
    console.log('[HybridStore] Deleted:', id)
  }

  /**
   * Clear all snapshots (from both local and cloud)
   */
  async clear(): Promise<void> {
    this.cancelPending()
    await this.localStore.clear()
    if (this.cloudStore) {
      try {
        await this.cloudStore.clear()
      } catch (error) {
        console.error('[HybridStore] Error clearing cloud:', error)
      }
    }
    console.log('[HybridStore] Cleared all snapshots')
  }

  /**
   * Run every pending debounced sync now and wait for uploads in flight
   */
  async flushPending(): Promise<void> {
    const cloudStore = this.cloudStore
    if (cloudStore) {
      const due = Array.from(this.pending, ([id, { doc }]): [string, PlannerDocument] => [id, doc])
      this.cancelPending()
      for (const [id, doc] of due) {
        void this.syncOne(cloudStore, id, doc)
      }
    }
    await Promise.all(this.inFlight)
  }

  /**
   * Force immediate upload of every local snapshot
   */
  async syncNow(): Promise<void> {
    const cloudStore = this.cloudStore
    if (!cloudStore) return

    this.cancelPending()
    try {
      this.setSyncStatus({ isSyncing: true, error: null })
      const local = await this.localStore.list()
      for (const { id } of local) {
        const doc = await this.localStore.get(id)
        if (doc) await cloudStore.save(id, doc)
      }
      this.setSyncStatus({ isSyncing: false, lastSyncAt: Date.now(), error: null })
      console.log('[HybridStore] Force synced', local.length, 'snapshots')
    } catch (error) {
      console.error('[HybridStore] Error force syncing:', error)
      this.setSyncStatus({ isSyncing: false, error: errorMessage(error) })
      throw error
    }
  }
}
