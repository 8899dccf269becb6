/**
 * Storage Manager
 *
 * Builds the snapshot store for a configuration: local files, plus cloud
 * sync through Firestore when Firebase is configured
 */

import type { PlannerConfig } from '@/lib/config'
import { GridPlanner } from '@/lib/engine/planner'
import { getDb } from '@/lib/firebase/firestore'
import { Autosaver } from './autosave'
import { FirestoreSnapshotStore } from './firestore-store'
import { HybridSnapshotStore } from './hybrid-store'
import { LocalSnapshotStore } from './local-store'

export function createSnapshotStore(config: Pick<PlannerConfig, 'snapshotDir' | 'firebase'>): HybridSnapshotStore {
  const localStore = new LocalSnapshotStore(config.snapshotDir)
  const cloudStore = config.firebase ? new FirestoreSnapshotStore(getDb(config.firebase)) : null
  return new HybridSnapshotStore(localStore, cloudStore)
}

export interface PlannerSession {
  planner: GridPlanner
  store: HybridSnapshotStore
  autosaver: Autosaver
}

/**
 * Open a planner for a snapshot id: restore the saved snapshot when there is
 * one, otherwise start fresh from the configured defaults. Autosave is
 * already running on the returned session.
 */
export async function openPlannerSession(config: PlannerConfig, snapshotId: string): Promise<PlannerSession> {
  const store = createSnapshotStore(config)
  const doc = await store.get(snapshotId)
  const planner = doc
    ? GridPlanner.fromDocument(doc, { seedDefaultRegions: config.seedDefaultRegions })
    : new GridPlanner({ undoCapacity: config.undoCapacity, seedDefaultRegions: config.seedDefaultRegions })
  console.log('[StorageManager]', doc ? 'restored snapshot:' : 'new snapshot:', snapshotId)

  const autosaver = new Autosaver(planner, store, { snapshotId, debounceMs: config.autosaveMs })
  autosaver.start()
  return { planner, store, autosaver }
}
