/**
 * Firestore implementation of SnapshotStore
 *
 * One document per snapshot id in a single collection.
 */

import {
  collection,
  deleteDoc,
  doc,
  getDoc,
  getDocs,
  setDoc,
  type Firestore,
} from 'firebase/firestore'
import { toDocumentData } from '@/lib/firebase/utils'
import { isPlannerError } from '@/lib/errors'
import { upgradeDocument } from './migrations'
import { snapshotMetadata, type SnapshotStore } from './store'
import type { PlannerDocument, SnapshotMetadata } from './types'

const DEFAULT_COLLECTION = 'snapshots'

export class FirestoreSnapshotStore implements SnapshotStore {
  private readonly db: Firestore
  private readonly collectionName: string

  constructor(db: Firestore, collectionName: string = DEFAULT_COLLECTION) {
    this.db = db
    this.collectionName = collectionName
  }

  /**
   * List all snapshots in the collection
   */
  async list(): Promise<SnapshotMetadata[]> {
    try {
      const snapshot = await getDocs(collection(this.db, this.collectionName))
      const metadata: SnapshotMetadata[] = []
      snapshot.forEach((docSnap) => {
        try {
          metadata.push(snapshotMetadata(docSnap.id, upgradeDocument(docSnap.data())))
        } catch (error) {
          if (!isPlannerError(error)) throw error
          console.warn(`[FirestoreStore] skipping snapshot ${docSnap.id}:`, error.message)
        }
      })
      console.log('[FirestoreStore] Listed', metadata.length, 'snapshots')
      return metadata
    } catch (error) {
      console.error('[FirestoreStore] Error listing snapshots:', error)
      throw error
    }
  }

  async get(id: string): Promise<PlannerDocument | null> {
    try {
      const docSnap = await getDoc(doc(this.db, this.collectionName, id))
      if (!docSnap.exists()) {
        console.log('[FirestoreStore] Snapshot not found:', id)
        return null
      }
      return upgradeDocument(docSnap.data())
    } catch (error) {
      console.error('[FirestoreStore] Error getting snapshot:', error)
      throw error
    }
  }

  async save(id: string, snapshot: PlannerDocument): Promise<void> {
    try {
      await setDoc(doc(this.db, this.collectionName, id), toDocumentData(snapshot))
      console.log('[FirestoreStore] Saved snapshot:', id)
    } catch (error) {
      console.error('[FirestoreStore] Error saving snapshot:', error)
      throw error
    }
  }

  async delete(id: string): Promise<void> {
    try {
      await deleteDoc(doc(this.db, this.collectionName, id))
      console.log('[FirestoreStore] Deleted snapshot:', id)
    } catch (error) {
      console.error('[FirestoreStore] Error deleting snapshot:', error)
      throw error
    }
  }

  async clear(): Promise<void> {
    try {
      const snapshot = await getDocs(collection(this.db, this.collectionName))
      const ids: string[] = []
      snapshot.forEach((docSnap) => {
        ids.push(docSnap.id)
      })
      for (const id of ids) {
        await deleteDoc(doc(this.db, this.collectionName, id))
      }
      console.log('[FirestoreStore] Cleared', ids.length, 'snapshots')
    } catch (error) {
      console.error('[FirestoreStore] Error clearing snapshots:', error)
      throw error
    }
  }
}
