/**
 * Firestore Instance Configuration
 */

import type { FirebaseOptions } from 'firebase/app'
import { getFirestore, type Firestore } from 'firebase/firestore'
import { getFirebaseApp } from './config'

export function getDb(options: FirebaseOptions): Firestore {
  return getFirestore(getFirebaseApp(options))
}
