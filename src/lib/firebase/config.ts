/**
 * Firebase Configuration
 *
 * Initializes the Firebase app from the options resolved by loadConfig
 */

import { getApps, initializeApp, type FirebaseApp, type FirebaseOptions } from 'firebase/app'

const APP_NAME = 'gridplan'

/** Initialize the app once; later calls return the same instance */
export function getFirebaseApp(options: FirebaseOptions): FirebaseApp {
  const existing = getApps().find((app) => app.name === APP_NAME)
  if (existing) return existing

  const app = initializeApp(options, APP_NAME)
  console.log('[Firebase] Initialized with project:', options.projectId)
  return app
}
