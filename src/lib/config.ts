/**
 * config.ts
 *
 * Runtime configuration from environment variables. Malformed values are
 * reported and replaced by their defaults; cloud sync is only configured
 * when every Firebase variable is present.
 */

import type { FirebaseOptions } from "firebase/app"
import { DEFAULT_UNDO_CAPACITY } from "@/lib/constants"

export interface PlannerConfig {
  undoCapacity: number
  seedDefaultRegions: boolean
  snapshotDir: string
  autosaveMs: number
  firebase: FirebaseOptions | null
}

export type Env = Record<string, string | undefined>

export const DEFAULT_SNAPSHOT_DIR = ".gridplan"
export const DEFAULT_AUTOSAVE_MS = 2000

const FIREBASE_KEYS = {
  apiKey: "FIREBASE_API_KEY",
  authDomain: "FIREBASE_AUTH_DOMAIN",
  projectId: "FIREBASE_PROJECT_ID",
  storageBucket: "FIREBASE_STORAGE_BUCKET",
  messagingSenderId: "FIREBASE_MESSAGING_SENDER_ID",
  appId: "FIREBASE_APP_ID",
} as const

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim()
  if (!raw) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[Config] ${name}=${raw} is not an integer >= ${min}, using ${fallback}`)
    return fallback
  }
  return value
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase()
  if (!raw) return fallback
  if (raw === "true" || raw === "1") return true
  if (raw === "false" || raw === "0") return false
  console.warn(`[Config] ${name}=${raw} is not a boolean, using ${fallback}`)
  return fallback
}

function readFirebase(env: Env): FirebaseOptions | null {
  const read = (name: string) => env[name]?.trim() ?? ""
  const options: FirebaseOptions = {
    apiKey: read(FIREBASE_KEYS.apiKey),
    authDomain: read(FIREBASE_KEYS.authDomain),
    projectId: read(FIREBASE_KEYS.projectId),
    storageBucket: read(FIREBASE_KEYS.storageBucket),
    messagingSenderId: read(FIREBASE_KEYS.messagingSenderId),
    appId: read(FIREBASE_KEYS.appId),
  }
  const names = Object.values(FIREBASE_KEYS)
  const missing = names.filter((name) => read(name) === "")
  if (missing.length === names.length) return null
  if (missing.length > 0) {
    console.warn(`[Config] cloud sync disabled, missing ${missing.join(", ")}`)
    return null
  }
  return options
}

export function loadConfig(env: Env = process.env): PlannerConfig {
  return {
    undoCapacity: readInteger(env, "GRIDPLAN_UNDO_CAPACITY", DEFAULT_UNDO_CAPACITY, 1),
    seedDefaultRegions: readBoolean(env, "GRIDPLAN_SEED_DEFAULT_REGIONS", true),
    snapshotDir: env.GRIDPLAN_SNAPSHOT_DIR?.trim() || DEFAULT_SNAPSHOT_DIR,
    autosaveMs: readInteger(env, "GRIDPLAN_AUTOSAVE_MS", DEFAULT_AUTOSAVE_MS, 0),
    firebase: readFirebase(env),
  }
}
