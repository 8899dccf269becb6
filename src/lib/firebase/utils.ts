/**
 * Firestore utility functions
 */

import type { DocumentData } from 'firebase/firestore'

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Recursively remove undefined values
 * Firestore doesn't accept undefined values - they must be omitted or null
 */
export function removeUndefined(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(removeUndefined)
  }
  if (isPlainObject(value)) {
    const cleaned: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        cleaned[key] = removeUndefined(item)
      }
    }
    return cleaned
  }
  return value
}

/** Top-level object as Firestore document data, without undefined values */
export function toDocumentData(record: object): DocumentData {
  const data: DocumentData = {}
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      data[key] = removeUndefined(value)
    }
  }
  return data
}
