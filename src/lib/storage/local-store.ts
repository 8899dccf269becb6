/**
 * Filesystem implementation of SnapshotStore
 *
 * One gzip-compressed JSON file per snapshot id.
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { gunzipSync, gzipSync, strFromU8, strToU8 } from 'fflate'
import { isPlannerError } from '@/lib/errors'
import { upgradeDocument } from './migrations'
import { snapshotMetadata, type SnapshotStore } from './store'
import type { PlannerDocument, SnapshotMetadata } from './types'

const FILE_SUFFIX = '.json.gz'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class LocalSnapshotStore implements SnapshotStore {
  readonly directory: string

  constructor(directory: string) {
    this.directory = directory
  }

  private pathFor(id: string): string {
    return join(this.directory, `${encodeURIComponent(id)}${FILE_SUFFIX}`)
  }

  private async listIds(): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this.directory)
    } catch (error) {
      if (isMissingFile(error)) return []
      throw error
    }
    return names
      .filter((name) => name.endsWith(FILE_SUFFIX))
      .map((name) => decodeURIComponent(name.slice(0, -FILE_SUFFIX.length)))
  }

  /** Raw JSON value of a snapshot file; undecodable files are removed */
  private async readRaw(id: string): Promise<unknown> {
    const path = this.pathFor(id)
    let bytes: Uint8Array
    try {
      bytes = await readFile(path)
    } catch (error) {
      if (isMissingFile(error)) return null
      throw error
    }
    try {
      return JSON.parse(strFromU8(gunzipSync(bytes)))
    } catch (error) {
      console.warn(`[LocalStore] unreadable snapshot ${id}, removing:`, error)
      await rm(path, { force: true })
      return null
    }
  }

  async list(): Promise<SnapshotMetadata[]> {
    const metadata: SnapshotMetadata[] = []
    for (const id of await this.listIds()) {
      const doc = await this.get(id)
      if (doc) metadata.push(snapshotMetadata(id, doc))
    }
    return metadata
  }

  async get(id: string): Promise<PlannerDocument | null> {
    const raw = await this.readRaw(id)
    if (raw === null) return null
    try {
      return upgradeDocument(raw)
    } catch (error) {
      if (!isPlannerError(error)) throw error
      console.warn(`[LocalStore] skipping snapshot ${id}:`, error.message)
      return null
    }
  }

  async save(id: string, doc: PlannerDocument): Promise<void> {
    await mkdir(this.directory, { recursive: true })
    await writeFile(this.pathFor(id), gzipSync(strToU8(JSON.stringify(doc))))
    console.log('[LocalStore] saved:', id)
  }

  async delete(id: string): Promise<void> {
    await rm(this.pathFor(id), { force: true })
    console.log('[LocalStore] deleted:', id)
  }

  async clear(): Promise<void> {
    const ids = await this.listIds()
    for (const id of ids) {
      await rm(this.pathFor(id), { force: true })
    }
    console.log('[LocalStore] cleared', ids.length, 'snapshots')
  }
}
