/**
 * NodeStorage - archive storage on the local disk via `node:fs`.
 *
 * @module storage/node
 */

import { open, readFile, writeFile, mkdir, readdir, stat, access } from 'node:fs/promises'
import * as path from 'node:path'

import type { ArchiveStorage, StorageEntry, StorageStat } from '../core/backend.js'
import { toArchiveError } from '../core/errors.js'

/**
 * Storage backed by the Node.js filesystem. Relative paths resolve against
 * the process working directory, or against `basePath` when given.
 *
 * @example
 * ```typescript
 * const storage = new NodeStorage()
 * const archive = new PackedArchive(storage)
 * await archive.read(filePath('./backup.vfsa'))
 * ```
 */
export class NodeStorage implements ArchiveStorage {
  private readonly basePath: string

  constructor(basePath: string = process.cwd()) {
    this.basePath = basePath
  }

  private resolve(target: string): string {
    return path.resolve(this.basePath, target)
  }

  async readFile(target: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(this.resolve(target)))
    } catch (err) {
      throw toArchiveError(err, 'read', target)
    }
  }

  async readRange(target: string, offset: number, length: number): Promise<Uint8Array> {
    let handle: Awaited<ReturnType<typeof open>> | undefined
    try {
      handle = await open(this.resolve(target), 'r')
      const buffer = new Uint8Array(length)
      const { bytesRead } = await handle.read(buffer, 0, length, offset)
      return bytesRead === length ? buffer : buffer.slice(0, bytesRead)
    } catch (err) {
      throw toArchiveError(err, 'read', target)
    } finally {
      await handle?.close()
    }
  }

  async writeFile(target: string, data: Uint8Array): Promise<void> {
    try {
      await writeFile(this.resolve(target), data)
    } catch (err) {
      throw toArchiveError(err, 'write', target)
    }
  }

  async mkdir(target: string): Promise<void> {
    try {
      await mkdir(this.resolve(target), { recursive: true })
    } catch (err) {
      throw toArchiveError(err, 'mkdir', target)
    }
  }

  async readdir(target: string): Promise<StorageEntry[]> {
    try {
      const entries = await readdir(this.resolve(target), { withFileTypes: true })
      return entries
        .filter((entry) => entry.isFile() || entry.isDirectory())
        .map((entry): StorageEntry => ({ name: entry.name, type: entry.isDirectory() ? 'directory' : 'file' }))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    } catch (err) {
      throw toArchiveError(err, 'scandir', target)
    }
  }

  async stat(target: string): Promise<StorageStat> {
    try {
      const stats = await stat(this.resolve(target))
      return { type: stats.isDirectory() ? 'directory' : 'file', size: stats.size }
    } catch (err) {
      throw toArchiveError(err, 'stat', target)
    }
  }

  async exists(target: string): Promise<boolean> {
    try {
      await access(this.resolve(target))
      return true
    } catch {
      return false
    }
  }

  join(...segments: string[]): string {
    return path.join(...segments)
  }

  basename(target: string): string {
    return path.basename(target)
  }
}
