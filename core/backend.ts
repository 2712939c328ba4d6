/**
 * ArchiveStorage Interface
 *
 * The physical storage backend the archive reads from and writes to.
 * Implement this interface to put archives somewhere other than the local
 * disk. The tree engine never calls it; only lifecycle operations
 * (create, read, save, extract, content reads) do.
 *
 * @module backend
 */

import { EEXIST, EISDIR, ENOENT, ENOTDIR, EINVAL } from './errors.js'

// =============================================================================
// Storage Types
// =============================================================================

/**
 * Entry of a real directory listing.
 */
export interface StorageEntry {
  name: string
  type: 'file' | 'directory'
}

/**
 * Metadata of a real file or directory.
 */
export interface StorageStat {
  type: 'file' | 'directory'
  size: number
}

// =============================================================================
// ArchiveStorage Interface
// =============================================================================

/**
 * Pluggable physical storage.
 *
 * Implementations:
 * - `NodeStorage` - Node.js fs module
 * - `MemoryStorage` - In-memory for testing
 *
 * Errors are thrown as `ArchiveError`s (or errors carrying a Node.js `code`);
 * archives convert them into failed results.
 */
export interface ArchiveStorage {
  /**
   * Read a whole file.
   *
   * @throws ENOENT if the file does not exist
   * @throws EISDIR if the path is a directory
   */
  readFile(path: string): Promise<Uint8Array>

  /**
   * Read `length` bytes starting at `offset`. Returns fewer bytes when the
   * file ends first.
   */
  readRange(path: string, offset: number, length: number): Promise<Uint8Array>

  /**
   * Create or replace a file.
   *
   * @throws ENOENT if the parent directory does not exist
   */
  writeFile(path: string, data: Uint8Array): Promise<void>

  /**
   * Create a directory and any missing parents. Existing directories are
   * left as they are.
   *
   * @throws EEXIST if a file occupies the path or one of its parents
   */
  mkdir(path: string): Promise<void>

  /**
   * List a directory, sorted by name.
   */
  readdir(path: string): Promise<StorageEntry[]>

  stat(path: string): Promise<StorageStat>

  exists(path: string): Promise<boolean>

  /** Join path segments using the storage's own syntax. */
  join(...segments: string[]): string

  /** Last segment of a path using the storage's own syntax. */
  basename(path: string): string
}

// =============================================================================
// MemoryStorage Implementation
// =============================================================================

/**
 * In-memory storage with POSIX paths.
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorage()
 * await storage.mkdir('/input/docs')
 * await storage.writeFile('/input/docs/a.txt', new TextEncoder().encode('A'))
 * const archive = new PackedArchive(storage, { archivePath: '/out.vfsa' })
 * await archive.create(directoryPath('/input'))
 * ```
 */
export class MemoryStorage implements ArchiveStorage {
  private files = new Map<string, Uint8Array>()
  private directories = new Set<string>(['/'])

  /**
   * Normalize a path by resolving . and .., removing duplicate slashes,
   * and stripping trailing slashes (except for root).
   */
  private normalizePath(path: string): string {
    if (!path) {
      throw new EINVAL('normalize', 'path cannot be empty')
    }

    const parts = path.replace(/\/+/g, '/').split('/')
    const resolved: string[] = []

    for (const part of parts) {
      if (part === '..') {
        resolved.pop()
      } else if (part !== '.' && part !== '') {
        resolved.push(part)
      }
    }

    return '/' + resolved.join('/')
  }

  private getParentDir(normalized: string): string {
    const lastSlash = normalized.lastIndexOf('/')
    return lastSlash <= 0 ? '/' : normalized.slice(0, lastSlash)
  }

  async readFile(path: string): Promise<Uint8Array> {
    const normalized = this.normalizePath(path)

    if (this.directories.has(normalized)) {
      throw new EISDIR('read', path)
    }

    const data = this.files.get(normalized)
    if (!data) {
      throw new ENOENT('open', path)
    }
    return data.slice()
  }

  async readRange(path: string, offset: number, length: number): Promise<Uint8Array> {
    const data = await this.readFile(path)
    return data.slice(offset, offset + length)
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    const normalized = this.normalizePath(path)

    if (this.directories.has(normalized)) {
      throw new EISDIR('write', path)
    }

    const parent = this.getParentDir(normalized)
    if (this.files.has(parent)) {
      throw new ENOTDIR('write', path)
    }
    if (!this.directories.has(parent)) {
      throw new ENOENT('write', path)
    }

    this.files.set(normalized, data.slice())
  }

  async mkdir(path: string): Promise<void> {
    const normalized = this.normalizePath(path)

    const parts = normalized.split('/').filter(Boolean)
    let current = ''
    for (const part of parts) {
      current += '/' + part
      if (this.files.has(current)) {
        throw new EEXIST('mkdir', current)
      }
      this.directories.add(current)
    }
  }

  async readdir(path: string): Promise<StorageEntry[]> {
    const normalized = this.normalizePath(path)

    if (this.files.has(normalized)) {
      throw new ENOTDIR('scandir', path)
    }
    if (!this.directories.has(normalized)) {
      throw new ENOENT('scandir', path)
    }

    const prefix = normalized === '/' ? '/' : normalized + '/'
    const entries = new Map<string, StorageEntry['type']>()

    for (const file of this.files.keys()) {
      if (file.startsWith(prefix) && !file.slice(prefix.length).includes('/')) {
        entries.set(file.slice(prefix.length), 'file')
      }
    }
    for (const dir of this.directories) {
      if (dir !== normalized && dir.startsWith(prefix) && !dir.slice(prefix.length).includes('/')) {
        entries.set(dir.slice(prefix.length), 'directory')
      }
    }

    return [...entries]
      .map(([name, type]) => ({ name, type }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  async stat(path: string): Promise<StorageStat> {
    const normalized = this.normalizePath(path)

    const file = this.files.get(normalized)
    if (file) {
      return { type: 'file', size: file.length }
    }
    if (this.directories.has(normalized)) {
      return { type: 'directory', size: 0 }
    }
    throw new ENOENT('stat', path)
  }

  async exists(path: string): Promise<boolean> {
    const normalized = this.normalizePath(path)
    return this.files.has(normalized) || this.directories.has(normalized)
  }

  join(...segments: string[]): string {
    return this.normalizePath(segments.filter(Boolean).join('/'))
  }

  basename(path: string): string {
    const normalized = this.normalizePath(path)
    return normalized.slice(normalized.lastIndexOf('/') + 1)
  }
}
