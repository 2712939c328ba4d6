/**
 * Archive lifecycle contract.
 *
 * `Archive` is the interface every archive backend and every layer
 * exposes. `BaseArchive` implements the parts that are the same for all of
 * them (tree queries, removal, the text/stream/path write variants, the
 * read family and extraction) on top of a handful of abstract lifecycle
 * operations a concrete backend supplies.
 *
 * Lifecycle: `uninitialized` → `create()` or `read()` → `open` → mutate →
 * `save()`.
 *
 * Concurrency: an archive has a single writer. Mutations (create, read,
 * save, remove, write, extract) must not overlap on one instance; read-only
 * queries may overlap each other but not a mutation. Nothing is locked
 * internally, and no operation can be cancelled once started.
 *
 * @module core/archive
 */

import type { Logger } from '../utils/logger.js'
import type { ArchiveStorage } from './backend.js'
import type { ArchiveConfig } from './config.js'
import { type ArchiveError, EBADF, EFBIG, EIO, ENOENT } from './errors.js'
import type { VirtualDirectory, VirtualFile, VirtualTree } from './node.js'
import { formatPath, resolveDirectory, resolveFile, resolveParent } from './path.js'
import * as query from './query.js'
import { fail, failWith, ok, type Result } from './result.js'
import {
  type ArchiveState,
  type ByteStream,
  type DirectoryPath,
  type FilePath,
  type ProgressOperation,
  type SearchResult,
  isDirectoryPath,
} from './types.js'

// =============================================================================
// Archive Interface
// =============================================================================

/**
 * Input of `create`.
 *
 * - `contents`: everything inside one real directory becomes the root's
 *   content
 * - `entries`: files are added to the root and each directory becomes a
 *   subdirectory of the root
 * - `tree`: a prepared tree, taken over as it is
 */
export type CreateSource =
  | { kind: 'contents'; directory: DirectoryPath }
  | { kind: 'entries'; files: readonly FilePath[]; directories: readonly DirectoryPath[] }
  | { kind: 'tree'; tree: VirtualTree }

export interface Archive {
  /** The tree this archive operates on */
  readonly tree: VirtualTree

  /** Root directory of the tree (name `''`) */
  readonly root: VirtualDirectory

  readonly state: ArchiveState

  readonly config: ArchiveConfig

  /** Physical storage used by lifecycle operations */
  readonly storage: ArchiveStorage

  /** Strip a single leading separator. */
  formatPath(path: string): string

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Build the archive from everything inside a real directory, then save.
   * Callable once per fresh instance.
   */
  create(directory: DirectoryPath): Promise<Result<boolean>>

  /**
   * Build the archive from real files (added to the root) and directories
   * (added as subdirectories of the root), then save.
   */
  create(files: readonly FilePath[], directories: readonly DirectoryPath[]): Promise<Result<boolean>>

  /**
   * Build the archive from a prepared tree, then save. The archive takes
   * the tree over; its content handles must be `buffered` or `source`.
   */
  createFromTree(tree: VirtualTree): Promise<Result<boolean>>

  /**
   * Load the tree shape of an archive file without reading file contents.
   * The file becomes the save location.
   */
  read(file: FilePath): Promise<Result<boolean>>

  /**
   * Persist the tree and every pending write to the save location.
   */
  save(): Promise<Result<boolean>>

  // ---------------------------------------------------------------------------
  // Queries and removal
  // ---------------------------------------------------------------------------

  fileExists(path: string, start?: VirtualDirectory): boolean

  directoryExists(path: string, start?: VirtualDirectory): boolean

  /**
   * Case-insensitive substring search. Non-recursive mode matches only the
   * files directly inside `start`.
   */
  search(query: string, start?: VirtualDirectory, recurse?: boolean): SearchResult

  removeFile(path: string, start?: VirtualDirectory): Promise<Result<boolean>>

  removeDirectory(path: string, start?: VirtualDirectory): Promise<Result<boolean>>

  createDirectory(name: string, parent?: VirtualDirectory): Promise<Result<VirtualDirectory>>

  // ---------------------------------------------------------------------------
  // Extraction
  // ---------------------------------------------------------------------------

  /** Extract every file and directory into `target`. */
  extract(target: DirectoryPath): Promise<Result<boolean>>

  /** Extract the given files, flat, into `target`. */
  extractFiles(files: readonly (string | VirtualFile)[], target: DirectoryPath): Promise<Result<boolean>>

  /** Extract a directory (itself and its subtree) into `target`. */
  extractDirectory(directory: VirtualDirectory | string, target: DirectoryPath): Promise<Result<boolean>>

  // ---------------------------------------------------------------------------
  // Content
  // ---------------------------------------------------------------------------

  /** Plain content of a file (at most 1 GiB). */
  readFile(file: VirtualFile): Promise<Result<Uint8Array>>

  /** UTF-8 content of the file at `path` (at most 1 GiB). */
  readAllText(path: string, start?: VirtualDirectory): Promise<Result<string>>

  /** Content of the file at `path` (at most 1 GiB). */
  readAllBytes(path: string, start?: VirtualDirectory): Promise<Result<Uint8Array>>

  /**
   * Insert a file into `directory`, or replace the content of an existing
   * one when `overrideExisting` is true. A name collision without override
   * fails and leaves the existing file untouched.
   */
  writeAllBytes(
    data: Uint8Array,
    name: string,
    directory: VirtualDirectory,
    overrideExisting?: boolean
  ): Promise<Result<boolean>>

  /** Like `writeAllBytes`, addressing the file by a path from the root. */
  writeAllBytesToPath(data: Uint8Array, path: string, overrideExisting?: boolean): Promise<Result<boolean>>

  writeAllText(
    content: string,
    name: string,
    directory: VirtualDirectory,
    overrideExisting?: boolean
  ): Promise<Result<boolean>>

  writeStream(
    name: string,
    directory: VirtualDirectory,
    stream: ByteStream,
    overrideExisting?: boolean
  ): Promise<Result<boolean>>
}

// =============================================================================
// BaseArchive
// =============================================================================

export abstract class BaseArchive implements Archive {
  readonly storage: ArchiveStorage
  protected readonly log: Logger

  constructor(storage: ArchiveStorage, log: Logger) {
    this.storage = storage
    this.log = log
  }

  abstract get tree(): VirtualTree
  abstract get state(): ArchiveState
  abstract get config(): ArchiveConfig

  abstract read(file: FilePath): Promise<Result<boolean>>
  abstract save(): Promise<Result<boolean>>
  abstract readFile(file: VirtualFile): Promise<Result<Uint8Array>>
  abstract writeAllBytes(
    data: Uint8Array,
    name: string,
    directory: VirtualDirectory,
    overrideExisting?: boolean
  ): Promise<Result<boolean>>

  /**
   * Populate the archive and save it. Implementations fail with EALREADY
   * unless the archive is uninitialized, and stay uninitialized when any
   * step fails.
   */
  protected abstract createFrom(source: CreateSource): Promise<Result<boolean>>

  get root(): VirtualDirectory {
    return this.tree.root
  }

  formatPath(path: string): string {
    return formatPath(path)
  }

  create(directory: DirectoryPath): Promise<Result<boolean>>
  create(files: readonly FilePath[], directories: readonly DirectoryPath[]): Promise<Result<boolean>>
  create(
    source: DirectoryPath | readonly FilePath[],
    directories: readonly DirectoryPath[] = []
  ): Promise<Result<boolean>> {
    if (isDirectoryPath(source)) {
      return this.createFrom({ kind: 'contents', directory: source })
    }
    return this.createFrom({ kind: 'entries', files: source, directories })
  }

  createFromTree(tree: VirtualTree): Promise<Result<boolean>> {
    return this.createFrom({ kind: 'tree', tree })
  }

  // ---------------------------------------------------------------------------
  // Queries and removal
  // ---------------------------------------------------------------------------

  fileExists(path: string, start: VirtualDirectory = this.root): boolean {
    return query.fileExists(path, start)
  }

  directoryExists(path: string, start: VirtualDirectory = this.root): boolean {
    return query.directoryExists(path, start)
  }

  search(searchQuery: string, start: VirtualDirectory = this.root, recurse: boolean = false): SearchResult {
    return query.search(searchQuery, start, recurse)
  }

  async removeFile(path: string, start: VirtualDirectory = this.root): Promise<Result<boolean>> {
    const file = resolveFile(path, start)
    const owner = file?.directory
    const position = file && owner ? owner.files.indexOf(file) : -1

    const result = await query.removeFile(path, start)
    if (!result.success || !file || !owner) {
      return result
    }
    return this.afterChange(() => owner.addFile(file, position))
  }

  async removeDirectory(path: string, start: VirtualDirectory = this.root): Promise<Result<boolean>> {
    const parent = resolveParent(path, start)
    const target = parent?.directory.directory(parent.name)
    const position = parent && target ? parent.directory.directories.indexOf(target) : -1

    const result = await query.removeDirectory(path, start)
    if (!result.success || !parent || !target) {
      return result
    }
    return this.afterChange(() => parent.directory.addDirectory(target, position))
  }

  async createDirectory(name: string, parent: VirtualDirectory = this.root): Promise<Result<VirtualDirectory>> {
    if (this.state !== 'open') {
      return fail(undefined, new EBADF('createDirectory', name))
    }
    let directory: VirtualDirectory
    try {
      directory = this.tree.createDirectory(name, parent)
    } catch (err) {
      return failWith(undefined, err, 'createDirectory', name)
    }
    const saved = await this.afterChange(() => parent.removeDirectory(directory))
    return saved.success ? ok(directory) : fail(undefined, saved.error)
  }

  // ---------------------------------------------------------------------------
  // Read family
  // ---------------------------------------------------------------------------

  async readAllBytes(path: string, start: VirtualDirectory = this.root): Promise<Result<Uint8Array>> {
    const file = resolveFile(path, start)
    if (!file) {
      return fail(undefined)
    }
    return this.readFile(file)
  }

  async readAllText(path: string, start: VirtualDirectory = this.root): Promise<Result<string>> {
    const bytes = await this.readAllBytes(path, start)
    if (!bytes.success) {
      return fail(undefined, bytes.error)
    }
    return ok(new TextDecoder().decode(bytes.value))
  }

  // ---------------------------------------------------------------------------
  // Write family
  // ---------------------------------------------------------------------------

  async writeAllBytesToPath(
    data: Uint8Array,
    path: string,
    overrideExisting: boolean = false
  ): Promise<Result<boolean>> {
    const parent = resolveParent(path, this.root)
    if (!parent) {
      return fail(false)
    }
    return this.writeAllBytes(data, parent.name, parent.directory, overrideExisting)
  }

  writeAllText(
    content: string,
    name: string,
    directory: VirtualDirectory,
    overrideExisting: boolean = false
  ): Promise<Result<boolean>> {
    return this.writeAllBytes(new TextEncoder().encode(content), name, directory, overrideExisting)
  }

  async writeStream(
    name: string,
    directory: VirtualDirectory,
    stream: ByteStream,
    overrideExisting: boolean = false
  ): Promise<Result<boolean>> {
    const chunks: Uint8Array[] = []
    let size = 0
    try {
      for await (const chunk of stream) {
        size += chunk.length
        const tooLarge = this.checkContentSize(size, 'writeStream', name)
        if (tooLarge) {
          return fail(false, tooLarge)
        }
        chunks.push(chunk)
      }
    } catch (err) {
      return failWith(false, err, 'writeStream', name)
    }
    return this.writeAllBytes(concat(chunks, size), name, directory, overrideExisting)
  }

  // ---------------------------------------------------------------------------
  // Extraction
  // ---------------------------------------------------------------------------

  extract(target: DirectoryPath): Promise<Result<boolean>> {
    return this.extractTree(this.root, target.path)
  }

  extractDirectory(directory: VirtualDirectory | string, target: DirectoryPath): Promise<Result<boolean>> {
    const resolved = typeof directory === 'string' ? resolveDirectory(directory, this.root) : directory
    if (!resolved) {
      return Promise.resolve(fail(false))
    }
    const destination = resolved.isRoot ? target.path : this.storage.join(target.path, resolved.name)
    return this.extractTree(resolved, destination)
  }

  async extractFiles(
    files: readonly (string | VirtualFile)[],
    target: DirectoryPath
  ): Promise<Result<boolean>> {
    const prepared = await this.prepareExtraction(target.path)
    if (!prepared.success) {
      return prepared
    }

    const startedAt = performance.now()
    const failures: unknown[] = []
    let processed = 0
    for (const entry of files) {
      const file = typeof entry === 'string' ? resolveFile(entry, this.root) : entry
      const label = typeof entry === 'string' ? entry : entry.fullPath
      if (!file) {
        failures.push(new ENOENT('extractFiles', label))
      } else {
        await this.extractFile(file, this.storage.join(target.path, file.name), failures)
      }
      this.reportProgress('extract', ++processed, files.length, label, startedAt)
    }
    return this.settleExtraction(failures, files.length, target.path)
  }

  // ---------------------------------------------------------------------------
  // Helpers for backends
  // ---------------------------------------------------------------------------

  /**
   * Save when `saveAfterChange` is enabled; otherwise report success.
   * A failed save runs `undo`, so the tree is back as it was before the
   * mutation.
   */
  protected async afterChange(undo: () => void): Promise<Result<boolean>> {
    if (!this.config.saveAfterChange) {
      return ok(true)
    }
    const saved = await this.save()
    if (!saved.success) {
      undo()
    }
    return saved
  }

  /**
   * EFBIG when `size` exceeds the configured single-file limit.
   */
  protected checkContentSize(size: number, syscall: string, path: string): ArchiveError | undefined {
    return size > this.config.maxContentSize ? new EFBIG(syscall, path) : undefined
  }

  protected reportProgress(
    operation: ProgressOperation,
    processed: number,
    total: number,
    path: string,
    startedAt: number
  ): void {
    this.config.onProgress?.({ operation, processed, total, path, elapsed: performance.now() - startedAt })
  }

  private async prepareExtraction(destination: string): Promise<Result<boolean>> {
    if (this.state !== 'open') {
      return fail(false, new EBADF('extract', destination))
    }
    try {
      await this.storage.mkdir(destination)
      return ok(true)
    } catch (err) {
      return failWith(false, err, 'extract', destination)
    }
  }

  private async extractTree(directory: VirtualDirectory, destination: string): Promise<Result<boolean>> {
    const prepared = await this.prepareExtraction(destination)
    if (!prepared.success) {
      return prepared
    }

    const startedAt = performance.now()
    const total = countFiles(directory)
    const failures: unknown[] = []
    let processed = 0

    const visit = async (current: VirtualDirectory, into: string): Promise<void> => {
      for (const file of current.files) {
        await this.extractFile(file, this.storage.join(into, file.name), failures)
        this.reportProgress('extract', ++processed, total, file.fullPath, startedAt)
      }
      for (const child of current.directories) {
        const childPath = this.storage.join(into, child.name)
        try {
          await this.storage.mkdir(childPath)
        } catch (err) {
          failures.push(err)
          processed += countFiles(child)
          continue
        }
        await visit(child, childPath)
      }
    }

    await visit(directory, destination)
    return this.settleExtraction(failures, total, destination)
  }

  private async extractFile(file: VirtualFile, destination: string, failures: unknown[]): Promise<void> {
    const content = await this.readFile(file)
    if (!content.success) {
      failures.push(content.error ?? new ENOENT('extract', file.fullPath))
      return
    }
    try {
      await this.storage.writeFile(destination, content.value)
    } catch (err) {
      failures.push(err)
    }
  }

  private settleExtraction(failures: unknown[], total: number, destination: string): Result<boolean> {
    if (failures.length === 0) {
      return ok(true)
    }
    this.log.warn(`extraction into ${destination} incomplete: ${failures.length} of ${total} entries failed`)
    const cause = new AggregateError(failures, `${failures.length} of ${total} entries failed`)
    return fail(false, new EIO('extract', destination, { cause }))
  }
}

// =============================================================================
// Utilities
// =============================================================================

function countFiles(directory: VirtualDirectory): number {
  let count = directory.files.length
  for (const child of directory.directories) {
    count += countFiles(child)
  }
  return count
}

function concat(chunks: readonly Uint8Array[], size: number): Uint8Array {
  const result = new Uint8Array(size)
  let offset = 0
  for (const chunk of chunks) {
    result.set(chunk, offset)
    offset += chunk.length
  }
  return result
}
