/**
 * PackedArchive - the single-file archive backend.
 *
 * Keeps the tree in memory and the contents in one archive file on an
 * `ArchiveStorage`. Reading an archive loads only the header; file contents
 * are fetched lazily by byte range. Writes are buffered in memory until the
 * next `save()`, which rewrites the whole archive file.
 *
 * @example
 * ```typescript
 * const archive = new PackedArchive(new NodeStorage(), { archivePath: 'site.vfsa' })
 * await archive.create(directoryPath('public'))
 *
 * await archive.writeAllText('hello', 'greeting.txt', archive.root)
 * await archive.save()
 * ```
 *
 * @module archive/packed-archive
 */

import { BaseArchive, type CreateSource } from '../core/archive.js'
import type { ArchiveStorage } from '../core/backend.js'
import { type ArchiveConfig, type ArchiveConfigOptions, createConfig, withArchivePath } from '../core/config.js'
import { PREAMBLE_SIZE } from '../core/constants.js'
import { EALREADY, EBADF, EBADMSG, EINVAL } from '../core/errors.js'
import { VirtualFile, VirtualTree, type VirtualDirectory } from '../core/node.js'
import { isValidName, joinPath } from '../core/path.js'
import { attempt, fail, failWith, ok, type Result } from '../core/result.js'
import type { ArchiveState, BufferedContent, FilePath, ProgressOperation } from '../core/types.js'
import { createLogger } from '../utils/logger.js'
import { buildHeader, decodePreamble, encodeHeader, encodePreamble, parseHeader, treeFromHeader } from './header.js'
import { ingest } from './ingest.js'

export class PackedArchive extends BaseArchive {
  private currentTree = new VirtualTree()
  private currentState: ArchiveState = 'uninitialized'
  private currentConfig: ArchiveConfig

  /** Archive file that `stored` handles point into */
  private storedPath: string | undefined

  /**
   * @throws EINVAL if an option is invalid
   */
  constructor(storage: ArchiveStorage, options: ArchiveConfigOptions = {}) {
    super(storage, createLogger('[arcfs:packed]'))
    this.currentConfig = createConfig(options)
  }

  get tree(): VirtualTree {
    return this.currentTree
  }

  get state(): ArchiveState {
    return this.currentState
  }

  get config(): ArchiveConfig {
    return this.currentConfig
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  protected async createFrom(source: CreateSource): Promise<Result<boolean>> {
    const archivePath = this.config.archivePath
    if (this.state !== 'uninitialized') {
      return fail(false, new EALREADY('create', archivePath))
    }
    if (!archivePath) {
      return fail(false, new EINVAL('create', 'archivePath is required'))
    }

    let tree: VirtualTree
    if (source.kind === 'tree') {
      tree = source.tree
    } else {
      tree = new VirtualTree()
      try {
        await ingest(this.storage, source, tree)
      } catch (err) {
        return failWith(false, err, 'create', archivePath)
      }
    }

    const saved = await this.persist(tree, archivePath, 'create')
    if (!saved.success) {
      return saved
    }
    this.currentTree = tree
    this.currentState = 'open'
    this.log.debug('created', { archivePath, files: tree.fileCount })
    return saved
  }

  async read(file: FilePath): Promise<Result<boolean>> {
    try {
      const preamble = await this.storage.readRange(file.path, 0, PREAMBLE_SIZE)
      const headerLength = decodePreamble(preamble, file.path)
      const headerBytes = await this.storage.readRange(file.path, PREAMBLE_SIZE, headerLength)
      if (headerBytes.length < headerLength) {
        throw new EBADMSG('read', file.path)
      }
      const header = parseHeader(headerBytes, file.path)
      const tree = treeFromHeader(header, PREAMBLE_SIZE + headerLength, file.path)

      this.currentTree = tree
      this.currentState = 'open'
      this.currentConfig = withArchivePath(this.config, file.path)
      this.storedPath = file.path
      this.log.debug('read header', { archivePath: file.path, files: tree.fileCount })
      return ok(true)
    } catch (err) {
      return failWith(false, err, 'read', file.path)
    }
  }

  async save(): Promise<Result<boolean>> {
    const archivePath = this.config.archivePath
    if (this.state !== 'open') {
      return fail(false, new EBADF('save', archivePath))
    }
    if (!archivePath) {
      return fail(false, new EINVAL('save', 'archivePath is required'))
    }
    return this.persist(this.tree, archivePath, 'save')
  }

  // ---------------------------------------------------------------------------
  // Content
  // ---------------------------------------------------------------------------

  async readFile(file: VirtualFile): Promise<Result<Uint8Array>> {
    if (this.state !== 'open') {
      return fail(undefined, new EBADF('readFile', file.fullPath))
    }
    const tooLarge = this.checkContentSize(file.size, 'readFile', file.fullPath)
    if (tooLarge) {
      return fail(undefined, tooLarge)
    }
    return attempt(() => this.loadContent(file), undefined, 'readFile', file.fullPath)
  }

  async writeAllBytes(
    data: Uint8Array,
    name: string,
    directory: VirtualDirectory,
    overrideExisting: boolean = false
  ): Promise<Result<boolean>> {
    const path = joinPath(directory.fullPath, name)
    if (this.state !== 'open') {
      return fail(false, new EBADF('write', path))
    }
    if (!isValidName(name)) {
      return fail(false, new EINVAL('write', name))
    }
    const tooLarge = this.checkContentSize(data.length, 'write', path)
    if (tooLarge) {
      return fail(false, tooLarge)
    }

    const existing = directory.file(name)
    if (existing && !overrideExisting) {
      return fail(false)
    }

    const content: BufferedContent = { kind: 'buffered', data: data.slice() }
    if (existing) {
      const previous = existing.content
      existing.content = content
      return this.afterChange(() => {
        existing.content = previous
      })
    }
    const added = directory.addFile(new VirtualFile(name, content))
    return this.afterChange(() => directory.removeFile(added))
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async loadContent(file: VirtualFile): Promise<Uint8Array> {
    const content = file.content
    switch (content.kind) {
      case 'buffered':
        return content.data.slice()
      case 'source':
        return this.storage.readFile(content.path)
      case 'stored': {
        if (!this.storedPath) {
          throw new EBADF('readFile', file.fullPath)
        }
        const bytes = await this.storage.readRange(this.storedPath, content.offset, content.size)
        if (bytes.length < content.size) {
          throw new EBADMSG('readFile', file.fullPath)
        }
        return bytes
      }
    }
  }

  /**
   * Write header and data region of `tree`, then repoint every handle at
   * the new archive file. Handles stay untouched when writing fails.
   */
  private async persist(tree: VirtualTree, archivePath: string, operation: ProgressOperation): Promise<Result<boolean>> {
    const startedAt = performance.now()
    const files = [...tree.files()]
    const layout: { file: VirtualFile; bytes: Uint8Array; offset: number }[] = []
    const offsets = new Map<VirtualFile, number>()
    let dataSize = 0

    try {
      for (const file of files) {
        const bytes = await this.loadContent(file)
        layout.push({ file, bytes, offset: dataSize })
        offsets.set(file, dataSize)
        dataSize += bytes.length
        this.reportProgress(operation, layout.length, files.length, file.fullPath, startedAt)
      }

      const header = encodeHeader(buildHeader(tree, offsets))
      const preamble = encodePreamble(header.length)
      const dataStart = preamble.length + header.length
      const output = new Uint8Array(dataStart + dataSize)
      output.set(preamble, 0)
      output.set(header, preamble.length)
      for (const { bytes, offset } of layout) {
        output.set(bytes, dataStart + offset)
      }

      await this.storage.writeFile(archivePath, output)

      for (const { file, bytes, offset } of layout) {
        file.content = { kind: 'stored', offset: dataStart + offset, size: bytes.length }
      }
      this.storedPath = archivePath
      this.log.debug('saved', { archivePath, files: files.length, bytes: output.length })
      return ok(true)
    } catch (err) {
      return failWith(false, err, operation, archivePath)
    }
  }
}
