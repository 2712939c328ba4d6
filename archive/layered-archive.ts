/**
 * LayeredArchive - content transformation over another archive.
 *
 * A layer owns an inner archive and delegates the whole lifecycle (tree,
 * state, configuration, storage, read and save) to it. Only content passes
 * through the layer: it is encoded before the inner archive stores it and
 * decoded after the inner archive loads it. Layers nest, so compression
 * over encryption over a packed archive is
 *
 * ```typescript
 * new LayeredArchive(new LayeredArchive(packed, new AesGcmCodec({ password })), new GzipCodec())
 * ```
 *
 * @module archive/layered-archive
 */

import { type Archive, BaseArchive, type CreateSource } from '../core/archive.js'
import type { ArchiveConfig } from '../core/config.js'
import { EALREADY, EBADMSG, EINVAL } from '../core/errors.js'
import { VirtualTree, type VirtualDirectory, type VirtualFile } from '../core/node.js'
import { joinPath } from '../core/path.js'
import { fail, failWith, ok, type Result } from '../core/result.js'
import type { ArchiveState, FileContent, FilePath } from '../core/types.js'
import type { ContentCodec } from '../storage/codec/types.js'
import { createLogger } from '../utils/logger.js'
import { ingest } from './ingest.js'

export class LayeredArchive extends BaseArchive {
  readonly inner: Archive
  readonly codec: ContentCodec

  constructor(inner: Archive, codec: ContentCodec) {
    super(inner.storage, createLogger(`[arcfs:${codec.name}]`))
    this.inner = inner
    this.codec = codec
  }

  get tree(): VirtualTree {
    return this.inner.tree
  }

  get state(): ArchiveState {
    return this.inner.state
  }

  get config(): ArchiveConfig {
    return this.inner.config
  }

  read(file: FilePath): Promise<Result<boolean>> {
    return this.inner.read(file)
  }

  save(): Promise<Result<boolean>> {
    return this.inner.save()
  }

  /**
   * Ingest into a scratch tree, encode every file in place, then hand the
   * tree to the inner archive, which saves it. Nothing reaches the inner
   * archive unless every file was read and encoded.
   */
  protected async createFrom(source: CreateSource): Promise<Result<boolean>> {
    const archivePath = this.config.archivePath
    if (this.state !== 'uninitialized') {
      return fail(false, new EALREADY('create', archivePath))
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

    for (const file of tree.files()) {
      try {
        const plain = await this.loadSource(file.content, file.fullPath)
        const tooLarge = this.checkContentSize(plain.length, 'create', file.fullPath)
        if (tooLarge) {
          return fail(false, tooLarge)
        }
        file.content = { kind: 'buffered', data: await this.codec.encode(plain) }
      } catch (err) {
        return failWith(false, err, 'create', file.fullPath)
      }
    }

    this.log.debug('encoded', { archivePath, files: tree.fileCount })
    return this.inner.createFromTree(tree)
  }

  async readFile(file: VirtualFile): Promise<Result<Uint8Array>> {
    const stored = await this.inner.readFile(file)
    if (!stored.success) {
      return stored
    }

    let plain: Uint8Array
    try {
      plain = await this.codec.decode(stored.value)
    } catch (err) {
      return fail(undefined, new EBADMSG('readFile', file.fullPath, { cause: err }))
    }

    const tooLarge = this.checkContentSize(plain.length, 'readFile', file.fullPath)
    return tooLarge ? fail(undefined, tooLarge) : ok(plain)
  }

  async writeAllBytes(
    data: Uint8Array,
    name: string,
    directory: VirtualDirectory,
    overrideExisting: boolean = false
  ): Promise<Result<boolean>> {
    const path = joinPath(directory.fullPath, name)
    const tooLarge = this.checkContentSize(data.length, 'write', path)
    if (tooLarge) {
      return fail(false, tooLarge)
    }

    let encoded: Uint8Array
    try {
      encoded = await this.codec.encode(data)
    } catch (err) {
      return failWith(false, err, 'write', path)
    }
    return this.inner.writeAllBytes(encoded, name, directory, overrideExisting)
  }

  private loadSource(content: FileContent, path: string): Promise<Uint8Array> {
    switch (content.kind) {
      case 'source':
        return this.storage.readFile(content.path)
      case 'buffered':
        return Promise.resolve(content.data)
      case 'stored':
        return Promise.reject(new EINVAL('create', path))
    }
  }
}
