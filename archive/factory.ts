/**
 * Archive stack composition.
 *
 * @module archive/factory
 */

import type { Archive } from '../core/archive.js'
import type { ArchiveStorage } from '../core/backend.js'
import type { ArchiveConfigOptions } from '../core/config.js'
import { AesGcmCodec } from '../storage/codec/aes-gcm.js'
import { GzipCodec, type GzipLevel } from '../storage/codec/gzip.js'
import { LayeredArchive } from './layered-archive.js'
import { PackedArchive } from './packed-archive.js'

export interface CreateArchiveOptions extends ArchiveConfigOptions {
  storage: ArchiveStorage
  /** Gzip every file's content; `true` uses the default level */
  compress?: boolean | GzipLevel
  /** Encrypt every file's content with a key derived from this passphrase */
  password?: string
  /** PBKDF2 iterations for `password` */
  iterations?: number
}

/**
 * Build a packed archive, optionally wrapped in an encryption layer and a
 * compression layer (compression outermost, so content is compressed
 * before it is encrypted).
 *
 * @example
 * ```typescript
 * const archive = createArchive({
 *   storage: new NodeStorage(),
 *   archivePath: 'backup.vfsa',
 *   compress: true,
 *   password: 'test-secret',
 * })
 * await archive.create(directoryPath('documents'))
 * ```
 */
export function createArchive(options: CreateArchiveOptions): Archive {
  const { storage, compress, password, iterations, ...config } = options

  let archive: Archive = new PackedArchive(storage, config)
  if (password !== undefined) {
    archive = new LayeredArchive(archive, new AesGcmCodec({ password, iterations }))
  }
  if (compress !== undefined && compress !== false) {
    archive = new LayeredArchive(archive, new GzipCodec(compress === true ? undefined : { level: compress }))
  }
  return archive
}
