/**
 * Gzip Codec
 *
 * Uses pako for gzip compression. This is a lightweight, well-tested
 * implementation that works in all JavaScript environments.
 *
 * @module storage/codec/gzip
 */

import pako from 'pako'

import { type ContentCodec, CodecError } from './types.js'

/**
 * Gzip compression level (0-9)
 * - 0: No compression (store only)
 * - 1: Best speed (fastest)
 * - 6: Default (balanced)
 * - 9: Best compression (smallest)
 */
export type GzipLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9

export interface GzipOptions {
  /** Compression level (0-9), default: 6 */
  level?: GzipLevel
}

export const DEFAULT_GZIP_OPTIONS: Required<GzipOptions> = {
  level: 6,
}

/**
 * Gzip content codec.
 *
 * @example
 * ```typescript
 * const archive = new LayeredArchive(new PackedArchive(storage, options), new GzipCodec({ level: 9 }))
 * ```
 */
export class GzipCodec implements ContentCodec {
  readonly name = 'gzip'
  private readonly level: GzipLevel

  constructor(options?: GzipOptions) {
    this.level = options?.level ?? DEFAULT_GZIP_OPTIONS.level
  }

  async encode(data: Uint8Array): Promise<Uint8Array> {
    try {
      return pako.gzip(data, { level: this.level })
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error'
      throw new CodecError(`Gzip compression failed: ${message}`, 'ENCODE_FAILED')
    }
  }

  async decode(data: Uint8Array): Promise<Uint8Array> {
    if (!isGzipCompressed(data)) {
      throw new CodecError('Invalid gzip data: missing magic number (0x1f 0x8b)', 'INVALID_DATA')
    }

    try {
      return pako.ungzip(data)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new CodecError(`Gzip decompression failed: ${message}`, 'DECODE_FAILED')
    }
  }
}

/**
 * Check if data appears to be gzip-compressed.
 */
export function isGzipCompressed(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b
}
