/**
 * AES-GCM Codec
 *
 * Authenticated encryption using the Web Crypto API (crypto.subtle).
 * Keys are derived from a passphrase with PBKDF2-SHA-256.
 *
 * Payload layout: `[salt:16][iv:12][ciphertext + tag]`
 *
 * @module storage/codec/aes-gcm
 */

import { type ContentCodec, CodecError } from './types.js'

const SALT_LENGTH = 16
const IV_LENGTH = 12

type DerivedKey = Awaited<ReturnType<typeof crypto.subtle.deriveKey>>

export interface AesGcmOptions {
  /** Passphrase the key is derived from */
  password: string
  /** PBKDF2 iterations, default: 100000 */
  iterations?: number
}

export const DEFAULT_ITERATIONS = 100_000

/**
 * AES-256-GCM content codec.
 *
 * One salt is generated per codec instance for encoding; decoding derives
 * (and caches) the key for whatever salt the payload carries.
 *
 * @example
 * ```typescript
 * const codec = new AesGcmCodec({ password: 'test-secret' })
 * const sealed = await codec.encode(new TextEncoder().encode('hello'))
 * const plain = await codec.decode(sealed)
 * ```
 */
export class AesGcmCodec implements ContentCodec {
  readonly name = 'aes-256-gcm'
  private readonly password: string
  private readonly iterations: number
  private readonly keys = new Map<string, Promise<DerivedKey>>()
  private encodeSalt: Uint8Array | undefined

  constructor(options: AesGcmOptions) {
    if (typeof options.password !== 'string' || options.password.length === 0) {
      throw new CodecError('AES-GCM codec requires a non-empty password', 'INVALID_KEY')
    }
    this.password = options.password
    this.iterations = options.iterations ?? DEFAULT_ITERATIONS
  }

  async encode(data: Uint8Array): Promise<Uint8Array> {
    const salt = (this.encodeSalt ??= crypto.getRandomValues(new Uint8Array(SALT_LENGTH)))
    const iv = crypto.getRandomValues(new Uint8Array(IV_LENGTH))

    try {
      const key = await this.deriveKey(salt)
      const ciphertext = new Uint8Array(await crypto.subtle.encrypt({ name: 'AES-GCM', iv }, key, data))

      const payload = new Uint8Array(SALT_LENGTH + IV_LENGTH + ciphertext.length)
      payload.set(salt, 0)
      payload.set(iv, SALT_LENGTH)
      payload.set(ciphertext, SALT_LENGTH + IV_LENGTH)
      return payload
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new CodecError(`AES-GCM encryption failed: ${message}`, 'ENCODE_FAILED')
    }
  }

  async decode(data: Uint8Array): Promise<Uint8Array> {
    // The GCM tag alone is 16 bytes
    if (data.length < SALT_LENGTH + IV_LENGTH + 16) {
      throw new CodecError('Invalid AES-GCM payload: too short', 'INVALID_DATA')
    }

    const salt = data.slice(0, SALT_LENGTH)
    const iv = data.slice(SALT_LENGTH, SALT_LENGTH + IV_LENGTH)
    const ciphertext = data.slice(SALT_LENGTH + IV_LENGTH)

    try {
      const key = await this.deriveKey(salt)
      return new Uint8Array(await crypto.subtle.decrypt({ name: 'AES-GCM', iv }, key, ciphertext))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new CodecError(`AES-GCM decryption failed: ${message}`, 'DECODE_FAILED')
    }
  }

  private deriveKey(salt: Uint8Array): Promise<DerivedKey> {
    const id = toHex(salt)
    let key = this.keys.get(id)
    if (!key) {
      key = this.importKey(salt)
      this.keys.set(id, key)
    }
    return key
  }

  private async importKey(salt: Uint8Array): Promise<DerivedKey> {
    const material = await crypto.subtle.importKey(
      'raw',
      new TextEncoder().encode(this.password),
      'PBKDF2',
      false,
      ['deriveKey']
    )
    return crypto.subtle.deriveKey(
      { name: 'PBKDF2', salt, iterations: this.iterations, hash: 'SHA-256' },
      material,
      { name: 'AES-GCM', length: 256 },
      false,
      ['encrypt', 'decrypt']
    )
  }
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('')
}
