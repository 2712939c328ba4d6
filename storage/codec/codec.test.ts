import { describe, it, expect } from 'vitest'
import { AesGcmCodec } from './aes-gcm.js'
import { GzipCodec, isGzipCompressed } from './gzip.js'
import { CodecError } from './types.js'

const encode = (text: string) => new TextEncoder().encode(text)
const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes)

describe('GzipCodec', () => {
  const codec = new GzipCodec()

  it('should compress to a gzip stream and back', async () => {
    const text = 'repeat '.repeat(200)
    const packed = await codec.encode(encode(text))

    expect(isGzipCompressed(packed)).toBe(true)
    expect(packed.length).toBeLessThan(text.length)
    expect(decode(await codec.decode(packed))).toBe(text)
  })

  it('should reject data without the gzip magic number', async () => {
    await expect(codec.decode(encode('plain text'))).rejects.toBeInstanceOf(CodecError)
  })

  it('should reject a stream with a corrupt header', async () => {
    const packed = await codec.encode(encode('some content that compresses'))
    packed[2] = 0x07 // compression method other than deflate
    await expect(codec.decode(packed)).rejects.toThrow('Gzip decompression failed')
  })

  it('should accept a custom level', async () => {
    const fast = new GzipCodec({ level: 1 })
    expect(decode(await fast.decode(await fast.encode(encode('abc'))))).toBe('abc')
  })
})

describe('isGzipCompressed', () => {
  it('should check the magic number', () => {
    expect(isGzipCompressed(new Uint8Array([0x1f, 0x8b, 0x08]))).toBe(true)
    expect(isGzipCompressed(new Uint8Array([0x1f]))).toBe(false)
  })
})

describe('AesGcmCodec', () => {
  // A low iteration count keeps key derivation fast in tests
  const codec = new AesGcmCodec({ password: 'test-secret', iterations: 1000 })

  it('should seal and open content', async () => {
    const sealed = await codec.encode(encode('confidential'))

    expect(sealed.length).toBe(16 + 12 + 'confidential'.length + 16)
    expect(decode(sealed)).not.toContain('confidential')
    expect(decode(await codec.decode(sealed))).toBe('confidential')
  })

  it('should use a fresh IV for every payload', async () => {
    const first = await codec.encode(encode('same'))
    const second = await codec.encode(encode('same'))
    expect(first.slice(16, 28)).not.toEqual(second.slice(16, 28))
  })

  it('should open payloads sealed by another instance with the same password', async () => {
    const other = new AesGcmCodec({ password: 'test-secret', iterations: 1000 })
    expect(decode(await other.decode(await codec.encode(encode('shared'))))).toBe('shared')
  })

  it('should fail with the wrong password', async () => {
    const wrong = new AesGcmCodec({ password: 'other-secret', iterations: 1000 })
    const sealed = await codec.encode(encode('confidential'))

    const error = await wrong.decode(sealed).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(CodecError)
    expect(error).toMatchObject({ code: 'DECODE_FAILED' })
  })

  it('should reject payloads that are too short', async () => {
    await expect(codec.decode(new Uint8Array(10))).rejects.toMatchObject({ code: 'INVALID_DATA' })
  })

  it('should require a password', () => {
    expect(() => new AesGcmCodec({ password: '' })).toThrow(CodecError)
  })
})
