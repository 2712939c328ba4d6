/**
 * Content codecs for layered archives.
 *
 * @module storage/codec
 */

export { type ContentCodec, type CodecErrorCode, CodecError } from './types.js'
export { GzipCodec, type GzipLevel, type GzipOptions, DEFAULT_GZIP_OPTIONS, isGzipCompressed } from './gzip.js'
export { AesGcmCodec, type AesGcmOptions, DEFAULT_ITERATIONS } from './aes-gcm.js'
