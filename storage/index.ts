/**
 * Storage backends and content codecs for arcfs
 *
 * - {@link NodeStorage} - local disk through node:fs
 * - {@link GzipCodec} / {@link AesGcmCodec} - content codecs for layered archives
 *
 * @module storage
 */

export { NodeStorage } from './node.js'

export * from './codec/index.js'
