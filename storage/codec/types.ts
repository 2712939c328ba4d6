/**
 * Content Codec Types
 *
 * A codec transforms file content on its way into an archive layer and
 * back out. Layers compose codecs by nesting archives: the outermost layer
 * encodes first.
 *
 * @module storage/codec/types
 */

/**
 * Reversible content transformation.
 */
export interface ContentCodec {
  /**
   * Name of the transformation, used in logs and errors.
   */
  readonly name: string

  /**
   * Transform plain content for storage.
   */
  encode(data: Uint8Array): Promise<Uint8Array>

  /**
   * Recover plain content.
   * @throws CodecError when the payload is malformed or cannot be authenticated
   */
  decode(data: Uint8Array): Promise<Uint8Array>
}

/**
 * Error codes for codec operations.
 */
export type CodecErrorCode =
  | 'ENCODE_FAILED'
  | 'DECODE_FAILED'
  | 'INVALID_DATA'
  | 'INVALID_KEY'

/**
 * Custom error class for codec failures.
 */
export class CodecError extends Error {
  readonly code: CodecErrorCode

  constructor(message: string, code: CodecErrorCode) {
    super(message)
    this.name = 'CodecError'
    this.code = code
  }
}
