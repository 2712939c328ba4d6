/**
 * @fileoverview POSIX-style error classes for arcfs
 *
 * Archive operations report failures through `Result` values; the payload of
 * a failed result is one of the errors defined here. Messages follow the
 * Node.js fs convention: `CODE: message, syscall 'path'`.
 *
 * @example
 * ```typescript
 * import { EFBIG, isArchiveError } from 'arcfs/errors'
 *
 * const error = new EFBIG('readAllBytes', 'assets\\movie.bin')
 * // EFBIG: file too large, readAllBytes 'assets\movie.bin'
 *
 * const result = await archive.readAllBytes('assets\\movie.bin')
 * if (!result.success && isArchiveError(result.error)) {
 *   console.log(result.error.code)
 * }
 * ```
 *
 * @module arcfs/errors
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Maps error codes to their numeric errno values and human-readable messages.
 */
export const ERROR_CODES = {
  ENOENT: { errno: -2, message: 'no such file or directory' },
  EEXIST: { errno: -17, message: 'file already exists' },
  EISDIR: { errno: -21, message: 'illegal operation on a directory' },
  ENOTDIR: { errno: -20, message: 'not a directory' },
  EINVAL: { errno: -22, message: 'invalid argument' },
  EIO: { errno: -5, message: 'i/o error' },
  EFBIG: { errno: -27, message: 'file too large' },
  EBADMSG: { errno: -74, message: 'bad archive data' },
  EBADF: { errno: -9, message: 'archive is not open' },
  EALREADY: { errno: -114, message: 'archive already initialized' },
} as const

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Union type of all supported error codes.
 */
export type ErrorCode = keyof typeof ERROR_CODES

/**
 * Numeric errno values corresponding to the error codes.
 */
export type Errno = (typeof ERROR_CODES)[ErrorCode]['errno']

/**
 * Extra data attached to an error.
 */
export interface ArchiveErrorOptions {
  /** Underlying error (storage fault, codec failure, aggregated failures) */
  cause?: unknown
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all archive errors.
 *
 * @example
 * ```typescript
 * const error = new ArchiveError('ENOENT', -2, 'no such file or directory', 'read', 'data.vfsa')
 * console.log(error.message)  // "ENOENT: no such file or directory, read 'data.vfsa'"
 * console.log(error.code)     // "ENOENT"
 * ```
 */
export class ArchiveError extends Error {
  /** Error code string (e.g., 'ENOENT', 'EFBIG') */
  code: ErrorCode

  /** Numeric errno value (negative, following Node.js convention) */
  errno: number

  /** Archive operation that triggered the error (e.g., 'read', 'extract') */
  syscall?: string

  /** Virtual or physical path involved in the operation */
  path?: string

  constructor(
    code: ErrorCode,
    errno: number,
    message: string,
    syscall?: string,
    path?: string,
    options?: ArchiveErrorOptions
  ) {
    const fullMessage = `${code}: ${message}${syscall ? `, ${syscall}` : ''}${path ? ` '${path}'` : ''}`
    super(fullMessage, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'ArchiveError'
    this.code = code
    this.errno = errno
    this.syscall = syscall
    this.path = path
  }
}

// ============================================================================
// Error Class Factory
// ============================================================================

/**
 * @internal
 */
function createErrorClass<T extends ErrorCode>(code: T) {
  const { errno, message } = ERROR_CODES[code]

  return class extends ArchiveError {
    constructor(syscall?: string, path?: string, options?: ArchiveErrorOptions) {
      super(code, errno, message, syscall, path, options)
      this.name = code
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * ENOENT - No such file or directory.
 *
 * Raised by storage when a physical source or archive file is missing, and
 * by extraction for virtual paths that do not resolve. Plain lookups through
 * the path resolver never raise it; they report an unsuccessful result.
 */
export class ENOENT extends createErrorClass('ENOENT') {}

/**
 * EEXIST - An entry with the same name already exists in the directory.
 *
 * @example
 * ```typescript
 * throw new EEXIST('createDirectory', 'docs')
 * // EEXIST: file already exists, createDirectory 'docs'
 * ```
 */
export class EEXIST extends createErrorClass('EEXIST') {}

/**
 * EISDIR - A directory was found where a file was expected.
 */
export class EISDIR extends createErrorClass('EISDIR') {}

/**
 * ENOTDIR - A file was found where a directory was expected.
 */
export class ENOTDIR extends createErrorClass('ENOTDIR') {}

/**
 * EINVAL - Invalid argument, such as an empty entry name or a name containing
 * the path separator, or a missing save location.
 */
export class EINVAL extends createErrorClass('EINVAL') {}

/**
 * EIO - Storage fault, or one or more entries failed during extraction.
 */
export class EIO extends createErrorClass('EIO') {}

/**
 * EFBIG - File content exceeds the single-file limit (1 GiB).
 *
 * @example
 * ```typescript
 * throw new EFBIG('readAllBytes', 'media\\huge.iso')
 * // EFBIG: file too large, readAllBytes 'media\huge.iso'
 * ```
 */
export class EFBIG extends createErrorClass('EFBIG') {}

/**
 * EBADMSG - The archive header is malformed, or a content layer could not
 * decode a payload (wrong password, corrupt data).
 */
export class EBADMSG extends createErrorClass('EBADMSG') {}

/**
 * EBADF - The archive has not been created or read yet.
 */
export class EBADF extends createErrorClass('EBADF') {}

/**
 * EALREADY - `create` was called on an archive that already holds a tree.
 */
export class EALREADY extends createErrorClass('EALREADY') {}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard to check if an error is an ArchiveError.
 */
export function isArchiveError(error: unknown): error is ArchiveError {
  return error instanceof ArchiveError
}

export function isEnoent(error: unknown): error is ENOENT {
  return error instanceof ENOENT
}

export function isEexist(error: unknown): error is EEXIST {
  return error instanceof EEXIST
}

export function isEfbig(error: unknown): error is EFBIG {
  return error instanceof EFBIG
}

export function isEbadmsg(error: unknown): error is EBADMSG {
  return error instanceof EBADMSG
}

/**
 * Checks if an error is an ArchiveError with the given code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isArchiveError(error) && error.code === code
}

/**
 * Check whether a string is one of the supported error codes.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CODES
}

// ============================================================================
// Construction Helpers
// ============================================================================

const ERROR_CLASSES = {
  ENOENT,
  EEXIST,
  EISDIR,
  ENOTDIR,
  EINVAL,
  EIO,
  EFBIG,
  EBADMSG,
  EBADF,
  EALREADY,
} satisfies Record<ErrorCode, unknown>

/**
 * Creates a new error from a code, operation and path.
 *
 * @example
 * ```typescript
 * throw createError('ENOENT', 'extractFiles', 'docs\\missing.txt')
 * ```
 */
export function createError(
  code: ErrorCode,
  syscall?: string,
  path?: string,
  options?: ArchiveErrorOptions
): ArchiveError {
  const ErrorClass = ERROR_CLASSES[code]
  return new ErrorClass(syscall, path, options)
}

/**
 * Convert any thrown value into an ArchiveError.
 *
 * ArchiveErrors pass through unchanged. Errors carrying a known `code`
 * property (such as those raised by `node:fs`) keep their code; everything
 * else becomes `EIO` with the original value as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *   await storage.readFile(source)
 * } catch (err) {
 *   return fail(false, toArchiveError(err, 'create', source))
 * }
 * ```
 */
export function toArchiveError(error: unknown, syscall?: string, path?: string): ArchiveError {
  if (isArchiveError(error)) {
    return error
  }
  if (error !== null && typeof error === 'object' && 'code' in error) {
    const code = String(error.code)
    if (isErrorCode(code)) {
      return createError(code, syscall, path, { cause: error })
    }
  }
  return new EIO(syscall, path, { cause: error })
}

/**
 * All supported error codes as a constant array.
 */
export const ALL_ERROR_CODES: readonly ErrorCode[] = Object.keys(ERROR_CODES).filter(isErrorCode)
