/**
 * Archive Constants
 *
 * Path syntax, content limits and the physical layout markers shared by the
 * tree engine and the packed archive format.
 *
 * @module
 */

// =============================================================================
// Virtual Paths
// =============================================================================

/**
 * Reserved separator between virtual path segments.
 * @example
 * ```typescript
 * archive.fileExists(`docs${SEPARATOR}readme.md`)
 * ```
 */
export const SEPARATOR = '\\' as const

/**
 * Name of the root directory.
 */
export const ROOT_NAME = '' as const

/**
 * Index assigned to the root directory of every tree.
 */
export const ROOT_INDEX = 0

// =============================================================================
// Content Limits
// =============================================================================

/**
 * Maximum size of a single file's content: 1 GiB.
 *
 * Reads and writes beyond this size fail with EFBIG.
 */
export const MAX_CONTENT_SIZE = 1024 * 1024 * 1024

// =============================================================================
// Packed Archive Layout
// =============================================================================
// [magic:4][version:u32le][headerLength:u32le][header json][data region]

/**
 * Magic bytes at the start of every packed archive ("VFSA").
 */
export const ARCHIVE_MAGIC = new Uint8Array([0x56, 0x46, 0x53, 0x41])

/**
 * Current packed archive format version.
 */
export const FORMAT_VERSION = 1

/**
 * Size of the fixed preamble (magic, version, header length).
 */
export const PREAMBLE_SIZE = 12

// =============================================================================
// Convenience Export
// =============================================================================

/**
 * All archive constants as a single object.
 */
export const constants = {
  SEPARATOR,
  ROOT_NAME,
  ROOT_INDEX,
  MAX_CONTENT_SIZE,
  ARCHIVE_MAGIC,
  FORMAT_VERSION,
  PREAMBLE_SIZE,
} as const
