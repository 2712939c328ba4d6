/**
 * Core archive types
 *
 * Shared shapes for the virtual tree, physical locations, search results
 * and progress reporting.
 *
 * @module core/types
 */

import type { VirtualDirectory, VirtualFile } from './node.js'

// =============================================================================
// Content Handles
// =============================================================================

/**
 * Bytes already persisted in the archive file.
 * `offset` is absolute within the archive file.
 */
export interface StoredContent {
  kind: 'stored'
  offset: number
  size: number
}

/**
 * Bytes written through the write family, held until the next save.
 */
export interface BufferedContent {
  kind: 'buffered'
  data: Uint8Array
}

/**
 * A real file ingested by `create`, copied into the archive on save.
 */
export interface SourceContent {
  kind: 'source'
  path: string
  size: number
}

/**
 * Opaque content handle of a virtual file, interpreted by the backend.
 */
export type FileContent = StoredContent | BufferedContent | SourceContent

// =============================================================================
// Physical Locations
// =============================================================================

/**
 * A real file location on the storage backend.
 *
 * @example
 * ```typescript
 * await archive.read(filePath('/backups/site.vfsa'))
 * ```
 */
export interface FilePath {
  readonly kind: 'file'
  readonly path: string
}

/**
 * A real directory location on the storage backend.
 */
export interface DirectoryPath {
  readonly kind: 'directory'
  readonly path: string
}

export function filePath(path: string): FilePath {
  return { kind: 'file', path }
}

export function directoryPath(path: string): DirectoryPath {
  return { kind: 'directory', path }
}

export function isDirectoryPath(value: unknown): value is DirectoryPath {
  return (
    value !== null &&
    typeof value === 'object' &&
    'kind' in value &&
    value.kind === 'directory' &&
    'path' in value &&
    typeof value.path === 'string'
  )
}

// =============================================================================
// Query Results
// =============================================================================

/**
 * Matches found by `search`, in discovery order.
 */
export interface SearchResult {
  directories: VirtualDirectory[]
  files: VirtualFile[]
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * - `uninitialized`: fresh instance, neither created nor read
 * - `open`: holds a tree that can be queried, mutated and saved
 */
export type ArchiveState = 'uninitialized' | 'open'

/**
 * Operations that report progress.
 */
export type ProgressOperation = 'create' | 'save' | 'extract'

export interface ProgressEvent {
  operation: ProgressOperation
  /** Entries handled so far, including this one */
  processed: number
  /** Entries the operation will handle in total */
  total: number
  /** Virtual path of the entry just handled */
  path: string
  /** Milliseconds since the operation started */
  elapsed: number
}

export type ProgressListener = (event: ProgressEvent) => void

/**
 * Byte source accepted by `writeStream`. Node.js readable streams and web
 * `ReadableStream`s are both async iterables of chunks.
 */
export type ByteStream = AsyncIterable<Uint8Array>
