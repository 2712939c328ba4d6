/**
 * arcfs core - the virtual tree, path resolution and the archive contract
 *
 * Everything here works without physical storage except the lifecycle
 * operations of `BaseArchive`, which go through an `ArchiveStorage`.
 *
 * @example
 * ```typescript
 * import { VirtualTree, search } from 'arcfs/core'
 *
 * const tree = new VirtualTree()
 * const docs = tree.createDirectory('docs', tree.root)
 * search('doc', tree.root, true).directories // [docs]
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Archive Contract
// =============================================================================

export { type Archive, BaseArchive, type CreateSource } from './archive.js'

// =============================================================================
// Storage Interface
// =============================================================================

export { type ArchiveStorage, type StorageEntry, type StorageStat, MemoryStorage } from './backend.js'

// =============================================================================
// Tree Model
// =============================================================================

export { IndexSequence, VirtualDirectory, VirtualFile, VirtualTree } from './node.js'

export {
  type ResolvedParent,
  basename,
  formatPath,
  isMultiSegment,
  isValidName,
  joinPath,
  resolveDirectory,
  resolveFile,
  resolveParent,
  splitPath,
  validateName,
} from './path.js'

export { directoryExists, fileExists, removeDirectory, removeFile, search } from './query.js'

// =============================================================================
// Types
// =============================================================================

export {
  type ArchiveState,
  type BufferedContent,
  type ByteStream,
  type DirectoryPath,
  type FileContent,
  type FilePath,
  type ProgressEvent,
  type ProgressListener,
  type ProgressOperation,
  type SearchResult,
  type SourceContent,
  type StoredContent,
  directoryPath,
  filePath,
  isDirectoryPath,
} from './types.js'

export { type Failure, type Result, type Success, attempt, fail, failWith, ok } from './result.js'

// =============================================================================
// Configuration & Constants
// =============================================================================

export {
  type ArchiveConfig,
  type ArchiveConfigOptions,
  createConfig,
  defaultConfig,
  withArchivePath,
} from './config.js'

export {
  ARCHIVE_MAGIC,
  FORMAT_VERSION,
  MAX_CONTENT_SIZE,
  PREAMBLE_SIZE,
  ROOT_INDEX,
  ROOT_NAME,
  SEPARATOR,
  constants,
} from './constants.js'

// =============================================================================
// Errors
// =============================================================================

export {
  ALL_ERROR_CODES,
  ArchiveError,
  type ArchiveErrorOptions,
  EALREADY,
  EBADF,
  EBADMSG,
  EEXIST,
  EFBIG,
  EINVAL,
  EIO,
  EISDIR,
  ENOENT,
  ENOTDIR,
  type Errno,
  type ErrorCode,
  ERROR_CODES,
  createError,
  hasErrorCode,
  isArchiveError,
  isEbadmsg,
  isEexist,
  isEfbig,
  isEnoent,
  isErrorCode,
  toArchiveError,
} from './errors.js'
