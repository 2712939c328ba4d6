/**
 * Virtual path utilities and the path resolver.
 *
 * Virtual paths are sequences of segments separated by `\`. They are always
 * relative to a start directory; a single leading separator is stripped.
 * Resolution walks the tree one segment at a time and never creates
 * anything: a missing intermediate directory ends the walk.
 *
 * @module path
 * @example
 * ```typescript
 * import { formatPath, resolveFile } from './path'
 *
 * formatPath('\\docs\\readme.md')        // 'docs\\readme.md'
 * resolveFile('docs\\readme.md', root)   // VirtualFile | undefined
 * ```
 */

import { SEPARATOR } from './constants.js'
import { EINVAL } from './errors.js'
import type { VirtualDirectory, VirtualFile } from './node.js'

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Strip a single leading separator. Empty input formats to an empty string.
 *
 * @example
 * ```typescript
 * formatPath('')             // ''
 * formatPath('\\a\\b.txt')   // 'a\\b.txt'
 * formatPath('\\\\a')        // '\\a'
 * ```
 */
export function formatPath(path: string): string {
  if (!path) {
    return ''
  }
  return path.startsWith(SEPARATOR) ? path.slice(SEPARATOR.length) : path
}

/**
 * Split a path into its non-empty segments.
 */
export function splitPath(path: string): string[] {
  return formatPath(path)
    .split(SEPARATOR)
    .filter((segment) => segment.length > 0)
}

/**
 * Join segments with the separator, skipping empty ones.
 *
 * @example
 * ```typescript
 * joinPath('', 'a.txt')       // 'a.txt'
 * joinPath('docs', 'a.txt')   // 'docs\\a.txt'
 * ```
 */
export function joinPath(...segments: string[]): string {
  return segments.filter((segment) => segment.length > 0).join(SEPARATOR)
}

/**
 * Whether a path still contains a separator after formatting.
 */
export function isMultiSegment(path: string): boolean {
  return formatPath(path).includes(SEPARATOR)
}

/**
 * Last segment of a path, or '' when there is none.
 */
export function basename(path: string): string {
  const segments = splitPath(path)
  return segments[segments.length - 1] ?? ''
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate a single entry name.
 *
 * @throws EINVAL if the name is empty or contains the separator
 */
export function validateName(name: string, syscall: string = 'validateName'): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new EINVAL(syscall, 'name must be a non-empty string')
  }
  if (name.includes(SEPARATOR)) {
    throw new EINVAL(syscall, name)
  }
}

export function isValidName(name: string): boolean {
  return typeof name === 'string' && name.length > 0 && !name.includes(SEPARATOR)
}

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Walk `segments` as subdirectory names starting at `start`.
 * @internal
 */
function walk(segments: readonly string[], start: VirtualDirectory): VirtualDirectory | undefined {
  let current: VirtualDirectory = start
  for (const segment of segments) {
    const next = current.directory(segment)
    if (!next) {
      return undefined
    }
    current = next
  }
  return current
}

/**
 * Resolve a path whose every segment names a directory.
 * An empty path resolves to `start`.
 */
export function resolveDirectory(path: string, start: VirtualDirectory): VirtualDirectory | undefined {
  return walk(splitPath(path), start)
}

/**
 * The directory owning the last segment of a path.
 */
export interface ResolvedParent {
  directory: VirtualDirectory
  name: string
}

/**
 * Resolve all but the last segment. Returns undefined when an intermediate
 * directory is missing or the path has no last segment.
 */
export function resolveParent(path: string, start: VirtualDirectory): ResolvedParent | undefined {
  const segments = splitPath(path)
  const name = segments.pop()
  if (name === undefined) {
    return undefined
  }
  const directory = walk(segments, start)
  return directory ? { directory, name } : undefined
}

/**
 * Resolve a path to a file.
 *
 * Single-segment paths match a file of `start` by bare name. Multi-segment
 * paths walk the intermediate directories, then match the reconstructed
 * full path `directory.fullPath + '\\' + last` against the files' own full
 * paths.
 *
 * @example
 * ```typescript
 * resolveFile('a.txt', root)          // root's 'a.txt'
 * resolveFile('sub\\x.txt', root)     // 'x.txt' inside 'sub'
 * resolveFile('missing\\x.txt', root) // undefined
 * ```
 */
export function resolveFile(path: string, start: VirtualDirectory): VirtualFile | undefined {
  const formatted = formatPath(path)
  if (!formatted) {
    return undefined
  }
  if (!formatted.includes(SEPARATOR)) {
    return start.file(formatted)
  }
  const parent = resolveParent(formatted, start)
  if (!parent) {
    return undefined
  }
  return parent.directory.fileByPath(joinPath(parent.directory.fullPath, parent.name))
}
