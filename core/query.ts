/**
 * Query and mutation engine over a virtual tree.
 *
 * Every operation resolves paths through `core/path` and reports ordinary
 * not-found conditions as `false` or an unsuccessful result without an
 * error payload. Nothing here touches physical storage.
 *
 * Concurrency: `fileExists`, `directoryExists` and `search` are read-only
 * and may run alongside each other. None of them may run while a removal on
 * the same tree is in flight; callers serialize mutations.
 *
 * @module core/query
 */

import { defer } from '../utils/defer.js'
import type { VirtualDirectory, VirtualFile } from './node.js'
import { resolveFile, resolveParent } from './path.js'
import { fail, ok, type Result } from './result.js'
import type { SearchResult } from './types.js'

/**
 * Whether `path` addresses an existing file. Fails closed when an
 * intermediate directory is missing.
 */
export function fileExists(path: string, start: VirtualDirectory): boolean {
  return resolveFile(path, start) !== undefined
}

/**
 * Whether `path` addresses an existing directory below `start`.
 * An empty path is not a directory reference.
 */
export function directoryExists(path: string, start: VirtualDirectory): boolean {
  const parent = resolveParent(path, start)
  return parent !== undefined && parent.directory.containsDirectory(parent.name)
}

/**
 * Detach the file addressed by `path`.
 *
 * Single-segment paths match by bare name in `start`; multi-segment paths
 * match the reconstructed full path in the resolved directory. A second
 * removal of the same path reports `success: false`.
 */
export function removeFile(path: string, start: VirtualDirectory): Promise<Result<boolean>> {
  return defer(() => {
    const file = resolveFile(path, start)
    if (!file || !file.directory) {
      return fail(false)
    }
    return file.directory.removeFile(file) ? ok(true) : fail(false)
  })
}

/**
 * Detach the directory addressed by `path` along with its subtree.
 */
export function removeDirectory(path: string, start: VirtualDirectory): Promise<Result<boolean>> {
  return defer(() => {
    const parent = resolveParent(path, start)
    const target = parent?.directory.directory(parent.name)
    if (!parent || !target) {
      return fail(false)
    }
    return parent.directory.removeDirectory(target) ? ok(true) : fail(false)
  })
}

/**
 * Find directories and files whose names contain `query`, ignoring case.
 *
 * Non-recursive mode checks only the files directly inside `start`;
 * directories are never matched. Recursive mode visits every descendant
 * directory in pre-order, testing the directory's name and then its files
 * before descending, and finishes with a separate pass over `start`'s own
 * files. Results keep discovery order.
 *
 * @example
 * ```typescript
 * search('report', root, false).files    // e.g. [Report.TXT]
 * search('2024', root, true).directories // every directory named like '*2024*'
 * ```
 */
export function search(query: string, start: VirtualDirectory, recurse: boolean): SearchResult {
  const needle = query.toLowerCase()
  const matches = (name: string): boolean => name.toLowerCase().includes(needle)

  const directories: VirtualDirectory[] = []
  const files: VirtualFile[] = []

  const collectFiles = (directory: VirtualDirectory): void => {
    for (const file of directory.files) {
      if (matches(file.name)) {
        files.push(file)
      }
    }
  }

  if (!recurse) {
    collectFiles(start)
    return { directories, files }
  }

  const descend = (directory: VirtualDirectory): void => {
    for (const child of directory.directories) {
      if (matches(child.name)) {
        directories.push(child)
      }
      collectFiles(child)
      descend(child)
    }
  }

  descend(start)
  collectFiles(start)

  return { directories, files }
}

