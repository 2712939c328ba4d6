/**
 * Formatting utilities for CLI output
 */

import { SEPARATOR } from '../../core/constants.js'
import type { VirtualDirectory, VirtualFile } from '../../core/node.js'
import type { SearchResult } from '../../core/types.js'
import type { LsEntry, LsFormatOptions } from '../types.js'

/**
 * Listing entries of `directory`: files first, then subdirectories. In
 * recursive mode each subdirectory is followed by its own entries and names
 * are paths from the archive root.
 */
export function listEntries(directory: VirtualDirectory, recursive: boolean = false): LsEntry[] {
  const entries: LsEntry[] = []
  const visit = (current: VirtualDirectory): void => {
    for (const file of current.files) {
      entries.push(fileEntry(file, recursive))
    }
    for (const child of current.directories) {
      entries.push({ name: recursive ? child.fullPath : child.name, type: 'directory', size: 0 })
      if (recursive) visit(child)
    }
  }
  visit(directory)
  return entries
}

function fileEntry(file: VirtualFile, fullPath: boolean): LsEntry {
  return { name: fullPath ? file.fullPath : file.name, type: 'file', size: file.size }
}

/**
 * Format ls output. Directories carry a trailing separator.
 *
 * Long format: type, stored size, name
 */
export function formatLsOutput(entries: LsEntry[], options: LsFormatOptions = {}): string {
  const { long = false } = options

  const label = (entry: LsEntry): string => (entry.type === 'directory' ? entry.name + SEPARATOR : entry.name)

  if (!long) {
    return entries.map(label).join('\n')
  }

  return entries.map(entry => {
    const type = entry.type === 'directory' ? 'd' : '-'
    const size = entry.size.toString().padStart(10, ' ')
    return `${type} ${size} ${label(entry)}`
  }).join('\n')
}

/**
 * Format search matches, directories first, as paths from the root
 */
export function formatSearchOutput(result: SearchResult): string {
  return [
    ...result.directories.map((directory) => directory.fullPath + SEPARATOR),
    ...result.files.map((file) => file.fullPath),
  ].join('\n')
}
