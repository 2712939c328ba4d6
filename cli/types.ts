/**
 * CLI Types for arcfs
 */

import type { ArchiveStorage } from '../core/backend.js'

/**
 * Result of executing a CLI command
 */
export interface CommandResult {
  exitCode: number
  error?: string
}

/**
 * Everything a command touches, injected so tests can run in memory
 */
export interface CLIContext {
  storage: ArchiveStorage
  stdout: (text: string) => void
  stderr: (text: string) => void
}

/**
 * Layer options shared by every command
 */
export interface LayerOptions {
  gzip: boolean
  password: string | undefined
}

/**
 * Entry in an archive listing
 */
export interface LsEntry {
  /** Bare name, or the path from the root in recursive listings */
  name: string
  type: 'file' | 'directory'
  size: number
}

/**
 * Options for ls output formatting
 */
export interface LsFormatOptions {
  long?: boolean
}
