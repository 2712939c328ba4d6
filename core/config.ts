/**
 * Archive Configuration Module
 *
 * Provides configuration types and utilities for archive instances.
 * Configuration is validated, normalized, and frozen for immutability.
 *
 * @module core/config
 */

import { MAX_CONTENT_SIZE } from './constants.js'
import { EINVAL } from './errors.js'
import type { ProgressListener } from './types.js'

/**
 * Archive configuration
 */
export interface ArchiveConfig {
  /** Physical location of the archive file; `read()` may set it later */
  readonly archivePath: string | undefined

  /** Save after every successful mutation instead of waiting for `save()` */
  readonly saveAfterChange: boolean

  /** Largest single-file content accepted by reads and writes (bytes) */
  readonly maxContentSize: number

  /** Receives progress of create, save and extract */
  readonly onProgress: ProgressListener | undefined
}

/**
 * Configuration options (partial, for user input)
 */
export interface ArchiveConfigOptions {
  archivePath?: string
  saveAfterChange?: boolean
  maxContentSize?: number
  onProgress?: ProgressListener
}

/**
 * Default configuration values
 */
export const defaultConfig: ArchiveConfig = Object.freeze({
  archivePath: undefined,
  saveAfterChange: false,
  maxContentSize: MAX_CONTENT_SIZE,
  onProgress: undefined,
})

/**
 * Validate an archive path
 */
function validateArchivePath(archivePath: unknown): string {
  if (typeof archivePath !== 'string' || archivePath.trim() === '') {
    throw new EINVAL('createConfig', 'archivePath must be a non-empty string')
  }
  return archivePath
}

/**
 * Validate content size limit
 */
function validateMaxContentSize(size: unknown): number {
  if (typeof size !== 'number' || !Number.isInteger(size)) {
    throw new EINVAL('createConfig', 'maxContentSize must be an integer')
  }
  if (size < 0 || size > MAX_CONTENT_SIZE) {
    throw new EINVAL('createConfig', `maxContentSize must be between 0 and ${MAX_CONTENT_SIZE}`)
  }
  return size
}

/**
 * Validate boolean value
 */
function validateBoolean(value: unknown, name: string): boolean {
  if (typeof value !== 'boolean') {
    throw new EINVAL('createConfig', `${name} must be a boolean`)
  }
  return value
}

function validateListener(listener: unknown): ProgressListener {
  if (typeof listener !== 'function') {
    throw new EINVAL('createConfig', 'onProgress must be a function')
  }
  return (event) => listener(event)
}

/**
 * Create a new archive configuration
 *
 * @throws {EINVAL} If any option is invalid
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config = createConfig()
 *
 * // Persist every change immediately
 * const autoSave = createConfig({ archivePath: 'site.vfsa', saveAfterChange: true })
 * ```
 */
export function createConfig(options: ArchiveConfigOptions = {}): ArchiveConfig {
  const config: ArchiveConfig = {
    archivePath:
      options.archivePath !== undefined
        ? validateArchivePath(options.archivePath)
        : defaultConfig.archivePath,

    saveAfterChange:
      options.saveAfterChange !== undefined
        ? validateBoolean(options.saveAfterChange, 'saveAfterChange')
        : defaultConfig.saveAfterChange,

    maxContentSize:
      options.maxContentSize !== undefined
        ? validateMaxContentSize(options.maxContentSize)
        : defaultConfig.maxContentSize,

    onProgress:
      options.onProgress !== undefined
        ? validateListener(options.onProgress)
        : defaultConfig.onProgress,
  }

  return Object.freeze(config)
}

/**
 * Copy of `config` with a different archive path.
 */
export function withArchivePath(config: ArchiveConfig, archivePath: string): ArchiveConfig {
  return Object.freeze({ ...config, archivePath: validateArchivePath(archivePath) })
}
