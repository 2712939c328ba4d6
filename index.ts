/**
 * arcfs - single-file virtual archives
 *
 * A directory tree packed into one archive file, with an in-memory tree
 * for queries and edits, lazy content reads, and optional compression and
 * encryption layers.
 *
 * @example
 * ```typescript
 * import { createArchive, NodeStorage, directoryPath, filePath } from 'arcfs'
 *
 * const archive = createArchive({ storage: new NodeStorage(), archivePath: 'site.vfsa', compress: true })
 * await archive.create(directoryPath('public'))
 *
 * const reopened = createArchive({ storage: new NodeStorage(), compress: true })
 * await reopened.read(filePath('site.vfsa'))
 * const page = await reopened.readAllText('index.html')
 * ```
 *
 * @example CLI
 * ```bash
 * arcfs create ./public site.vfsa --gzip
 * arcfs ls site.vfsa -r
 * arcfs cat site.vfsa index.html
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'
export * from './archive/index.js'
export * from './storage/index.js'
export { createLogger, logger, type Logger } from './utils/logger.js'
export { defer } from './utils/defer.js'
