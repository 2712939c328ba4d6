/**
 * Path utilities for CLI
 */

import { SEPARATOR } from '../../core/constants.js'

/**
 * Normalize an archive path typed on the command line.
 * - Accepts '/' as well as the archive separator
 * - Handles '.' as the root (maps to '')
 * - Collapses repeated separators
 * - Removes leading and trailing separators
 *
 * @example
 * ```typescript
 * normalizeCLIPath('/docs//a.txt') // 'docs\\a.txt'
 * normalizeCLIPath('.')            // ''
 * ```
 */
export function normalizeCLIPath(path: string): string {
  if (path === '.') return ''

  return path
    .split(/[\\/]+/)
    .filter((segment) => segment.length > 0)
    .join(SEPARATOR)
}
