/**
 * CLI utilities - barrel export
 */

export { normalizeCLIPath } from './path.js'
export { formatLsOutput, formatSearchOutput, listEntries } from './format.js'
export { formatError, missingArgumentError, unknownCommandError, getErrorMessage, getResultMessage } from './errors.js'
