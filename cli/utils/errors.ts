/**
 * Error formatting utilities for CLI
 */

import type { Result } from '../../core/result.js'

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

/**
 * Message of a failed result, or `fallback` when it carries no error
 */
export function getResultMessage<T>(result: Result<T>, fallback: string): string {
  return result.error ? result.error.message : fallback
}

/**
 * Format error for CLI output with consistent styling
 *
 * Format: arcfs <command>: <message>
 */
export function formatError(command: string, err: unknown): string {
  const message = getErrorMessage(err)
  return `arcfs ${command}: ${message}`
}

/**
 * Create a missing argument error message
 */
export function missingArgumentError(command: string, argName: string): string {
  return `arcfs ${command}: missing ${argName} argument`
}

/**
 * Create an unknown command error message
 */
export function unknownCommandError(command: string): string {
  return `arcfs: unknown command '${command}'`
}
