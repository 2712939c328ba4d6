/**
 * Operation outcome for archive operations.
 *
 * Every mutating or I/O operation returns a `Result` instead of throwing.
 * Ordinary not-found conditions are failures without an error payload;
 * storage faults and codec failures carry an `ArchiveError`.
 *
 * @example
 * ```typescript
 * const removed = await archive.removeFile('docs\\old.txt')
 * if (removed.success) {
 *   // value is true
 * } else if (removed.error) {
 *   logger.error(removed.error.message)
 * }
 * ```
 *
 * @module core/result
 */

import { type ArchiveError, toArchiveError } from './errors.js'

/**
 * Successful outcome.
 */
export interface Success<T> {
  readonly success: true
  readonly value: T
  readonly error?: undefined
}

/**
 * Unsuccessful outcome. Boolean operations report `value: false`.
 */
export interface Failure<T> {
  readonly success: false
  readonly value: T | undefined
  readonly error?: ArchiveError
}

export type Result<T> = Success<T> | Failure<T>

export function ok<T>(value: T): Success<T> {
  return { success: true, value }
}

/**
 * Build a failure. Omit `error` for plain not-found outcomes.
 */
export function fail<T>(value: T | undefined, error?: ArchiveError): Failure<T> {
  return error ? { success: false, value, error } : { success: false, value }
}

/**
 * Build a failure from any thrown value.
 */
export function failWith<T>(value: T | undefined, thrown: unknown, syscall?: string, path?: string): Failure<T> {
  return fail(value, toArchiveError(thrown, syscall, path))
}

/**
 * Run async work and capture a thrown error as a failure carrying `fallback`.
 *
 * @example
 * ```typescript
 * const bytes = await attempt(() => storage.readFile(path), undefined, 'readFile', path)
 * ```
 */
export async function attempt<T>(
  work: () => Promise<T>,
  fallback: T | undefined,
  syscall?: string,
  path?: string
): Promise<Result<T>> {
  try {
    return ok(await work())
  } catch (err) {
    return failWith(fallback, err, syscall, path)
  }
}
