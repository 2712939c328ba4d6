/**
 * Run synchronous work off the caller's stack.
 *
 * The work is queued as a single microtask and runs to completion without
 * interleaving, so tree mutations stay atomic with respect to other
 * callers. There is no locking: two deferred mutations of the same tree
 * must be serialized by the caller.
 *
 * @example
 * ```typescript
 * const result = await defer(() => directory.removeFile(file))
 * ```
 */
export function defer<T>(work: () => T): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    queueMicrotask(() => {
      try {
        resolve(work())
      } catch (err) {
        reject(err)
      }
    })
  })
}
