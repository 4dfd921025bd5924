/**
 * Wait for `ms` milliseconds.
 *
 * Resolves early (never rejects) when `signal` aborts, so loops can check
 * `signal.aborted` right after waking up.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve()
      return
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId)
      resolve()
    }

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
