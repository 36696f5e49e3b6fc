import { AbortOperationError } from './errors.ts'
import type { THttpMethod, TRetryPolicy } from './types.ts'

export const DEFAULT_RETRY_POLICY: TRetryPolicy = {
  attempts: 4,
  baseDelayInMilliseconds: 200,
  maximumDelayInMilliseconds: 2000,
}

/** Gateway failures that usually clear on their own. Other 5xx and every 4xx are terminal. */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([502, 503, 504])

/**
 * Methods that may be resent after a gateway error. A POST that reached the
 * backend before the gateway gave up may already have created its resource.
 */
export const IDEMPOTENT_METHODS: ReadonlySet<THttpMethod> = new Set([
  'GET',
  'HEAD',
  'PUT',
  'DELETE',
])

export function calculateBackoff(
  attemptIndex: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attemptIndex))
  const jitter = Math.random() * 0.25 * exponential
  return Math.min(maxDelayMs, exponential + jitter)
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortOperationError())
      return
    }

    let onAbort: (() => void) | undefined

    const timeoutId = setTimeout(() => {
      if (onAbort) signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    if (signal) {
      onAbort = () => {
        clearTimeout(timeoutId)
        reject(new AbortOperationError())
      }
      signal.addEventListener('abort', onAbort, { once: true })
    }
  })
}
