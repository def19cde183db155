/**
 * Retry loop shared by the HTTP fetcher and the browser renderer.
 *
 * Each attempt reports whether its failure is worth retrying; the loop
 * backs off between attempts per the RetryPolicy and stops early on
 * success, a permanent failure or cancellation.
 */

import type { ILogger } from '@cratedigger/logger'
import type { FetchResult, RetryPolicy } from '../types.js'

export type AttemptResult = Omit<FetchResult, 'attempts'> & { retryable: boolean }

/**
 * Backoff before retry n (0-based).
 */
export function computeRetryDelay(policy: RetryPolicy, retryIndex: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * Math.pow(2, retryIndex), policy.maxDelayMs)
  const jitter = policy.jitterMs.min + random() * (policy.jitterMs.max - policy.jitterMs.min)
  return exponential + jitter
}

export function isRetryableStatus(policy: RetryPolicy, statusCode: number): boolean {
  return statusCode >= 500 || policy.retryableStatusCodes.includes(statusCode)
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export interface RetryLoopOptions {
  url: string
  policy: RetryPolicy
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  random: () => number
  logger: ILogger
  signal?: AbortSignal
}

/**
 * Run `attemptOnce` until it succeeds, fails permanently or the policy's
 * attempts are used up. Never throws.
 */
export async function withRetries(
  attemptOnce: () => Promise<AttemptResult>,
  options: RetryLoopOptions
): Promise<FetchResult> {
  const { url, policy, signal } = options
  const startTime = Date.now()
  const maxAttempts = Math.max(1, policy.maxAttempts)

  let last: AttemptResult | null = null
  let attempts = 0

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return { status: 'aborted', attempts, durationMs: Date.now() - startTime, error: 'Fetch cancelled' }
    }

    attempts = attempt
    last = await attemptOnce()

    if (last.status === 'ok' || !last.retryable || attempt === maxAttempts) {
      break
    }

    const delay = computeRetryDelay(policy, attempt - 1, options.random)
    options.logger.warn('Retrying request', {
      url,
      attempt,
      maxAttempts,
      status: last.status,
      statusCode: last.statusCode,
      delayMs: Math.round(delay),
    })
    await options.sleep(delay, signal)
  }

  if (!last) {
    return { status: 'error', attempts: 0, durationMs: Date.now() - startTime, error: 'No attempt made' }
  }

  const { retryable: _retryable, ...result } = last
  return { ...result, attempts, durationMs: Date.now() - startTime }
}
