/**
 * Retry Policy
 *
 * Decides, per failed attempt, whether a URL goes back to the queue and
 * after how long. Transient kinds back off exponentially with equal jitter
 * (half the delay fixed, half random) so retries from parallel requests
 * spread out. Permanent kinds are never retried.
 */

import { isTransientErrorKind } from '../../lib/errors.js'
import type { ErrorKind, RetryConfig, RetryDecision } from '../types.js'
import { DEFAULT_RETRY } from '../types.js'

export interface RetryPolicyOptions {
  config?: Partial<RetryConfig>
  random?: () => number
}

export class RetryPolicy {
  readonly config: RetryConfig
  private readonly random: () => number

  constructor(options: RetryPolicyOptions = {}) {
    this.config = { ...DEFAULT_RETRY, ...options.config }
    this.random = options.random ?? Math.random
  }

  get maxAttempts(): number {
    return this.config.maxAttempts
  }

  /**
   * @param attemptsMade - attempts performed so far, including the failed one (≥ 1)
   * @param retryAfterMs - server-provided Retry-After, honoured up to maxDelayMs
   */
  shouldRetry(attemptsMade: number, errorKind: ErrorKind, retryAfterMs?: number): RetryDecision {
    if (!isTransientErrorKind(errorKind)) {
      return { action: 'give_up', reason: 'permanent' }
    }

    if (attemptsMade >= this.config.maxAttempts) {
      return { action: 'give_up', reason: 'exhausted' }
    }

    return { action: 'retry', delayMs: this.delayFor(attemptsMade, retryAfterMs) }
  }

  /**
   * Backoff before the next attempt, after `attemptsMade` failures.
   */
  delayFor(attemptsMade: number, retryAfterMs?: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs } = this.config
    const exponent = Math.max(0, attemptsMade - 1)
    const base = Math.min(initialDelayMs * Math.pow(backoffMultiplier, exponent), maxDelayMs)

    const half = base / 2
    let delay = Math.round(half + this.random() * half)

    if (retryAfterMs !== undefined && retryAfterMs > delay) {
      delay = retryAfterMs
    }

    return Math.min(delay, maxDelayMs)
  }
}
