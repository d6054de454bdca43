/**
 * Fetcher
 *
 * Processes a WorkQueue with at most `concurrency` items in flight. For
 * each item:
 * 1. acquire a throttle slot for the URL
 * 2. make one HTTP attempt
 * 3. emit Success, or ask the retry policy:
 *    - retry: hand the item back to the queue with a not-before time and move on
 *    - give up: emit a terminal Failure
 *
 * The result handler is awaited inside the item's slot, so links discovered
 * on a page are adopted before the queue can look idle.
 */

import type { ILogger } from '@cover-harvest/logger'
import { silentLogger } from '@cover-harvest/logger'
import { sanitizeUrl } from '../../config/structured-log.js'
import type { FetchResult, PageFetcher, WorkItem } from '../types.js'
import type { RequestThrottle } from './throttle.js'
import type { RetryPolicy } from './retry-policy.js'
import type { WorkQueue } from './work-queue.js'

export type ResultHandler = (result: FetchResult) => void | Promise<void>

export interface FetcherOptions {
  pageFetcher: PageFetcher
  throttle: RequestThrottle
  retryPolicy: RetryPolicy
  concurrency: number
  requestTimeoutMs: number
  logger?: ILogger
}

type AttemptOutcome =
  | { type: 'result'; result: FetchResult }
  | { type: 'requeued' }

export interface FetcherStats {
  /** HTTP attempts made */
  attempts: number
  succeeded: number
  failed: number
  retried: number
}

export class Fetcher {
  private readonly options: FetcherOptions
  private readonly log: ILogger
  private readonly counters: FetcherStats = { attempts: 0, succeeded: 0, failed: 0, retried: 0 }

  constructor(options: FetcherOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`)
    }
    this.options = options
    this.log = options.logger ?? silentLogger
  }

  get stats(): FetcherStats {
    return { ...this.counters }
  }

  /**
   * Process the queue until it is idle.
   * Rejects only on an unexpected fault; fetch failures are results. A fault
   * aborts the queue, and the returned promise settles once in-flight items
   * have finished.
   */
  async run(queue: WorkQueue, onResult: ResultHandler): Promise<FetcherStats> {
    await queue.run(async item => {
      try {
        const outcome = await this.attempt(item, queue)
        if (outcome.type === 'result') {
          await onResult(outcome.result)
        }
      } catch (error) {
        this.log.error('Fetch fault, aborting queue', { ...sanitizeUrl(item.url), attempt: item.attempt + 1 }, error)
        throw error
      }
    }, this.options.concurrency)

    return this.stats
  }

  /**
   * One attempt for one item: a result to emit, or the item went back to the queue.
   */
  private async attempt(item: WorkItem, queue: WorkQueue): Promise<AttemptOutcome> {
    const { pageFetcher, throttle, retryPolicy, requestTimeoutMs } = this.options

    await throttle.acquire(item.url)

    this.counters.attempts++
    const attemptsMade = item.attempt + 1
    const response = await pageFetcher.fetch(item.url, { timeoutMs: requestTimeoutMs })

    if (response.ok) {
      this.counters.succeeded++
      this.log.debug('Fetched page', { ...sanitizeUrl(item.url), status: response.status, attempt: attemptsMade })
      return {
        type: 'result',
        result: {
          ok: true,
          url: item.url,
          body: response.body,
          status: response.status,
          fetchedAt: new Date(),
          item,
        },
      }
    }

    const decision = retryPolicy.shouldRetry(attemptsMade, response.errorKind, response.retryAfterMs)

    if (decision.action === 'retry') {
      this.counters.retried++
      this.log.info('Scheduling retry', {
        ...sanitizeUrl(item.url),
        errorKind: response.errorKind,
        statusCode: response.status,
        attempt: attemptsMade,
        delayMs: decision.delayMs,
      })
      queue.retryLater(item, decision.delayMs)
      return { type: 'requeued' }
    }

    this.counters.failed++
    this.log.warn('Giving up on URL', {
      ...sanitizeUrl(item.url),
      errorKind: response.errorKind,
      statusCode: response.status,
      attempt: attemptsMade,
      reason: decision.reason,
    })

    return {
      type: 'result',
      result: {
        ok: false,
        url: item.url,
        errorKind: response.errorKind,
        attempt: attemptsMade,
        statusCode: response.status,
        message: response.message,
        item,
      },
    }
  }
}
