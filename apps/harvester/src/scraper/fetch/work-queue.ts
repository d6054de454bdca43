/**
 * Work Queue
 *
 * Run-wide queue of WorkItems on top of a p-queue pool. The pool bounds how
 * many items are processed at once; this wrapper adds admission rules,
 * delayed re-submission for retries and a run-level idle signal. A retried
 * item waits on a timer outside the pool instead of holding a slot.
 *
 * Lifecycle:
 * - open: push() and adopt() accepted
 * - closed: push() refused; adopt() still accepted for links found on in-flight pages
 * - draining: adopt() refused, unstarted items dropped; retries still honoured
 * - aborted: everything dropped, including scheduled retries
 *
 * The queue is idle once it is closed and the pool is empty with no retry
 * pending, or once it is aborted and in-flight items have finished.
 */

import PQueue from 'p-queue'
import type { WorkItem } from '../types.js'

export type QueueState = 'open' | 'closed' | 'draining' | 'aborted'

export type ItemProcessor = (item: WorkItem) => Promise<void>

export interface QueueStats {
  state: QueueState
  ready: number
  delayed: number
  inFlight: number
  /** Items discarded by drain() or abort() */
  dropped: number
}

export class WorkQueue {
  private state: QueueState = 'open'
  private readonly pool = new PQueue({ autoStart: false })
  private readonly delayed = new Map<WorkItem, NodeJS.Timeout>()
  private processor: ItemProcessor | null = null
  private dropped = 0
  private faulted = false
  private fault: unknown
  private listeners: Array<() => void> = []

  /**
   * Admit top-level work. Refused once the queue is closed.
   */
  push(item: WorkItem): boolean {
    if (this.state !== 'open') {
      return false
    }
    this.enqueue(item)
    return true
  }

  /**
   * Admit work discovered while processing an in-flight item.
   * Accepted after close() so the run can finish what it started.
   */
  adopt(item: WorkItem): boolean {
    if (this.state !== 'open' && this.state !== 'closed') {
      return false
    }
    this.enqueue(item)
    return true
  }

  /**
   * Process items with at most `concurrency` running at once, until the
   * queue is idle. If the processor throws, the queue is aborted and the
   * first error is rethrown once in-flight items have finished.
   */
  async run(processor: ItemProcessor, concurrency: number): Promise<void> {
    this.processor = processor
    this.pool.concurrency = concurrency
    this.pool.start()

    await this.whenIdle()

    if (this.faulted) {
      throw this.fault
    }
  }

  /**
   * Re-submit an item after `delayMs`, with attempt + 1 and a notBefore
   * timestamp. Called from inside the processor; refused once aborted.
   */
  retryLater(item: WorkItem, delayMs: number): boolean {
    if (this.state === 'aborted') {
      return false
    }

    const waitMs = Math.max(0, delayMs)
    const next: WorkItem = {
      ...item,
      attempt: item.attempt + 1,
      notBefore: Date.now() + waitMs,
    }

    const timer = setTimeout(() => {
      this.delayed.delete(next)
      this.enqueue(next)
      this.notify()
    }, waitMs)
    this.delayed.set(next, timer)
    return true
  }

  /**
   * Stop accepting top-level work. Discovered work and retries continue.
   */
  close(): void {
    if (this.state === 'open') {
      this.state = 'closed'
    }
    this.notify()
  }

  /**
   * Cooperative shutdown: drop items not yet started and refuse discovered
   * work. In-flight items finish; scheduled retries still run.
   *
   * @returns the number of items dropped
   */
  drain(): number {
    if (this.state === 'aborted') {
      return 0
    }
    this.state = 'draining'
    const count = this.pool.size
    this.pool.clear()
    this.dropped += count
    this.notify()
    return count
  }

  /**
   * Forced shutdown: drop queued items and cancel scheduled retries.
   *
   * @returns the number of items dropped (queued and delayed)
   */
  abort(): number {
    let count = this.pool.size
    this.pool.clear()
    for (const timer of this.delayed.values()) {
      clearTimeout(timer)
      count++
    }
    this.delayed.clear()
    this.dropped += count
    this.state = 'aborted'
    this.notify()
    return count
  }

  /**
   * True when no more items can ever be processed.
   */
  isIdle(): boolean {
    if (this.pool.pending > 0) return false
    if (this.state === 'aborted') return true
    return this.state !== 'open' && this.pool.size === 0 && this.delayed.size === 0
  }

  /**
   * Resolves once the queue is idle.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      await this.pool.onIdle()
      if (this.isIdle()) return
      if (this.pool.size > 0 || this.pool.pending > 0) continue
      // Waiting on close() or a retry timer
      await this.nextChange()
    }
  }

  stats(): QueueStats {
    return {
      state: this.state,
      ready: this.pool.size,
      delayed: this.delayed.size,
      inFlight: this.pool.pending,
      dropped: this.dropped,
    }
  }

  private enqueue(item: WorkItem): void {
    this.pool.add(() => this.process(item)).catch((error: unknown) => this.fail(error))
  }

  private async process(item: WorkItem): Promise<void> {
    const processor = this.processor
    try {
      if (!processor) {
        throw new Error('WorkQueue started without a processor')
      }
      await processor(item)
    } catch (error) {
      // Abort before the pool starts the next item
      this.fail(error)
    }
  }

  private fail(error: unknown): void {
    if (!this.faulted) {
      this.faulted = true
      this.fault = error
    }
    this.abort()
  }

  private nextChange(): Promise<void> {
    return new Promise(resolve => {
      this.listeners.push(resolve)
    })
  }

  private notify(): void {
    const listeners = this.listeners
    this.listeners = []
    for (const listener of listeners) {
      listener()
    }
  }
}
