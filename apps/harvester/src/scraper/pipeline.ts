/**
 * Harvest Pipeline
 *
 * Owns one run: seeds the work queue, drives the fetcher, routes each
 * fetched page through the site adapter and the deduplicator, then hands
 * the finalized records to the writers.
 *
 * States: idle → seeding → running → draining → finalized
 *
 * - seeding: seeds are validated, de-duplicated by canonical URL and pushed; the queue is then closed
 * - running: the queue's pool fetches; search pages add listing and next-page work
 * - draining: the queue is idle or shutdown() was called
 * - finalized: records frozen, writers done, report built
 */

import { createId } from '@paralleldrive/cuid2'
import type { ILogger } from '@cover-harvest/logger'
import { loggers } from '../config/logger.js'
import { createWorkflowLogger, sanitizeUrl } from '../config/structured-log.js'
import type { WorkflowLogger } from '../config/structured-log.js'
import { ERROR_CODES, HarvestError, PipelineAbortedError } from '../lib/errors.js'
import { Fetcher } from './fetch/fetcher.js'
import type { FetcherStats } from './fetch/fetcher.js'
import { RequestThrottle } from './fetch/throttle.js'
import { RetryPolicy } from './fetch/retry-policy.js'
import { WorkQueue } from './fetch/work-queue.js'
import { Deduplicator } from './process/run-dedupe.js'
import { writeAll } from './process/writer.js'
import type {
  CandidateRecord,
  DiscoveredLink,
  FailureLogEntry,
  FetchResult,
  FetchSuccess,
  ListingHint,
  PageFetcher,
  PageKind,
  PipelineState,
  RecordWriter,
  RunReport,
  RunSummary,
  SiteAdapter,
  WorkItem,
  WriteOutcome,
} from './types.js'
import { canonicalizeUrl, isValidUrl } from './utils/url.js'

/**
 * A seed URL. Plain strings are classified from the page content.
 */
export type PipelineSeed = string | { url: string; kind: PageKind; depth?: number }

export interface PipelineOptions {
  adapter: SiteAdapter
  pageFetcher: PageFetcher
  writers: readonly RecordWriter[]
  concurrency: number
  requestTimeoutMs: number

  /** Deepest search page reachable by following next-page links */
  maxPages: number

  throttle?: RequestThrottle
  retryPolicy?: RetryPolicy
  logger?: ILogger
  runId?: string
}

export interface ShutdownOptions {
  /** Cancel scheduled retries instead of letting them finish */
  force?: boolean
}

interface AdmitRequest {
  url: string
  kind: PageKind
  depth: number
  hint?: ListingHint
}

export class Pipeline {
  readonly runId: string

  private readonly options: PipelineOptions
  private readonly log: WorkflowLogger
  private readonly queue = new WorkQueue()
  private readonly dedupe = new Deduplicator()
  private readonly fetcher: Fetcher
  private readonly seen = new Set<string>()
  private readonly failures: FailureLogEntry[] = []

  private currentState: PipelineState = 'idle'
  private discovered = 0
  private skipped = 0

  constructor(options: PipelineOptions) {
    this.options = options
    this.runId = options.runId ?? createId()
    this.log = createWorkflowLogger(options.logger ?? loggers.pipeline, {
      workflow: 'harvest',
      stage: 'pipeline',
      runId: this.runId,
      adapterId: options.adapter.id,
    })
    this.fetcher = new Fetcher({
      pageFetcher: options.pageFetcher,
      throttle: options.throttle ?? new RequestThrottle(),
      retryPolicy: options.retryPolicy ?? new RetryPolicy(),
      concurrency: options.concurrency,
      requestTimeoutMs: options.requestTimeoutMs,
      logger: this.log.child({ stage: 'fetch' }).base,
    })
  }

  get state(): PipelineState {
    return this.currentState
  }

  /**
   * Execute the run to completion. A pipeline runs once.
   *
   * @throws PipelineAbortedError if processing faulted; the error carries the
   *   report for the partial results that were still written
   */
  async run(seeds: readonly PipelineSeed[]): Promise<RunReport> {
    if (this.currentState !== 'idle') {
      throw new HarvestError(`Pipeline ${this.runId} has already run`, {
        code: ERROR_CODES.INVALID_STATE,
        category: 'internal',
      })
    }

    const startedAt = new Date()
    this.currentState = 'seeding'
    this.log.info('RUN_STARTED', { seeds: seeds.length, concurrency: this.options.concurrency })

    for (const seed of seeds) {
      this.seed(seed, startedAt)
    }
    this.queue.close()
    this.currentState = 'running'

    let fault: unknown
    let stats: FetcherStats
    try {
      stats = await this.fetcher.run(this.queue, result => this.handleResult(result))
    } catch (error) {
      fault = error
      stats = this.fetcher.stats
    }

    this.currentState = 'draining'
    const records = this.dedupe.finalize()
    const writes = await writeAll(this.options.writers, records, this.log.child({ stage: 'write' }).base)
    this.currentState = 'finalized'

    const report = this.buildReport(stats, records, writes, startedAt)
    this.log.info('RUN_SUMMARY', { ...report.summary, durationMs: report.durationMs })

    if (fault !== undefined) {
      const message = fault instanceof Error ? fault.message : String(fault)
      this.log.error('RUN_ABORTED', { reason: message }, fault)
      throw new PipelineAbortedError(`Pipeline aborted: ${message}`, report, fault)
    }

    return report
  }

  /**
   * Stop the run early. Cooperative shutdown lets in-flight work and
   * scheduled retries finish; forced shutdown cancels retries too. Either
   * way the run still finalizes and writes what it has.
   */
  shutdown(options: ShutdownOptions = {}): void {
    if (this.currentState === 'idle' || this.currentState === 'finalized') {
      return
    }

    const dropped = options.force ? this.queue.abort() : this.queue.drain()
    this.currentState = 'draining'
    this.log.warn('SHUTDOWN_REQUESTED', { force: options.force === true, dropped })
  }

  private seed(seed: PipelineSeed, startedAt: Date): void {
    const request: AdmitRequest =
      typeof seed === 'string'
        ? { url: seed, kind: 'auto', depth: 1 }
        : { url: seed.url, kind: seed.kind, depth: seed.depth ?? 1 }

    if (!isValidUrl(request.url)) {
      this.log.warn('SEED_REJECTED', { url: request.url, reason: 'invalid_url' })
      this.failures.push({
        url: request.url,
        errorKind: 'invalid_url',
        attempt: 0,
        message: `Invalid seed URL: ${request.url}`,
      })
      return
    }

    this.admit(request, startedAt.getTime(), 'push')
  }

  /**
   * Queue a URL unless its canonical form was already admitted in this run.
   * The URL is fetched as given; the canonical form is only the seen key.
   */
  private admit(request: AdmitRequest, now: number, via: 'push' | 'adopt'): boolean {
    const key = canonicalizeUrl(request.url)
    if (this.seen.has(key)) {
      return false
    }

    const item: WorkItem = {
      url: request.url,
      attempt: 0,
      enqueuedAt: now,
      kind: request.kind,
      depth: request.depth,
    }
    if (request.hint) {
      item.hint = request.hint
    }

    const accepted = via === 'push' ? this.queue.push(item) : this.queue.adopt(item)
    if (accepted) {
      this.seen.add(key)
    }
    return accepted
  }

  private handleResult(result: FetchResult): void {
    if (!result.ok) {
      this.failures.push({
        url: result.url,
        errorKind: result.errorKind,
        attempt: result.attempt,
        statusCode: result.statusCode,
        message: result.message,
      })
      return
    }

    const outcome = this.options.adapter.process(result)

    switch (outcome.type) {
      case 'listing':
        this.acceptRecord(outcome.record, result)
        return
      case 'search':
        this.discover(outcome.links, outcome.nextPage, result)
        return
      case 'unrecognized':
        this.skipped++
        this.log.debug('PAGE_SKIPPED', { ...sanitizeUrl(result.url), reason: outcome.reason })
        return
    }
  }

  private acceptRecord(record: CandidateRecord, page: FetchSuccess): void {
    const offer = this.dedupe.offer(record)
    this.log.debug('RECORD_OFFERED', {
      ...sanitizeUrl(page.url),
      fingerprint: offer.fingerprint,
      status: offer.status,
    })
  }

  private discover(links: readonly DiscoveredLink[], nextPage: string | undefined, page: FetchSuccess): void {
    const now = Date.now()
    const { depth } = page.item
    let admitted = 0

    for (const link of links) {
      if (this.admit({ url: link.url, kind: link.kind, depth, hint: link.hint }, now, 'adopt')) {
        admitted++
      }
    }

    if (nextPage && depth < this.options.maxPages) {
      if (this.admit({ url: nextPage, kind: 'search', depth: depth + 1 }, now, 'adopt')) {
        admitted++
      }
    }

    this.discovered += admitted
    this.log.debug('LINKS_DISCOVERED', { ...sanitizeUrl(page.url), found: links.length, admitted, depth })
  }

  private buildReport(
    stats: FetcherStats,
    records: readonly CandidateRecord[],
    writes: WriteOutcome[],
    startedAt: Date
  ): RunReport {
    const finishedAt = new Date()
    const summary: RunSummary = {
      fetched: stats.attempts,
      succeeded: stats.succeeded,
      failed: this.failures.length,
      deduplicated: this.dedupe.duplicates,
      finalRecordCount: records.length,
      retried: stats.retried,
      discovered: this.discovered,
      skipped: this.skipped,
      dropped: this.queue.stats().dropped,
    }

    return {
      runId: this.runId,
      state: this.currentState,
      summary,
      failures: [...this.failures],
      writes,
      records,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    }
  }
}
