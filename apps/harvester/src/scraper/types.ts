/**
 * Harvester Core Types
 *
 * Work items, fetch results, candidate records and the contracts between
 * the fetch, extract, dedup and write stages.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Work Items
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * What a URL is expected to be.
 * 'auto' lets the adapter decide from the page content (used for seeds given by URL).
 */
export type PageKind = 'search' | 'listing' | 'auto'

/**
 * Listing-card fields seen on a search page, carried to the listing's WorkItem.
 * Used as fallbacks when the detail page lacks them.
 */
export interface ListingHint {
  title?: string
  priceText?: string
  location?: string
}

export interface WorkItem {
  url: string

  /** Attempts already made for this URL (0 on first delivery) */
  attempt: number

  /** Epoch ms when first admitted */
  enqueuedAt: number

  /** Epoch ms before which the item must not be redelivered (retry backoff) */
  notBefore?: number

  kind: PageKind

  /** Search pages followed to reach this item (seeds are depth 1) */
  depth: number

  hint?: ListingHint
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Results
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Classified fetch failure.
 * Transient: timeout, connection_reset, network, rate_limited, server_error.
 * Everything else is permanent and never retried.
 */
export type ErrorKind =
  | 'timeout'
  | 'connection_reset'
  | 'network'
  | 'rate_limited' // HTTP 429
  | 'server_error' // HTTP 5xx
  | 'not_found' // HTTP 404 / 410
  | 'client_error' // other HTTP 4xx
  | 'blocked' // captcha or access-denied page
  | 'invalid_url'
  | 'dns'
  | 'too_large'

export interface FetchSuccess {
  ok: true
  url: string
  body: string
  status: number
  fetchedAt: Date
  item: WorkItem
}

export interface FetchFailure {
  ok: false
  url: string
  errorKind: ErrorKind
  /** Attempts made, including the one that failed */
  attempt: number
  statusCode?: number
  message: string
  item: WorkItem
}

export type FetchResult = FetchSuccess | FetchFailure

// ═══════════════════════════════════════════════════════════════════════════════
// Page Fetch Capability
// ═══════════════════════════════════════════════════════════════════════════════

export interface PageFetchOptions {
  timeoutMs: number
}

/**
 * Outcome of a single HTTP attempt. No retries happen at this level;
 * the fetcher re-submits through the work queue instead.
 */
export type PageResponse =
  | { ok: true; status: number; body: string }
  | {
      ok: false
      errorKind: ErrorKind
      status?: number
      message: string
      /** Parsed Retry-After, if the server sent one */
      retryAfterMs?: number
    }

export interface PageFetcher {
  fetch(url: string, options: PageFetchOptions): Promise<PageResponse>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Throttle and Retry
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 'domain' keys the throttle by registrable domain (eTLD+1), so
 * www.olx.in and static.olx.in share one budget. 'host' keys by hostname.
 */
export type ThrottleScope = 'domain' | 'host'

export interface ThrottleConfig {
  /** Minimum spacing between any two requests, across all scopes */
  globalIntervalMs: number

  /** Minimum spacing between two requests in the same scope */
  scopeIntervalMs: number

  /** Upper bound of the random extra spacing added per grant */
  jitterMs: number

  scope: ThrottleScope
}

export const DEFAULT_THROTTLE: ThrottleConfig = {
  globalIntervalMs: 0,
  scopeIntervalMs: 1000,
  jitterMs: 2000,
  scope: 'domain',
}

export interface RetryConfig {
  /** Total attempts per URL, including the first */
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'give_up'; reason: 'permanent' | 'exhausted' }

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate Records
// ═══════════════════════════════════════════════════════════════════════════════

export type Material = 'Polyester' | 'Nylon' | 'Cotton' | 'PVC' | 'Unknown'

export type VehicleType = 'SUV' | 'Sedan' | 'Hatchback' | 'Universal' | 'Unknown'

export interface CoverSize {
  widthCm: number
  heightCm: number
}

/** Classification fields. Pure function of a record's rawText. */
export interface CoverSpecs {
  material: Material
  vehicleType: VehicleType
  waterproof: boolean
  uvProtected: boolean
  size: CoverSize | null
}

export interface CandidateRecord extends CoverSpecs {
  sourceUrl: string
  title: string
  /** Listed price in major currency units */
  price: number | null
  location: string | null
  imageCount: number
  rawText: string
  scrapedAt: Date
}

export type Fingerprint = string

// ═══════════════════════════════════════════════════════════════════════════════
// Site Adapter
// ═══════════════════════════════════════════════════════════════════════════════

export interface DiscoveredLink {
  url: string
  kind: Exclude<PageKind, 'auto'>
  hint?: ListingHint
}

/**
 * What a fetched page turned out to be.
 * 'unrecognized' pages are skipped, not treated as errors.
 */
export type PageOutcome =
  | { type: 'listing'; record: CandidateRecord }
  | { type: 'search'; links: DiscoveredLink[]; nextPage?: string }
  | { type: 'unrecognized'; reason: string }

export interface SiteAdapter {
  readonly id: string
  readonly version: string

  /** Registrable domain the adapter handles (e.g. "olx.in") */
  readonly domain: string

  /** Build the URL of search-result page `page` (1-based) */
  searchUrl(baseUrl: string, searchTerm: string, page: number): string

  /**
   * Interpret a fetched page. Must be deterministic for the same input.
   */
  process(page: FetchSuccess): PageOutcome

  /** Turn a listing page into a candidate record, or null if it holds none */
  extract(page: FetchSuccess): CandidateRecord | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Deduplication
// ═══════════════════════════════════════════════════════════════════════════════

export type OfferOutcome =
  | { status: 'inserted'; fingerprint: Fingerprint }
  | { status: 'merged'; fingerprint: Fingerprint; replaced: CandidateRecord }
  | { status: 'ignored'; fingerprint: Fingerprint; existing: CandidateRecord }

// ═══════════════════════════════════════════════════════════════════════════════
// Writers
// ═══════════════════════════════════════════════════════════════════════════════

export type OutputFormat = 'csv' | 'parquet'

export interface WriteOutcome {
  format: OutputFormat
  ok: boolean
  path?: string
  rows?: number
  error?: string
}

export interface RecordWriter {
  readonly format: OutputFormat
  write(records: readonly CandidateRecord[]): Promise<WriteOutcome>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Report
// ═══════════════════════════════════════════════════════════════════════════════

export type PipelineState = 'idle' | 'seeding' | 'running' | 'draining' | 'finalized'

export interface RunSummary {
  /** HTTP attempts performed */
  fetched: number
  succeeded: number
  /** Terminal failures */
  failed: number
  /** Candidate records merged into or ignored in favour of an existing one */
  deduplicated: number
  finalRecordCount: number
  /** Re-submissions scheduled by the retry policy */
  retried: number
  /** Links admitted from search pages */
  discovered: number
  /** Pages fetched that were neither a listing nor a search page */
  skipped: number
  /** Queued items discarded by shutdown before they started */
  dropped: number
}

export interface FailureLogEntry {
  url: string
  errorKind: ErrorKind
  attempt: number
  statusCode?: number
  message: string
}

export interface RunReport {
  runId: string
  state: PipelineState
  summary: RunSummary
  failures: FailureLogEntry[]
  writes: WriteOutcome[]
  records: readonly CandidateRecord[]
  startedAt: Date
  finishedAt: Date
  durationMs: number
}
