/**
 * Car Cover Harvester
 *
 * Concurrent fetch, extract and dedupe pipeline for classified listings.
 */

// Core types
export * from './types.js'

// Registry
export { InMemoryAdapterRegistry, getAdapterRegistry, resetAdapterRegistry } from './registry.js'
export { registerAllAdapters, olxAdapter } from './adapters/index.js'

// Fetch layer
export { Fetcher } from './fetch/fetcher.js'
export type { FetcherOptions, FetcherStats, ResultHandler } from './fetch/fetcher.js'
export { HttpFetcher, parseRetryAfter, looksLikeBlockedPage } from './fetch/http-fetcher.js'
export { RequestThrottle } from './fetch/throttle.js'
export { RetryPolicy } from './fetch/retry-policy.js'
export { WorkQueue } from './fetch/work-queue.js'
export type { ItemProcessor, QueueState, QueueStats } from './fetch/work-queue.js'

// Processing
export { classifySpecs, parsePrice, parseSize } from './process/classify.js'
export { extractListing, buildRawText } from './process/extractor.js'
export type { ListingSelectors } from './process/extractor.js'
export { computeFingerprint, normalizeTitle } from './process/fingerprint.js'
export { Deduplicator, completeness } from './process/run-dedupe.js'
export { writeAll, toExportRow, EXPORT_COLUMNS } from './process/writer.js'
export { CsvWriter } from './process/csv-writer.js'
export { ParquetRecordWriter } from './process/parquet-writer.js'

// Orchestration
export { Pipeline } from './pipeline.js'
export type { PipelineOptions, PipelineSeed, ShutdownOptions } from './pipeline.js'
export { buildSeeds, createPipeline, createWriters } from './harvest.js'
