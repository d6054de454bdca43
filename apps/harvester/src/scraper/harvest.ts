/**
 * Harvest Composition
 *
 * Builds a Pipeline and its seeds from a validated HarvestConfig.
 * Each collaborator can be replaced, which is how tests run a full
 * pipeline without the network or the filesystem.
 */

import type { ILogger } from '@cover-harvest/logger'
import type { HarvestConfig } from '../config/settings.js'
import { ConfigurationError } from '../lib/errors.js'
import { registerAllAdapters } from './adapters/index.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { RequestThrottle } from './fetch/throttle.js'
import { RetryPolicy } from './fetch/retry-policy.js'
import { CsvWriter } from './process/csv-writer.js'
import { ParquetRecordWriter } from './process/parquet-writer.js'
import { Pipeline } from './pipeline.js'
import type { PipelineSeed } from './pipeline.js'
import { getAdapterRegistry } from './registry.js'
import type { OutputFormat, PageFetcher, RecordWriter, SiteAdapter } from './types.js'

export interface HarvestDependencies {
  adapter?: SiteAdapter
  pageFetcher?: PageFetcher
  writers?: readonly RecordWriter[]
  logger?: ILogger
  /** Random source for throttle jitter and retry backoff */
  random?: () => number
  /** Timestamp for output file names */
  now?: Date
}

/**
 * Explicit seed URLs when configured, otherwise search pages 1..pages.
 */
export function buildSeeds(config: HarvestConfig, adapter: SiteAdapter): PipelineSeed[] {
  if (config.seedUrls.length > 0) {
    return [...config.seedUrls]
  }

  const seeds: PipelineSeed[] = []
  for (let page = 1; page <= config.pages; page++) {
    seeds.push({
      url: adapter.searchUrl(config.baseUrl, config.searchTerm, page),
      kind: 'search',
      depth: page,
    })
  }
  return seeds
}

export function createWriters(
  formats: readonly OutputFormat[],
  outputDir: string,
  timestamp: Date
): RecordWriter[] {
  return Array.from(new Set(formats)).map(format =>
    format === 'csv'
      ? new CsvWriter({ outputDir, timestamp })
      : new ParquetRecordWriter({ outputDir, timestamp })
  )
}

/**
 * @throws ConfigurationError if no adapter handles the configured base URL
 */
export function resolveAdapter(baseUrl: string): SiteAdapter {
  registerAllAdapters()
  const adapter = getAdapterRegistry().forUrl(baseUrl)
  if (!adapter) {
    throw new ConfigurationError(`No site adapter for ${baseUrl}`, [
      { path: 'baseUrl', message: 'No site adapter registered for this domain' },
    ])
  }
  return adapter
}

export function createPipeline(config: HarvestConfig, deps: HarvestDependencies = {}): Pipeline {
  const adapter = deps.adapter ?? resolveAdapter(config.baseUrl)

  const pageFetcher =
    deps.pageFetcher ??
    new HttpFetcher({
      headers: config.userAgent ? { 'User-Agent': config.userAgent } : undefined,
      maxResponseBytes: config.maxResponseBytes,
    })

  return new Pipeline({
    adapter,
    pageFetcher,
    writers: deps.writers ?? createWriters(config.outputFormats, config.outputDir, deps.now ?? new Date()),
    concurrency: config.concurrency,
    requestTimeoutMs: config.requestTimeoutMs,
    maxPages: config.maxPages,
    throttle: new RequestThrottle({ config: config.throttle, random: deps.random }),
    retryPolicy: new RetryPolicy({ config: config.retry, random: deps.random }),
    logger: deps.logger,
  })
}
