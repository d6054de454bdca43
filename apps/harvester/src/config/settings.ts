/**
 * Harvest configuration.
 *
 * Sources, lowest precedence first: schema defaults, HARVEST_* environment
 * variables, explicit overrides (CLI flags). The merged result is validated
 * with zod; invalid input raises ConfigurationError before any work starts.
 */

import { z } from 'zod'
import { ConfigurationError } from '../lib/errors.js'

const ThrottleSchema = z.object({
  globalIntervalMs: z.coerce.number().int().min(0).default(0),
  scopeIntervalMs: z.coerce.number().int().min(0).default(1000),
  jitterMs: z.coerce.number().int().min(0).default(2000),
  scope: z.enum(['domain', 'host']).default('domain'),
})

const RetrySchema = z
  .object({
    maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    initialDelayMs: z.coerce.number().int().min(0).default(1000),
    maxDelayMs: z.coerce.number().int().min(0).default(30000),
    backoffMultiplier: z.coerce.number().min(1).default(2),
  })
  .refine(value => value.maxDelayMs >= value.initialDelayMs, {
    message: 'maxDelayMs must be >= initialDelayMs',
    path: ['maxDelayMs'],
  })

export const OUTPUT_FORMATS = ['csv', 'parquet'] as const

export const HarvestConfigSchema = z.object({
  baseUrl: z.string().url().default('https://www.olx.in'),
  searchTerm: z.string().trim().min(1).default('car-cover'),

  /** Search pages seeded up front (1..pages) */
  pages: z.coerce.number().int().min(1).max(100).default(2),

  /** Deepest search page reachable by following rel="next" */
  maxPages: z.coerce.number().int().min(1).max(100).default(5),

  /** Explicit seeds; when non-empty, search pages are not generated */
  seedUrls: z.array(z.string().trim().min(1)).default([]),

  concurrency: z.coerce.number().int().min(1).max(64).default(4),
  requestTimeoutMs: z.coerce.number().int().min(100).max(120000).default(10000),
  maxResponseBytes: z.coerce.number().int().min(1024).default(10 * 1024 * 1024),
  userAgent: z.string().trim().min(1).optional(),

  throttle: ThrottleSchema.default({}),
  retry: RetrySchema.default({}),

  outputDir: z.string().trim().min(1).default('.'),
  outputFormats: z.array(z.enum(OUTPUT_FORMATS)).min(1).default(['csv', 'parquet']),
})

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>

type RawConfig = Record<string, unknown>

const ENV_KEYS: Record<string, string> = {
  HARVEST_BASE_URL: 'baseUrl',
  HARVEST_SEARCH_TERM: 'searchTerm',
  HARVEST_PAGES: 'pages',
  HARVEST_MAX_PAGES: 'maxPages',
  HARVEST_CONCURRENCY: 'concurrency',
  HARVEST_REQUEST_TIMEOUT_MS: 'requestTimeoutMs',
  HARVEST_MAX_RESPONSE_BYTES: 'maxResponseBytes',
  HARVEST_USER_AGENT: 'userAgent',
  HARVEST_OUTPUT_DIR: 'outputDir',
}

const ENV_THROTTLE_KEYS: Record<string, string> = {
  HARVEST_GLOBAL_INTERVAL_MS: 'globalIntervalMs',
  HARVEST_THROTTLE_INTERVAL_MS: 'scopeIntervalMs',
  HARVEST_THROTTLE_JITTER_MS: 'jitterMs',
  HARVEST_THROTTLE_SCOPE: 'scope',
}

const ENV_RETRY_KEYS: Record<string, string> = {
  HARVEST_MAX_ATTEMPTS: 'maxAttempts',
  HARVEST_RETRY_INITIAL_DELAY_MS: 'initialDelayMs',
  HARVEST_RETRY_MAX_DELAY_MS: 'maxDelayMs',
}

function pick(env: NodeJS.ProcessEnv, keys: Record<string, string>): RawConfig {
  const out: RawConfig = {}
  for (const [envKey, field] of Object.entries(keys)) {
    const value = env[envKey]?.trim()
    if (value) {
      out[field] = value
    }
  }
  return out
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined
  const items = value
    .split(',')
    .map(part => part.trim())
    .filter(Boolean)
  return items.length > 0 ? items : undefined
}

/**
 * Read HARVEST_* variables into an unvalidated config object.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const raw: RawConfig = pick(env, ENV_KEYS)

  const throttle = pick(env, ENV_THROTTLE_KEYS)
  if (Object.keys(throttle).length > 0) raw.throttle = throttle

  const retry = pick(env, ENV_RETRY_KEYS)
  if (Object.keys(retry).length > 0) raw.retry = retry

  const formats = splitList(env.HARVEST_OUTPUT_FORMATS)
  if (formats) raw.outputFormats = formats

  const seeds = splitList(env.HARVEST_SEED_URLS)
  if (seeds) raw.seedUrls = seeds

  return raw
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function mergeRaw(base: RawConfig, overrides: RawConfig): RawConfig {
  const merged: RawConfig = { ...base }
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue
    const existing = merged[key]
    merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value
  }
  return merged
}

/**
 * Resolve and validate the harvest configuration.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadConfig(overrides: RawConfig = {}, env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const parsed = HarvestConfigSchema.safeParse(mergeRaw(configFromEnv(env), overrides))
  if (!parsed.success) {
    throw ConfigurationError.fromZod(parsed.error)
  }
  return parsed.data
}
