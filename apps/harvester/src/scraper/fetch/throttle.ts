/**
 * Request Throttle
 *
 * In-process replacement for a shared rate limiter: every request slot is
 * reserved by advancing a per-scope "next allowed" watermark. The
 * reservation is synchronous, so concurrent callers are serialized without
 * holding anything across the request itself.
 *
 * Two tiers are enforced on every grant:
 * - global: spacing between any two requests
 * - scope: spacing between requests to one registrable domain (or host),
 *   plus random jitter so callers do not fall into lockstep
 */

import type { ThrottleConfig } from '../types.js'
import { DEFAULT_THROTTLE } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'

export interface RequestThrottleOptions {
  config?: Partial<ThrottleConfig>

  /** Override spacing for specific scopes (e.g. a slower CDN); the global tier is not affected */
  scopeOverrides?: Map<string, Partial<ThrottleConfig>>

  /** Random source in [0, 1), injectable for tests */
  random?: () => number
}

export interface ThrottleState {
  scope: string
  nextAllowedAt: number
  grants: number
}

const GLOBAL_SCOPE = '*'

export class RequestThrottle {
  private readonly config: ThrottleConfig
  private readonly scopeOverrides: Map<string, Partial<ThrottleConfig>>
  private readonly random: () => number
  private readonly watermarks = new Map<string, number>()
  private readonly grantCounts = new Map<string, number>()

  constructor(options: RequestThrottleOptions = {}) {
    this.config = { ...DEFAULT_THROTTLE, ...options.config }
    this.scopeOverrides = options.scopeOverrides ?? new Map()
    this.random = options.random ?? Math.random
  }

  /**
   * Wait until a request to `url` is permitted.
   * Resolves with the epoch ms the slot was granted for.
   */
  async acquire(url: string): Promise<number> {
    const scope = this.scopeFor(url)
    const grantedAt = this.reserve(scope)
    const waitMs = grantedAt - Date.now()
    if (waitMs > 0) {
      await this.sleep(waitMs)
    }
    return grantedAt
  }

  /**
   * Reserve the next slot for a scope and advance both watermarks.
   * Must stay synchronous: this is the serialization point.
   */
  private reserve(scope: string): number {
    const now = Date.now()
    const config = this.getConfig(scope)
    const globalNext = this.watermarks.get(GLOBAL_SCOPE) ?? 0
    const scopeNext = this.watermarks.get(scope) ?? 0

    const slot = Math.max(now, globalNext, scopeNext)
    const jitter = config.jitterMs > 0 ? Math.floor(this.random() * config.jitterMs) : 0

    this.watermarks.set(GLOBAL_SCOPE, Math.max(globalNext, slot + this.config.globalIntervalMs))
    this.watermarks.set(scope, slot + config.scopeIntervalMs + jitter)
    this.grantCounts.set(scope, (this.grantCounts.get(scope) ?? 0) + 1)

    return slot
  }

  /**
   * Throttle key for a URL. Unparseable URLs throttle under their raw text.
   */
  scopeFor(url: string): string {
    try {
      if (this.config.scope === 'host') {
        return new URL(url).hostname.toLowerCase()
      }
      return getRegistrableDomain(url)
    } catch {
      return url
    }
  }

  getConfig(scope: string): ThrottleConfig {
    const override = this.scopeOverrides.get(scope)
    return override ? { ...this.config, ...override } : this.config
  }

  setConfig(scope: string, config: Partial<ThrottleConfig>): void {
    this.scopeOverrides.set(scope, config)
  }

  getState(scope: string): ThrottleState {
    return {
      scope,
      nextAllowedAt: this.watermarks.get(scope) ?? 0,
      grants: this.grantCounts.get(scope) ?? 0,
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}
