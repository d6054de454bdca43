/**
 * Adapter Registry
 *
 * Site adapters keyed by id and by registrable domain. Adapters must be
 * explicitly registered; no auto-discovery.
 */

import type { SiteAdapter } from './types.js'
import { getRegistrableDomain } from './utils/url.js'

export class InMemoryAdapterRegistry {
  private readonly adapters = new Map<string, SiteAdapter>()
  private readonly domainToAdapter = new Map<string, SiteAdapter>()

  /**
   * @throws Error if the id or domain is already registered
   */
  register(adapter: SiteAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter with ID '${adapter.id}' is already registered`)
    }

    const existing = this.domainToAdapter.get(adapter.domain)
    if (existing) {
      throw new Error(
        `Adapter for domain '${adapter.domain}' is already registered as '${existing.id}'`
      )
    }

    this.adapters.set(adapter.id, adapter)
    this.domainToAdapter.set(adapter.domain, adapter)
  }

  get(adapterId: string): SiteAdapter | undefined {
    return this.adapters.get(adapterId)
  }

  list(): string[] {
    return Array.from(this.adapters.keys())
  }

  getByDomain(domain: string): SiteAdapter | undefined {
    return this.domainToAdapter.get(domain)
  }

  /**
   * Adapter for the site a URL belongs to.
   */
  forUrl(url: string): SiteAdapter | undefined {
    try {
      return this.domainToAdapter.get(getRegistrableDomain(url))
    } catch {
      return undefined
    }
  }

  size(): number {
    return this.adapters.size
  }
}

let globalRegistry: InMemoryAdapterRegistry | null = null

export function getAdapterRegistry(): InMemoryAdapterRegistry {
  if (!globalRegistry) {
    globalRegistry = new InMemoryAdapterRegistry()
  }
  return globalRegistry
}

/**
 * Reset the global registry (for testing).
 */
export function resetAdapterRegistry(): void {
  globalRegistry = null
}
