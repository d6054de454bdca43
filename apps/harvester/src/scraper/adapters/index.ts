/**
 * Adapter Registration
 *
 * Adapters are explicitly registered here - no auto-discovery.
 */

import { getAdapterRegistry } from '../registry.js'
import { olxAdapter } from './olx/index.js'

/**
 * Register all site adapters. Safe to call more than once.
 */
export function registerAllAdapters(): void {
  const registry = getAdapterRegistry()
  if (!registry.get(olxAdapter.id)) {
    registry.register(olxAdapter)
  }
}

export { olxAdapter } from './olx/index.js'
