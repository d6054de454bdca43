/**
 * OLX Adapter
 *
 * Exports the OLX classifieds adapter for registration.
 */

export { olxAdapter } from './adapter.js'
export { SELECTORS as OLX_SELECTORS } from './selectors.js'
