/**
 * Environment loader - import first, before any module that reads process.env.
 *
 * Loads apps/harvester/.env.local in development only; production
 * injects variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', '.env.local')
  config({ path: envPath })
}
