import { describe, it, expect, beforeEach } from 'vitest'
import { loadConfig } from '../../config/settings.js'
import { ConfigurationError } from '../../lib/errors.js'
import { olxAdapter } from '../adapters/index.js'
import { buildSeeds, createWriters, resolveAdapter } from '../harvest.js'
import { CsvWriter } from '../process/csv-writer.js'
import { ParquetRecordWriter } from '../process/parquet-writer.js'
import { InMemoryAdapterRegistry, getAdapterRegistry, resetAdapterRegistry } from '../registry.js'

describe('buildSeeds', () => {
  it('generates search pages 1..pages', () => {
    const config = loadConfig({ pages: 2, searchTerm: 'car cover' }, {})

    expect(buildSeeds(config, olxAdapter)).toEqual([
      { url: 'https://www.olx.in/items/q-car%20cover?page=1', kind: 'search', depth: 1 },
      { url: 'https://www.olx.in/items/q-car%20cover?page=2', kind: 'search', depth: 2 },
    ])
  })

  it('uses explicit seed URLs instead of search pages', () => {
    const config = loadConfig({ seedUrls: ['https://www.olx.in/item/a'] }, {})
    expect(buildSeeds(config, olxAdapter)).toEqual(['https://www.olx.in/item/a'])
  })
})

describe('createWriters', () => {
  it('builds one writer per distinct format', () => {
    const writers = createWriters(['csv', 'parquet', 'csv'], 'out', new Date(2024, 0, 1))

    expect(writers).toHaveLength(2)
    expect(writers[0]).toBeInstanceOf(CsvWriter)
    expect(writers[1]).toBeInstanceOf(ParquetRecordWriter)
  })
})

describe('resolveAdapter', () => {
  beforeEach(() => {
    resetAdapterRegistry()
  })

  it('finds the adapter by registrable domain', () => {
    expect(resolveAdapter('https://www.olx.in')).toBe(olxAdapter)
    expect(resolveAdapter('https://m.olx.in/items')).toBe(olxAdapter)
    expect(getAdapterRegistry().size()).toBe(1)
  })

  it('throws ConfigurationError for unknown sites', () => {
    expect(() => resolveAdapter('https://shop.example.com')).toThrow(ConfigurationError)
  })
})

describe('InMemoryAdapterRegistry', () => {
  it('rejects duplicate ids and domains', () => {
    const registry = new InMemoryAdapterRegistry()
    registry.register(olxAdapter)

    expect(() => registry.register(olxAdapter)).toThrow("Adapter with ID 'olx' is already registered")
    expect(() => registry.register({ ...olxAdapter, id: 'olx-2' })).toThrow(
      "Adapter for domain 'olx.in' is already registered as 'olx'"
    )
    expect(registry.list()).toEqual(['olx'])
    expect(registry.getByDomain('olx.in')).toBe(olxAdapter)
    expect(registry.forUrl('not a url')).toBeUndefined()
  })
})
