import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { CandidateRecord } from '../types.js'

const mocks = vi.hoisted(() => {
  const appendRow = vi.fn()
  const close = vi.fn()
  return {
    appendRow,
    close,
    openFile: vi.fn(async () => ({ appendRow, close })),
  }
})

vi.mock('@dsnp/parquetjs', () => ({
  ParquetSchema: class {
    constructor(readonly fields: unknown) {}
  },
  ParquetWriter: { openFile: mocks.openFile },
}))

import { PARQUET_SCHEMA, ParquetRecordWriter, toParquetRow } from '../process/parquet-writer.js'
import { computeFingerprint } from '../process/fingerprint.js'
import { toExportRow } from '../process/writer.js'
import { WriterError } from '../../lib/errors.js'

const createRecord = (overrides: Partial<CandidateRecord> = {}): CandidateRecord => ({
  sourceUrl: 'https://www.olx.in/item/a',
  title: 'SUV cover',
  price: 1499,
  location: null,
  imageCount: 2,
  rawText: 'SUV cover',
  scrapedAt: new Date('2026-03-01T10:00:00.000Z'),
  material: 'Polyester',
  vehicleType: 'SUV',
  waterproof: true,
  uvProtected: false,
  size: null,
  ...overrides,
})

describe('toParquetRow', () => {
  it('drops null columns so they are stored as missing', () => {
    const record = createRecord()
    expect(toParquetRow(toExportRow(record))).toEqual({
      fingerprint: computeFingerprint(record),
      source_url: 'https://www.olx.in/item/a',
      title: 'SUV cover',
      price: 1499,
      material: 'Polyester',
      vehicle_type: 'SUV',
      waterproof: true,
      uv_protected: false,
      image_count: 2,
      scraped_at: '2026-03-01T10:00:00.000Z',
      raw_text: 'SUV cover',
    })
  })
})

describe('ParquetRecordWriter', () => {
  let dir: string

  beforeEach(async () => {
    vi.clearAllMocks()
    mocks.appendRow.mockResolvedValue(undefined)
    mocks.close.mockResolvedValue(undefined)
    dir = await mkdtemp(join(tmpdir(), 'cover-harvest-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('appends one row per record and closes the file', async () => {
    const records = [createRecord(), createRecord({ sourceUrl: 'https://www.olx.in/item/b' })]
    const timestamp = new Date(2026, 2, 1, 9, 5, 7)

    const outcome = await new ParquetRecordWriter({ outputDir: dir, timestamp }).write(records)

    const path = join(dir, 'car_covers_20260301_090507.parquet')
    expect(mocks.openFile).toHaveBeenCalledWith(PARQUET_SCHEMA, path)
    expect(mocks.appendRow).toHaveBeenCalledTimes(2)
    expect(mocks.appendRow).toHaveBeenNthCalledWith(2, toParquetRow(toExportRow(records[1])))
    expect(mocks.close).toHaveBeenCalledTimes(1)
    expect(outcome).toEqual({ format: 'parquet', ok: true, path, rows: 2 })
  })

  it('closes the file and raises WriterError when a row fails', async () => {
    mocks.appendRow.mockRejectedValueOnce(new Error('encode failed'))

    const writer = new ParquetRecordWriter({ outputDir: dir, timestamp: new Date() })

    await expect(writer.write([createRecord()])).rejects.toBeInstanceOf(WriterError)
    expect(mocks.close).toHaveBeenCalledTimes(1)
  })
})
