import { mkdir } from 'fs/promises'
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs'
import { WriterError } from '../../lib/errors.js'
import type { CandidateRecord, RecordWriter, WriteOutcome } from '../types.js'
import type { ExportRow } from './writer.js'
import { EXPORT_COLUMNS, outputPath, toExportRow } from './writer.js'

export const PARQUET_SCHEMA = new ParquetSchema({
  fingerprint: { type: 'UTF8' },
  source_url: { type: 'UTF8' },
  title: { type: 'UTF8' },
  price: { type: 'DOUBLE', optional: true },
  location: { type: 'UTF8', optional: true },
  material: { type: 'UTF8' },
  vehicle_type: { type: 'UTF8' },
  waterproof: { type: 'BOOLEAN' },
  uv_protected: { type: 'BOOLEAN' },
  width_cm: { type: 'DOUBLE', optional: true },
  height_cm: { type: 'DOUBLE', optional: true },
  image_count: { type: 'INT32' },
  scraped_at: { type: 'UTF8' },
  raw_text: { type: 'UTF8' },
})

/**
 * Row shape for the Parquet encoder: optional columns are left out when null.
 */
export function toParquetRow(row: ExportRow): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {}
  for (const column of EXPORT_COLUMNS) {
    const value = row[column]
    if (value !== null) {
      out[column] = value
    }
  }
  return out
}

export interface ParquetWriterOptions {
  outputDir: string
  timestamp: Date
}

export class ParquetRecordWriter implements RecordWriter {
  readonly format = 'parquet' as const

  constructor(private readonly options: ParquetWriterOptions) {}

  async write(records: readonly CandidateRecord[]): Promise<WriteOutcome> {
    const path = outputPath(this.options.outputDir, this.format, this.options.timestamp)
    try {
      await mkdir(this.options.outputDir, { recursive: true })
      const writer = await ParquetWriter.openFile(PARQUET_SCHEMA, path)
      try {
        for (const record of records) {
          await writer.appendRow(toParquetRow(toExportRow(record)))
        }
      } finally {
        await writer.close()
      }
    } catch (error) {
      throw new WriterError(`Failed to write Parquet to ${path}`, error)
    }
    return { format: this.format, ok: true, path, rows: records.length }
  }
}
