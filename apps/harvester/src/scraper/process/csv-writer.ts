import { mkdir, writeFile } from 'fs/promises'
import { stringify } from 'csv-stringify/sync'
import { WriterError } from '../../lib/errors.js'
import type { CandidateRecord, RecordWriter, WriteOutcome } from '../types.js'
import type { ExportRow } from './writer.js'
import { EXPORT_COLUMNS, outputPath, toExportRow } from './writer.js'

export interface CsvWriterOptions {
  outputDir: string
  /** Timestamp used in the file name */
  timestamp: Date
}

/**
 * Cells in EXPORT_COLUMNS order. Booleans are spelled out, nulls are empty.
 */
export function toCsvCells(row: ExportRow): string[] {
  return EXPORT_COLUMNS.map(column => {
    const value = row[column]
    if (value === null) return ''
    if (typeof value === 'boolean') return value ? 'true' : 'false'
    return String(value)
  })
}

export function renderCsv(records: readonly CandidateRecord[]): string {
  const rows = records.map(record => toCsvCells(toExportRow(record)))
  return stringify([[...EXPORT_COLUMNS], ...rows])
}

export class CsvWriter implements RecordWriter {
  readonly format = 'csv' as const

  constructor(private readonly options: CsvWriterOptions) {}

  async write(records: readonly CandidateRecord[]): Promise<WriteOutcome> {
    const path = outputPath(this.options.outputDir, this.format, this.options.timestamp)
    try {
      await mkdir(this.options.outputDir, { recursive: true })
      await writeFile(path, renderCsv(records), 'utf8')
    } catch (error) {
      throw new WriterError(`Failed to write CSV to ${path}`, error)
    }
    return { format: this.format, ok: true, path, rows: records.length }
  }
}
