/**
 * Record Writers
 *
 * Hands the finalized RecordSet to each configured output format.
 *
 * Key design decisions:
 * - Every writer sees the same rows and the same file timestamp
 * - A failing writer does not stop the others; its outcome carries the error
 * - Absent values stay null here; each format decides how to encode them
 */

import { join } from 'path'
import type { ILogger } from '@cover-harvest/logger'
import { silentLogger } from '@cover-harvest/logger'
import { classifyError } from '../../lib/errors.js'
import type { CandidateRecord, Material, OutputFormat, RecordWriter, VehicleType, WriteOutcome } from '../types.js'
import { computeFingerprint } from './fingerprint.js'

export const EXPORT_COLUMNS = [
  'fingerprint',
  'source_url',
  'title',
  'price',
  'location',
  'material',
  'vehicle_type',
  'waterproof',
  'uv_protected',
  'width_cm',
  'height_cm',
  'image_count',
  'scraped_at',
  'raw_text',
] as const

export type ExportColumn = (typeof EXPORT_COLUMNS)[number]

export interface ExportRow {
  fingerprint: string
  source_url: string
  title: string
  price: number | null
  location: string | null
  material: Material
  vehicle_type: VehicleType
  waterproof: boolean
  uv_protected: boolean
  width_cm: number | null
  height_cm: number | null
  image_count: number
  scraped_at: string
  raw_text: string
}

export function toExportRow(record: CandidateRecord): ExportRow {
  return {
    fingerprint: computeFingerprint(record),
    source_url: record.sourceUrl,
    title: record.title,
    price: record.price,
    location: record.location,
    material: record.material,
    vehicle_type: record.vehicleType,
    waterproof: record.waterproof,
    uv_protected: record.uvProtected,
    width_cm: record.size?.widthCm ?? null,
    height_cm: record.size?.heightCm ?? null,
    image_count: record.imageCount,
    scraped_at: record.scrapedAt.toISOString(),
    raw_text: record.rawText,
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Local-time stamp used in output file names: YYYYMMDD_HHmmss.
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

export function outputPath(outputDir: string, format: OutputFormat, timestamp: Date): string {
  return join(outputDir, `car_covers_${formatFileTimestamp(timestamp)}.${format}`)
}

/**
 * Run every writer in turn. Never throws; failures are reported per format.
 */
export async function writeAll(
  writers: readonly RecordWriter[],
  records: readonly CandidateRecord[],
  log: ILogger = silentLogger
): Promise<WriteOutcome[]> {
  const outcomes: WriteOutcome[] = []

  for (const writer of writers) {
    try {
      const outcome = await writer.write(records)
      log.info('Wrote records', { format: writer.format, path: outcome.path, rows: outcome.rows })
      outcomes.push(outcome)
    } catch (error) {
      const classified = classifyError(error)
      log.error('Writer failed', { format: writer.format, code: classified.code }, error)
      outcomes.push({ format: writer.format, ok: false, error: classified.message })
    }
  }

  return outcomes
}
