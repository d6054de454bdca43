/**
 * Run-Level Deduplication
 *
 * Holds the RecordSet for one run: at most one CandidateRecord per
 * fingerprint. When two records collide the more complete one is kept;
 * on a tie the first one stays.
 *
 * Only the pipeline's result handler calls offer(), and it does so
 * synchronously, so no locking is needed.
 */

import { HarvestError, ERROR_CODES } from '../../lib/errors.js'
import type { CandidateRecord, Fingerprint, OfferOutcome } from '../types.js'
import { computeFingerprint } from './fingerprint.js'

/**
 * Number of informative fields a record carries.
 */
export function completeness(record: CandidateRecord): number {
  let score = 0
  if (record.price !== null) score++
  if (record.location !== null) score++
  if (record.size !== null) score++
  if (record.material !== 'Unknown') score++
  if (record.vehicleType !== 'Unknown') score++
  if (record.waterproof) score++
  if (record.uvProtected) score++
  if (record.imageCount > 0) score++
  return score
}

export interface DedupeCounts {
  offered: number
  inserted: number
  merged: number
  ignored: number
}

export class Deduplicator {
  private readonly records = new Map<Fingerprint, CandidateRecord>()
  private readonly counters: DedupeCounts = { offered: 0, inserted: 0, merged: 0, ignored: 0 }
  private frozen: readonly CandidateRecord[] | null = null

  offer(record: CandidateRecord): OfferOutcome {
    if (this.frozen) {
      throw new HarvestError('Record set is finalized', {
        code: ERROR_CODES.INVALID_STATE,
        category: 'internal',
      })
    }

    this.counters.offered++
    const fingerprint = computeFingerprint(record)
    const existing = this.records.get(fingerprint)

    if (!existing) {
      this.records.set(fingerprint, record)
      this.counters.inserted++
      return { status: 'inserted', fingerprint }
    }

    if (completeness(record) > completeness(existing)) {
      this.records.set(fingerprint, record)
      this.counters.merged++
      return { status: 'merged', fingerprint, replaced: existing }
    }

    this.counters.ignored++
    return { status: 'ignored', fingerprint, existing }
  }

  get size(): number {
    return this.records.size
  }

  /** Records offered that did not add a new fingerprint */
  get duplicates(): number {
    return this.counters.merged + this.counters.ignored
  }

  get counts(): DedupeCounts {
    return { ...this.counters }
  }

  entries(): Array<[Fingerprint, CandidateRecord]> {
    return Array.from(this.records.entries())
  }

  /**
   * Freeze the set. Further offers throw; repeated calls return the same array.
   * Records keep the order in which their fingerprint was first seen.
   */
  finalize(): readonly CandidateRecord[] {
    if (!this.frozen) {
      this.frozen = Object.freeze(Array.from(this.records.values()))
    }
    return this.frozen
  }

  get isFinalized(): boolean {
    return this.frozen !== null
  }
}
