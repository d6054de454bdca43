/**
 * Car Cover Classification Rules
 *
 * Each field is an ordered list of predicate → value rules evaluated against
 * a record's raw text. The first matching rule wins; no match falls back to
 * Unknown / false / null. Rules are independent of page layout, so a markup
 * change on the site cannot break classification, only the text it sees.
 */

import type { CoverSize, CoverSpecs, Material, VehicleType } from '../types.js'

export interface ClassificationRule<T> {
  value: T
  patterns: readonly RegExp[]
}

export const MATERIAL_RULES: readonly ClassificationRule<Material>[] = [
  { value: 'Polyester', patterns: [/\bpolyester\b/i, /\bpoly\b/i] },
  { value: 'Nylon', patterns: [/\bnylon\b/i] },
  { value: 'Cotton', patterns: [/\bcotton\b/i] },
  { value: 'PVC', patterns: [/\bpvc\b/i, /\bvinyl\b/i] },
]

/**
 * Specific body styles first; generic fit terms only when none matched.
 */
export const VEHICLE_TYPE_RULES: readonly ClassificationRule<VehicleType>[] = [
  { value: 'SUV', patterns: [/\bsuvs?\b/i, /\bsport[\s-]*utility\b/i] },
  { value: 'Sedan', patterns: [/\bsedans?\b/i] },
  { value: 'Hatchback', patterns: [/\bhatch(?:back)?s?\b/i] },
  {
    value: 'Universal',
    patterns: [/\buniversal\b/i, /\ball\s+cars?\b/i, /\bfits?\s+all\b/i, /\bfree\s+size\b/i],
  },
]

export const WATERPROOF_PATTERNS: readonly RegExp[] = [
  /\bwater[\s-]*(?:proof|resistant)\b/i,
  /\brain[\s-]*proof\b/i,
]

export const UV_PATTERNS: readonly RegExp[] = [
  /\buv\b/i,
  /\bultra[\s-]*violet\b/i,
  /\bsun[\s-]*protect/i,
]

export function firstMatch<T>(
  rules: readonly ClassificationRule<T>[],
  text: string,
  fallback: T
): T {
  for (const rule of rules) {
    if (rule.patterns.some(pattern => pattern.test(text))) {
      return rule.value
    }
  }
  return fallback
}

export function classifyMaterial(text: string): Material {
  return firstMatch(MATERIAL_RULES, text, 'Unknown')
}

export function classifyVehicleType(text: string): VehicleType {
  return firstMatch(VEHICLE_TYPE_RULES, text, 'Unknown')
}

export function detectWaterproof(text: string): boolean {
  return WATERPROOF_PATTERNS.some(pattern => pattern.test(text))
}

export function detectUvProtection(text: string): boolean {
  return UV_PATTERNS.some(pattern => pattern.test(text))
}

// ═══════════════════════════════════════════════════════════════════════════════
// Size
// ═══════════════════════════════════════════════════════════════════════════════

const NUM = String.raw`(\d+(?:[.,]\d+)?)`
const UNIT = String.raw`(mm|cms?|m(?:trs?|eters?|etres?)?)?`
const SEP = String.raw`\s*[x×*]\s*`

/**
 * `<n>[unit] x <n>[unit]`, with an optional third dimension.
 */
const SIZE_PATTERN = new RegExp(
  String.raw`(?<![\d.,])${NUM}\s*${UNIT}${SEP}${NUM}\s*${UNIT}(?:${SEP}${NUM}\s*${UNIT})?(?![a-z])`,
  'gi'
)

/** Without any unit both numbers must be at least this large (read as cm). */
const MIN_UNITLESS_VALUE = 10

const MAX_CM = 2000

type LengthUnit = 'mm' | 'cm' | 'm'

function toUnit(raw: string | undefined): LengthUnit | undefined {
  if (!raw) return undefined
  const unit = raw.toLowerCase()
  if (unit === 'mm') return 'mm'
  if (unit.startsWith('c')) return 'cm'
  return 'm'
}

function toCentimetres(value: number, unit: LengthUnit): number {
  const cm = unit === 'mm' ? value / 10 : unit === 'm' ? value * 100 : value
  return Math.round(cm * 10) / 10
}

function parseNumber(raw: string): number {
  return Number.parseFloat(raw.replace(',', '.'))
}

/**
 * First plausible `W x H` dimension in the text, normalized to centimetres.
 * A trailing unit applies to numbers that have none of their own.
 */
export function parseSize(text: string): CoverSize | null {
  for (const match of text.matchAll(SIZE_PATTERN)) {
    const [, rawA, rawUnitA, rawB, rawUnitB, , rawUnitC] = match
    const unitA = toUnit(rawUnitA)
    const unitB = toUnit(rawUnitB)
    const unitC = toUnit(rawUnitC)

    const a = parseNumber(rawA)
    const b = parseNumber(rawB)
    if (!Number.isFinite(a) || !Number.isFinite(b)) continue

    const resolvedA = unitA ?? unitB ?? unitC
    const resolvedB = unitB ?? unitC ?? unitA
    if (!resolvedA || !resolvedB) {
      if (a < MIN_UNITLESS_VALUE || b < MIN_UNITLESS_VALUE) continue
    }

    const widthCm = toCentimetres(a, resolvedA ?? 'cm')
    const heightCm = toCentimetres(b, resolvedB ?? 'cm')
    if (widthCm <= 0 || heightCm <= 0 || widthCm > MAX_CM || heightCm > MAX_CM) continue

    return { widthCm, heightCm }
  }
  return null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Price
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse a displayed price such as "₹ 1,499" or "Rs. 2,49,999.50".
 * Grouping commas are dropped; returns null when no positive amount is found.
 */
export function parsePrice(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? Math.round(value * 100) / 100 : null
  }

  const match = value.match(/\d[\d,]*(?:\.\d+)?/)
  if (!match) {
    return null
  }

  const parsed = Number.parseFloat(match[0].replace(/,/g, ''))
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null
  }
  return Math.round(parsed * 100) / 100
}

/**
 * All classification fields for a record. Pure function of its raw text.
 */
export function classifySpecs(rawText: string): CoverSpecs {
  return {
    material: classifyMaterial(rawText),
    vehicleType: classifyVehicleType(rawText),
    waterproof: detectWaterproof(rawText),
    uvProtected: detectUvProtection(rawText),
    size: parseSize(rawText),
  }
}
