/**
 * JSON-LD Product reader.
 *
 * Listing pages often embed a schema.org Product even when the visible
 * markup changes. Fields are parsed leniently: a malformed field becomes
 * undefined instead of rejecting the whole node.
 */

import type * as cheerio from 'cheerio'
import { z } from 'zod'

const PriceValue = z.union([z.string(), z.number()])

const JsonLdOfferSchema = z.object({
  price: PriceValue.optional().catch(undefined),
  priceCurrency: z.string().optional().catch(undefined),
})

const ImageValue = z.union([
  z.string(),
  z.object({ url: z.string() }).transform(image => image.url),
])

const JsonLdProductSchema = z.object({
  '@type': z.union([z.string(), z.array(z.string())]).optional().catch(undefined),
  name: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
  image: z
    .union([ImageValue, z.array(ImageValue)])
    .optional()
    .catch(undefined),
  offers: z
    .union([JsonLdOfferSchema, z.array(JsonLdOfferSchema)])
    .optional()
    .catch(undefined),
})

export type JsonLdProduct = z.infer<typeof JsonLdProductSchema>
export type JsonLdOffer = z.infer<typeof JsonLdOfferSchema>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isTypeMatch(value: JsonLdProduct['@type'], target: string): boolean {
  if (!value) return false
  const types = Array.isArray(value) ? value : [value]
  return types.some(item => item.toLowerCase() === target.toLowerCase())
}

export function normalizeArray<T>(value: T | T[] | null | undefined): T[] {
  if (value === null || value === undefined) return []
  return Array.isArray(value) ? value : [value]
}

function flattenJsonLdNodes(value: unknown): Record<string, unknown>[] {
  const queue: unknown[] = Array.isArray(value) ? [...value] : [value]
  const flattened: Record<string, unknown>[] = []

  while (queue.length > 0) {
    const current = queue.shift()
    if (!isRecord(current)) continue
    flattened.push(current)

    const graph = current['@graph']
    if (Array.isArray(graph)) {
      queue.push(...graph)
    }
  }

  return flattened
}

/**
 * First schema.org Product among the page's ld+json scripts, or null.
 */
export function extractJsonLdProduct($: cheerio.CheerioAPI, selector: string): JsonLdProduct | null {
  const scripts = $(selector)

  for (let i = 0; i < scripts.length; i++) {
    const raw = scripts.eq(i).text().trim()
    if (!raw) continue

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      // Broken script blocks are common; try the next one
      continue
    }

    for (const node of flattenJsonLdNodes(parsed)) {
      const product = JsonLdProductSchema.safeParse(node)
      if (product.success && isTypeMatch(product.data['@type'], 'Product')) {
        return product.data
      }
    }
  }

  return null
}
