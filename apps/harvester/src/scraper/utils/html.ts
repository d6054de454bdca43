import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Collapse runs of whitespace (including newlines and nbsp) to single spaces.
 */
export function cleanText(value: string | undefined | null): string {
  return (value ?? '').replace(/[\s ]+/g, ' ').trim()
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return cleanText($(selector).first().text())
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}
