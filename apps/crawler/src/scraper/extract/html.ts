import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/** Collapse runs of whitespace (including non-breaking spaces) and trim */
export function cleanText(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim()
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return cleanText($(selector).first().text())
}

export function firstAttr($: cheerio.CheerioAPI, selector: string, attr: string): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

/** Text of every match, cleaned, empties dropped */
export function allText($: cheerio.CheerioAPI, selector: string): string[] {
  return $(selector)
    .toArray()
    .map(el => cleanText($(el).text()))
    .filter(text => text.length > 0)
}

export function allAttr($: cheerio.CheerioAPI, selector: string, attr: string): string[] {
  return $(selector)
    .toArray()
    .map(el => $(el).attr(attr)?.trim() ?? '')
    .filter(value => value.length > 0)
}
