/**
 * Album Page Extractor
 *
 * Each field has an ordered list of strategies. The first one that yields a
 * usable value wins; when none does the field is null. Misses are logged at
 * debug level and never raised: the site's markup drifts and a partial
 * record is still worth keeping until validation decides otherwise.
 */

import type { CheerioAPI } from 'cheerio'
import type { AlbumRecord, ExtractContext } from '../types.js'
import { canonicalizeUrl, extractAotyId, toAbsoluteUrl } from '../utils/url.js'
import { allAttr, allText, cleanText, firstAttr, firstText } from './html.js'
import { ALBUM_SELECTORS, PLACEHOLDER_NAMES } from './selectors.js'
import type { FieldStrategy } from './selectors.js'

export { extractAotyId }

const COMBINED_SEPARATOR = ' - '
const RELEASE_DATE_PATTERN =
  /(January|February|March|April|May|June|July|August|September|October|November|December)\s+(\d{1,2}),\s+(\d{4})/
const FIRST_NUMBER_PATTERN = /\d[\d,]*/

type ExtractedFields = Omit<AlbumRecord, 'aoty_id' | 'url' | 'scrape_genre' | 'scrape_year' | 'scraped_at'>

function isPlaceholder(value: string): boolean {
  const normalized = value.trim().toLowerCase()
  return PLACEHOLDER_NAMES.some(placeholder => placeholder === normalized)
}

function readStrategy($: CheerioAPI, strategy: FieldStrategy): string {
  if (strategy.attr) {
    return cleanText(firstAttr($, strategy.selector, strategy.attr))
  }
  return firstText($, strategy.selector)
}

/**
 * Score text to float. Thousands separators are dropped; anything else that
 * is not a plain number ("NR", "tbd") is null.
 */
export function parseScore(text: string | null | undefined): number | null {
  const cleaned = cleanText(text).replace(/,/g, '')
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    return null
  }
  const value = Number.parseFloat(cleaned)
  return Number.isFinite(value) ? value : null
}

/**
 * First integer in a count label: "Based on 1,234 ratings" → 1234.
 */
export function parseCount(text: string | null | undefined): number | null {
  const match = cleanText(text).match(FIRST_NUMBER_PATTERN)
  if (!match) {
    return null
  }
  const value = Number.parseInt(match[0].replace(/,/g, ''), 10)
  return Number.isSafeInteger(value) && value >= 0 ? value : null
}

/**
 * Split "Artist - Title" on the first separator.
 */
export function splitCombined(value: string): { artist: string; title: string } | null {
  const index = value.indexOf(COMBINED_SEPARATOR)
  if (index < 0) {
    return null
  }
  return {
    artist: value.slice(0, index).trim(),
    title: value.slice(index + COMBINED_SEPARATOR.length).trim(),
  }
}

function extractTitle($: CheerioAPI): string | null {
  for (const strategy of ALBUM_SELECTORS.title) {
    let value = readStrategy($, strategy)
    if (!value) continue
    if ('combined' in strategy && strategy.combined) {
      value = splitCombined(value)?.title ?? value
    }
    if (value && !isPlaceholder(value)) {
      return value
    }
  }
  return null
}

function extractArtist($: CheerioAPI): string | null {
  for (const strategy of ALBUM_SELECTORS.artist) {
    let value = readStrategy($, strategy)
    if (!value) continue
    if ('combined' in strategy && strategy.combined) {
      // A bare og:title is the album title, not the artist
      const parts = splitCombined(value)
      if (!parts) continue
      value = parts.artist
    }
    if (value && !isPlaceholder(value)) {
      return value
    }
  }
  return null
}

function extractReleaseDate($: CheerioAPI): string | null {
  const rows = $(ALBUM_SELECTORS.detailRow).toArray()
  for (const row of rows) {
    const rowText = cleanText($(row).text())
    if (!rowText.includes('Release Date')) continue
    const match = rowText.match(RELEASE_DATE_PATTERN)
    if (match) {
      return `${match[1]} ${match[2]}, ${match[3]}`
    }
  }

  // Month and year are links to release listings; the day is loose text
  const parts = allText($, ALBUM_SELECTORS.releaseLinks)
  if (parts.length >= 2) {
    const detailText = allText($, ALBUM_SELECTORS.detailRow).join(' ')
    const day = detailText.match(/(\d{1,2}),/)?.[1] ?? '1'
    return `${parts[0]} ${day}, ${parts[1]}`
  }

  return null
}

function extractCriticScore($: CheerioAPI): number | null {
  return parseScore(firstText($, ALBUM_SELECTORS.criticScore))
}

function extractUserScore($: CheerioAPI): number | null {
  const primary = parseScore(firstText($, ALBUM_SELECTORS.userScore))
  if (primary !== null) {
    return primary
  }

  for (const badge of allText($, ALBUM_SELECTORS.ratingBadge)) {
    if (badge === 'NR') continue
    const value = parseScore(badge)
    if (value !== null) return value
  }

  return null
}

function extractCount($: CheerioAPI, strategies: readonly FieldStrategy[]): number | null {
  for (const strategy of strategies) {
    const value = parseCount(readStrategy($, strategy))
    if (value !== null) return value
  }
  return null
}

/**
 * Union of embedded metadata and visible genre links, first-seen order,
 * case-sensitive.
 */
function extractGenres($: CheerioAPI): string[] {
  const candidates = [
    ...allAttr($, ALBUM_SELECTORS.metaGenre, 'content').map(value => cleanText(value)),
    ...allText($, ALBUM_SELECTORS.genreLinks),
  ]
  return [...new Set(candidates.filter(genre => genre.length > 0))]
}

function extractGenreTags($: CheerioAPI): string[] {
  return allText($, ALBUM_SELECTORS.genreTags)
}

function extractCoverImage($: CheerioAPI, pageUrl: string): string | null {
  for (const strategy of ALBUM_SELECTORS.coverImage) {
    const value = toAbsoluteUrl(pageUrl, readStrategy($, strategy))
    if (value) return value
  }
  return null
}

function extractDescription($: CheerioAPI): string | null {
  for (const strategy of ALBUM_SELECTORS.description) {
    const value = readStrategy($, strategy)
    if (value) return value
  }
  return null
}

/**
 * Run one field extractor; a throw is a miss, not a failure.
 */
function field<T>(name: string, ctx: ExtractContext, url: string, extract: () => T, empty: T): T {
  try {
    return extract()
  } catch (error) {
    ctx.logger.debug('Field extraction threw', {
      field: name,
      url,
      error: error instanceof Error ? error.message : String(error),
    })
    return empty
  }
}

function extractFields($: CheerioAPI, url: string, ctx: ExtractContext): ExtractedFields {
  return {
    title: field('title', ctx, url, () => extractTitle($), null),
    artist_name: field('artist_name', ctx, url, () => extractArtist($), null),
    release_date: field('release_date', ctx, url, () => extractReleaseDate($), null),
    critic_score: field('critic_score', ctx, url, () => extractCriticScore($), null),
    user_score: field('user_score', ctx, url, () => extractUserScore($), null),
    critic_review_count: field('critic_review_count', ctx, url, () => extractCount($, ALBUM_SELECTORS.criticReviewCount), null),
    user_review_count: field('user_review_count', ctx, url, () => extractCount($, ALBUM_SELECTORS.userReviewCount), null),
    genres: field('genres', ctx, url, () => extractGenres($), []),
    genre_tags: field('genre_tags', ctx, url, () => extractGenreTags($), []),
    cover_image_url: field('cover_image_url', ctx, url, () => extractCoverImage($, url), null),
    description: field('description', ctx, url, () => extractDescription($), null),
  }
}

/**
 * Extract one album record from a loaded album page.
 *
 * Returns null only when the URL carries no album id; every other gap is a
 * null field.
 */
export function extractAlbum($: CheerioAPI, pageUrl: string, ctx: ExtractContext): AlbumRecord | null {
  const aotyId = extractAotyId(pageUrl)
  if (!aotyId) {
    ctx.logger.debug('URL has no album id', { url: pageUrl })
    return null
  }

  let url: string
  try {
    url = canonicalizeUrl(pageUrl)
  } catch {
    url = pageUrl
  }

  const fields = extractFields($, url, ctx)

  const missing = Object.entries(fields)
    .filter(([, value]) => value === null || (Array.isArray(value) && value.length === 0))
    .map(([name]) => name)
  if (missing.length > 0) {
    ctx.logger.debug('Fields not found', { url, aotyId, missing })
  }

  return {
    aoty_id: aotyId,
    url,
    ...fields,
    scrape_genre: ctx.genreSlug,
    scrape_year: ctx.year,
    scraped_at: ctx.now.toISOString(),
  }
}
