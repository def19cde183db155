/**
 * Navigation page parsers: the genre index and the yearly ratings lists.
 *
 * Both return plain data; deciding what to fetch next is the crawler's job.
 */

import type { CheerioAPI } from 'cheerio'
import type { GenreDescriptor } from '../types.js'
import { canonicalizeUrl, isAlbumUrl, toAbsoluteUrl } from '../utils/url.js'
import { cleanText } from './html.js'
import { GENRE_INDEX_SELECTORS, GENRE_NAV_TEXTS, LISTING_SELECTORS } from './selectors.js'

const GENRE_SLUG_PATTERN = /\/genre\/(\d+-[^/?#]+)\/?/

export interface RatingsPage {
  /** Canonical album URLs in list (rank) order, without duplicates */
  albumUrls: string[]
  nextPageUrl: string | null
}

/**
 * `7-rock` → `Rock`, `15-hip-hop` → `Hip Hop`
 */
export function genreNameFromSlug(slug: string): string {
  return slug
    .replace(/^\d+-/, '')
    .split('-')
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

export function genreSlugFromHref(href: string): string | null {
  if (href.includes('/genre/list') || href.includes('/genre.php')) {
    return null
  }
  const match = href.match(GENRE_SLUG_PATTERN)
  if (!match) {
    return null
  }
  try {
    return decodeURIComponent(match[1])
  } catch {
    return match[1]
  }
}

function isNavigationText(text: string): boolean {
  const normalized = text.toLowerCase()
  return GENRE_NAV_TEXTS.some(nav => nav === normalized)
}

interface GenreAnchor {
  href: string | undefined
  text: string
}

/**
 * Genre anchors that follow the "All Genres" heading, in document order.
 * Empty when the heading is missing.
 */
function anchorsAfterAllGenres($: CheerioAPI): GenreAnchor[] {
  const anchors: GenreAnchor[] = []
  let seenHeading = false

  for (const el of $('*').toArray()) {
    const node = $(el)
    if (!seenHeading) {
      const ownText = node.clone().children().remove().end().text()
      if (ownText.includes(GENRE_INDEX_SELECTORS.allGenresHeading)) {
        seenHeading = true
      }
      continue
    }
    const href = node.attr('href')
    if (node.is('a') && href?.includes('/genre/')) {
      anchors.push({ href, text: cleanText(node.text()) })
    }
  }

  return anchors
}

/**
 * Extract genres from the genre index page. Prefers the links after the
 * "All Genres" heading, else every genre link on the page. Navigation links
 * and list pages are skipped; genres are de-duplicated by slug, first wins.
 */
export function parseGenreIndex($: CheerioAPI, pageUrl: string): GenreDescriptor[] {
  let anchors = anchorsAfterAllGenres($)
  if (anchors.length === 0) {
    anchors = $(GENRE_INDEX_SELECTORS.genreLinks)
      .toArray()
      .map(el => ({ href: $(el).attr('href'), text: cleanText($(el).text()) }))
  }

  const genres: GenreDescriptor[] = []
  const seen = new Set<string>()

  for (const anchor of anchors) {
    const { href, text } = anchor
    if (!href) continue

    const slug = genreSlugFromHref(href)
    if (!slug || seen.has(slug)) continue

    if (text && isNavigationText(text)) continue

    const url = toAbsoluteUrl(pageUrl, href)
    if (!url) continue

    seen.add(slug)
    genres.push({
      name: text || genreNameFromSlug(slug),
      slug,
      url,
    })
  }

  return genres
}

/**
 * Extract album links (rank order) and the next-page link from one ratings
 * page.
 */
export function parseRatingsPage($: CheerioAPI, pageUrl: string): RatingsPage {
  let hrefs = $(LISTING_SELECTORS.albumLinks)
    .toArray()
    .map(el => $(el).attr('href'))
  if (hrefs.length === 0) {
    hrefs = $(LISTING_SELECTORS.albumLinksFallback)
      .toArray()
      .map(el => $(el).attr('href'))
  }

  const albumUrls: string[] = []
  const seen = new Set<string>()
  for (const href of hrefs) {
    const absolute = toAbsoluteUrl(pageUrl, href)
    if (!absolute || !isAlbumUrl(absolute)) continue
    const url = canonicalizeUrl(absolute)
    if (seen.has(url)) continue
    seen.add(url)
    albumUrls.push(url)
  }

  return { albumUrls, nextPageUrl: findNextPage($, pageUrl) }
}

function findNextPage($: CheerioAPI, pageUrl: string): string | null {
  for (const selector of LISTING_SELECTORS.nextPage) {
    const next = toAbsoluteUrl(pageUrl, $(selector).first().attr('href'))
    if (next && canonicalizeUrl(next) !== canonicalizeUrl(pageUrl)) {
      return next
    }
  }
  return null
}
