/**
 * URL utilities for crawl navigation.
 *
 * Canonical form (used for resume matching and record `url`):
 * 1. Enforce https
 * 2. Lowercase hostname
 * 3. Remove tracking parameters (utm_*, fbclid, gclid, ref, source, campaign)
 * 4. Remove empty query parameters, sort the rest
 * 5. Remove fragment
 */

import psl from 'psl'

const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'ref', 'source', 'campaign'])

const ALBUM_ID_PATTERN = /\/album\/(\d+-[^/?#]+)\.php/

/**
 * Canonicalize a URL for deduplication.
 *
 * @throws Error if URL is invalid
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url)

  parsed.protocol = 'https:'
  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  return parsed.toString()
}

export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Resolve an href against the page it was found on.
 * Returns null for empty, javascript: and otherwise unusable values.
 */
export function toAbsoluteUrl(base: string, href: string | null | undefined): string | null {
  const value = href?.trim()
  if (!value || value.startsWith('#') || value.toLowerCase().startsWith('javascript:')) {
    return null
  }
  if (value.startsWith('//')) {
    return `https:${value}`
  }
  try {
    return new URL(value, base).toString()
  } catch {
    return null
  }
}

/**
 * Registrable domain (eTLD+1) of a URL. Rate limits are scoped by it, so
 * www. and cdn. subdomains share one budget.
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  return psl.get(hostname) ?? hostname
}

/**
 * Album identity from its URL: `/album/12345-some-title.php` → `12345-some-title`.
 */
export function extractAotyId(url: string): string | null {
  const match = url.match(ALBUM_ID_PATTERN)
  return match ? match[1] : null
}

export function isAlbumUrl(url: string): boolean {
  return ALBUM_ID_PATTERN.test(url)
}
