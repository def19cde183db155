/**
 * Crawl target metadata shared across apps.
 */

export interface SiteRateLimit {
  /** Lower bound of the randomized gap between requests */
  minDelayMs: number
  /** Upper bound of the randomized gap between requests */
  maxDelayMs: number
}

export interface SitePaths {
  genreIndex: string
  /** `{year}` and `{slug}` are substituted */
  ratings: string
}

export interface SiteRegistryEntry {
  id: string
  name: string
  domain: string
  baseUrls: readonly string[]
  paths: SitePaths
  /** Route every page through the browser renderer */
  requiresJsRendering: boolean
  rateLimit: SiteRateLimit
}

export const KNOWN_SITES = [
  {
    id: 'aoty',
    name: 'Album of the Year',
    domain: 'albumoftheyear.org',
    baseUrls: ['https://www.albumoftheyear.org'],
    paths: {
      genreIndex: '/genre.php',
      ratings: '/ratings/user-highest-rated/{year}/{slug}/',
    },
    requiresJsRendering: false,
    rateLimit: {
      minDelayMs: 1500,
      maxDelayMs: 4500,
    },
  },
] as const satisfies readonly SiteRegistryEntry[]

export type KnownSite = (typeof KNOWN_SITES)[number]
export type KnownSiteId = KnownSite['id']

export const DEFAULT_SITE_ID: KnownSiteId = 'aoty'

export function getSite(id: string): SiteRegistryEntry | undefined {
  return KNOWN_SITES.find(site => site.id === id)
}

/**
 * Fill in the ratings path template for one (year, genre slug) pair.
 */
export function buildRatingsPath(site: SiteRegistryEntry, year: number, slug: string): string {
  return site.paths.ratings.replace('{year}', String(year)).replace('{slug}', encodeURIComponent(slug))
}
