/**
 * Album of the Year CSS Selectors
 *
 * Each field lists its strategies in priority order; the extractor takes the
 * first one that yields a usable value. Structured markup (itemprop, Open
 * Graph) comes before layout classes.
 */

export const ALBUM_SELECTORS = {
  title: [
    { selector: 'h1.albumTitle span[itemprop="name"]' },
    { selector: 'meta[property="og:title"]', attr: 'content', combined: true },
    { selector: 'h1' },
  ],

  artist: [
    { selector: '[itemprop="byArtist"] span[itemprop="name"] a' },
    { selector: '.artist a' },
    { selector: 'meta[property="og:title"]', attr: 'content', combined: true },
  ],

  // Rows of the album detail table; the release row is found by its label
  detailRow: '.detailRow',
  releaseLinks: '.detailRow a[href*="/releases/"]',

  criticScore: '[itemprop="ratingValue"] a',
  userScore: '.albumUserScore a',
  // Per-review rating badges, "NR" when unrated
  ratingBadge: '.rating',

  criticReviewCount: [
    { selector: 'meta[itemprop="reviewCount"]', attr: 'content' },
    { selector: 'span[itemprop="ratingCount"]' },
    { selector: '.albumCriticScoreBox .numReviews' },
  ],

  userReviewCount: [
    { selector: '.albumUserScoreBox .numReviews strong' },
    { selector: '.albumUserScoreBox .numReviews a' },
  ],

  metaGenre: 'meta[itemprop="genre"]',
  genreLinks: '.detailRow a[href*="/genre/"]',
  genreTags: '.detailRow .secondary',

  coverImage: [
    { selector: '.albumTopBox.cover img', attr: 'src' },
    { selector: 'meta[property="og:image"]', attr: 'content' },
    { selector: 'img[alt*=" - "]', attr: 'src' },
  ],

  description: [
    { selector: 'meta[name="Description"]', attr: 'content' },
    { selector: 'meta[name="description"]', attr: 'content' },
    { selector: 'meta[property="og:description"]', attr: 'content' },
  ],
} as const

export const LISTING_SELECTORS = {
  albumLinks: '.albumListRow .albumListTitle a',
  // When the row markup changes, any album link inside the list container
  albumLinksFallback: '.albumListRow a[href*="/album/"], #centerContent a[href*="/album/"]',
  nextPage: ['a.next', 'link[rel="next"]', '.pageSelect a.next'],
} as const

export const GENRE_INDEX_SELECTORS = {
  genreLinks: 'a[href*="/genre/"]',
  allGenresHeading: 'All Genres',
} as const

/**
 * Link texts on the genre index that are navigation, not genres.
 */
export const GENRE_NAV_TEXTS = [
  'view more',
  'similar artists',
  'follow',
  'on this day',
  'newsworthy',
  'user updates',
  'site updates',
  'privacy policy',
  'contact us',
  'ad-free',
  'highest rated',
  'must hear albums',
  'year end lists',
  'new releases',
  'random',
] as const

/**
 * Values the site renders in title/artist positions that are not names.
 */
export const PLACEHOLDER_NAMES = ['discography', 'submit correction', 'unknown'] as const

export interface FieldStrategy {
  selector: string
  attr?: string
  /** Value is "Artist - Title" and must be split */
  combined?: boolean
}
