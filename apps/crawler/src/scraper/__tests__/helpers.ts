import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadHtml } from '../extract/html.js'
import type { AlbumRecord, PageResult, PageSource } from '../types.js'

export const BASE_URL = 'https://www.albumoftheyear.org'

export function ratingsUrl(year: number, slug: string): string {
  return `${BASE_URL}/ratings/user-highest-rated/${year}/${slug}/`
}

export function albumUrl(id: string): string {
  return `${BASE_URL}/album/${id}.php`
}

export function genreIndexHtml(genres: Array<{ name: string; slug: string }>): string {
  const links = genres.map(genre => `<a href="/genre/${genre.slug}/">${genre.name}</a>`).join('\n')
  return `<html><body><h2>All Genres</h2><div>${links}</div></body></html>`
}

export function ratingsHtml(hrefs: string[], nextHref?: string): string {
  const rows = hrefs
    .map(href => `<div class="albumListRow"><h2 class="albumListTitle"><a href="${href}">Listed</a></h2></div>`)
    .join('\n')
  const next = nextHref ? `<div class="pageSelect"><a class="next" href="${nextHref}">Next</a></div>` : ''
  return `<html><body><div id="centerContent">${rows}${next}</div></body></html>`
}

export function albumHtml(options: { title: string; artist: string; score?: number; genre?: string }): string {
  const score = options.score === undefined ? '' : `<span itemprop="ratingValue"><a href="#c">${options.score}</a></span>`
  const genre = options.genre ? `<div class="detailRow"><a href="/genre/7-rock/">${options.genre}</a></div>` : ''
  return [
    '<html><body>',
    `<h1 class="albumTitle"><span itemprop="name">${options.title}</span></h1>`,
    `<div class="artist"><a href="/artist/1-someone/">${options.artist}</a></div>`,
    score,
    genre,
    '</body></html>',
  ].join('\n')
}

/**
 * Serves canned documents by exact URL and records every request.
 * Unknown URLs fail the way an HTTP 404 would.
 */
export class StubPageSource implements PageSource {
  readonly requested: string[] = []
  /** `requiresJs` of each request, in order */
  readonly rendered: boolean[] = []
  closed = 0
  onFetch?: (url: string) => void

  constructor(private readonly pages: Map<string, string>) {}

  async fetchPage(url: string, options: { requiresJs?: boolean } = {}): Promise<PageResult> {
    this.requested.push(url)
    this.rendered.push(options.requiresJs ?? false)
    this.onFetch?.(url)
    const html = this.pages.get(url)
    if (html === undefined) {
      return { ok: false, url, reason: 'error', error: 'HTTP 404: Not Found', statusCode: 404, attempts: 1 }
    }
    return { ok: true, url, html, $: loadHtml(html), attempts: 1 }
  }

  async close(): Promise<void> {
    this.closed++
  }
}

export function makeAlbum(overrides: Partial<AlbumRecord> = {}): AlbumRecord {
  return {
    aoty_id: '1-first-light',
    title: 'First Light',
    artist_name: 'The Placeholders',
    url: albumUrl('1-first-light'),
    release_date: 'January 5, 2025',
    critic_score: 80,
    user_score: 75,
    critic_review_count: 10,
    user_review_count: 200,
    genres: ['Rock'],
    genre_tags: [],
    cover_image_url: null,
    description: null,
    scrape_genre: '7-rock',
    scrape_year: 2025,
    scraped_at: '2025-03-14T12:00:00.000Z',
    ...overrides,
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'cratedigger-test-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}
