import { readFileSync } from 'node:fs'
import { describe, expect, it } from 'vitest'
import { loadHtml } from '../extract/html.js'
import { genreNameFromSlug, genreSlugFromHref, parseGenreIndex, parseRatingsPage } from '../extract/listing.js'
import { BASE_URL, ratingsHtml, ratingsUrl } from './helpers.js'

const indexUrl = `${BASE_URL}/genre.php`

describe('genre slugs', () => {
  it('derives a display name from a slug', () => {
    expect(genreNameFromSlug('7-rock')).toBe('Rock')
    expect(genreNameFromSlug('15-hip-hop')).toBe('Hip Hop')
  })

  it('reads the slug from genre hrefs and rejects list pages', () => {
    expect(genreSlugFromHref('/genre/7-rock/')).toBe('7-rock')
    expect(genreSlugFromHref('https://www.albumoftheyear.org/genre/22-indie-rock/2024/')).toBe('22-indie-rock')
    expect(genreSlugFromHref('/genre/list/')).toBeNull()
    expect(genreSlugFromHref('/genre.php')).toBeNull()
  })
})

describe('parseGenreIndex', () => {
  it('takes the genres after the All Genres heading', () => {
    const html = readFileSync(new URL('./fixtures/genre-index.html', import.meta.url), 'utf-8')
    const genres = parseGenreIndex(loadHtml(html), indexUrl)

    expect(genres).toEqual([
      { name: 'Rock', slug: '7-rock', url: `${BASE_URL}/genre/7-rock/` },
      { name: 'Pop', slug: '3-pop', url: `${BASE_URL}/genre/3-pop/` },
      { name: 'Hip Hop', slug: '15-hip-hop', url: `${BASE_URL}/genre/15-hip-hop/` },
      { name: 'Trip Hop', slug: '99-trip-hop', url: `${BASE_URL}/genre/99-trip-hop/` },
    ])
  })

  it('ignores non-anchor elements that carry a genre href', () => {
    const html = `<html><body><h2>All Genres</h2><div>
      <area href="/genre/40-jazz/">
      <a href="/genre/7-rock/">Rock</a>
    </div></body></html>`

    expect(parseGenreIndex(loadHtml(html), indexUrl).map(genre => genre.slug)).toEqual(['7-rock'])
  })

  it('falls back to every genre link when there is no heading', () => {
    const html = `<html><body>
      <a href="/genre/7-rock/">Rock</a>
      <a href="/genre/3-pop/">Pop</a>
      <a href="/genre/7-rock/">Rock again</a>
      <a href="/genre/12-folk/">Similar Artists</a>
    </body></html>`

    expect(parseGenreIndex(loadHtml(html), indexUrl).map(genre => genre.slug)).toEqual(['7-rock', '3-pop'])
  })

  it('returns nothing for a page without genre links', () => {
    expect(parseGenreIndex(loadHtml('<html><body><p>Maintenance</p></body></html>'), indexUrl)).toEqual([])
  })
})

describe('parseRatingsPage', () => {
  const pageUrl = ratingsUrl(2025, '7-rock')

  it('returns album links in list order without duplicates', () => {
    const html = ratingsHtml(['/album/1-a.php', '/album/2-b.php?ref=list', '/album/1-a.php', '/artist/5-z/'])
    const { albumUrls, nextPageUrl } = parseRatingsPage(loadHtml(html), pageUrl)

    expect(albumUrls).toEqual([`${BASE_URL}/album/1-a.php`, `${BASE_URL}/album/2-b.php`])
    expect(nextPageUrl).toBeNull()
  })

  it('resolves the next page link', () => {
    const html = ratingsHtml(['/album/1-a.php'], '/ratings/user-highest-rated/2025/7-rock/2/')
    expect(parseRatingsPage(loadHtml(html), pageUrl).nextPageUrl).toBe(`${pageUrl}2/`)
  })

  it('ignores a next link that points back at the same page', () => {
    const html = ratingsHtml(['/album/1-a.php'], '/ratings/user-highest-rated/2025/7-rock/')
    expect(parseRatingsPage(loadHtml(html), pageUrl).nextPageUrl).toBeNull()
  })

  it('falls back to any album link in the list container', () => {
    const html = `<html><body><div id="centerContent">
      <div class="albumBlock"><a href="/album/3-c.php">C</a></div>
      <div class="albumBlock"><a href="/album/4-d.php">D</a></div>
    </div></body></html>`

    expect(parseRatingsPage(loadHtml(html), pageUrl).albumUrls).toEqual([
      `${BASE_URL}/album/3-c.php`,
      `${BASE_URL}/album/4-d.php`,
    ])
  })
})
