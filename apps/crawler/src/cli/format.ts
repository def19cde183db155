import type { AlbumRecord } from '../scraper/types.js'

function score(value: number | null): string {
  return value === null ? 'n/a' : `${Number.isInteger(value) ? value : value.toFixed(1)}/100`
}

function count(value: number | null): string {
  return value === null ? 'n/a' : String(value)
}

/**
 * Multi-line listing entry for one album.
 */
export function formatAlbum(album: AlbumRecord): string {
  const lines = [
    album.title ?? 'Unknown',
    `   Artist:  ${album.artist_name ?? 'Unknown'}`,
    `   Scores:  ${score(album.critic_score)} critic, ${score(album.user_score)} user`,
    `   Reviews: ${count(album.critic_review_count)} critic, ${count(album.user_review_count)} user`,
  ]
  if (album.release_date) {
    lines.push(`   Release: ${album.release_date}`)
  }
  if (album.genres.length > 0) {
    lines.push(`   Genres:  ${album.genres.join(', ')}`)
  }
  return lines.join('\n')
}

export function formatAverage(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(1)
}
