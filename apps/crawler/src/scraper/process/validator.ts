/**
 * Album Validator (Fail-Closed)
 *
 * A record is kept only if it has a real title and artist, some evidence of
 * reception (a score or a positive review count) and at least one genre.
 * Anything else is dropped before persistence, with a reason.
 */

import type { AlbumRecord } from '../types.js'

export type AlbumDropReason =
  | 'MISSING_ID'
  | 'PLACEHOLDER_ARTIST'
  | 'PLACEHOLDER_TITLE'
  | 'NO_SCORE_OR_REVIEWS'
  | 'NO_GENRES'

export type AlbumValidationResult = { ok: true } | { ok: false; reason: AlbumDropReason }

/** Compared lowercased and trimmed */
const PLACEHOLDER_ARTISTS = new Set(['submit correction', 'album', 'artist', 'unknown', 'discography', ''])
const PLACEHOLDER_TITLES = new Set(['discography', 'album', 'artist', 'unknown', 'submit correction', ''])

export function isPlaceholderArtist(artist: string | null | undefined): boolean {
  return PLACEHOLDER_ARTISTS.has((artist ?? '').trim().toLowerCase())
}

export function isPlaceholderTitle(title: string | null | undefined): boolean {
  return PLACEHOLDER_TITLES.has((title ?? '').trim().toLowerCase())
}

export function validateAlbum(album: AlbumRecord): AlbumValidationResult {
  if (!album.aoty_id || album.aoty_id === 'album') {
    return { ok: false, reason: 'MISSING_ID' }
  }

  if (isPlaceholderArtist(album.artist_name)) {
    return { ok: false, reason: 'PLACEHOLDER_ARTIST' }
  }

  if (isPlaceholderTitle(album.title)) {
    return { ok: false, reason: 'PLACEHOLDER_TITLE' }
  }

  const hasScore = album.critic_score !== null || album.user_score !== null
  const hasReviews = (album.critic_review_count ?? 0) > 0 || (album.user_review_count ?? 0) > 0
  if (!hasScore && !hasReviews) {
    return { ok: false, reason: 'NO_SCORE_OR_REVIEWS' }
  }

  if (album.genres.length === 0) {
    return { ok: false, reason: 'NO_GENRES' }
  }

  return { ok: true }
}

export interface ValidationSummary {
  valid: AlbumRecord[]
  dropped: number
  dropReasons: Partial<Record<AlbumDropReason, number>>
}

/**
 * Keep valid records in their original order and count the rest by reason.
 */
export function filterValidAlbums(albums: AlbumRecord[]): ValidationSummary {
  const valid: AlbumRecord[] = []
  const dropReasons: Partial<Record<AlbumDropReason, number>> = {}

  for (const album of albums) {
    const result = validateAlbum(album)
    if (result.ok) {
      valid.push(album)
    } else {
      dropReasons[result.reason] = (dropReasons[result.reason] ?? 0) + 1
    }
  }

  return { valid, dropped: albums.length - valid.length, dropReasons }
}
