/**
 * Run-Level Deduplication
 *
 * Albums are keyed by aoty_id. A later record for the same id replaces the
 * earlier one (last write wins) but keeps the position of the first, so the
 * output stays in discovery order.
 */

import type { AlbumRecord } from '../types.js'

export interface DedupeResult {
  albums: AlbumRecord[]
  duplicatesRemoved: number
}

export function dedupeAlbums(albums: AlbumRecord[]): DedupeResult {
  const byId = new Map<string, AlbumRecord>()
  for (const album of albums) {
    byId.set(album.aoty_id, album)
  }
  const unique = [...byId.values()]
  return { albums: unique, duplicatesRemoved: albums.length - unique.length }
}

/**
 * Genres are keyed by slug, first wins.
 */
export function dedupeBySlug<T extends { slug: string }>(items: T[]): T[] {
  const bySlug = new Map<string, T>()
  for (const item of items) {
    if (!bySlug.has(item.slug)) {
      bySlug.set(item.slug, item)
    }
  }
  return [...bySlug.values()]
}
