/**
 * Genre filter matching for `--genre`.
 *
 * Compares the filter against each genre's slug (numeric id prefix removed)
 * and display name, ignoring case and treating hyphens, underscores and
 * spaces alike. If any genre matches exactly, only exact matches are
 * returned; otherwise substring containment is accepted. So `pop` selects
 * Pop alone, not every genre with "pop" in its name, while `metal` still
 * finds Black Metal when there is no plain Metal.
 */

import type { GenreDescriptor } from './types.js'

export function normalizeGenreKey(value: string): string {
  return value
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[-_\s]+/g, ' ')
    .trim()
}

function candidateKeys(genre: Pick<GenreDescriptor, 'name' | 'slug'>): string[] {
  return [normalizeGenreKey(genre.slug.replace(/^\d+-/, '')), normalizeGenreKey(genre.name)]
}

export type GenreMatchKind = 'exact' | 'partial' | 'none'

export function matchGenre(filter: string, genre: Pick<GenreDescriptor, 'name' | 'slug'>): GenreMatchKind {
  const target = normalizeGenreKey(filter)
  if (!target) return 'none'

  const keys = candidateKeys(genre)
  if (keys.includes(target)) return 'exact'
  // squashed spellings: "hiphop" for "hip hop"
  if (keys.some(key => key.replace(/ /g, '') === target.replace(/ /g, ''))) return 'exact'
  if (keys.some(key => key.includes(target))) return 'partial'
  return 'none'
}

/**
 * Apply the filter to a genre list, preserving order. An empty or missing
 * filter selects everything.
 */
export function filterGenres<T extends Pick<GenreDescriptor, 'name' | 'slug'>>(genres: T[], filter?: string | null): T[] {
  if (!filter || !normalizeGenreKey(filter)) {
    return genres
  }

  const exact: T[] = []
  const partial: T[] = []
  for (const genre of genres) {
    const kind = matchGenre(filter, genre)
    if (kind === 'exact') exact.push(genre)
    else if (kind === 'partial') partial.push(genre)
  }

  return exact.length > 0 ? exact : partial
}
