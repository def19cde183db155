/**
 * Album Catalogue
 *
 * Read-side of the output directory: loads every persisted album file,
 * filters and summarizes the result, and exports selections.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import type { AlbumRecord } from '../types.js'
import { toCsv, toJson } from '../process/writer.js'
import { dedupeAlbums } from '../process/run-dedupe.js'
import { filterValidAlbums } from '../process/validator.js'
import type { LooseRecord } from './output-files.js'
import { listOutputFiles, readCsvRecords, readJsonRecords } from './output-files.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Coercion
// ═══════════════════════════════════════════════════════════════════════════════

const NULL_TEXT = new Set(['', 'null', 'none', 'undefined', 'nan'])

function isNullish(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && NULL_TEXT.has(value.trim().toLowerCase()))
}

function toFloat(value: unknown): number | null {
  if (isNullish(value)) return null
  const parsed = typeof value === 'number' ? value : Number.parseFloat(String(value).replace(/,/g, ''))
  return Number.isFinite(parsed) ? parsed : null
}

/** "2.0" → 2; CSV round-trips integers as text */
function toInt(value: unknown): number | null {
  const parsed = toFloat(value)
  return parsed === null ? null : Math.trunc(parsed)
}

function toText(value: unknown): string | null {
  if (isNullish(value)) return null
  return String(value)
}

/**
 * A list field: an array, JSON text of an array, or a single bare value.
 */
function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string')
  }
  if (isNullish(value)) {
    return []
  }
  const text = String(value).trim()
  if (text.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(text)
      if (Array.isArray(parsed)) {
        return parsed.filter((item): item is string => typeof item === 'string')
      }
    } catch {
      // not JSON after all; treat as a single value
    }
  }
  return [text]
}

/**
 * Typed album from a loosely typed JSON/CSV row. Rows without an id or URL
 * are unusable and come back as null.
 */
export function coerceAlbum(row: LooseRecord): AlbumRecord | null {
  const aotyId = toText(row.aoty_id)
  const url = toText(row.url)
  if (!aotyId || !url) {
    return null
  }

  return {
    aoty_id: aotyId,
    title: toText(row.title),
    artist_name: toText(row.artist_name),
    url,
    release_date: toText(row.release_date),
    critic_score: toFloat(row.critic_score),
    user_score: toFloat(row.user_score),
    critic_review_count: toInt(row.critic_review_count),
    user_review_count: toInt(row.user_review_count),
    genres: toStringList(row.genres),
    genre_tags: toStringList(row.genre_tags),
    cover_image_url: toText(row.cover_image_url),
    description: toText(row.description),
    scrape_genre: toText(row.scrape_genre),
    scrape_year: toInt(row.scrape_year),
    scraped_at: toText(row.scraped_at) ?? '',
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Loading
// ═══════════════════════════════════════════════════════════════════════════════

export interface LoadAlbumsOptions {
  logger?: ILogger
  /** Skip the validity filter (default: false) */
  includeInvalid?: boolean
}

/**
 * Every album in `albums_*.json` then `albums_*.csv`, de-duplicated by
 * aoty_id (later files win) and validated. Unreadable files are skipped.
 */
export async function loadAlbums(outputDir: string, options: LoadAlbumsOptions = {}): Promise<AlbumRecord[]> {
  const logger = options.logger ?? silentLogger
  const jsonFiles = await listOutputFiles(outputDir, 'albums', 'json')
  const csvFiles = await listOutputFiles(outputDir, 'albums', 'csv')

  const albums: AlbumRecord[] = []
  const sources: Array<{ file: string; read: (path: string) => Promise<LooseRecord[]> }> = [
    ...jsonFiles.map(file => ({ file, read: readJsonRecords })),
    ...csvFiles.map(file => ({ file, read: readCsvRecords })),
  ]

  for (const { file, read } of sources) {
    try {
      const rows = await read(file)
      let kept = 0
      for (const row of rows) {
        const album = coerceAlbum(row)
        if (album) {
          albums.push(album)
          kept++
        }
      }
      logger.debug('Loaded album file', { file, rows: rows.length, albums: kept })
    } catch (error) {
      logger.warn('Skipping unreadable album file', { file }, error)
    }
  }

  const { albums: unique, duplicatesRemoved } = dedupeAlbums(albums)
  if (options.includeInvalid) {
    logger.info('Albums loaded', { files: sources.length, albums: unique.length, duplicatesRemoved })
    return unique
  }

  const { valid, dropped } = filterValidAlbums(unique)
  logger.info('Albums loaded', { files: sources.length, albums: valid.length, duplicatesRemoved, invalid: dropped })
  return valid
}

// ═══════════════════════════════════════════════════════════════════════════════
// Filtering
// ═══════════════════════════════════════════════════════════════════════════════

export interface AlbumCriteria {
  /** Album has any of these genres (case-insensitive) */
  genres?: string[]
  /** Album has all of these genres (case-insensitive) */
  genresAll?: string[]
  minScore?: number
  maxScore?: number
  minUserScore?: number
  maxUserScore?: number
  /** Critic plus user review count */
  minReviews?: number
  minUserReviews?: number
  minCriticReviews?: number
  /** Exact scrape year */
  year?: number
  yearMin?: number
  yearMax?: number
  /** Substring of title, artist or description (case-insensitive) */
  search?: string
}

function genreSet(album: AlbumRecord): Set<string> {
  return new Set(album.genres.map(genre => genre.toLowerCase()))
}

/**
 * Every criterion that is set must hold. Albums missing a score fail any
 * score bound; missing review counts count as zero.
 */
export function filterAlbums(albums: AlbumRecord[], criteria: AlbumCriteria = {}): AlbumRecord[] {
  const {
    genres,
    genresAll,
    minScore,
    maxScore,
    minUserScore,
    maxUserScore,
    minReviews,
    minUserReviews,
    minCriticReviews,
    year,
    yearMin,
    yearMax,
    search,
  } = criteria
  const needle = search?.trim().toLowerCase()

  return albums.filter(album => {
    const albumGenres = genreSet(album)
    if (genres && genres.length > 0 && !genres.some(genre => albumGenres.has(genre.toLowerCase()))) return false
    if (genresAll && genresAll.length > 0 && !genresAll.every(genre => albumGenres.has(genre.toLowerCase()))) return false

    if (minScore !== undefined && (album.critic_score === null || album.critic_score < minScore)) return false
    if (maxScore !== undefined && (album.critic_score === null || album.critic_score > maxScore)) return false
    if (minUserScore !== undefined && (album.user_score === null || album.user_score < minUserScore)) return false
    if (maxUserScore !== undefined && (album.user_score === null || album.user_score > maxUserScore)) return false

    const criticReviews = album.critic_review_count ?? 0
    const userReviews = album.user_review_count ?? 0
    if (minReviews !== undefined && criticReviews + userReviews < minReviews) return false
    if (minUserReviews !== undefined && userReviews < minUserReviews) return false
    if (minCriticReviews !== undefined && criticReviews < minCriticReviews) return false

    if (year !== undefined && album.scrape_year !== year) return false
    if (yearMin !== undefined && (album.scrape_year ?? 0) < yearMin) return false
    if (yearMax !== undefined && (album.scrape_year ?? 9999) > yearMax) return false

    if (needle) {
      const haystacks = [album.title, album.artist_name, album.description]
      if (!haystacks.some(text => (text ?? '').toLowerCase().includes(needle))) return false
    }

    return true
  })
}

// ═══════════════════════════════════════════════════════════════════════════════
// Statistics
// ═══════════════════════════════════════════════════════════════════════════════

export interface AlbumStats {
  albums: number
  artists: number
  genres: number
  withCriticScore: number
  withUserScore: number
  averageCriticScore: number | null
  averageUserScore: number | null
  /** Albums per scrape year, newest first */
  byYear: Array<{ year: number; albums: number }>
  /** Most frequent genres, most albums first */
  topGenres: Array<{ genre: string; albums: number }>
  topByCriticScore: AlbumRecord[]
}

function average(values: number[]): number | null {
  if (values.length === 0) return null
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

export function computeStats(albums: AlbumRecord[], topN = 5): AlbumStats {
  const criticScores = albums.flatMap(album => (album.critic_score === null ? [] : [album.critic_score]))
  const userScores = albums.flatMap(album => (album.user_score === null ? [] : [album.user_score]))

  const artists = new Set(albums.flatMap(album => (album.artist_name ? [album.artist_name.toLowerCase()] : [])))

  const genreCounts = new Map<string, number>()
  for (const album of albums) {
    for (const genre of album.genres) {
      genreCounts.set(genre, (genreCounts.get(genre) ?? 0) + 1)
    }
  }

  const yearCounts = new Map<number, number>()
  for (const album of albums) {
    if (album.scrape_year !== null) {
      yearCounts.set(album.scrape_year, (yearCounts.get(album.scrape_year) ?? 0) + 1)
    }
  }

  const topByCriticScore = albums
    .filter(album => album.critic_score !== null)
    .sort((a, b) => (b.critic_score ?? 0) - (a.critic_score ?? 0))
    .slice(0, topN)

  return {
    albums: albums.length,
    artists: artists.size,
    genres: genreCounts.size,
    withCriticScore: criticScores.length,
    withUserScore: userScores.length,
    averageCriticScore: average(criticScores),
    averageUserScore: average(userScores),
    byYear: [...yearCounts.entries()]
      .sort(([a], [b]) => b - a)
      .map(([year, count]) => ({ year, albums: count })),
    topGenres: [...genreCounts.entries()]
      .sort(([genreA, a], [genreB, b]) => b - a || genreA.localeCompare(genreB))
      .slice(0, 10)
      .map(([genre, count]) => ({ genre, albums: count })),
    topByCriticScore,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Export
// ═══════════════════════════════════════════════════════════════════════════════

export type ExportFormat = 'csv' | 'json'

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'csv' || value === 'json'
}

/**
 * Write albums to one file in the chosen format, creating parent
 * directories as needed.
 */
export async function exportAlbums(albums: AlbumRecord[], format: ExportFormat, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const body = format === 'csv' ? toCsv(albums) : toJson(albums)
  await writeFile(path, body, 'utf-8')
}
