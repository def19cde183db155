/**
 * Output Sink
 *
 * Buffers records for the whole run and writes them once, at the end:
 * one `{category}_{YYYYMMDD_HHMMSS}.json` array file and one `.csv` file per
 * non-empty category.
 *
 * Key design decisions:
 * - Albums are de-duplicated by aoty_id, then validated, before writing
 * - JSON and CSV outcomes are reported separately; one failing does not
 *   stop the other
 * - No global configuration: the directory and clock come from the caller
 */

import { mkdir, readdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import type { AlbumRecord, GenreDescriptor, GenreRecord, OutputCategory } from '../types.js'
import { dedupeAlbums, dedupeBySlug } from './run-dedupe.js'
import type { AlbumDropReason } from './validator.js'
import { filterValidAlbums } from './validator.js'

export interface OutputSinkOptions {
  outputDir: string
  /** Clock for file timestamps and genre discovery times */
  now?: () => Date
  logger?: ILogger
}

export type FormatOutcome = { ok: true; path: string } | { ok: false; path: string; error: string }

export interface CategoryReport {
  category: OutputCategory
  count: number
  json: FormatOutcome
  csv: FormatOutcome
}

export interface FlushReport {
  outputDir: string
  timestamp: string
  categories: CategoryReport[]
  albumsReceived: number
  albumsWritten: number
  duplicatesRemoved: number
  albumsDropped: number
  dropReasons: Partial<Record<AlbumDropReason, number>>
  filesWritten: number
  filesFailed: number
  /** At least one album file was written, or there were no albums to write */
  success: boolean
}

type CsvRow = Record<string, string>

/**
 * UTC `YYYYMMDD_HHMMSS`.
 */
export function formatRunTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

function toCsvCell(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

/**
 * CSV with a sorted header that is the union of every record's keys.
 * List and object cells are written as JSON text.
 */
export function toCsv(records: object[]): string {
  const columns = [...new Set(records.flatMap(record => Object.keys(record)))].sort()
  const rows: CsvRow[] = records.map(record => {
    const row: CsvRow = {}
    const entries = new Map<string, unknown>(Object.entries(record))
    for (const column of columns) {
      row[column] = toCsvCell(entries.get(column))
    }
    return row
  })
  return stringify(rows, { header: true, columns })
}

export function toJson(records: object[]): string {
  return `${JSON.stringify(records, null, 2)}\n`
}

/**
 * `<dir>/<stem>` or, when a file of either format already has that name,
 * `<dir>/<stem>_1`, `<dir>/<stem>_2`, ...
 */
async function claimBasePath(dir: string, stem: string): Promise<string> {
  const taken = new Set(await readdir(dir).catch((): string[] => []))
  for (let n = 0; ; n++) {
    const name = n === 0 ? stem : `${stem}_${n}`
    if (!taken.has(`${name}.json`) && !taken.has(`${name}.csv`)) {
      return join(dir, name)
    }
  }
}

async function writeFormat(path: string, render: () => string): Promise<FormatOutcome> {
  try {
    // wx: never replace an existing run file
    await writeFile(path, render(), { encoding: 'utf-8', flag: 'wx' })
    return { ok: true, path }
  } catch (error) {
    return { ok: false, path, error: error instanceof Error ? error.message : String(error) }
  }
}

export class OutputSink {
  private readonly outputDir: string
  private readonly now: () => Date
  private readonly logger: ILogger
  private albums: AlbumRecord[] = []
  private genres: GenreRecord[] = []

  constructor(options: OutputSinkOptions) {
    this.outputDir = options.outputDir
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? silentLogger
  }

  add(record: AlbumRecord): void {
    this.albums.push(record)
  }

  addGenre(genre: GenreDescriptor): void {
    this.genres.push({
      name: genre.name,
      slug: genre.slug,
      url: genre.url,
      discovered_at: this.now().toISOString(),
    })
  }

  get pendingAlbums(): number {
    return this.albums.length
  }

  get pendingGenres(): number {
    return this.genres.length
  }

  /**
   * Write everything buffered so far and clear the buffers.
   * Never throws for write failures; they are in the report.
   */
  async flush(): Promise<FlushReport> {
    const timestamp = formatRunTimestamp(this.now())
    const received = this.albums.length
    const { albums: unique, duplicatesRemoved } = dedupeAlbums(this.albums)
    const { valid, dropped, dropReasons } = filterValidAlbums(unique)
    const genres = dedupeBySlug(this.genres)
    this.albums = []
    this.genres = []

    if (dropped > 0) {
      this.logger.info('Dropped invalid albums', { dropped, dropReasons })
    }

    const pending: Array<{ category: OutputCategory; records: object[] }> = [
      { category: 'albums', records: valid },
      { category: 'genres', records: genres },
    ]

    const categories: CategoryReport[] = []
    const toWrite = pending.filter(entry => entry.records.length > 0)

    if (toWrite.length > 0) {
      try {
        await mkdir(this.outputDir, { recursive: true })
      } catch (error) {
        this.logger.error('Cannot create output directory', { outputDir: this.outputDir }, error)
      }
    }

    for (const { category, records } of toWrite) {
      const base = await claimBasePath(this.outputDir, `${category}_${timestamp}`)
      const json = await writeFormat(`${base}.json`, () => toJson(records))
      const csv = await writeFormat(`${base}.csv`, () => toCsv(records))

      for (const outcome of [json, csv]) {
        if (outcome.ok) {
          this.logger.info('Wrote output file', { category, count: records.length, path: outcome.path })
        } else {
          this.logger.error('Failed to write output file', { category, path: outcome.path, error: outcome.error })
        }
      }

      categories.push({ category, count: records.length, json, csv })
    }

    const outcomes = categories.flatMap(report => [report.json, report.csv])
    const albumReport = categories.find(report => report.category === 'albums')
    const albumsWritten = albumReport && (albumReport.json.ok || albumReport.csv.ok) ? albumReport.count : 0

    return {
      outputDir: this.outputDir,
      timestamp,
      categories,
      albumsReceived: received,
      albumsWritten,
      duplicatesRemoved,
      albumsDropped: dropped,
      dropReasons,
      filesWritten: outcomes.filter(outcome => outcome.ok).length,
      filesFailed: outcomes.filter(outcome => !outcome.ok).length,
      success: valid.length === 0 || albumsWritten > 0,
    }
  }
}
