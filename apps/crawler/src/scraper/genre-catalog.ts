/**
 * Genre Catalog
 *
 * Process-wide, additive-only map of genre names seen so far:
 *
 *   { "version": 1, "genres": { "Rock": { "type": "parent", "children": [...], ... } } }
 *
 * Seeded from the static fallback list the first time it is loaded. New
 * genres come from the genre index and from album pages; nothing is ever
 * removed. The file is rewritten only when something was added, through a
 * temp file and a rename.
 */

import { readFile, writeFile, mkdir, rename } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import type { AlbumRecord, GenreDescriptor } from './types.js'
import { isRecord } from './catalog/output-files.js'

export type GenreCatalogSource = 'fallback' | 'discovered'

export interface GenreCatalogEntry {
  type: 'parent' | 'child'
  parent?: string
  children: string[]
  slug?: string
  discovered_at: string
  source: GenreCatalogSource
}

export interface GenreCatalogFile {
  version: 1
  genres: Record<string, GenreCatalogEntry>
}

export interface FallbackGenre {
  name: string
  slug: string
}

const FALLBACK_LIST_URL = new URL('../../data/genres-fallback.json', import.meta.url)

let fallbackCache: FallbackGenre[] | null = null

function isFallbackGenre(value: unknown): value is FallbackGenre {
  return isRecord(value) && typeof value.name === 'string' && typeof value.slug === 'string'
}

/**
 * The static genre list shipped with the crawler.
 */
export async function loadFallbackGenres(): Promise<FallbackGenre[]> {
  if (!fallbackCache) {
    const parsed: unknown = JSON.parse(await readFile(FALLBACK_LIST_URL, 'utf-8'))
    const genres = isRecord(parsed) && Array.isArray(parsed.genres) ? parsed.genres : []
    fallbackCache = genres.filter(isFallbackGenre)
  }
  return fallbackCache
}

function parseEntry(value: unknown): GenreCatalogEntry | null {
  if (!isRecord(value)) return null
  const type = value.type === 'child' ? 'child' : 'parent'
  const children = Array.isArray(value.children)
    ? value.children.filter((child): child is string => typeof child === 'string')
    : []
  return {
    type,
    parent: typeof value.parent === 'string' ? value.parent : undefined,
    children,
    slug: typeof value.slug === 'string' ? value.slug : undefined,
    discovered_at: typeof value.discovered_at === 'string' ? value.discovered_at : 'initial',
    source: value.source === 'discovered' ? 'discovered' : 'fallback',
  }
}

export interface GenreCatalogOptions {
  path: string
  now?: () => Date
  logger?: ILogger
}

export class GenreCatalog {
  private readonly path: string
  private readonly now: () => Date
  private readonly logger: ILogger
  private readonly genres = new Map<string, GenreCatalogEntry>()
  private fallback: FallbackGenre[] = []
  private added = 0

  private constructor(options: GenreCatalogOptions) {
    this.path = options.path
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Load the catalog file, or seed a new catalog from the fallback list when
   * the file does not exist. A corrupt file is moved aside to `<path>.bak`
   * and the catalog is reseeded.
   */
  static async load(options: GenreCatalogOptions): Promise<GenreCatalog> {
    const catalog = new GenreCatalog(options)
    catalog.fallback = await loadFallbackGenres()

    let loaded = false
    let unreadable = false
    try {
      const parsed: unknown = JSON.parse(await readFile(options.path, 'utf-8'))
      if (isRecord(parsed) && isRecord(parsed.genres)) {
        for (const [name, value] of Object.entries(parsed.genres)) {
          const entry = parseEntry(value)
          if (entry) catalog.genres.set(name, entry)
        }
        loaded = true
      } else {
        unreadable = true
      }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        catalog.logger.warn('Genre catalog unreadable, reseeding', { path: options.path }, error)
        unreadable = true
      }
    }

    if (unreadable) {
      const backupPath = `${options.path}.bak`
      await rename(options.path, backupPath)
      catalog.logger.warn('Moved unreadable genre catalog aside', { path: options.path, backupPath })
    }

    if (!loaded) {
      for (const genre of catalog.fallback) {
        catalog.genres.set(genre.name, {
          type: 'parent',
          children: [],
          slug: genre.slug,
          discovered_at: 'initial',
          source: 'fallback',
        })
      }
      // a freshly seeded catalog is worth persisting
      catalog.added = catalog.genres.size
    }

    return catalog
  }

  get size(): number {
    return this.genres.size
  }

  get addedCount(): number {
    return this.added
  }

  has(name: string): boolean {
    return this.genres.has(name)
  }

  get(name: string): GenreCatalogEntry | undefined {
    return this.genres.get(name)
  }

  names(): string[] {
    return [...this.genres.keys()].sort((a, b) => a.localeCompare(b))
  }

  parentNames(): string[] {
    return this.names().filter(name => this.genres.get(name)?.type === 'parent')
  }

  /**
   * Static genre list as crawlable descriptors, for when the genre index is
   * unreachable. Fallback slugs carry no numeric id.
   */
  fallbackDescriptors(baseUrl: string): GenreDescriptor[] {
    return this.fallback.map(genre => ({
      name: genre.name,
      slug: genre.slug,
      url: new URL(`/genre/${genre.slug}/`, baseUrl).toString(),
    }))
  }

  /**
   * Record a genre found on the genre index. Returns true if it was new.
   */
  addDiscovered(genre: GenreDescriptor): boolean {
    const existing = this.genres.get(genre.name)
    if (existing) {
      if (!existing.slug) existing.slug = genre.slug
      return false
    }
    this.genres.set(genre.name, {
      type: 'parent',
      children: [],
      slug: genre.slug,
      discovered_at: this.now().toISOString(),
      source: 'discovered',
    })
    this.added++
    return true
  }

  /**
   * Record the genres of a scraped album as children of the genre it was
   * found under, when that genre is a known parent. Returns the new names.
   */
  addFromAlbum(album: Pick<AlbumRecord, 'genres'>, parentName?: string): string[] {
    const parent = parentName && this.genres.get(parentName)?.type === 'parent' ? parentName : undefined
    const added: string[] = []

    for (const name of album.genres) {
      if (this.genres.has(name)) continue
      this.genres.set(name, {
        type: 'child',
        parent,
        children: [],
        discovered_at: this.now().toISOString(),
        source: 'discovered',
      })
      if (parent) {
        this.genres.get(parent)?.children.push(name)
      }
      added.push(name)
      this.added++
    }

    return added
  }

  toJSON(): GenreCatalogFile {
    const genres: Record<string, GenreCatalogEntry> = {}
    for (const name of this.names()) {
      const entry = this.genres.get(name)
      if (entry) genres[name] = entry
    }
    return { version: 1, genres }
  }

  /**
   * Persist if anything was added since load. Returns whether a write happened.
   */
  async save(): Promise<boolean> {
    if (this.added === 0) {
      return false
    }
    await mkdir(dirname(this.path), { recursive: true })
    const tempPath = `${this.path}.tmp`
    await writeFile(tempPath, `${JSON.stringify(this.toJSON(), null, 2)}\n`, 'utf-8')
    await rename(tempPath, this.path)
    this.logger.info('Saved genre catalog', { path: this.path, genres: this.genres.size, added: this.added })
    this.added = 0
    return true
  }
}
