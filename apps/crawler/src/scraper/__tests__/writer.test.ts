import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { formatRunTimestamp, OutputSink, toCsv, toJson } from '../process/writer.js'
import { albumUrl, makeAlbum, makeTempDir, removeTempDir } from './helpers.js'

const NOW = new Date('2025-03-14T12:00:00.000Z')

describe('formatRunTimestamp', () => {
  it('formats UTC with zero padding', () => {
    expect(formatRunTimestamp(NOW)).toBe('20250314_120000')
    expect(formatRunTimestamp(new Date('2024-01-02T03:04:05.000Z'))).toBe('20240102_030405')
  })
})

describe('toCsv', () => {
  it('writes a sorted union header with lists as JSON text', () => {
    const csv = toCsv([
      { b: 1, a: ['x', 'y'] },
      { a: null, c: 'z' },
    ])

    expect(csv).toBe('a,b,c\n"[""x"",""y""]",1,\n,,z\n')
  })
})

describe('toJson', () => {
  it('writes an indented array with a trailing newline', () => {
    expect(toJson([{ a: 1 }])).toBe('[\n  {\n    "a": 1\n  }\n]\n')
  })
})

describe('OutputSink', () => {
  let outputDir: string

  beforeEach(async () => {
    outputDir = await makeTempDir()
  })

  afterEach(async () => {
    await removeTempDir(outputDir)
  })

  it('writes timestamped JSON and CSV files per category', async () => {
    const sink = new OutputSink({ outputDir, now: () => NOW })
    sink.add(makeAlbum())
    sink.addGenre({ name: 'Rock', slug: '7-rock', url: 'https://www.albumoftheyear.org/genre/7-rock/' })

    const report = await sink.flush()

    expect((await readdir(outputDir)).sort()).toEqual([
      'albums_20250314_120000.csv',
      'albums_20250314_120000.json',
      'genres_20250314_120000.csv',
      'genres_20250314_120000.json',
    ])
    expect(report).toMatchObject({
      timestamp: '20250314_120000',
      albumsReceived: 1,
      albumsWritten: 1,
      filesWritten: 4,
      filesFailed: 0,
      success: true,
    })

    const genresCsv = await readFile(join(outputDir, 'genres_20250314_120000.csv'), 'utf-8')
    expect(genresCsv).toBe(
      'discovered_at,name,slug,url\n2025-03-14T12:00:00.000Z,Rock,7-rock,https://www.albumoftheyear.org/genre/7-rock/\n'
    )
  })

  it('does not overwrite files from an earlier flush in the same second', async () => {
    const first = new OutputSink({ outputDir, now: () => NOW })
    first.add(makeAlbum({ aoty_id: '1-a', url: albumUrl('1-a'), title: 'Earlier' }))
    await first.flush()

    const second = new OutputSink({ outputDir, now: () => NOW })
    second.add(makeAlbum({ aoty_id: '2-b', url: albumUrl('2-b'), title: 'Later' }))
    const report = await second.flush()

    expect((await readdir(outputDir)).sort()).toEqual([
      'albums_20250314_120000.csv',
      'albums_20250314_120000.json',
      'albums_20250314_120000_1.csv',
      'albums_20250314_120000_1.json',
    ])
    expect(report.filesWritten).toBe(2)
    const earlier = JSON.parse(await readFile(join(outputDir, 'albums_20250314_120000.json'), 'utf-8'))
    const later = JSON.parse(await readFile(join(outputDir, 'albums_20250314_120000_1.json'), 'utf-8'))
    expect(earlier[0].title).toBe('Earlier')
    expect(later[0].title).toBe('Later')
  })

  it('keeps the last record per id in the position of the first', async () => {
    const sink = new OutputSink({ outputDir, now: () => NOW })
    sink.add(makeAlbum({ aoty_id: '1-a', url: albumUrl('1-a'), title: 'Old' }))
    sink.add(makeAlbum({ aoty_id: '2-b', url: albumUrl('2-b') }))
    sink.add(makeAlbum({ aoty_id: '1-a', url: albumUrl('1-a'), title: 'New' }))

    const report = await sink.flush()
    const written = JSON.parse(await readFile(join(outputDir, 'albums_20250314_120000.json'), 'utf-8'))

    expect(report.duplicatesRemoved).toBe(1)
    expect(written.map((record: { aoty_id: string; title: string }) => `${record.aoty_id}:${record.title}`)).toEqual([
      '1-a:New',
      '2-b:First Light',
    ])
  })

  it('drops invalid records and counts why', async () => {
    const sink = new OutputSink({ outputDir, now: () => NOW })
    sink.add(makeAlbum({ aoty_id: '1-a' }))
    sink.add(makeAlbum({ aoty_id: '2-b', artist_name: 'Submit Correction' }))
    sink.add(makeAlbum({ aoty_id: '3-c', genres: [] }))

    const report = await sink.flush()

    expect(report.albumsWritten).toBe(1)
    expect(report.albumsDropped).toBe(2)
    expect(report.dropReasons).toEqual({ PLACEHOLDER_ARTIST: 1, NO_GENRES: 1 })
  })

  it('writes nothing for an empty run and still succeeds', async () => {
    const sink = new OutputSink({ outputDir: join(outputDir, 'never-created'), now: () => NOW })

    const report = await sink.flush()

    expect(report.categories).toEqual([])
    expect(report.success).toBe(true)
    expect(await readdir(outputDir)).toEqual([])
  })

  it('reports write failures instead of throwing', async () => {
    const sink = new OutputSink({ outputDir: join(outputDir, 'missing', '\u0000bad'), now: () => NOW })
    sink.add(makeAlbum())

    const report = await sink.flush()

    expect(report.albumsWritten).toBe(0)
    expect(report.filesFailed).toBe(2)
    expect(report.success).toBe(false)
  })

  it('clears its buffers on flush', async () => {
    const sink = new OutputSink({ outputDir, now: () => NOW })
    sink.add(makeAlbum())
    sink.addGenre({ name: 'Rock', slug: '7-rock', url: 'https://www.albumoftheyear.org/genre/7-rock/' })

    await sink.flush()

    expect(sink.pendingAlbums).toBe(0)
    expect(sink.pendingGenres).toBe(0)
  })
})
