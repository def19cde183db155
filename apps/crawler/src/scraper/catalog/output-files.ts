/**
 * Readers for files written by the output sink.
 *
 * Records come back as loose string-keyed objects; callers coerce the
 * fields they need.
 */

import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { parse as parseCSV } from 'csv-parse/sync'
import type { OutputCategory } from '../types.js'

export type LooseRecord = Record<string, unknown>

export function isRecord(value: unknown): value is LooseRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * `{category}_*.json|csv` in the directory, sorted by name (which sorts by
 * run timestamp). A missing directory is an empty list.
 */
export async function listOutputFiles(
  outputDir: string,
  category: OutputCategory,
  extension: 'json' | 'csv'
): Promise<string[]> {
  let names: string[]
  try {
    names = await readdir(outputDir)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return []
    }
    throw error
  }

  const prefix = `${category}_`
  const suffix = `.${extension}`
  return names
    .filter(name => name.startsWith(prefix) && name.endsWith(suffix))
    .sort()
    .map(name => join(outputDir, name))
}

/**
 * A JSON file holding an array of records (a single object is accepted as a
 * one-element array).
 */
export async function readJsonRecords(path: string): Promise<LooseRecord[]> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'))
  if (Array.isArray(parsed)) {
    return parsed.filter(isRecord)
  }
  if (isRecord(parsed)) {
    return [parsed]
  }
  throw new Error(`Expected an array of records in ${path}`)
}

export async function readCsvRecords(path: string): Promise<LooseRecord[]> {
  const rows: unknown = parseCSV(await readFile(path, 'utf-8'), {
    columns: true,
    skip_empty_lines: true,
    bom: true,
  })
  return Array.isArray(rows) ? rows.filter(isRecord) : []
}

export async function readRecords(path: string): Promise<LooseRecord[]> {
  return path.toLowerCase().endsWith('.csv') ? readCsvRecords(path) : readJsonRecords(path)
}
