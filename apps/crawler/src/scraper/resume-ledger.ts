/**
 * Resume Ledger
 *
 * Album URLs already persisted by earlier runs. The crawler consults it
 * before fetching an album page and adds every URL it extracts. It is
 * in-memory only; the output files are the durable record.
 */

import type { ILogger } from '@cratedigger/logger'
import { silentLogger } from '@cratedigger/logger'
import { listOutputFiles, readRecords } from './catalog/output-files.js'
import { canonicalizeUrl } from './utils/url.js'

function normalize(url: string): string {
  try {
    return canonicalizeUrl(url)
  } catch {
    return url.trim()
  }
}

export class ResumeLedger {
  private readonly urls = new Set<string>()

  constructor(urls: Iterable<string> = []) {
    for (const url of urls) {
      this.add(url)
    }
  }

  has(url: string): boolean {
    return this.urls.has(normalize(url))
  }

  add(url: string): void {
    this.urls.add(normalize(url))
  }

  get size(): number {
    return this.urls.size
  }
}

export interface LoadResumeLedgerOptions {
  /** Read only this file instead of scanning the directory */
  resumeFile?: string
  /** Also read `albums_*.csv` (JSON only by default) */
  includeCsv?: boolean
  logger?: ILogger
}

/**
 * Build a ledger from the `url` field of persisted album files.
 * Files that cannot be read or parsed are logged and skipped.
 */
export async function loadResumeLedger(outputDir: string, options: LoadResumeLedgerOptions = {}): Promise<ResumeLedger> {
  const logger = options.logger ?? silentLogger
  const ledger = new ResumeLedger()

  let files: string[]
  if (options.resumeFile) {
    files = [options.resumeFile]
  } else {
    files = await listOutputFiles(outputDir, 'albums', 'json')
    if (options.includeCsv) {
      files = files.concat(await listOutputFiles(outputDir, 'albums', 'csv'))
    }
  }

  for (const file of files) {
    try {
      const records = await readRecords(file)
      let added = 0
      for (const record of records) {
        const url = record.url
        if (typeof url === 'string' && url.length > 0) {
          ledger.add(url)
          added++
        }
      }
      logger.debug('Loaded resume file', { file, urls: added })
    } catch (error) {
      logger.warn('Skipping unreadable resume file', { file }, error)
    }
  }

  logger.info('Resume ledger ready', { files: files.length, urls: ledger.size })
  return ledger
}
