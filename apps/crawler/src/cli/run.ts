import { setLogLevel } from '@cratedigger/logger'
import { ConfigError } from '../config/crawl-config.js'
import { runExportCommand } from './commands/export.js'
import { runListGenresCommand } from './commands/list-genres.js'
import { runScrapeCommand } from './commands/scrape.js'
import { DEFAULT_SEARCH_LIMIT, runSearchCommand } from './commands/search.js'
import { runStatsCommand } from './commands/stats.js'
import type { PageSourceFactory } from './page-source.js'
import { flagBool, flagInt, flagList, flagNumber, flagString, parseFlags } from './parse-flags.js'

export function printHelp(): void {
  console.log('cratedigger: album ratings crawler')
  console.log('')
  console.log('Commands:')
  console.log('  scrape [--genre <name>] [--start-year <year>] [--years-back 1] [--albums-per-year 250]')
  console.log('         [--output-dir <dir>] [--resume] [--resume-file <path>] [--test-mode] [--limit 10] [--render]')
  console.log('  list-genres [--refresh] [--render]')
  console.log('  search [--genres a,b] [--match-all] [--min-score <n>] [--max-score <n>] [--min-user-score <n>]')
  console.log('         [--min-reviews <n>] [--year <year>] [--query <text>] [--limit 20] [--show-all]')
  console.log('  stats')
  console.log('  export --output <path> [--format csv|json] [--genres a,b]')
  console.log('')
  console.log('Global flags: --output-dir <dir>, --verbose (-v), --help (-h)')
}

export interface RunCliDeps {
  signal?: AbortSignal
  env?: Record<string, string | undefined>
  /** Replaces the HTTP/browser fetch stack for commands that crawl */
  createPages?: PageSourceFactory
  now?: () => Date
}

/**
 * Dispatch one command line (without the node and script arguments) and
 * return the process exit code.
 */
export async function runCli(argv: string[], deps: RunCliDeps = {}): Promise<number> {
  const [command, ...rest] = argv
  if (!command || command === '--help' || command === '-h' || command === 'help') {
    printHelp()
    return 0
  }

  const flags = parseFlags(rest)
  if (flagBool(flags, 'help')) {
    printHelp()
    return 0
  }
  if (flagBool(flags, 'verbose')) {
    setLogLevel('debug')
  }

  const env = deps.env ?? process.env
  const crawlDeps = { env, signal: deps.signal, createPages: deps.createPages, now: deps.now }
  const outputDir = flagString(flags, 'output-dir')

  try {
    switch (command) {
      case 'scrape':
        return await runScrapeCommand(
          {
            genre: flagString(flags, 'genre'),
            startYear: flagInt(flags, 'start-year'),
            yearsBack: flagInt(flags, 'years-back', 1),
            albumsPerYear: flagInt(flags, 'albums-per-year', 1),
            outputDir,
            resume: flagBool(flags, 'resume'),
            resumeFile: flagString(flags, 'resume-file'),
            testMode: flagBool(flags, 'test-mode'),
            limit: flagInt(flags, 'limit', 1),
            render: flagBool(flags, 'render'),
          },
          crawlDeps
        )
      case 'list-genres':
        return await runListGenresCommand(
          { outputDir, refresh: flagBool(flags, 'refresh'), render: flagBool(flags, 'render') },
          crawlDeps
        )
      case 'search':
        return await runSearchCommand(
          {
            outputDir,
            genres: flagList(flags, 'genres'),
            matchAll: flagBool(flags, 'match-all'),
            minScore: flagNumber(flags, 'min-score'),
            maxScore: flagNumber(flags, 'max-score'),
            minUserScore: flagNumber(flags, 'min-user-score'),
            minReviews: flagInt(flags, 'min-reviews', 0),
            year: flagInt(flags, 'year'),
            query: flagString(flags, 'query'),
            limit: flagInt(flags, 'limit', 1) ?? DEFAULT_SEARCH_LIMIT,
            showAll: flagBool(flags, 'show-all'),
          },
          env
        )
      case 'stats':
        return await runStatsCommand({ outputDir }, env)
      case 'export':
        return await runExportCommand(
          {
            outputDir,
            output: flagString(flags, 'output') ?? '',
            format: flagString(flags, 'format') ?? 'csv',
            genres: flagList(flags, 'genres'),
          },
          env
        )
      default:
        console.error(`Unknown command: ${command}`)
        printHelp()
        return 2
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return error.exitCode
    }
    throw error
  }
}
