import { resolve } from 'node:path'
import { ConfigError, loadCrawlerConfig } from '../../config/crawl-config.js'
import { loggers } from '../../config/logger.js'
import { exportAlbums, filterAlbums, isExportFormat, loadAlbums } from '../../scraper/catalog/album-store.js'

export interface ExportCommandArgs {
  outputDir?: string
  /** Destination file */
  output: string
  format: string
  genres?: string[]
}

export async function runExportCommand(
  args: ExportCommandArgs,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  if (!args.output) {
    throw new ConfigError('Missing --output <path>')
  }
  const format = args.format.toLowerCase()
  if (!isExportFormat(format)) {
    throw new ConfigError(`--format must be csv or json, got "${args.format}"`)
  }

  const config = loadCrawlerConfig(env, { outputDir: args.outputDir })
  const albums = await loadAlbums(config.outputDir, { logger: loggers.cli })
  const selected = filterAlbums(albums, { genres: args.genres })

  const destination = resolve(args.output)
  await exportAlbums(selected, format, destination)
  loggers.cli.info('Exported albums', { format, albums: selected.length, path: destination })
  console.log(`Exported ${selected.length} albums to ${destination}`)
  return 0
}
