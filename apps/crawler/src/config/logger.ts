/**
 * Component loggers for the crawler.
 */

import { createLogger } from '@cratedigger/logger'

export const rootLogger = createLogger('crawler')

export const loggers = {
  crawler: rootLogger.child('traversal'),
  fetcher: rootLogger.child('fetch'),
  extractor: rootLogger.child('extract'),
  sink: rootLogger.child('sink'),
  cli: rootLogger.child('cli'),
}
