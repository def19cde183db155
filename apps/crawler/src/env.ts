/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/crawler/.env.local outside production; in production the
 * environment is expected to be set by whatever runs the crawler.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = fileURLToPath(new URL('../.env.local', import.meta.url))
  config({ path: envPath })
}
