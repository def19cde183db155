#!/usr/bin/env node
import '../env.js'
import { loggers } from '../config/logger.js'
import { runCli } from './run.js'

const controller = new AbortController()

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    // second Ctrl-C: stop waiting for the flush
    process.exit(130)
  }
  loggers.cli.warn('Interrupted, finishing the current task and writing output')
  controller.abort()
})

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2), { signal: controller.signal })
  process.exit(controller.signal.aborted ? 130 : exitCode)
}

main().catch(error => {
  loggers.cli.error('Unhandled failure', {}, error)
  process.exit(1)
})
