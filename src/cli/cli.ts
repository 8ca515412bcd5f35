#!/usr/bin/env node

import { CommanderError } from 'commander'
import { loadDashboardConfig } from '../config/config-loader'
import { DashboardCore } from '../core/dashboard-core'
import { createLogger } from '../utils/logger'
import { sleep } from '../utils/sleep'
import { parseArgs, type CliArgs } from './args-parser'
import { formatStatusLine } from './status-line'

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  let args: CliArgs
  try {
    args = parseArgs(process.argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode)
    }
    throw error
  }

  const verboseLevel = args.verbose > 0 ? 'debug' : undefined

  // Load configuration
  const config = await loadDashboardConfig(args.config, createLogger({ level: verboseLevel }))

  const logDir = args.logDir ?? config.log_dir
  const logger = createLogger({
    level: verboseLevel ?? config.log_level,
    ...(logDir !== undefined ? { logDir } : {})
  })

  const core = new DashboardCore(config, { logger })
  const intervalMs = args.interval * 1000
  const printStatus = (): void => {
    console.log(formatStatusLine(core.getMarketSnapshot()))
  }

  core.start()

  if (args.once) {
    await sleep(intervalMs)
    printStatus()
    await core.stop()
    return
  }

  const printer = setInterval(printStatus, intervalMs)

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`)
    clearInterval(printer)
    try {
      await core.stop()
      process.exit(0)
    } catch (error) {
      console.error('Error during shutdown:', error)
      process.exit(1)
    }
  }

  process.once('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

// Export the main function for testing
export { main }

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
