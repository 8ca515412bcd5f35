import { Command, InvalidArgumentError } from 'commander'

export const VERSION = '0.1.0'

/**
 * Parsed command-line arguments
 */
export interface CliArgs {
  /** Path to the configuration file */
  config: string

  /** Seconds between two status lines */
  interval: number

  /** Print a single status line, then stop */
  once: boolean

  /** Verbosity level for logging */
  verbose: number

  /** Directory for log files, overrides the configuration */
  logDir?: string
}

/**
 * Default CLI arguments
 */
export const DEFAULT_ARGS = {
  config: 'config.json',
  interval: 5,
  once: false,
  verbose: 0
} as const

function parsePositiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.')
  }
  return parsed
}

interface ParsedOptions {
  config: string
  interval: number
  once?: boolean
  verbose: number
  logDir?: string
}

/**
 * Parse command-line arguments using commander.
 * Invalid input, --help and --version throw a CommanderError carrying the exit code.
 */
export function parseArgs(argv: string[]): CliArgs {
  const program = new Command()

  program
    .name('hashboard')
    .description('Live crypto prices, miner telemetry and Bitcoin network stats for a dashboard')
    .version(VERSION)
    .usage('[options]')
    .exitOverride()

  program
    .option(
      '-c, --config <file>',
      'path to the dashboard configuration file',
      DEFAULT_ARGS.config
    )
    .option(
      '-i, --interval <seconds>',
      'seconds between status lines',
      parsePositiveNumber,
      DEFAULT_ARGS.interval
    )
    .option(
      '--once',
      'print one status line after the first interval, then exit'
    )
    .option(
      '-v, --verbose',
      'increase verbosity (-v for debug logging)',
      (_: string, previous: number) => previous + 1,
      DEFAULT_ARGS.verbose
    )
    .option(
      '--log-dir <dir>',
      'write combined.log and error.log to this directory'
    )

  program.addHelpText('after', `

Examples:
  $ hashboard                          # Use ./config.json
  $ hashboard -c ~/dashboard.json      # Use another config file
  $ hashboard -i 1 -v                  # Status every second with debug logging
  $ hashboard --once -i 15             # Print one status line after 15s and exit
`)

  program.parse(argv)
  const options = program.opts<ParsedOptions>()

  return {
    config: options.config,
    interval: options.interval,
    once: options.once ?? DEFAULT_ARGS.once,
    verbose: options.verbose,
    ...(options.logDir !== undefined ? { logDir: options.logDir } : {})
  }
}
