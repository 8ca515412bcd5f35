import { z } from 'zod'
import type { Logger } from '../utils/logger'

const symbolSchema = z.string().regex(/^[A-Za-z0-9]{2,24}$/)

// IPv4 or host name, optional port
const hostSchema = z.string().regex(/^[A-Za-z0-9](?:[A-Za-z0-9.-]{0,252})(?::\d{1,5})?$/)

const seconds = z.number().positive()

/**
 * Schema of the dashboard configuration file.
 * Keys keep the snake_case spelling of config.json; anything else in the
 * file (display geometry, fonts, colours) belongs to the renderer and is
 * stripped here.
 */
export const dashboardConfigSchema = z.object({
  main_symbols: z.array(symbolSchema).min(1).default(['BTCUSDT']),
  marquee_symbols: z.array(symbolSchema).default([
    'ETHUSDT', 'BNBUSDT', 'XMRUSDT', 'SOLUSDT', 'LTCUSDT',
    'XRPUSDT', 'ADAUSDT', 'TRXUSDT', 'MEUSDT', 'HBARUSDT', 'ESXUSD',
    'XECUSDT', 'RUNECOIN'
  ]),
  marquee_refresh_interval: seconds.default(8),

  candle_seconds: z.number().int().positive().default(60),
  max_candles: z.number().int().min(1).max(1000).default(14),
  candle_backfill: z.boolean().default(true),

  price_decimals: z.record(z.string(), z.number().int().min(0).max(12)).default({
    xecusdt: 8,
    xecusdc: 8,
    esxusd: 6,
    runecoin: 8
  }),
  kraken_pairs: z.record(z.string(), z.string().regex(/^[A-Z0-9]+\/[A-Z0-9]+$/)).default({
    xmrusdt: 'XMR/USDT',
    esxusd: 'ESX/USD'
  }),
  coingecko_ids: z.record(z.string(), z.string().min(1)).default({
    runecoin: 'runecoin'
  }),

  miners_ips: z.array(hostSchema).default([]),
  miner_active_threshold: z.number().min(0).max(1).default(0.25),
  miner_hashrate_floor: z.number().min(0).default(0),
  miner_poll_interval: seconds.default(15),
  miner_timeout: seconds.default(4),
  miner_data_timeout: seconds.default(60),

  data_timeout: seconds.default(300),
  health_failure_multiplier: z.number().min(1).default(3),

  symbol_rotation_interval: seconds.default(21),

  network_poll_interval: seconds.default(25),
  network_timeout: seconds.default(15),

  rest_timeout: seconds.default(10),
  rest_fallback_interval: seconds.default(30),
  staleness_check_interval: seconds.default(5),
  coingecko_poll_interval: seconds.default(300),

  stream_backoff_initial: seconds.default(1),
  stream_backoff_max: seconds.default(120),
  stream_backoff_multiplier: z.number().min(1).default(1.8),
  stream_backoff_jitter: z.number().min(0).max(1).default(0.2),
  stream_connect_timeout: seconds.default(10),
  stream_heartbeat_timeout: seconds.default(60),
  stream_ping_interval: seconds.default(25),

  log_level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  log_dir: z.string().min(1).optional()
})

export type DashboardConfig = z.infer<typeof dashboardConfigSchema>

/**
 * List options whose invalid entries are removed one by one
 */
const LIST_OPTIONS = {
  main_symbols: symbolSchema,
  marquee_symbols: symbolSchema,
  miners_ips: hostSchema
} as const

/**
 * Configuration with every option at its default
 */
export function defaultDashboardConfig(): DashboardConfig {
  return dashboardConfigSchema.parse({})
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate a raw configuration object.
 *
 * Never throws: an invalid option is replaced by its default and an invalid
 * entry in a list option is dropped, each with a warning, so a bad setting
 * disables or defaults one feature instead of stopping the dashboard.
 */
export function parseDashboardConfig(raw: unknown, logger: Logger): DashboardConfig {
  if (!isPlainObject(raw)) {
    logger.warn('Configuration is not an object, using defaults')
    return defaultDashboardConfig()
  }

  const candidate: Record<string, unknown> = { ...raw }

  for (const [key, entrySchema] of Object.entries(LIST_OPTIONS)) {
    const value = candidate[key]
    if (!Array.isArray(value)) continue

    const kept = value.filter(entry => entrySchema.safeParse(entry).success)
    const dropped = value.filter(entry => !entrySchema.safeParse(entry).success)
    if (dropped.length > 0) {
      logger.warn('Ignoring invalid configuration entries', { option: key, entries: dropped })
    }
    candidate[key] = kept
  }

  // Each pass removes at least one offending option, so this terminates
  for (;;) {
    const result = dashboardConfigSchema.safeParse(candidate)
    if (result.success) {
      return result.data
    }

    const offending = new Set<string>()
    for (const issue of result.error.issues) {
      const key = issue.path[0]
      if (typeof key === 'string' && key in candidate) {
        offending.add(key)
      }
    }

    if (offending.size === 0) {
      logger.warn('Configuration could not be validated, using defaults', {
        issues: result.error.issues.map(issue => issue.message)
      })
      return defaultDashboardConfig()
    }

    for (const key of offending) {
      logger.warn('Invalid configuration option, using default', { option: key, value: candidate[key] })
      delete candidate[key]
    }
  }
}
