import type { PriceProvider } from '../models'
import { classifyError, describeError } from '../network/errors'
import type { PriceRestClient } from '../providers/base/types'
import type { MarketState } from '../state/market-state'
import type { SymbolRoute } from '../symbols/symbol-registry'
import type { EpochDate } from '../utils/dates'
import { NoopLogger, type Logger } from '../utils/logger'
import { ScheduledTask } from './scheduled-task'

export interface RestFallbackConfig {
  /** Routes served by streaming providers */
  routes: readonly SymbolRoute[]
  /** Cadence of the staleness watchdog */
  checkIntervalMs: number
  /** Cadence of REST requests for one symbol while it is on fallback */
  fallbackIntervalMs: number
  logger?: Logger
}

/**
 * Tells whether a provider's stream is currently fully subscribed
 */
export type StreamStatusProbe = (provider: PriceProvider) => boolean

/**
 * Watches stream freshness per symbol and runs a REST polling task for
 * each symbol whose stream is down or silent. A symbol leaves fallback as
 * soon as its stream delivers again.
 */
export class RestFallbackManager {
  private readonly logger: Logger
  private readonly watchdog: ScheduledTask
  private readonly tasks = new Map<string, ScheduledTask>()

  constructor(
    private readonly config: RestFallbackConfig,
    private readonly state: MarketState,
    private readonly clients: ReadonlyMap<PriceProvider, PriceRestClient>,
    private readonly isStreamConnected: StreamStatusProbe
  ) {
    this.logger = config.logger ?? new NoopLogger()
    this.watchdog = new ScheduledTask(
      { name: 'staleness watchdog', intervalMs: config.checkIntervalMs, logger: this.logger },
      signal => this.check(signal)
    )
  }

  start(): void {
    this.watchdog.start()
  }

  /**
   * Stop the watchdog and every fallback task, cancelling requests in flight
   */
  async stop(): Promise<void> {
    const tasks = Array.from(this.tasks.values())
    this.tasks.clear()
    await Promise.all([this.watchdog.stop(), ...tasks.map(task => task.stop())])
    this.state.setFallbackSymbols([])
  }

  /**
   * Symbols currently fetched over REST
   */
  activeFallbacks(): string[] {
    return Array.from(this.tasks.keys())
  }

  /**
   * Whether a symbol needs REST right now: its provider's stream is down,
   * the stream went silent for it, or its quote is older than the data timeout
   */
  needsFallback(route: SymbolRoute, now: EpochDate): boolean {
    return !this.isStreamConnected(route.provider) ||
      this.state.isStreamStale(route.symbol, now) ||
      this.state.isQuoteStale(route.symbol, now)
  }

  /**
   * One watchdog pass: start fallback for newly stale symbols, stop it for
   * recovered ones. Resolves after the first fetch of every newly started
   * fallback.
   */
  async check(signal?: AbortSignal): Promise<void> {
    const now = this.state.now()
    const firstFetches: Promise<void>[] = []

    for (const route of this.config.routes) {
      if (signal?.aborted) break

      const needed = this.needsFallback(route, now)
      const task = this.tasks.get(route.symbol)

      if (needed && !task) {
        firstFetches.push(this.activate(route))
      } else if (!needed && task) {
        this.tasks.delete(route.symbol)
        this.logger.info('Stream recovered, REST fallback stopped', { symbol: route.symbol })
        await task.stop()
      }
    }

    this.state.setFallbackSymbols(this.activeFallbacks())
    await Promise.all(firstFetches)
  }

  /**
   * Single bounded REST request for one symbol. Failures are logged and
   * left to the next scheduled attempt.
   */
  async fetchOnce(route: SymbolRoute, signal?: AbortSignal): Promise<void> {
    const client = this.clients.get(route.provider)
    if (!client) {
      this.logger.warn('No REST client for provider', { provider: route.provider, symbol: route.symbol })
      return
    }

    try {
      const quotes = await client.fetchQuotes([route], signal)
      if (quotes.length === 0) {
        this.logger.warn('REST response did not list symbol', { symbol: route.symbol, provider: route.provider })
      }
      for (const quote of quotes) {
        const result = this.state.applyQuote(quote)
        this.logger.debug('REST fallback quote', { symbol: quote.symbol, price: quote.price, result })
      }
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug('REST fallback request cancelled', { symbol: route.symbol })
        return
      }
      this.logger.warn('REST fallback failed', {
        symbol: route.symbol,
        provider: route.provider,
        error: describeError(error),
        class: classifyError(error)
      })
    }
  }

  private activate(route: SymbolRoute): Promise<void> {
    const task = new ScheduledTask(
      {
        name: `rest fallback ${route.symbol}`,
        intervalMs: this.config.fallbackIntervalMs,
        initialDelayMs: this.config.fallbackIntervalMs,
        logger: this.logger
      },
      signal => this.fetchOnce(route, signal)
    )
    this.tasks.set(route.symbol, task)
    this.logger.info('Stream unavailable or stale, REST fallback started', {
      symbol: route.symbol,
      provider: route.provider,
      streamConnected: this.isStreamConnected(route.provider)
    })

    task.start()
    return task.runNow()
  }
}
