import { HttpError, classifyError, describeError } from '../network/errors'
import type { PriceRestClient } from '../providers/base/types'
import type { MarketState } from '../state/market-state'
import type { SymbolRoute } from '../symbols/symbol-registry'
import { NoopLogger, type Logger } from '../utils/logger'
import { ScheduledTask } from './scheduled-task'

export interface RestPricePollerConfig {
  /** Routes of the polled provider */
  routes: readonly SymbolRoute[]
  intervalMs: number
  /** Base delay after an HTTP 429 */
  rateLimitDelayMs?: number
  /** Upper bound of the random delay added after an HTTP 429 */
  rateLimitJitterMs?: number
  /** Delay after any other failure */
  retryDelayMs?: number
  logger?: Logger
  random?: () => number
}

/**
 * Batch polling for a provider without a stream (CoinGecko)
 */
export class RestPricePoller {
  private readonly config: Required<Omit<RestPricePollerConfig, 'logger' | 'random'>>
  private readonly logger: Logger
  private readonly random: () => number
  private readonly task: ScheduledTask

  constructor(
    config: RestPricePollerConfig,
    private readonly state: MarketState,
    private readonly client: PriceRestClient
  ) {
    this.config = {
      routes: config.routes,
      intervalMs: config.intervalMs,
      rateLimitDelayMs: config.rateLimitDelayMs ?? 180000,
      rateLimitJitterMs: config.rateLimitJitterMs ?? 30000,
      retryDelayMs: config.retryDelayMs ?? 60000
    }
    this.logger = config.logger ?? new NoopLogger()
    this.random = config.random ?? Math.random
    this.task = new ScheduledTask(
      { name: `${client.provider} poller`, intervalMs: config.intervalMs, logger: this.logger },
      signal => this.poll(signal)
    )
  }

  start(): void {
    if (this.config.routes.length === 0) return
    this.task.start()
  }

  stop(): Promise<void> {
    return this.task.stop()
  }

  /**
   * One batch request
   * @returns delay before the next poll
   */
  async poll(signal?: AbortSignal): Promise<number> {
    try {
      const quotes = await this.client.fetchQuotes(this.config.routes, signal)
      let applied = 0
      for (const quote of quotes) {
        if (this.state.applyQuote(quote) === 'applied') applied++
      }
      this.logger.debug('Polled prices', { provider: this.client.provider, received: quotes.length, applied })
      return this.config.intervalMs
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug('Price poll cancelled', { provider: this.client.provider })
        return this.config.intervalMs
      }
      if (error instanceof HttpError && error.status === 429) {
        const delayMs = Math.round(this.config.rateLimitDelayMs + this.random() * this.config.rateLimitJitterMs)
        this.logger.warn('Rate limited, deferring next poll', { provider: this.client.provider, delayMs })
        return delayMs
      }

      this.logger.warn('Price poll failed', {
        provider: this.client.provider,
        error: describeError(error),
        class: classifyError(error)
      })
      return this.config.retryDelayMs
    }
  }
}
