import type { DashboardConfig } from '../config/dashboard-config'
import { MinerClient } from '../miners/miner-client'
import { MinerPoller } from '../miners/miner-poller'
import type { MarketSnapshot, PriceProvider } from '../models'
import { classifyError, describeError } from '../network/errors'
import { FetchHttpClient, type HttpClient } from '../network/http-client'
import { MempoolClient } from '../network-stats/mempool-client'
import { NetworkStatsPoller } from '../network-stats/network-stats-poller'
import { RestFallbackManager } from '../pipeline/rest-fallback-manager'
import { RestPricePoller } from '../pipeline/rest-price-poller'
import { ScheduledTask } from '../pipeline/scheduled-task'
import { SymbolRotator } from '../pipeline/symbol-rotator'
import { wsSocketFactory, type SocketFactory } from '../providers/base/stream-socket'
import type { StreamingPriceClient, StreamingClientConfig } from '../providers/base/streaming-price-client'
import type { PriceRestClient } from '../providers/base/types'
import { BinanceRestClient } from '../providers/binance/binance-rest-client'
import { BinanceStreamClient } from '../providers/binance/binance-stream-client'
import { CoinGeckoRestClient } from '../providers/coingecko/coingecko-rest-client'
import { KrakenRestClient } from '../providers/kraken/kraken-rest-client'
import { KrakenStreamClient } from '../providers/kraken/kraken-stream-client'
import { MarketState } from '../state/market-state'
import { SymbolRegistry, isStreamingProvider } from '../symbols/symbol-registry'
import { NoopLogger, type Logger } from '../utils/logger'
import { RealTimeSource, type TimeSource } from '../utils/time-source'

/**
 * Collaborators the core talks to; each defaults to the real thing
 */
export interface DashboardDependencies {
  logger?: Logger
  timeSource?: TimeSource
  http?: HttpClient
  socketFactory?: SocketFactory
  random?: () => number
}

const seconds = (value: number): number => Math.round(value * 1000)

/**
 * The ingestion core: owns the shared market state and every worker that
 * feeds it, and hands out read-only snapshots.
 *
 * @example
 * const core = new DashboardCore(config, { logger })
 * core.start()
 * const snapshot = core.getMarketSnapshot()
 * await core.stop()
 */
export class DashboardCore {
  readonly registry: SymbolRegistry
  readonly state: MarketState

  private readonly logger: Logger
  private readonly streams: StreamingPriceClient[]
  private readonly restClients: ReadonlyMap<PriceProvider, PriceRestClient>
  private readonly binanceRest: BinanceRestClient
  private readonly fallback: RestFallbackManager
  private readonly coingecko: RestPricePoller
  private readonly miners: MinerPoller
  private readonly network: NetworkStatsPoller
  private readonly rotator: SymbolRotator
  private readonly marquee: ScheduledTask
  private readonly backfills = new Set<Promise<void>>()
  private backfillController = new AbortController()
  private started = false

  constructor(
    private readonly config: DashboardConfig,
    deps: DashboardDependencies = {}
  ) {
    this.logger = deps.logger ?? new NoopLogger()
    const timeSource = deps.timeSource ?? new RealTimeSource()
    const http = deps.http ?? new FetchHttpClient(seconds(config.rest_timeout))
    const socketFactory = deps.socketFactory ?? wsSocketFactory

    this.registry = new SymbolRegistry({
      mainSymbols: config.main_symbols,
      marqueeSymbols: config.marquee_symbols,
      krakenPairs: config.kraken_pairs,
      coingeckoIds: config.coingecko_ids,
      priceDecimals: config.price_decimals
    })

    this.state = new MarketState({
      registry: this.registry,
      candleSeconds: config.candle_seconds,
      maxCandles: config.max_candles,
      dataTimeoutMs: seconds(config.data_timeout),
      minerDataTimeoutMs: seconds(config.miner_data_timeout),
      healthFailureMultiplier: config.health_failure_multiplier,
      minerHosts: config.miners_ips,
      minerActiveThreshold: config.miner_active_threshold,
      minerHashrateFloorTh: config.miner_hashrate_floor,
      timeSource
    })

    // Prices
    const streamConfig = (provider: PriceProvider): StreamingClientConfig => ({
      routes: this.registry.byProvider(provider),
      backoff: {
        initialDelay: seconds(config.stream_backoff_initial),
        maxDelay: seconds(config.stream_backoff_max),
        multiplier: config.stream_backoff_multiplier,
        jitter: config.stream_backoff_jitter
      },
      connectTimeoutMs: seconds(config.stream_connect_timeout),
      heartbeatTimeoutMs: seconds(config.stream_heartbeat_timeout),
      pingIntervalMs: seconds(config.stream_ping_interval),
      logger: this.logger.child(`${provider}-stream`),
      ...(deps.random ? { random: deps.random } : {})
    })
    this.streams = [
      new BinanceStreamClient(streamConfig('binance'), this.state, socketFactory),
      new KrakenStreamClient(streamConfig('kraken'), this.state, socketFactory)
    ]

    const restTimeoutMs = seconds(config.rest_timeout)
    this.binanceRest = new BinanceRestClient(http, restTimeoutMs)
    const coingeckoRest = new CoinGeckoRestClient(http, restTimeoutMs, timeSource)
    this.restClients = new Map<PriceProvider, PriceRestClient>([
      ['binance', this.binanceRest],
      ['kraken', new KrakenRestClient(http, restTimeoutMs, timeSource)],
      ['coingecko', coingeckoRest]
    ])

    this.fallback = new RestFallbackManager(
      {
        routes: this.registry.tracked().filter(route => isStreamingProvider(route.provider)),
        checkIntervalMs: seconds(config.staleness_check_interval),
        fallbackIntervalMs: seconds(config.rest_fallback_interval),
        logger: this.logger.child('rest-fallback')
      },
      this.state,
      this.restClients,
      provider => this.streams.some(stream => stream.provider === provider && stream.isConnected())
    )

    this.coingecko = new RestPricePoller(
      {
        routes: this.registry.byProvider('coingecko'),
        intervalMs: seconds(config.coingecko_poll_interval),
        logger: this.logger.child('coingecko'),
        ...(deps.random ? { random: deps.random } : {})
      },
      this.state,
      coingeckoRest
    )

    // Miners and network
    this.miners = new MinerPoller(
      {
        hosts: config.miners_ips,
        pollIntervalMs: seconds(config.miner_poll_interval),
        logger: this.logger.child('miners')
      },
      this.state,
      new MinerClient(http, seconds(config.miner_timeout))
    )

    this.network = new NetworkStatsPoller(
      { pollIntervalMs: seconds(config.network_poll_interval), logger: this.logger.child('network') },
      this.state,
      new MempoolClient(http, seconds(config.network_timeout))
    )

    // Rotation and display batches
    this.rotator = new SymbolRotator(
      {
        symbols: this.registry.mainSymbols,
        intervalMs: seconds(config.symbol_rotation_interval),
        logger: this.logger.child('rotator')
      },
      this.state
    )
    this.rotator.on('rotate', ({ next }) => this.scheduleBackfill(next))

    this.marquee = new ScheduledTask(
      {
        name: 'marquee refresh',
        intervalMs: seconds(config.marquee_refresh_interval),
        logger: this.logger.child('marquee')
      },
      async () => {
        this.state.refreshMarquee()
      }
    )
  }

  get running(): boolean {
    return this.started
  }

  /**
   * Start every worker. Returns immediately; data arrives asynchronously.
   */
  start(): void {
    if (this.started) return
    this.started = true

    this.logger.info('Starting dashboard core', {
      mainSymbols: this.registry.mainSymbols,
      tracked: this.registry.tracked().length,
      miners: this.config.miners_ips.length
    })

    this.state.markStarted()
    this.backfillController = new AbortController()
    for (const stream of this.streams) {
      stream.start()
    }
    this.fallback.start()
    this.coingecko.start()
    this.miners.start()
    this.network.start()
    this.rotator.start()
    this.marquee.start()
    this.scheduleBackfill(this.state.getActiveSymbol())
  }

  /**
   * Cancel every worker and wait for them to settle. The last state stays
   * readable through getMarketSnapshot().
   */
  async stop(): Promise<void> {
    if (!this.started) return
    this.started = false

    this.logger.info('Stopping dashboard core')
    this.backfillController.abort()
    await Promise.all([
      this.rotator.stop(),
      this.marquee.stop(),
      this.fallback.stop(),
      this.coingecko.stop(),
      this.miners.stop(),
      this.network.stop(),
      ...this.streams.map(stream => stream.stop())
    ])
    await Promise.all(this.backfills)
    this.state.markStopped()
    this.logger.info('Dashboard core stopped')
  }

  /**
   * Immutable copy of the current picture; cheap enough to call every frame
   */
  getMarketSnapshot(): MarketSnapshot {
    return this.state.snapshot()
  }

  /**
   * Main symbol currently charted
   */
  getActiveSymbol(): string {
    return this.state.getActiveSymbol()
  }

  /**
   * Seed the candle sequence of a Binance-routed symbol from recent klines
   * @returns number of candles added
   */
  async backfillCandles(symbol: string, signal?: AbortSignal): Promise<number> {
    const route = this.registry.route(symbol)
    if (!this.config.candle_backfill || route?.provider !== 'binance') {
      return 0
    }
    if (!BinanceRestClient.klineInterval(this.config.candle_seconds)) {
      this.logger.debug('No kline interval for candle length, backfill skipped', {
        candleSeconds: this.config.candle_seconds
      })
      return 0
    }

    try {
      const candles = await this.binanceRest.fetchCandles(
        route,
        this.config.candle_seconds,
        this.config.max_candles,
        signal
      )
      const added = this.state.seedCandles(route.symbol, candles)
      this.logger.debug('Candles backfilled', { symbol: route.symbol, received: candles.length, added })
      return added
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug('Candle backfill cancelled', { symbol: route.symbol })
        return 0
      }
      this.logger.warn('Candle backfill failed', {
        symbol: route.symbol,
        error: describeError(error),
        class: classifyError(error)
      })
      return 0
    }
  }

  private scheduleBackfill(symbol: string): void {
    const pending = this.backfillCandles(symbol, this.backfillController.signal).then(() => {
      this.backfills.delete(pending)
    })
    this.backfills.add(pending)
  }
}
