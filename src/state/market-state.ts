import { CandleBuilder } from '../candles/candle-builder'
import type {
  Candle,
  FeedStats,
  MarketSnapshot,
  MarqueeEntry,
  MinerAggregate,
  MinerReading,
  NetworkStats,
  PriceProvider,
  PriceQuote,
  QuoteView
} from '../models'
import { isValidQuote } from '../models'
import { aggregateMiners } from '../miners/miner-aggregator'
import { initialReading, recordFailure, recordSuccess, type MinerSample } from '../miners/miner-state'
import { evaluateHealth, type SubsystemInput } from '../pipeline/health-monitor'
import { canonicalSymbol, type SymbolRegistry } from '../symbols/symbol-registry'
import { elapsedMs, type EpochDate } from '../utils/dates'
import { deepFreeze } from '../utils/freeze'
import { RealTimeSource, type TimeSource } from '../utils/time-source'
import { buildMarquee, sameMarquee } from './marquee'

/**
 * Configuration for the shared market state
 */
export interface MarketStateConfig {
  registry: SymbolRegistry
  candleSeconds: number
  maxCandles: number
  /** Age after which a quote (and the network record) is stale */
  dataTimeoutMs: number
  /** Age after which the miner set is stale */
  minerDataTimeoutMs: number
  healthFailureMultiplier: number
  minerHosts: readonly string[]
  minerActiveThreshold: number
  minerHashrateFloorTh: number
  timeSource?: TimeSource
}

/**
 * Result of offering a quote to the state
 */
export type QuoteApplyResult = 'applied' | 'outdated' | 'invalid' | 'untracked'

interface StaticView {
  readonly version: number
  readonly candles: readonly Candle[]
  readonly marquee: readonly MarqueeEntry[]
  readonly feeds: readonly FeedStats[]
  readonly fallbackSymbols: readonly string[]
  readonly network?: NetworkStats
}

/**
 * Single source of truth for everything the dashboard shows.
 *
 * Every mutation is a synchronous method, so on the event loop it is applied
 * whole before any reader runs; readers get deeply frozen copies. Producers
 * never hold references into the state.
 */
export class MarketState {
  private readonly config: Required<MarketStateConfig>
  private readonly candleBuilder: CandleBuilder
  private readonly quotes = new Map<string, PriceQuote>()
  private readonly lastStreamUpdates = new Map<string, EpochDate>()
  private readonly miners = new Map<string, MinerReading>()
  private readonly hashrateHistory: number[] = []
  private readonly feeds = new Map<PriceProvider, FeedStats>()
  private network?: NetworkStats
  private marquee: readonly MarqueeEntry[] = []
  private fallbackSymbols: readonly string[] = []
  private activeSymbol: string
  private lastPriceSuccess?: EpochDate
  private lastNetworkSuccess?: EpochDate
  private startedAt: EpochDate
  private running = false
  private version = 0
  private cachedView?: StaticView

  constructor(config: MarketStateConfig) {
    this.config = {
      ...config,
      timeSource: config.timeSource ?? new RealTimeSource()
    }
    this.candleBuilder = new CandleBuilder({
      candleSeconds: config.candleSeconds,
      maxCandles: config.maxCandles
    })

    const first = config.registry.mainSymbols[0]
    if (first === undefined) {
      throw new Error('At least one main symbol is required')
    }
    this.activeSymbol = first

    for (const host of config.minerHosts) {
      this.miners.set(host, initialReading(host))
    }

    this.startedAt = this.config.timeSource.nowEpoch()
  }

  get registry(): SymbolRegistry {
    return this.config.registry
  }

  now(): EpochDate {
    return this.config.timeSource.nowEpoch()
  }

  /**
   * Mark the state as fed by running workers; health ages of subsystems
   * that never succeeded count from here
   */
  markStarted(): void {
    this.startedAt = this.now()
    this.running = true
    this.touch()
  }

  markStopped(): void {
    this.running = false
    this.touch()
  }

  // --- prices -------------------------------------------------------------

  /**
   * Compare-and-swap a quote into the state: applied only when strictly
   * newer than the stored quote of the same symbol, whatever its source.
   * Applied quotes of the active symbol are folded into the candles.
   */
  applyQuote(quote: PriceQuote): QuoteApplyResult {
    const symbol = canonicalSymbol(quote.symbol)
    if (!this.config.registry.route(symbol)) {
      return 'untracked'
    }
    if (!isValidQuote(quote)) {
      return 'invalid'
    }

    const now = this.now()
    if (quote.source === 'stream') {
      // Any stream delivery proves the stream alive, even if outdated
      this.lastStreamUpdates.set(symbol, now)
    }

    const current = this.quotes.get(symbol)
    if (current && quote.observedAt <= current.observedAt) {
      return 'outdated'
    }

    this.quotes.set(symbol, { ...quote, symbol })
    this.lastPriceSuccess = now

    if (symbol === this.activeSymbol) {
      this.candleBuilder.update(quote.price, quote.observedAt)
    }

    this.touch()
    return 'applied'
  }

  getQuote(symbol: string): PriceQuote | undefined {
    return this.quotes.get(canonicalSymbol(symbol))
  }

  /**
   * No quote within the data timeout
   */
  isQuoteStale(symbol: string, now: EpochDate = this.now()): boolean {
    const quote = this.getQuote(symbol)
    return !quote || elapsedMs(quote.observedAt, now) > this.config.dataTimeoutMs
  }

  /**
   * Last time the streaming feed delivered anything for a symbol
   */
  lastStreamUpdate(symbol: string): EpochDate | undefined {
    return this.lastStreamUpdates.get(canonicalSymbol(symbol))
  }

  /**
   * Stream silent for longer than the data timeout, or never heard from
   */
  isStreamStale(symbol: string, now: EpochDate = this.now()): boolean {
    const since = this.lastStreamUpdate(symbol)
    return since === undefined || elapsedMs(since, now) > this.config.dataTimeoutMs
  }

  // --- rotation and candles ------------------------------------------------

  getActiveSymbol(): string {
    return this.activeSymbol
  }

  /**
   * Switch the charted instrument; the candle sequence starts over
   * @returns false when the symbol was already active
   */
  setActiveSymbol(symbol: string): boolean {
    const next = canonicalSymbol(symbol)
    if (next === this.activeSymbol) {
      return false
    }
    if (!this.config.registry.mainSymbols.includes(next)) {
      throw new Error(`Not a main symbol: ${symbol}`)
    }

    this.activeSymbol = next
    this.candleBuilder.reset()
    this.touch()
    return true
  }

  /**
   * Prepend historical candles for the active symbol. Ignored when the
   * symbol rotated away while the history was fetched.
   * @returns number of candles added
   */
  seedCandles(symbol: string, history: readonly Candle[]): number {
    if (canonicalSymbol(symbol) !== this.activeSymbol) {
      return 0
    }
    const added = this.candleBuilder.seed(history)
    if (added > 0) {
      this.touch()
    }
    return added
  }

  candles(): Candle[] {
    return this.candleBuilder.candles()
  }

  // --- miners --------------------------------------------------------------

  recordMinerSuccess(host: string, sample: MinerSample): void {
    const reading = this.miners.get(host)
    if (!reading) return
    this.miners.set(host, recordSuccess(reading, sample, this.now()))
    this.touch()
  }

  recordMinerFailure(host: string, reason: string): void {
    const reading = this.miners.get(host)
    if (!reading) return
    this.miners.set(host, recordFailure(reading, reason, this.now()))
    this.touch()
  }

  minerReadings(): MinerReading[] {
    return Array.from(this.miners.values())
  }

  /**
   * Append the current total hashrate to the bounded history
   */
  sampleHashrate(): void {
    const aggregate = this.minerAggregate(false)
    if (!aggregate.visible) return

    this.hashrateHistory.push(aggregate.totalHashrateTh)
    while (this.hashrateHistory.length > this.config.maxCandles) {
      this.hashrateHistory.shift()
    }
    this.touch()
  }

  /**
   * Aggregate over the current readings, computed on every call
   */
  minerAggregate(withHistory = true): MinerAggregate {
    return aggregateMiners(
      this.minerReadings(),
      {
        configuredCount: this.miners.size,
        activeThreshold: this.config.minerActiveThreshold,
        hashrateFloorTh: this.config.minerHashrateFloorTh
      },
      withHistory ? this.hashrateHistory : []
    )
  }

  // --- network -------------------------------------------------------------

  /**
   * Store a network record unless it is not newer than the stored one
   */
  updateNetworkStats(stats: NetworkStats): boolean {
    if (this.network && stats.observedAt <= this.network.observedAt) {
      return false
    }
    this.network = { ...stats }
    this.lastNetworkSuccess = stats.observedAt
    this.touch()
    return true
  }

  getNetworkStats(): NetworkStats | undefined {
    return this.network
  }

  // --- feeds, marquee, fallback ------------------------------------------

  updateFeed(stats: FeedStats): void {
    this.feeds.set(stats.provider, { ...stats })
    this.touch()
  }

  /**
   * Rebuild the ticker batch from the current quotes
   * @returns false when nothing visible changed and the batch was kept
   */
  refreshMarquee(now: EpochDate = this.now()): boolean {
    const routes = this.config.registry.marqueeSymbols.flatMap(symbol => {
      const route = this.config.registry.route(symbol)
      return route ? [route] : []
    })
    const next = buildMarquee(routes, symbol => this.getQuote(symbol), symbol => this.isQuoteStale(symbol, now))

    if (sameMarquee(this.marquee, next)) {
      return false
    }
    this.marquee = next
    this.touch()
    return true
  }

  setFallbackSymbols(symbols: readonly string[]): void {
    const next = [...symbols].sort()
    if (next.length === this.fallbackSymbols.length && next.every((s, i) => s === this.fallbackSymbols[i])) {
      return
    }
    this.fallbackSymbols = next
    this.touch()
  }

  // --- reading -------------------------------------------------------------

  /**
   * Immutable copy of everything a renderer needs. State-derived parts are
   * rebuilt only after a change; staleness, miner aggregate and health are
   * evaluated against the clock on every call.
   */
  snapshot(): MarketSnapshot {
    const now = this.now()
    const view = this.staticView()

    const quotes: Record<string, QuoteView> = {}
    for (const [symbol, quote] of this.quotes) {
      const decimals = this.config.registry.route(symbol)?.decimals
      quotes[symbol] = {
        ...quote,
        stale: elapsedMs(quote.observedAt, now) > this.config.dataTimeoutMs,
        ...(decimals !== undefined ? { decimals } : {})
      }
    }

    const miners = this.minerAggregate()

    return deepFreeze({
      takenAt: now,
      running: this.running,
      activeSymbol: this.activeSymbol,
      quotes,
      candles: view.candles,
      marquee: view.marquee,
      miners,
      ...(view.network ? { network: view.network } : {}),
      feeds: view.feeds,
      fallbackSymbols: view.fallbackSymbols,
      health: evaluateHealth(this.healthInputs(miners.visible), now, {
        startedAt: this.startedAt,
        failureMultiplier: this.config.healthFailureMultiplier
      })
    })
  }

  private healthInputs(minersVisible: boolean): SubsystemInput[] {
    const inputs: SubsystemInput[] = [
      {
        name: 'prices',
        timeoutMs: this.config.dataTimeoutMs,
        ...(this.lastPriceSuccess !== undefined ? { lastSuccess: this.lastPriceSuccess } : {})
      }
    ]

    if (minersVisible) {
      let newest: EpochDate | undefined
      for (const { lastSeen } of this.miners.values()) {
        if (lastSeen !== undefined && (newest === undefined || lastSeen > newest)) {
          newest = lastSeen
        }
      }
      inputs.push({
        name: 'miners',
        timeoutMs: this.config.minerDataTimeoutMs,
        ...(newest !== undefined ? { lastSuccess: newest } : {})
      })
    }

    inputs.push({
      name: 'network',
      timeoutMs: this.config.dataTimeoutMs,
      ...(this.lastNetworkSuccess !== undefined ? { lastSuccess: this.lastNetworkSuccess } : {})
    })

    return inputs
  }

  private staticView(): StaticView {
    if (this.cachedView && this.cachedView.version === this.version) {
      return this.cachedView
    }

    this.cachedView = deepFreeze({
      version: this.version,
      candles: this.candleBuilder.candles(),
      marquee: this.marquee.map(entry => ({ ...entry })),
      feeds: Array.from(this.feeds.values()).map(feed => ({ ...feed })),
      fallbackSymbols: [...this.fallbackSymbols],
      ...(this.network ? { network: { ...this.network } } : {})
    })
    return this.cachedView
  }

  private touch(): void {
    this.version++
  }
}
