import type { EpochDate } from '../utils/dates'
import type { Candle } from './candle'
import type { MinerAggregate } from './miner'
import type { NetworkStats } from './network-stats'
import type { PriceProvider, PriceQuote } from './price-quote'

/**
 * Freshness of one subsystem, or of the whole core
 */
export type Freshness = 'fresh' | 'stale' | 'failed'

/**
 * Colour of the coarse status indicator
 */
export type HealthIndicator = 'green' | 'orange' | 'red'

export type SubsystemName = 'prices' | 'miners' | 'network'

export interface SubsystemHealth {
  readonly name: SubsystemName
  readonly freshness: Freshness
  readonly lastSuccess?: EpochDate
  /** Age of the last success, measured from core start when there is none */
  readonly ageMs: number
  readonly timeoutMs: number
}

export interface HealthReport {
  readonly overall: Freshness
  readonly indicator: HealthIndicator
  readonly subsystems: readonly SubsystemHealth[]
}

/**
 * Lifecycle of one streaming connection
 */
export type FeedStatus = 'idle' | 'connecting' | 'subscribing' | 'connected' | 'reconnecting' | 'stopped'

/**
 * Connection statistics for one streaming provider
 */
export interface FeedStats {
  readonly provider: PriceProvider
  readonly status: FeedStatus
  readonly reconnectAttempts: number
  readonly messagesReceived: number
  readonly protocolErrors: number
  readonly connectedAt?: EpochDate
  readonly lastMessageAt?: EpochDate
  readonly lastError?: string
}

/**
 * Quote as exposed to readers
 */
export interface QuoteView extends PriceQuote {
  /** No update within the data timeout */
  readonly stale: boolean
  /** Display-only decimals override */
  readonly decimals?: number
}

/**
 * One element of the scrolling ticker
 */
export interface MarqueeEntry {
  readonly symbol: string
  readonly provider: PriceProvider
  readonly price?: number
  readonly change24h?: number
  readonly decimals?: number
  readonly stale: boolean
}

/**
 * Immutable view handed to the renderer once per frame
 */
export interface MarketSnapshot {
  readonly takenAt: EpochDate
  readonly running: boolean
  readonly activeSymbol: string
  readonly quotes: Readonly<Record<string, QuoteView>>
  /** Candles of the active symbol, oldest first, open candle last */
  readonly candles: readonly Candle[]
  readonly marquee: readonly MarqueeEntry[]
  readonly miners: MinerAggregate
  readonly network?: NetworkStats
  readonly feeds: readonly FeedStats[]
  /** Symbols currently fetched over REST because their stream is stale */
  readonly fallbackSymbols: readonly string[]
  readonly health: HealthReport
}
