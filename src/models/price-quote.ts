import type { EpochDate } from '../utils/dates'

/**
 * Upstream price providers
 */
export type PriceProvider = 'binance' | 'kraken' | 'coingecko'

/**
 * How a quote reached the core
 */
export type QuoteSource = 'stream' | 'rest'

/**
 * Last traded price of one symbol
 */
export interface PriceQuote {
  /** Canonical upper-case symbol (e.g. 'BTCUSDT') */
  readonly symbol: string
  /** Last price, never negative */
  readonly price: number
  /**
   * Change in percent over the provider's daily window. Streams and
   * Binance/CoinGecko REST measure against the price 24 hours ago; Kraken
   * REST only publishes today's open, so its quotes measure the change
   * since 00:00 UTC.
   */
  readonly change24h: number
  readonly source: QuoteSource
  readonly provider: PriceProvider
  /** When the provider observed this price; ordering key per symbol */
  readonly observedAt: EpochDate
}

/**
 * Check the data-model invariants of a decoded quote
 */
export function isValidQuote(quote: PriceQuote): boolean {
  return Number.isFinite(quote.price) &&
    quote.price >= 0 &&
    Number.isFinite(quote.change24h) &&
    Number.isFinite(quote.observedAt)
}
