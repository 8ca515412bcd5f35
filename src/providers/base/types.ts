import type { FeedStats, PriceProvider, PriceQuote } from '../../models'
import type { QuoteApplyResult } from '../../state/market-state'
import type { SymbolRoute } from '../../symbols/symbol-registry'
import type { EpochDate } from '../../utils/dates'

/**
 * Where price clients deliver their results
 */
export interface PriceSink {
  applyQuote(quote: PriceQuote): QuoteApplyResult
  updateFeed(stats: FeedStats): void
  now(): EpochDate
}

/**
 * Decoded meaning of one stream frame
 */
export type StreamEvent =
  | { readonly kind: 'quote'; readonly quote: PriceQuote }
  | { readonly kind: 'ack'; readonly pair: string }
  | { readonly kind: 'rejected'; readonly pair: string; readonly reason: string }
  | { readonly kind: 'heartbeat' }
  | { readonly kind: 'ignored'; readonly reason: string }

/**
 * Single-shot price requests of one provider
 */
export interface PriceRestClient {
  readonly provider: PriceProvider
  /**
   * One bounded request for the given symbols of this provider
   * @throws on timeout, cancellation, non-2xx or unparseable payload
   */
  fetchQuotes(routes: readonly SymbolRoute[], signal?: AbortSignal): Promise<PriceQuote[]>
}
