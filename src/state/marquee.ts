import type { MarqueeEntry, PriceQuote } from '../models'
import type { SymbolRoute } from '../symbols/symbol-registry'

/**
 * Build the ticker batch in configured order. Symbols without any quote
 * yet are listed without a price.
 */
export function buildMarquee(
  routes: readonly SymbolRoute[],
  quoteOf: (symbol: string) => PriceQuote | undefined,
  isStale: (symbol: string) => boolean
): MarqueeEntry[] {
  return routes.map(route => {
    const quote = quoteOf(route.symbol)
    return {
      symbol: route.symbol,
      provider: route.provider,
      ...(quote ? { price: quote.price, change24h: quote.change24h } : {}),
      ...(route.decimals !== undefined ? { decimals: route.decimals } : {}),
      stale: isStale(route.symbol)
    }
  })
}

/**
 * Whether two batches show the same thing
 */
export function sameMarquee(a: readonly MarqueeEntry[], b: readonly MarqueeEntry[]): boolean {
  if (a.length !== b.length) return false

  return a.every((entry, i) => {
    const other = b[i]
    return other !== undefined &&
      entry.symbol === other.symbol &&
      entry.price === other.price &&
      entry.change24h === other.change24h &&
      entry.stale === other.stale
  })
}
