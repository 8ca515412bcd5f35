import type { PriceProvider } from '../models'

/**
 * Where and how one logical symbol is priced
 */
export interface SymbolRoute {
  /** Canonical upper-case symbol (e.g. 'XMRUSDT') */
  readonly symbol: string
  readonly provider: PriceProvider
  /** Provider spelling: 'BTCUSDT' on Binance, 'XMR/USDT' on Kraken, coin id on CoinGecko */
  readonly pair: string
  /** Display-only decimals override */
  readonly decimals?: number
}

/**
 * Providers that push prices over a socket; the others are polled
 */
export const STREAMING_PROVIDERS: readonly PriceProvider[] = ['binance', 'kraken']

export function isStreamingProvider(provider: PriceProvider): boolean {
  return STREAMING_PROVIDERS.includes(provider)
}

export interface SymbolRegistryOptions {
  readonly mainSymbols: readonly string[]
  readonly marqueeSymbols: readonly string[]
  /** symbol → Kraken pair, keys case-insensitive */
  readonly krakenPairs?: Readonly<Record<string, string>>
  /** symbol → CoinGecko coin id, keys case-insensitive */
  readonly coingeckoIds?: Readonly<Record<string, string>>
  /** symbol → display decimals, keys case-insensitive */
  readonly priceDecimals?: Readonly<Record<string, number>>
}

export function canonicalSymbol(symbol: string): string {
  return symbol.trim().toUpperCase()
}

function upperKeys<T>(record: Readonly<Record<string, T>> = {}): Map<string, T> {
  return new Map(Object.entries(record).map(([key, value]) => [canonicalSymbol(key), value]))
}

function unique(symbols: readonly string[]): string[] {
  return Array.from(new Set(symbols.map(canonicalSymbol)))
}

/**
 * Static symbol → provider routing table. No I/O.
 *
 * A symbol listed in `krakenPairs` is priced on Kraken, one listed in
 * `coingeckoIds` on CoinGecko, everything else on Binance under its own name.
 */
export class SymbolRegistry {
  private readonly routes = new Map<string, SymbolRoute>()
  private readonly main: readonly string[]
  private readonly marquee: readonly string[]

  constructor(options: SymbolRegistryOptions) {
    const krakenPairs = upperKeys(options.krakenPairs)
    const coingeckoIds = upperKeys(options.coingeckoIds)
    const decimals = upperKeys(options.priceDecimals)

    this.main = unique(options.mainSymbols)
    this.marquee = unique(options.marqueeSymbols)

    for (const symbol of unique([...this.main, ...this.marquee])) {
      const krakenPair = krakenPairs.get(symbol)
      const coinId = coingeckoIds.get(symbol)

      let route: SymbolRoute
      if (krakenPair !== undefined) {
        route = { symbol, provider: 'kraken', pair: krakenPair }
      } else if (coinId !== undefined) {
        route = { symbol, provider: 'coingecko', pair: coinId }
      } else {
        route = { symbol, provider: 'binance', pair: symbol }
      }

      const override = decimals.get(symbol)
      this.routes.set(symbol, override === undefined ? route : { ...route, decimals: override })
    }
  }

  /** Primary symbols in rotation order */
  get mainSymbols(): readonly string[] {
    return this.main
  }

  /** Scrolling ticker symbols in display order */
  get marqueeSymbols(): readonly string[] {
    return this.marquee
  }

  /**
   * Every tracked route: main symbols first, then marquee, without duplicates
   */
  tracked(): readonly SymbolRoute[] {
    return Array.from(this.routes.values())
  }

  route(symbol: string): SymbolRoute | undefined {
    return this.routes.get(canonicalSymbol(symbol))
  }

  byProvider(provider: PriceProvider): readonly SymbolRoute[] {
    return this.tracked().filter(route => route.provider === provider)
  }
}
