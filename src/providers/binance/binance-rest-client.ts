import { z } from 'zod'
import type { Candle, PriceProvider, PriceQuote } from '../../models'
import { decodePayload } from '../../network/decode'
import { ConfigurationError } from '../../network/errors'
import type { HttpClient } from '../../network/http-client'
import type { SymbolRoute } from '../../symbols/symbol-registry'
import { toEpochDate } from '../../utils/dates'
import type { PriceRestClient } from '../base/types'
import {
  BINANCE_REST_URL,
  KLINE_INTERVALS,
  binanceKlineSchema,
  binanceTicker24hrSchema,
  type BinanceTicker24hr
} from './types'

/**
 * Binance public market-data REST endpoints
 */
export class BinanceRestClient implements PriceRestClient {
  readonly provider: PriceProvider = 'binance'

  constructor(
    private readonly http: HttpClient,
    private readonly timeoutMs: number,
    private readonly baseUrl = BINANCE_REST_URL
  ) {}

  /**
   * Kline interval for a candle length, if Binance has one
   */
  static klineInterval(candleSeconds: number): string | undefined {
    return KLINE_INTERVALS[candleSeconds]
  }

  /**
   * Last price and 24h change; one request for any number of symbols
   */
  async fetchQuotes(routes: readonly SymbolRoute[], signal?: AbortSignal): Promise<PriceQuote[]> {
    if (routes.length === 0) return []

    const [only] = routes
    let tickers: BinanceTicker24hr[]
    if (only && routes.length === 1) {
      const payload = await this.http.getJson(`${this.baseUrl}/ticker/24hr`, {
        timeoutMs: this.timeoutMs,
        signal,
        query: { symbol: only.pair }
      })
      tickers = [decodePayload(binanceTicker24hrSchema, payload, 'binance')]
    } else {
      const payload = await this.http.getJson(`${this.baseUrl}/ticker/24hr`, {
        timeoutMs: this.timeoutMs,
        signal,
        query: { symbols: JSON.stringify(routes.map(route => route.pair)) }
      })
      tickers = decodePayload(z.array(binanceTicker24hrSchema), payload, 'binance')
    }

    return tickers.flatMap(ticker => {
      const route = routes.find(candidate => candidate.pair.toUpperCase() === ticker.symbol.toUpperCase())
      if (!route) return []

      const quote: PriceQuote = {
        symbol: route.symbol,
        price: ticker.lastPrice,
        change24h: ticker.priceChangePercent,
        source: 'rest',
        provider: 'binance',
        observedAt: toEpochDate(ticker.closeTime)
      }
      return [quote]
    })
  }

  /**
   * Recent klines of one symbol as candles, oldest first. The last one is
   * the bucket still in progress.
   * @throws ConfigurationError when Binance has no interval of that length
   */
  async fetchCandles(route: SymbolRoute, candleSeconds: number, limit: number, signal?: AbortSignal): Promise<Candle[]> {
    const interval = BinanceRestClient.klineInterval(candleSeconds)
    if (!interval) {
      throw new ConfigurationError(`No Binance kline interval for ${candleSeconds}s candles`)
    }

    const payload = await this.http.getJson(`${this.baseUrl}/klines`, {
      timeoutMs: this.timeoutMs,
      signal,
      query: { symbol: route.pair, interval, limit }
    })
    const rows = decodePayload(z.array(binanceKlineSchema), payload, 'binance')

    return rows.map(([openTime, open, high, low, close]) => ({
      bucketStart: toEpochDate(openTime),
      durationSeconds: candleSeconds,
      open,
      high,
      low,
      close
    }))
  }
}
