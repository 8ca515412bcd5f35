import { z } from 'zod'
import type { PriceProvider, PriceQuote } from '../../models'
import { decimal, decodePayload } from '../../network/decode'
import type { HttpClient } from '../../network/http-client'
import type { SymbolRoute } from '../../symbols/symbol-registry'
import type { TimeSource } from '../../utils/time-source'
import type { PriceRestClient } from '../base/types'

export const COINGECKO_REST_URL = 'https://api.coingecko.com/api/v3'

/**
 * `GET /simple/price` entry for one coin
 */
const coinPriceSchema = z.object({
  usd: decimal,
  usd_24h_change: decimal.nullable().default(0)
})

const simplePriceSchema = z.record(z.string(), z.unknown())

/**
 * CoinGecko simple price endpoint, for coins no exchange stream lists
 */
export class CoinGeckoRestClient implements PriceRestClient {
  readonly provider: PriceProvider = 'coingecko'

  constructor(
    private readonly http: HttpClient,
    private readonly timeoutMs: number,
    private readonly timeSource: TimeSource,
    private readonly baseUrl = COINGECKO_REST_URL
  ) {}

  /**
   * One batch request for every coin id, stamped with the request time.
   * Coins missing from the answer are skipped; a present coin with missing
   * fields fails the whole batch.
   */
  async fetchQuotes(routes: readonly SymbolRoute[], signal?: AbortSignal): Promise<PriceQuote[]> {
    if (routes.length === 0) return []

    const issuedAt = this.timeSource.nowEpoch()
    const payload = await this.http.getJson(`${this.baseUrl}/simple/price`, {
      timeoutMs: this.timeoutMs,
      signal,
      query: {
        ids: routes.map(route => route.pair).join(','),
        vs_currencies: 'usd',
        include_24hr_change: true
      }
    })
    const coins = decodePayload(simplePriceSchema, payload, 'coingecko')

    return routes.flatMap(route => {
      const raw = coins[route.pair]
      if (raw === undefined) return []

      const coin = decodePayload(coinPriceSchema, raw, 'coingecko')
      const quote: PriceQuote = {
        symbol: route.symbol,
        price: coin.usd,
        change24h: coin.usd_24h_change ?? 0,
        source: 'rest',
        provider: 'coingecko',
        observedAt: issuedAt
      }
      return [quote]
    })
  }
}
