import type { PriceProvider, PriceQuote } from '../../models'
import { decodePayload } from '../../network/decode'
import { ProtocolError } from '../../network/errors'
import type { HttpClient } from '../../network/http-client'
import type { SymbolRoute } from '../../symbols/symbol-registry'
import type { TimeSource } from '../../utils/time-source'
import type { PriceRestClient } from '../base/types'
import { KRAKEN_REST_URL, changePercent, krakenTickerResponseSchema, restPairName } from './types'

/**
 * Kraken public Ticker endpoint
 */
export class KrakenRestClient implements PriceRestClient {
  readonly provider: PriceProvider = 'kraken'

  constructor(
    private readonly http: HttpClient,
    private readonly timeoutMs: number,
    private readonly timeSource: TimeSource,
    private readonly baseUrl = KRAKEN_REST_URL
  ) {}

  /**
   * Quotes stamped with the request time. The Ticker endpoint has no open
   * from 24 hours ago, so the change is measured since today's 00:00 UTC open.
   */
  async fetchQuotes(routes: readonly SymbolRoute[], signal?: AbortSignal): Promise<PriceQuote[]> {
    if (routes.length === 0) return []

    const issuedAt = this.timeSource.nowEpoch()
    const payload = await this.http.getJson(`${this.baseUrl}/Ticker`, {
      timeoutMs: this.timeoutMs,
      signal,
      query: { pair: routes.map(route => restPairName(route.pair)).join(',') }
    })
    const response = decodePayload(krakenTickerResponseSchema, payload, 'kraken')
    if (response.error.length > 0) {
      throw new ProtocolError(response.error.join('; '), 'kraken')
    }

    const entries = Object.entries(response.result)
    return routes.flatMap(route => {
      const name = restPairName(route.pair)
      // Result keys are either the plain name or Kraken's legacy spelling containing it
      const entry = entries.find(([key]) => key.toUpperCase() === name) ??
        entries.find(([key]) => key.toUpperCase().includes(name))
      if (!entry) return []

      const [, ticker] = entry
      const [price] = ticker.c
      const quote: PriceQuote = {
        symbol: route.symbol,
        price,
        change24h: changePercent(price, ticker.o),
        source: 'rest',
        provider: 'kraken',
        observedAt: issuedAt
      }
      return [quote]
    })
  }
}
