import type { PriceProvider } from '../../models'
import { decodePayload } from '../../network/decode'
import { toEpochDate, type EpochDate } from '../../utils/dates'
import { StreamingPriceClient } from '../base/streaming-price-client'
import type { StreamEvent } from '../base/types'
import { BINANCE_STREAM_URL, binanceTickerEventSchema } from './types'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Binance combined ticker stream. Streams are named in the URL, so the
 * connection is subscribed as soon as it opens.
 */
export class BinanceStreamClient extends StreamingPriceClient {
  readonly provider: PriceProvider = 'binance'

  protected url(): string {
    const streams = this.routes.map(route => `${route.pair.toLowerCase()}@ticker`)
    return `${BINANCE_STREAM_URL}/${streams.join('/')}`
  }

  protected subscribeMessages(): string[] {
    return []
  }

  protected expectedAcks(): string[] {
    return []
  }

  protected decode(frame: unknown, _receivedAt: EpochDate): StreamEvent {
    if (!isRecord(frame) || frame.e !== '24hrTicker') {
      return { kind: 'ignored', reason: 'not a ticker event' }
    }

    const event = decodePayload(binanceTickerEventSchema, frame, 'binance')
    const route = this.routeFor(event.s)

    return {
      kind: 'quote',
      quote: {
        symbol: route.symbol,
        price: event.c,
        change24h: event.P,
        source: 'stream',
        provider: 'binance',
        observedAt: toEpochDate(event.E)
      }
    }
  }
}
