import type { PriceProvider } from '../../models'
import { decodePayload } from '../../network/decode'
import type { EpochDate } from '../../utils/dates'
import { StreamingPriceClient } from '../base/streaming-price-client'
import type { StreamEvent } from '../base/types'
import { KRAKEN_STREAM_URL, changePercent, krakenSubscriptionStatusSchema, krakenTickerFrameSchema } from './types'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Kraken public ticker stream. All pairs go into one subscribe request;
 * the feed is connected once each pair is acknowledged or rejected.
 */
export class KrakenStreamClient extends StreamingPriceClient {
  readonly provider: PriceProvider = 'kraken'

  protected url(): string {
    return KRAKEN_STREAM_URL
  }

  protected subscribeMessages(): string[] {
    return [JSON.stringify({
      event: 'subscribe',
      pair: this.routes.map(route => route.pair),
      subscription: { name: 'ticker' }
    })]
  }

  protected expectedAcks(): string[] {
    return this.routes.map(route => route.pair)
  }

  protected decode(frame: unknown, receivedAt: EpochDate): StreamEvent {
    if (isRecord(frame)) {
      return this.decodeEvent(frame)
    }

    if (Array.isArray(frame) && frame[2] === 'ticker') {
      const [, ticker, , pair] = decodePayload(krakenTickerFrameSchema, frame, 'kraken')
      const route = this.routeFor(pair)
      const [price] = ticker.c
      const [, open24h] = ticker.o

      return {
        kind: 'quote',
        quote: {
          symbol: route.symbol,
          price,
          change24h: changePercent(price, open24h),
          source: 'stream',
          provider: 'kraken',
          // Ticker frames carry no time
          observedAt: receivedAt
        }
      }
    }

    return { kind: 'ignored', reason: 'unknown frame' }
  }

  private decodeEvent(frame: Record<string, unknown>): StreamEvent {
    switch (frame.event) {
      case 'heartbeat':
        return { kind: 'heartbeat' }

      case 'subscriptionStatus': {
        const status = decodePayload(krakenSubscriptionStatusSchema, frame, 'kraken')
        if (status.pair === undefined) {
          return { kind: 'ignored', reason: status.errorMessage ?? 'status without pair' }
        }
        if (status.status === 'subscribed') {
          return { kind: 'ack', pair: status.pair }
        }
        if (status.status === 'error') {
          return { kind: 'rejected', pair: status.pair, reason: status.errorMessage ?? 'unknown reason' }
        }
        return { kind: 'ignored', reason: `unsubscribed ${status.pair}` }
      }

      default:
        return { kind: 'ignored', reason: `event ${String(frame.event)}` }
    }
  }
}
