import { z } from 'zod'
import { decimal } from '../../network/decode'

export const KRAKEN_STREAM_URL = 'wss://ws.kraken.com'
export const KRAKEN_REST_URL = 'https://api.kraken.com/0/public'

/**
 * `subscriptionStatus` event, one per requested pair
 */
export const krakenSubscriptionStatusSchema = z.object({
  event: z.literal('subscriptionStatus'),
  status: z.enum(['subscribed', 'unsubscribed', 'error']),
  pair: z.string().optional(),
  errorMessage: z.string().optional()
})

/**
 * Ticker frame: [channelID, ticker, "ticker", pair]
 */
export const krakenTickerFrameSchema = z.tuple([
  z.number(),
  z.object({
    /** [price, lot volume] of the last trade */
    c: z.tuple([decimal]).rest(z.unknown()),
    /** [today's open, open 24 hours ago] */
    o: z.tuple([decimal, decimal]).rest(z.unknown())
  }),
  z.literal('ticker'),
  z.string().min(1)
])

/**
 * `GET /Ticker` response
 */
export const krakenTickerResponseSchema = z.object({
  error: z.array(z.string()),
  result: z.record(
    z.string(),
    z.object({
      c: z.tuple([decimal]).rest(z.unknown()),
      /** Today's opening price */
      o: decimal
    })
  ).default({})
})

/**
 * Change in percent between an opening and a last price
 */
export function changePercent(last: number, open: number): number {
  return open > 0 ? (last - open) / open * 100 : 0
}

/**
 * 'XMR/USDT' → 'XMRUSDT'
 */
export function restPairName(pair: string): string {
  return pair.replace('/', '').toUpperCase()
}
