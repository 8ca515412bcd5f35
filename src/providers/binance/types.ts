import { z } from 'zod'
import { decimal } from '../../network/decode'

export const BINANCE_STREAM_URL = 'wss://stream.binance.com:9443/ws'
export const BINANCE_REST_URL = 'https://api.binance.com/api/v3'

/**
 * `<symbol>@ticker` stream payload (24h rolling window)
 */
export const binanceTickerEventSchema = z.object({
  e: z.literal('24hrTicker'),
  /** Event time, epoch ms */
  E: z.number().int().nonnegative(),
  s: z.string().min(1),
  /** Last price */
  c: decimal,
  /** 24h change percent */
  P: decimal
})

/**
 * `GET /ticker/24hr` entry
 */
export const binanceTicker24hrSchema = z.object({
  symbol: z.string().min(1),
  lastPrice: decimal,
  priceChangePercent: decimal,
  /** End of the 24h window, epoch ms */
  closeTime: z.number().int().nonnegative()
})

export type BinanceTicker24hr = z.infer<typeof binanceTicker24hrSchema>

/**
 * `GET /klines` row: [openTime, open, high, low, close, volume, closeTime, ...]
 */
export const binanceKlineSchema = z
  .tuple([z.number().int().nonnegative(), decimal, decimal, decimal, decimal])
  .rest(z.unknown())

/**
 * Kline intervals by bucket length in seconds
 */
export const KLINE_INTERVALS: Readonly<Record<number, string>> = {
  60: '1m',
  180: '3m',
  300: '5m',
  900: '15m',
  1800: '30m',
  3600: '1h',
  7200: '2h',
  14400: '4h',
  21600: '6h',
  28800: '8h',
  43200: '12h',
  86400: '1d'
}
