import type { Candle } from '../models'
import { isValidCandle } from '../models'
import { toEpochDate, type EpochDate } from '../utils/dates'

/**
 * Configuration for the candle builder
 */
export interface CandleBuilderConfig {
  /** Bucket duration in seconds */
  readonly candleSeconds: number
  /** Maximum number of candles retained, open candle included */
  readonly maxCandles: number
}

/**
 * Outcome of folding one tick
 */
export type CandleUpdate = 'opened' | 'updated' | 'discarded'

interface MutableCandle {
  bucketStart: EpochDate
  open: number
  high: number
  low: number
  close: number
}

/**
 * Folds price ticks of one instrument into fixed-duration OHLC buckets.
 * The last candle is the open one; every earlier candle is closed and never
 * touched again.
 */
export class CandleBuilder {
  private readonly bucketMs: number
  private readonly maxCandles: number
  private readonly buffer: MutableCandle[] = []

  constructor(private readonly config: CandleBuilderConfig) {
    if (!Number.isInteger(config.candleSeconds) || config.candleSeconds <= 0) {
      throw new Error(`Invalid candle duration: ${config.candleSeconds}`)
    }
    if (!Number.isInteger(config.maxCandles) || config.maxCandles < 1) {
      throw new Error(`Invalid candle limit: ${config.maxCandles}`)
    }
    this.bucketMs = config.candleSeconds * 1000
    this.maxCandles = config.maxCandles
  }

  get length(): number {
    return this.buffer.length
  }

  /**
   * Bucket index of a timestamp: floor(timestamp / candle duration)
   */
  bucketIndex(timestamp: EpochDate): number {
    return Math.floor(timestamp / this.bucketMs)
  }

  /**
   * Fold one tick into the sequence
   */
  update(price: number, timestamp: EpochDate): CandleUpdate {
    if (!Number.isFinite(price) || price < 0) {
      return 'discarded'
    }

    const index = this.bucketIndex(timestamp)
    const current = this.buffer.at(-1)
    const currentIndex = current ? this.bucketIndex(current.bucketStart) : undefined

    if (current === undefined || currentIndex === undefined || index > currentIndex) {
      this.buffer.push({
        bucketStart: toEpochDate(index * this.bucketMs),
        open: price,
        high: price,
        low: price,
        close: price
      })
      this.evict()
      return 'opened'
    }

    if (index === currentIndex) {
      current.high = Math.max(current.high, price)
      current.low = Math.min(current.low, price)
      current.close = price
      return 'updated'
    }

    // Out-of-order tick for a closed bucket
    return 'discarded'
  }

  /**
   * Prepend historical candles older than anything built from live ticks.
   * Candles of another duration, invalid ones and overlapping buckets are skipped.
   * @returns number of candles added
   */
  seed(history: readonly Candle[]): number {
    const first = this.buffer[0]
    const limit = first ? this.bucketIndex(first.bucketStart) : Number.POSITIVE_INFINITY

    const byIndex = new Map<number, MutableCandle>()
    for (const candle of history) {
      if (candle.durationSeconds !== this.config.candleSeconds || !isValidCandle(candle)) {
        continue
      }
      const index = this.bucketIndex(candle.bucketStart)
      if (index >= limit) continue

      byIndex.set(index, {
        bucketStart: toEpochDate(index * this.bucketMs),
        open: candle.open,
        high: candle.high,
        low: candle.low,
        close: candle.close
      })
    }

    const older = Array.from(byIndex.entries())
      .sort((a, b) => a[0] - b[0])
      .map(([, candle]) => candle)

    this.buffer.unshift(...older)
    const before = this.buffer.length
    this.evict()
    return older.length - (before - this.buffer.length)
  }

  /**
   * Copy of the sequence, oldest first
   */
  candles(): Candle[] {
    return this.buffer.map(candle => ({
      ...candle,
      durationSeconds: this.config.candleSeconds
    }))
  }

  /**
   * Drop every candle, e.g. when the instrument changes
   */
  reset(): void {
    this.buffer.length = 0
  }

  private evict(): void {
    while (this.buffer.length > this.maxCandles) {
      this.buffer.shift()
    }
  }
}
