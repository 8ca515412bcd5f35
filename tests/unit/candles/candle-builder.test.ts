import { deepStrictEqual, strictEqual, throws } from 'node:assert'
import { describe, it } from 'node:test'
import { CandleBuilder } from '../../../src/candles'
import type { Candle } from '../../../src/models'
import { toEpochDate, type EpochDate } from '../../../src/utils'
import { T0 } from '../../helpers/fixtures'

const MINUTE = 60000

function at(offsetMs: number): EpochDate {
  return toEpochDate(T0 + offsetMs)
}

function candle(offsetMs: number, open: number, high: number, low: number, close: number, durationSeconds = 60): Candle {
  return { bucketStart: at(offsetMs), durationSeconds, open, high, low, close }
}

describe('CandleBuilder', () => {
  describe('constructor', () => {
    it('should reject invalid settings', () => {
      throws(() => new CandleBuilder({ candleSeconds: 0, maxCandles: 14 }), /Invalid candle duration/)
      throws(() => new CandleBuilder({ candleSeconds: 1.5, maxCandles: 14 }), /Invalid candle duration/)
      throws(() => new CandleBuilder({ candleSeconds: 60, maxCandles: 0 }), /Invalid candle limit/)
    })
  })

  describe('update', () => {
    it('should fold ticks of one bucket into OHLC', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })

      strictEqual(builder.update(100, at(0)), 'opened')
      strictEqual(builder.update(105, at(10000)), 'updated')
      strictEqual(builder.update(95, at(20000)), 'updated')
      strictEqual(builder.update(102, at(50000)), 'updated')

      deepStrictEqual(builder.candles(), [candle(0, 100, 105, 95, 102)])
    })

    it('should align buckets to the duration', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })

      builder.update(100, at(MINUTE + 42000))
      strictEqual(builder.candles()[0]?.bucketStart, at(MINUTE))
      strictEqual(builder.bucketIndex(at(MINUTE - 1)) + 1, builder.bucketIndex(at(MINUTE)))
    })

    it('should open a new candle for a newer bucket', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })

      builder.update(100, at(0))
      strictEqual(builder.update(101, at(MINUTE)), 'opened')
      deepStrictEqual(builder.candles(), [candle(0, 100, 100, 100, 100), candle(MINUTE, 101, 101, 101, 101)])
    })

    it('should evict the oldest candle beyond the limit', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 3 })

      for (let i = 0; i < 4; i++) {
        builder.update(100 + i, at(i * MINUTE))
      }

      strictEqual(builder.length, 3)
      deepStrictEqual(builder.candles().map(c => c.bucketStart), [at(MINUTE), at(2 * MINUTE), at(3 * MINUTE)])
    })

    it('should discard ticks for closed buckets', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })

      builder.update(100, at(0))
      builder.update(101, at(MINUTE))
      strictEqual(builder.update(50, at(30000)), 'discarded')

      deepStrictEqual(builder.candles()[0], candle(0, 100, 100, 100, 100))
    })

    it('should discard invalid prices', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })

      strictEqual(builder.update(Number.NaN, at(0)), 'discarded')
      strictEqual(builder.update(-1, at(0)), 'discarded')
      strictEqual(builder.length, 0)
    })

    it('should keep high and low around open and close', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })
      const prices = [100, 97, 103, 99, 101, 96, 104, 100]
      prices.forEach((price, i) => builder.update(price, at(i * 7000)))

      const [only] = builder.candles()
      strictEqual(only?.high, 104)
      strictEqual(only?.low, 96)
      strictEqual(only?.open, 100)
      strictEqual(only?.close, 100)
    })
  })

  describe('seed', () => {
    it('should prepend history older than the live candles', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })
      builder.update(110, at(3 * MINUTE))

      const added = builder.seed([
        candle(MINUTE, 101, 103, 100, 102),
        candle(0, 100, 102, 99, 101),
        candle(2 * MINUTE, 102, 104, 101, 103),
        // overlaps the live bucket
        candle(3 * MINUTE, 1, 1, 1, 1),
        // another duration
        candle(0, 1, 1, 1, 1, 300),
        // high below open
        candle(-MINUTE, 100, 90, 80, 85)
      ])

      strictEqual(added, 3)
      deepStrictEqual(builder.candles(), [
        candle(0, 100, 102, 99, 101),
        candle(MINUTE, 101, 103, 100, 102),
        candle(2 * MINUTE, 102, 104, 101, 103),
        candle(3 * MINUTE, 110, 110, 110, 110)
      ])
    })

    it('should keep the newest candles when history exceeds the limit', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 2 })
      builder.update(110, at(3 * MINUTE))

      const added = builder.seed([
        candle(0, 100, 102, 99, 101),
        candle(MINUTE, 101, 103, 100, 102),
        candle(2 * MINUTE, 102, 104, 101, 103)
      ])

      strictEqual(added, 1)
      deepStrictEqual(builder.candles().map(c => c.bucketStart), [at(2 * MINUTE), at(3 * MINUTE)])
    })

    it('should continue from seeded history with live ticks', () => {
      const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })
      builder.seed([candle(0, 100, 102, 99, 101)])

      strictEqual(builder.update(104, at(MINUTE)), 'opened')
      strictEqual(builder.length, 2)
    })
  })

  it('should start over after reset', () => {
    const builder = new CandleBuilder({ candleSeconds: 60, maxCandles: 14 })
    builder.update(100, at(0))
    builder.reset()

    strictEqual(builder.length, 0)
    deepStrictEqual(builder.candles(), [])
  })
})
