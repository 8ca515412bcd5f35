import { deepStrictEqual, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import {
  aggregateMiners,
  initialReading,
  isWithinThreshold,
  recordFailure,
  recordSuccess,
  type MinerAggregateOptions
} from '../../../src/miners'
import type { MinerReading } from '../../../src/models'
import { toEpochDate } from '../../../src/utils'
import { T0 } from '../../helpers/fixtures'

const options: MinerAggregateOptions = { configuredCount: 3, activeThreshold: 0.25, hashrateFloorTh: 0 }

function reachable(host: string, hashrateTh: number, peakHashrateTh = hashrateTh, bestDifficulty = 0): MinerReading {
  return { host, status: 'reachable', hashrateTh, peakHashrateTh, bestDifficulty, lastSeen: T0 }
}

function unreachable(host: string, hashrateTh = 0, bestDifficulty = 0): MinerReading {
  return { host, status: 'unreachable', hashrateTh, peakHashrateTh: hashrateTh, bestDifficulty, lastError: 'timeout' }
}

describe('miner state', () => {
  it('should start unknown', () => {
    deepStrictEqual(initialReading('192.168.1.50'), {
      host: '192.168.1.50',
      status: 'unknown',
      hashrateTh: 0,
      peakHashrateTh: 0,
      bestDifficulty: 0
    })
  })

  it('should track peak and best difficulty across polls', () => {
    let reading = initialReading('192.168.1.50')
    reading = recordSuccess(reading, { hashrateTh: 40, bestDifficulty: 5000 }, T0)
    reading = recordSuccess(reading, { hashrateTh: 30, bestDifficulty: 2000 }, toEpochDate(T0 + 1000))

    strictEqual(reading.hashrateTh, 30)
    strictEqual(reading.peakHashrateTh, 40)
    strictEqual(reading.bestDifficulty, 5000)
    strictEqual(reading.lastSeen, T0 + 1000)
  })

  it('should keep the last hashrate when a miner goes unreachable', () => {
    const seen = recordSuccess(initialReading('192.168.1.50'), { hashrateTh: 40, bestDifficulty: 5000 }, T0)
    const lost = recordFailure(seen, 'RequestTimeoutError: timed out', toEpochDate(T0 + 15000))

    strictEqual(lost.status, 'unreachable')
    strictEqual(lost.hashrateTh, 40)
    strictEqual(lost.lastSeen, T0)
    strictEqual(lost.lastAttempt, T0 + 15000)
    strictEqual(lost.lastError, 'RequestTimeoutError: timed out')
  })

  it('should clear the error after a successful poll', () => {
    const lost = recordFailure(initialReading('192.168.1.50'), 'refused', T0)
    const back = recordSuccess(lost, { hashrateTh: 1, bestDifficulty: 0 }, toEpochDate(T0 + 1000))

    strictEqual(back.lastError, undefined)
    strictEqual(back.status, 'reachable')
  })
})

describe('aggregateMiners', () => {
  it('should hide the feature without configured miners', () => {
    deepStrictEqual(aggregateMiners([], { ...options, configuredCount: 0 }), { visible: false })
  })

  it('should sum reachable miners and report degraded when one is missing', () => {
    const aggregate = aggregateMiners(
      [reachable('a', 40), reachable('b', 35), unreachable('c', 30)],
      options
    )

    deepStrictEqual(aggregate, {
      visible: true,
      totalHashrateTh: 75,
      bestDifficulty: 0,
      activeCount: 2,
      totalCount: 3,
      health: 'degraded',
      hashrateHistory: []
    })
  })

  it('should be healthy when every miner runs within the threshold', () => {
    const aggregate = aggregateMiners([reachable('a', 40), reachable('b', 35), reachable('c', 12, 40)], options)
    strictEqual(aggregate.visible && aggregate.health, 'healthy')
  })

  it('should be degraded when a miner falls below its share of peak', () => {
    const aggregate = aggregateMiners([reachable('a', 40), reachable('b', 35), reachable('c', 5, 40)], options)
    strictEqual(aggregate.visible && aggregate.health, 'degraded')
  })

  it('should be down when no miner is reachable', () => {
    const aggregate = aggregateMiners([unreachable('a', 40), unreachable('b'), unreachable('c')], options)

    strictEqual(aggregate.visible && aggregate.health, 'down')
    strictEqual(aggregate.visible && aggregate.totalHashrateTh, 0)
  })

  it('should report the best difficulty of every miner', () => {
    const aggregate = aggregateMiners([reachable('a', 40, 40, 900), unreachable('b', 0, 4000)], {
      ...options,
      configuredCount: 2
    })
    strictEqual(aggregate.visible && aggregate.bestDifficulty, 4000)
  })

  it('should copy the hashrate history', () => {
    const history = [70, 75]
    const aggregate = aggregateMiners([reachable('a', 40)], { ...options, configuredCount: 1 }, history)

    deepStrictEqual(aggregate.visible && aggregate.hashrateHistory, [70, 75])
  })
})

describe('isWithinThreshold', () => {
  it('should apply the larger of peak share and floor', () => {
    strictEqual(isWithinThreshold(reachable('a', 10, 40), options), true)
    strictEqual(isWithinThreshold(reachable('a', 9, 40), options), false)
    strictEqual(isWithinThreshold(reachable('a', 8, 8), { ...options, hashrateFloorTh: 10 }), false)
  })
})
