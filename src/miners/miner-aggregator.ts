import type { MinerAggregate, MinerHealth, MinerReading } from '../models'

export interface MinerAggregateOptions {
  /** Number of configured miner hosts; 0 hides the feature */
  readonly configuredCount: number
  /** Fraction of its own peak an active miner must reach to count as healthy */
  readonly activeThreshold: number
  /** Absolute minimum hashrate in TH/s for a healthy miner */
  readonly hashrateFloorTh: number
}

/**
 * Whether a reachable miner runs within the active threshold
 */
export function isWithinThreshold(reading: MinerReading, options: MinerAggregateOptions): boolean {
  const required = Math.max(options.activeThreshold * reading.peakHashrateTh, options.hashrateFloorTh)
  return reading.hashrateTh >= required
}

/**
 * Reduce per-miner readings into one aggregate. Pure; called on every read.
 */
export function aggregateMiners(
  readings: readonly MinerReading[],
  options: MinerAggregateOptions,
  hashrateHistory: readonly number[] = []
): MinerAggregate {
  if (options.configuredCount === 0) {
    return { visible: false }
  }

  const active = readings.filter(reading => reading.status === 'reachable')
  const activeCount = Math.min(active.length, options.configuredCount)

  const totalHashrateTh = active.reduce((sum, reading) => sum + reading.hashrateTh, 0)
  const bestDifficulty = readings.reduce((best, reading) => Math.max(best, reading.bestDifficulty), 0)

  let health: MinerHealth
  if (activeCount === 0) {
    health = 'down'
  } else if (activeCount < options.configuredCount) {
    health = 'degraded'
  } else {
    health = active.every(reading => isWithinThreshold(reading, options)) ? 'healthy' : 'degraded'
  }

  return {
    visible: true,
    totalHashrateTh,
    bestDifficulty,
    activeCount,
    totalCount: options.configuredCount,
    health,
    hashrateHistory: [...hashrateHistory]
  }
}
