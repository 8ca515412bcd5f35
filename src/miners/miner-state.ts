import type { MinerReading } from '../models'
import type { EpochDate } from '../utils/dates'

/**
 * Parsed telemetry of one successful poll
 */
export interface MinerSample {
  readonly hashrateTh: number
  readonly bestDifficulty: number
}

/**
 * Reading of a miner that has not been polled yet
 */
export function initialReading(host: string): MinerReading {
  return {
    host,
    status: 'unknown',
    hashrateTh: 0,
    peakHashrateTh: 0,
    bestDifficulty: 0
  }
}

/**
 * unknown/unreachable/reachable → reachable
 *
 * Peak hashrate and best difficulty only ever grow during a session.
 */
export function recordSuccess(reading: MinerReading, sample: MinerSample, at: EpochDate): MinerReading {
  return {
    host: reading.host,
    status: 'reachable',
    hashrateTh: sample.hashrateTh,
    peakHashrateTh: Math.max(reading.peakHashrateTh, sample.hashrateTh),
    bestDifficulty: Math.max(reading.bestDifficulty, sample.bestDifficulty),
    lastSeen: at,
    lastAttempt: at
  }
}

/**
 * unknown/reachable/unreachable → unreachable
 *
 * The last known hashrate stays for display; only the status changes.
 */
export function recordFailure(reading: MinerReading, reason: string, at: EpochDate): MinerReading {
  return {
    ...reading,
    status: 'unreachable',
    lastAttempt: at,
    lastError: reason
  }
}
