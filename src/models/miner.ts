import type { EpochDate } from '../utils/dates'

/**
 * Reachability of one miner endpoint
 */
export type MinerStatus = 'unknown' | 'reachable' | 'unreachable'

/**
 * Latest known telemetry for one configured miner
 */
export interface MinerReading {
  /** Host name or IP the miner is polled at */
  readonly host: string
  readonly status: MinerStatus
  /** Last known hashrate in TH/s, kept while unreachable */
  readonly hashrateTh: number
  /** Highest hashrate seen this session in TH/s */
  readonly peakHashrateTh: number
  /** Best share difficulty achieved this session */
  readonly bestDifficulty: number
  /** Last successful poll */
  readonly lastSeen?: EpochDate
  /** Last poll attempt, successful or not */
  readonly lastAttempt?: EpochDate
  /** Reason of the last failed poll */
  readonly lastError?: string
}

export type MinerHealth = 'healthy' | 'degraded' | 'down'

/**
 * Aggregate over all configured miners, recomputed on every read.
 * `visible: false` means no miners are configured and the feature is hidden.
 */
export type MinerAggregate =
  | { readonly visible: false }
  | {
    readonly visible: true
    /** Sum of reachable miners' hashrates in TH/s */
    readonly totalHashrateTh: number
    /** Best share difficulty across every miner this session */
    readonly bestDifficulty: number
    readonly activeCount: number
    readonly totalCount: number
    readonly health: MinerHealth
    /** Sampled total hashrate, oldest first */
    readonly hashrateHistory: readonly number[]
  }
