import type { EpochDate } from '../utils/dates'

/**
 * Bitcoin network statistics from one polling cycle
 */
export interface NetworkStats {
  /** Recommended fee in sat/vB */
  readonly feeSatPerVb: number
  readonly blockHeight: number
  /** Mining pool of the latest block */
  readonly miningPool: string
  /** Network hashrate in EH/s */
  readonly networkHashrateEh: number
  readonly difficulty: number
  readonly observedAt: EpochDate
}
