import { epochDateNow, toEpochDate, type EpochDate } from './dates'

/**
 * Time source abstraction for consistent time access.
 * Workers read the clock through this so tests can drive staleness,
 * candle buckets and health classification with a simulated clock.
 */
export interface TimeSource {
  /**
   * Get current time as EpochDate (milliseconds since Unix epoch)
   */
  nowEpoch(): EpochDate
}

/**
 * Wall-clock source used at runtime
 */
export class RealTimeSource implements TimeSource {
  nowEpoch(): EpochDate {
    return epochDateNow()
  }
}

/**
 * Manually advanced clock for tests
 */
export class SimulatedTimeSource implements TimeSource {
  private currentTime: EpochDate
  private readonly startTime: EpochDate

  constructor(startTime: EpochDate = epochDateNow()) {
    this.startTime = startTime
    this.currentTime = startTime
  }

  nowEpoch(): EpochDate {
    return this.currentTime
  }

  /**
   * Advance time by specified milliseconds
   */
  advance(milliseconds: number): void {
    this.currentTime = toEpochDate(this.currentTime + milliseconds)
  }

  /**
   * Advance time to specific date
   */
  advanceTo(date: EpochDate | Date): void {
    const ms = date instanceof Date ? toEpochDate(date) : date
    if (ms < this.currentTime) {
      throw new Error('Cannot move time backwards')
    }
    this.currentTime = ms
  }

  /**
   * Reset to start time
   */
  reset(): void {
    this.currentTime = this.startTime
  }
}
