/**
 * Branded number type for epoch timestamps in milliseconds since 1970-01-01.
 *
 * Every timestamp stored in market state (quote observation times, candle
 * bucket starts, miner last-seen times) uses this type so that seconds and
 * milliseconds can't be mixed up silently.
 *
 * @example
 * const timestamp: EpochDate = toEpochDate(1705321845123)
 */
export type EpochDate = number & { readonly __brand: 'EpochDate' }

/**
 * Converts a Date object or timestamp to an epoch timestamp in milliseconds.
 *
 * @param value - A Date object or numeric timestamp to convert
 * @param precision - Optional precision for numeric timestamps: 'ms' (milliseconds, default) or 's' (seconds)
 *
 * @example
 * toEpochDate(new Date('2024-01-15T12:30:45.123Z')) // 1705321845123
 * toEpochDate(1705321845, 's') // 1705321845000
 */
export function toEpochDate(value: Date): EpochDate
export function toEpochDate(value: number, precision?: 'ms' | 's'): EpochDate
export function toEpochDate(value: Date | number, precision?: 'ms' | 's'): EpochDate {
  if (typeof value === 'number') {
    return (precision === 's' ? value * 1000 : value) as EpochDate
  }
  return value.getTime() as EpochDate
}

/**
 * Current wall-clock time as an EpochDate
 */
export function epochDateNow(): EpochDate {
  return Date.now() as EpochDate
}

/**
 * Milliseconds elapsed between two epoch timestamps (never negative)
 */
export function elapsedMs(since: EpochDate, now: EpochDate): number {
  return Math.max(0, now - since)
}
