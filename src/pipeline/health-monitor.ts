import type { Freshness, HealthIndicator, HealthReport, SubsystemHealth, SubsystemName } from '../models'
import { elapsedMs, type EpochDate } from '../utils/dates'

/**
 * Timestamps of one tracked subsystem
 */
export interface SubsystemInput {
  readonly name: SubsystemName
  readonly lastSuccess?: EpochDate
  readonly timeoutMs: number
}

export interface HealthOptions {
  /** When the core started; the age of a subsystem that never succeeded counts from here */
  readonly startedAt: EpochDate
  /** Age beyond timeout × multiplier marks a subsystem failed */
  readonly failureMultiplier: number
}

const INDICATORS: Record<Freshness, HealthIndicator> = {
  fresh: 'green',
  stale: 'orange',
  failed: 'red'
}

/**
 * Classify one subsystem.
 *
 * fresh: age ≤ timeout. failed: age > timeout × multiplier, or no success
 * at all and age > timeout. stale: anything in between.
 */
export function classifySubsystem(input: SubsystemInput, now: EpochDate, options: HealthOptions): SubsystemHealth {
  const ageMs = elapsedMs(input.lastSuccess ?? options.startedAt, now)

  let freshness: Freshness
  if (ageMs <= input.timeoutMs) {
    freshness = 'fresh'
  } else if (input.lastSuccess === undefined || ageMs > input.timeoutMs * options.failureMultiplier) {
    freshness = 'failed'
  } else {
    freshness = 'stale'
  }

  return {
    name: input.name,
    freshness,
    ...(input.lastSuccess !== undefined ? { lastSuccess: input.lastSuccess } : {}),
    ageMs,
    timeoutMs: input.timeoutMs
  }
}

/**
 * Derive the overall health from the tracked subsystems. Pure.
 *
 * Overall is failed when every subsystem is past its timeout, fresh when
 * none is, stale otherwise. No tracked subsystem at all counts as fresh.
 */
export function evaluateHealth(
  inputs: readonly SubsystemInput[],
  now: EpochDate,
  options: HealthOptions
): HealthReport {
  const subsystems = inputs.map(input => classifySubsystem(input, now, options))
  const overdue = subsystems.filter(subsystem => subsystem.freshness !== 'fresh').length

  let overall: Freshness
  if (overdue === 0) {
    overall = 'fresh'
  } else if (overdue === subsystems.length) {
    overall = 'failed'
  } else {
    overall = 'stale'
  }

  return {
    overall,
    indicator: INDICATORS[overall],
    subsystems
  }
}
