import { classifyError, describeError } from '../network/errors'
import { NoopLogger, type Logger } from '../utils/logger'

/**
 * One cycle of work. May return a delay in milliseconds that replaces the
 * regular interval before the next cycle (e.g. after a rate limit).
 */
export type TaskCycle = (signal: AbortSignal) => Promise<number | void>

export interface ScheduledTaskConfig {
  /** Name used in log lines */
  name: string
  /** Delay between the end of one cycle and the start of the next */
  intervalMs: number
  /** Delay before the first cycle (default: run immediately) */
  initialDelayMs?: number
  logger?: Logger
}

/**
 * Cancellable periodic task. Cycles never overlap: the next one is
 * scheduled only after the previous one settled. A failing cycle is logged
 * and the schedule continues.
 */
export class ScheduledTask {
  private readonly config: Required<ScheduledTaskConfig>
  private timer?: NodeJS.Timeout
  private inFlight?: Promise<void>
  private controller = new AbortController()
  private active = false
  private cycleCount = 0

  constructor(config: ScheduledTaskConfig, private readonly cycle: TaskCycle) {
    this.config = {
      name: config.name,
      intervalMs: config.intervalMs,
      initialDelayMs: config.initialDelayMs ?? 0,
      logger: config.logger ?? new NoopLogger()
    }
  }

  get running(): boolean {
    return this.active
  }

  /** Number of completed cycles */
  get cycles(): number {
    return this.cycleCount
  }

  start(): void {
    if (this.active) return

    this.active = true
    this.controller = new AbortController()
    this.schedule(this.config.initialDelayMs)
  }

  /**
   * Cancel the schedule and wait for a cycle in flight to settle
   */
  async stop(): Promise<void> {
    this.active = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
    this.controller.abort()
    await this.inFlight
  }

  /**
   * Run a cycle now instead of waiting for the timer.
   * Joins the cycle in flight when there is one.
   */
  async runNow(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight
      return
    }

    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
    await this.tick()
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined
      this.tick().catch((error: unknown) => {
        this.config.logger.error(`${this.config.name}: scheduler failure`, { error: describeError(error) })
      })
    }, Math.max(0, delayMs))
  }

  private tick(): Promise<void> {
    const cycle = this.execute().then(delayMs => {
      this.inFlight = undefined
      this.cycleCount++
      if (this.active && !this.timer) {
        this.schedule(delayMs)
      }
    })
    this.inFlight = cycle
    return cycle
  }

  private async execute(): Promise<number> {
    try {
      const override = await this.cycle(this.controller.signal)
      return typeof override === 'number' ? override : this.config.intervalMs
    } catch (error) {
      this.config.logger.warn(`${this.config.name}: cycle failed`, {
        error: describeError(error),
        class: classifyError(error)
      })
      return this.config.intervalMs
    }
  }
}
