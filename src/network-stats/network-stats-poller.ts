import { classifyError, describeError } from '../network/errors'
import { ScheduledTask } from '../pipeline/scheduled-task'
import type { MarketState } from '../state/market-state'
import { NoopLogger, type Logger } from '../utils/logger'
import type { MempoolClient } from './mempool-client'

export interface NetworkStatsPollerConfig {
  pollIntervalMs: number
  logger?: Logger
}

/**
 * Polls Bitcoin network statistics on its own schedule. A failed cycle
 * leaves the previous record, and its timestamp, in place.
 */
export class NetworkStatsPoller {
  private readonly logger: Logger
  private readonly task: ScheduledTask
  private failures = 0

  constructor(
    config: NetworkStatsPollerConfig,
    private readonly state: MarketState,
    private readonly client: MempoolClient
  ) {
    this.logger = config.logger ?? new NoopLogger()
    this.task = new ScheduledTask(
      { name: 'network stats', intervalMs: config.pollIntervalMs, logger: this.logger },
      async signal => {
        await this.poll(signal)
      }
    )
  }

  start(): void {
    this.task.start()
  }

  stop(): Promise<void> {
    return this.task.stop()
  }

  /**
   * One polling cycle
   * @returns true when a new record was stored
   */
  async poll(signal?: AbortSignal): Promise<boolean> {
    // Records are stamped with the request time, not the response time
    const issuedAt = this.state.now()

    try {
      const stats = await this.client.fetchStats(issuedAt, signal)
      const stored = this.state.updateNetworkStats(stats)
      if (this.failures > 0) {
        this.logger.info('Network stats recovered', { failures: this.failures })
      }
      this.failures = 0
      this.logger.debug('Network stats updated', { blockHeight: stats.blockHeight, fee: stats.feeSatPerVb })
      return stored
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug('Network stats fetch cancelled')
        return false
      }
      this.failures++
      this.logger.warn('Network stats fetch failed', {
        error: describeError(error),
        class: classifyError(error),
        consecutiveFailures: this.failures
      })
      return false
    }
  }
}
