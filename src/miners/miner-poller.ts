import { classifyError, describeError } from '../network/errors'
import { ScheduledTask } from '../pipeline/scheduled-task'
import type { MarketState } from '../state/market-state'
import { NoopLogger, type Logger } from '../utils/logger'
import type { MinerClient } from './miner-client'

export interface MinerPollerConfig {
  hosts: readonly string[]
  pollIntervalMs: number
  logger?: Logger
}

/**
 * Polls every configured miner on its own schedule. A slow or dead miner
 * only ever delays its own next poll.
 */
export class MinerPoller {
  private readonly logger: Logger
  private readonly tasks: ScheduledTask[]
  private readonly sampler: ScheduledTask

  constructor(
    private readonly config: MinerPollerConfig,
    private readonly state: MarketState,
    private readonly client: MinerClient
  ) {
    this.logger = config.logger ?? new NoopLogger()

    this.tasks = config.hosts.map(host => new ScheduledTask(
      { name: `miner ${host}`, intervalMs: config.pollIntervalMs, logger: this.logger },
      signal => this.poll(host, signal)
    ))

    // First sample after the first round of polls had a chance to land
    this.sampler = new ScheduledTask(
      {
        name: 'hashrate sampler',
        intervalMs: config.pollIntervalMs,
        initialDelayMs: config.pollIntervalMs,
        logger: this.logger
      },
      async () => this.state.sampleHashrate()
    )
  }

  /** Whether any miner is configured */
  get enabled(): boolean {
    return this.tasks.length > 0
  }

  start(): void {
    if (!this.enabled) {
      this.logger.info('No miners configured, miner polling disabled')
      return
    }

    this.logger.info('Starting miner polling', { miners: this.config.hosts.length })
    for (const task of this.tasks) {
      task.start()
    }
    this.sampler.start()
  }

  async stop(): Promise<void> {
    await Promise.all([...this.tasks, this.sampler].map(task => task.stop()))
  }

  /**
   * Poll every miner once, concurrently, and take a hashrate sample
   */
  async pollAll(): Promise<void> {
    await Promise.all(this.tasks.map(task => task.runNow()))
    if (this.enabled) {
      this.state.sampleHashrate()
    }
  }

  /**
   * One bounded poll; the outcome always ends up in the miner's reading
   */
  async poll(host: string, signal?: AbortSignal): Promise<void> {
    const previous = this.state.minerReadings().find(reading => reading.host === host)

    try {
      const sample = await this.client.fetchSample(host, signal)
      this.state.recordMinerSuccess(host, sample)

      if (previous?.status !== 'reachable') {
        this.logger.info('Miner reachable', { host, hashrateTh: sample.hashrateTh })
      }
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug('Miner poll cancelled', { host })
        return
      }
      this.state.recordMinerFailure(host, describeError(error))

      const context = { host, error: describeError(error), class: classifyError(error) }
      if (previous?.status === 'unreachable') {
        this.logger.debug('Miner still unreachable', context)
      } else {
        this.logger.warn('Miner unreachable', context)
      }
    }
  }
}
