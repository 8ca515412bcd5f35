import { EventEmitter } from 'node:events'
import type { MarketState } from '../state/market-state'
import { NoopLogger, type Logger } from '../utils/logger'
import { ScheduledTask } from './scheduled-task'

export interface SymbolRotatorConfig {
  /** Main symbols in rotation order */
  symbols: readonly string[]
  intervalMs: number
  logger?: Logger
}

export interface SymbolRotation {
  previous: string
  next: string
}

/**
 * Rotator events
 */
export interface SymbolRotatorEvents {
  rotate: [rotation: SymbolRotation]
}

/**
 * Cycles the active main symbol on a fixed interval, wrapping at the end
 * of the list. With a single main symbol it never fires.
 */
export class SymbolRotator extends EventEmitter {
  private readonly logger: Logger
  private readonly task: ScheduledTask

  constructor(
    private readonly config: SymbolRotatorConfig,
    private readonly state: MarketState
  ) {
    super()
    this.logger = config.logger ?? new NoopLogger()
    this.task = new ScheduledTask(
      {
        name: 'symbol rotator',
        intervalMs: config.intervalMs,
        initialDelayMs: config.intervalMs,
        logger: this.logger
      },
      async () => {
        this.rotate()
      }
    )
  }

  get enabled(): boolean {
    return this.config.symbols.length > 1
  }

  current(): string {
    return this.state.getActiveSymbol()
  }

  start(): void {
    if (!this.enabled) {
      this.logger.debug('Single main symbol, rotation disabled', { symbol: this.current() })
      return
    }
    this.task.start()
  }

  stop(): Promise<void> {
    return this.task.stop()
  }

  /**
   * Advance to the next main symbol
   * @returns the symbol now active
   */
  rotate(): string {
    const previous = this.current()
    if (!this.enabled) {
      return previous
    }

    const index = this.config.symbols.indexOf(previous)
    const next = this.config.symbols[(index + 1) % this.config.symbols.length] ?? previous

    if (this.state.setActiveSymbol(next)) {
      this.logger.info('Active symbol rotated', { previous, next })
      this.emit('rotate', { previous, next })
    }
    return next
  }

  /**
   * Type-safe event emitter methods
   */
  emit<K extends keyof SymbolRotatorEvents>(event: K, ...args: SymbolRotatorEvents[K]): boolean {
    return super.emit(event, ...args)
  }

  on<K extends keyof SymbolRotatorEvents>(event: K, listener: (...args: SymbolRotatorEvents[K]) => void): this {
    return super.on(event, listener)
  }
}
