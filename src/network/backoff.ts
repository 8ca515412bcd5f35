/**
 * Configuration for reconnect delays
 */
export interface BackoffConfig {
  /** Delay in milliseconds before the first retry */
  readonly initialDelay: number
  /** Upper bound for any delay in milliseconds */
  readonly maxDelay: number
  /** Multiplier for exponential backoff */
  readonly multiplier: number
  /** Jitter factor (0-1) to randomize delays */
  readonly jitter: number
}

/**
 * Default backoff configuration
 */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelay: 1000,
  maxDelay: 120000,
  multiplier: 1.8,
  jitter: 0.2
}

/**
 * Exponential backoff with jitter, bounded by `maxDelay`.
 * Jitter spreads reconnects of many clients against the same provider.
 */
export class ExponentialBackoff {
  private readonly config: BackoffConfig
  private attempt = 0

  constructor(
    config: Partial<BackoffConfig> = {},
    private readonly random: () => number = Math.random
  ) {
    this.config = { ...DEFAULT_BACKOFF_CONFIG, ...config }
  }

  /**
   * Delay for the next attempt; advances the attempt counter
   */
  next(): number {
    const exponentialDelay = this.config.initialDelay *
      Math.pow(this.config.multiplier, this.attempt)

    const clampedDelay = Math.min(exponentialDelay, this.config.maxDelay)

    // ±jitter around the clamped delay
    const jitter = clampedDelay * this.config.jitter * (this.random() - 0.5) * 2

    this.attempt++
    return Math.round(Math.min(Math.max(clampedDelay + jitter, 0), this.config.maxDelay))
  }

  /**
   * Start over after a successful connection
   */
  reset(): void {
    this.attempt = 0
  }

  get attempts(): number {
    return this.attempt
  }
}
