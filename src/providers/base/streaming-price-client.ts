import type { FeedStats, FeedStatus, PriceProvider } from '../../models'
import { ExponentialBackoff, type BackoffConfig } from '../../network/backoff'
import { parseJson } from '../../network/decode'
import { ConfigurationError, ProtocolError, classifyError, describeError } from '../../network/errors'
import type { SymbolRoute } from '../../symbols/symbol-registry'
import type { EpochDate } from '../../utils/dates'
import { NoopLogger, type Logger } from '../../utils/logger'
import { sleep } from '../../utils/sleep'
import type { SocketFactory, StreamSocket } from './stream-socket'
import type { PriceSink, StreamEvent } from './types'

/**
 * Configuration shared by all streaming clients
 */
export interface StreamingClientConfig {
  /** Routes of this provider, in subscription order */
  routes: readonly SymbolRoute[]
  backoff?: Partial<BackoffConfig>
  /** Abandon a socket not open after this long */
  connectTimeoutMs?: number
  /** Abandon a socket silent for this long */
  heartbeatTimeoutMs?: number
  /** Ping cadence while connected */
  pingIntervalMs?: number
  logger?: Logger
  random?: () => number
}

interface SessionState {
  /** Pairs still waiting for their subscription acknowledgement */
  readonly pending: Set<string>
  subscribed: boolean
  protocolErrors: number
}

/**
 * Long-lived subscription to one streaming provider.
 *
 * Each connection is one session of a worker loop: connect, subscribe to
 * the full pair set, feed decoded quotes into the sink until the socket
 * drops, then wait out a jittered exponential backoff and start over.
 * The provider counts as connected only after every pair is acknowledged.
 */
export abstract class StreamingPriceClient {
  abstract readonly provider: PriceProvider

  protected readonly logger: Logger
  private readonly config: Required<Omit<StreamingClientConfig, 'logger' | 'backoff' | 'random'>>
  private readonly backoff: ExponentialBackoff
  private controller = new AbortController()
  private worker?: Promise<void>
  private status: FeedStatus = 'idle'
  private reconnects = 0
  private messages = 0
  private errors = 0
  private connectedAt?: EpochDate
  private lastMessageAt?: EpochDate
  private lastError?: string

  constructor(
    config: StreamingClientConfig,
    protected readonly sink: PriceSink,
    private readonly socketFactory: SocketFactory
  ) {
    this.logger = config.logger ?? new NoopLogger()
    this.config = {
      routes: config.routes,
      connectTimeoutMs: config.connectTimeoutMs ?? 10000,
      heartbeatTimeoutMs: config.heartbeatTimeoutMs ?? 60000,
      pingIntervalMs: config.pingIntervalMs ?? 25000
    }
    this.backoff = new ExponentialBackoff(config.backoff, config.random)
  }

  /** URL of the provider's socket endpoint */
  protected abstract url(): string

  /** Frames sent right after the socket opened */
  protected abstract subscribeMessages(): string[]

  /** Pairs that need an acknowledgement before the feed counts as connected */
  protected abstract expectedAcks(): string[]

  /**
   * Decode one parsed frame
   * @throws ProtocolError when a frame of a known kind misses required fields
   */
  protected abstract decode(frame: unknown, receivedAt: EpochDate): StreamEvent

  get routes(): readonly SymbolRoute[] {
    return this.config.routes
  }

  /**
   * Fully subscribed and receiving
   */
  isConnected(): boolean {
    return this.status === 'connected'
  }

  stats(): FeedStats {
    return {
      provider: this.provider,
      status: this.status,
      reconnectAttempts: this.reconnects,
      messagesReceived: this.messages,
      protocolErrors: this.errors,
      ...(this.connectedAt !== undefined ? { connectedAt: this.connectedAt } : {}),
      ...(this.lastMessageAt !== undefined ? { lastMessageAt: this.lastMessageAt } : {}),
      ...(this.lastError !== undefined ? { lastError: this.lastError } : {})
    }
  }

  /**
   * Launch the worker loop. No-op without routes or when already running.
   */
  start(): void {
    if (this.worker || this.config.routes.length === 0) return

    this.controller = new AbortController()
    this.worker = this.run().catch((error: unknown) => {
      this.lastError = describeError(error)
      this.logger.error('Stream worker crashed', { error: this.lastError })
      this.setStatus('stopped')
    })
  }

  /**
   * Close the socket and wait for the worker loop to finish
   */
  async stop(): Promise<void> {
    this.controller.abort()
    await this.worker
    this.worker = undefined
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal

    while (!signal.aborted) {
      const reachedConnected = await this.runSession(signal)
      if (signal.aborted) break

      if (reachedConnected) {
        this.backoff.reset()
      }
      const delayMs = this.backoff.next()
      this.reconnects++
      this.setStatus('reconnecting')
      this.logger.info('Reconnecting', { delayMs, attempt: this.backoff.attempts })
      await sleep(delayMs, signal)
    }

    this.setStatus('stopped')
  }

  /**
   * One connection from open to close
   * @returns whether the session reached the connected state
   */
  private runSession(signal: AbortSignal): Promise<boolean> {
    return new Promise<boolean>(resolve => {
      const session: SessionState = {
        pending: new Set(this.expectedAcks()),
        subscribed: false,
        protocolErrors: 0
      }
      let settled = false
      let heartbeatTimer: NodeJS.Timeout | undefined
      let pingTimer: NodeJS.Timeout | undefined
      let socket: StreamSocket | undefined

      const finish = (reason: string, graceful = false): void => {
        if (settled) return
        settled = true

        clearTimeout(connectTimer)
        clearTimeout(heartbeatTimer)
        clearInterval(pingTimer)
        signal.removeEventListener('abort', onAbort)

        if (graceful) {
          socket?.close()
        } else {
          socket?.terminate()
        }

        this.logger.info('Stream session ended', { reason, subscribed: session.subscribed })
        resolve(session.subscribed)
      }

      const onAbort = (): void => finish('stopped', true)

      const armHeartbeat = (): void => {
        clearTimeout(heartbeatTimer)
        heartbeatTimer = setTimeout(() => {
          this.lastError = `No message for ${this.config.heartbeatTimeoutMs}ms`
          this.logger.warn('Stream silent, dropping connection', { timeoutMs: this.config.heartbeatTimeoutMs })
          finish('heartbeat timeout')
        }, this.config.heartbeatTimeoutMs)
      }

      const connectTimer = setTimeout(() => {
        this.lastError = `Not connected within ${this.config.connectTimeoutMs}ms`
        this.logger.warn('Connect timeout', { timeoutMs: this.config.connectTimeoutMs })
        finish('connect timeout')
      }, this.config.connectTimeoutMs)

      signal.addEventListener('abort', onAbort, { once: true })
      this.setStatus('connecting')

      const url = this.url()
      this.logger.info('Connecting', { url, pairs: this.config.routes.length })

      try {
        socket = this.socketFactory(url, {
          onOpen: () => {
            if (settled) return
            clearTimeout(connectTimer)
            armHeartbeat()
            pingTimer = setInterval(() => socket?.ping(), this.config.pingIntervalMs)

            const messages = this.subscribeMessages()
            if (session.pending.size === 0) {
              this.markSubscribed(session)
            } else {
              this.setStatus('subscribing')
            }
            for (const message of messages) {
              socket?.send(message)
            }
          },
          onMessage: text => {
            if (settled) return
            armHeartbeat()
            this.handleFrame(text, session)
          },
          onPong: () => {
            if (!settled) armHeartbeat()
          },
          onClose: (code, reason) => {
            if (settled) return
            this.logger.warn('Stream closed', { code, reason: reason || 'no reason' })
            finish(`closed (${code})`)
          },
          onError: error => {
            if (settled) return
            this.lastError = describeError(error)
            this.logger.warn('Stream error', { error: this.lastError, class: classifyError(error) })
            finish('error')
          }
        })
      } catch (error) {
        this.lastError = describeError(error)
        this.logger.error('Could not open stream', { error: this.lastError })
        finish('open failed')
      }

      if (signal.aborted) {
        finish('stopped', true)
      }
    })
  }

  private handleFrame(text: string, session: SessionState): void {
    const receivedAt = this.sink.now()
    this.messages++
    this.lastMessageAt = receivedAt

    let event: StreamEvent
    try {
      event = this.decode(parseJson(text, this.provider), receivedAt)
    } catch (error) {
      this.errors++
      session.protocolErrors++
      const context = { error: describeError(error), class: classifyError(error) }
      // Warn once per session
      if (session.protocolErrors === 1) {
        this.logger.warn('Discarding undecodable frame', context)
      } else {
        this.logger.debug('Discarding undecodable frame', context)
      }
      this.publish()
      return
    }

    switch (event.kind) {
      case 'quote':
        this.sink.applyQuote(event.quote)
        break

      case 'ack':
        session.pending.delete(event.pair)
        this.logger.debug('Subscription acknowledged', { pair: event.pair, pending: session.pending.size })
        if (session.pending.size === 0) {
          this.markSubscribed(session)
        }
        break

      case 'rejected': {
        const error = new ConfigurationError(`Subscription to ${event.pair} rejected: ${event.reason}`)
        this.lastError = error.message
        this.logger.warn('Subscription rejected, symbol left to REST', {
          pair: event.pair,
          error: describeError(error),
          class: classifyError(error)
        })
        session.pending.delete(event.pair)
        if (session.pending.size === 0) {
          this.markSubscribed(session)
        }
        break
      }

      case 'heartbeat':
      case 'ignored':
        break
    }

    this.publish()
  }

  private markSubscribed(session: SessionState): void {
    if (session.subscribed) return
    session.subscribed = true
    this.connectedAt = this.sink.now()
    this.setStatus('connected')
    this.logger.info('Stream connected', { pairs: this.config.routes.length })
  }

  private setStatus(status: FeedStatus): void {
    this.status = status
    this.publish()
  }

  private publish(): void {
    this.sink.updateFeed(this.stats())
  }

  /**
   * Helper for decoders: resolve a provider pair to its route
   * @throws ProtocolError for pairs this client never subscribed to
   */
  protected routeFor(pair: string): SymbolRoute {
    const wanted = pair.toUpperCase()
    const route = this.config.routes.find(candidate => candidate.pair.toUpperCase() === wanted)
    if (!route) {
      throw new ProtocolError(`Update for unsubscribed pair ${pair}`, this.provider)
    }
    return route
  }
}
