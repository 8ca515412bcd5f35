import { deepStrictEqual, strictEqual } from 'node:assert'
import { afterEach, describe, it } from 'node:test'
import type { PriceProvider, PriceQuote } from '../../../src/models'
import { RestFallbackManager } from '../../../src/pipeline'
import type { PriceRestClient } from '../../../src/providers'
import type { MarketState } from '../../../src/state'
import { isStreamingProvider, type SymbolRoute } from '../../../src/symbols'
import { sleep } from '../../../src/utils'
import { T0, createState, quote } from '../../helpers/fixtures'
import { RecordingLogger } from '../../helpers/recording-logger'

const DATA_TIMEOUT = 300000

/**
 * REST client answering with the current clock time
 */
class StubRestClient implements PriceRestClient {
  readonly requested: string[][] = []
  failure?: Error
  /** Answer nothing until the request is cancelled */
  hang = false

  constructor(
    readonly provider: PriceProvider,
    private readonly state: MarketState
  ) {}

  async fetchQuotes(routes: readonly SymbolRoute[], signal?: AbortSignal): Promise<PriceQuote[]> {
    this.requested.push(routes.map(route => route.symbol))
    if (this.failure) throw this.failure
    if (this.hang) {
      await new Promise((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('cancelled')), { once: true })
      })
    }

    return routes.map(route => quote(route.symbol, 50, this.state.now(), { source: 'rest', provider: this.provider }))
  }
}

describe('RestFallbackManager', () => {
  let manager: RestFallbackManager | undefined

  afterEach(async () => {
    await manager?.stop()
    manager = undefined
  })

  function setup(connected: (provider: PriceProvider) => boolean) {
    const { state, clock } = createState()
    const logger = new RecordingLogger()
    const binance = new StubRestClient('binance', state)
    const kraken = new StubRestClient('kraken', state)
    const routes = state.registry.tracked().filter(route => isStreamingProvider(route.provider))

    const created = new RestFallbackManager(
      { routes, checkIntervalMs: 5000, fallbackIntervalMs: 30000, logger },
      state,
      new Map<PriceProvider, PriceRestClient>([['binance', binance], ['kraken', kraken]]),
      connected
    )
    manager = created
    return { state, clock, logger, binance, kraken, manager: created }
  }

  it('should poll only the symbol whose stream went silent', async () => {
    const { state, clock, binance, kraken, manager } = setup(() => true)

    state.applyQuote(quote('BTCUSDT', 100, T0))
    clock.advance(DATA_TIMEOUT + 1)
    state.applyQuote(quote('ETHUSDT', 3000, clock.nowEpoch()))
    state.applyQuote(quote('XMRUSDT', 160, clock.nowEpoch(), { provider: 'kraken' }))

    await manager.check()

    deepStrictEqual(manager.activeFallbacks(), ['BTCUSDT'])
    deepStrictEqual(binance.requested, [['BTCUSDT']])
    deepStrictEqual(kraken.requested, [])
    strictEqual(state.getQuote('BTCUSDT')?.source, 'rest')
    strictEqual(state.getQuote('BTCUSDT')?.observedAt, clock.nowEpoch())
    deepStrictEqual(state.snapshot().fallbackSymbols, ['BTCUSDT'])
  })

  it('should stop polling once the stream delivers again', async () => {
    const { state, clock, logger, manager } = setup(() => true)

    state.applyQuote(quote('ETHUSDT', 3000, T0))
    state.applyQuote(quote('XMRUSDT', 160, T0, { provider: 'kraken' }))
    await manager.check()
    deepStrictEqual(manager.activeFallbacks(), ['BTCUSDT'])

    clock.advance(1000)
    state.applyQuote(quote('BTCUSDT', 101, clock.nowEpoch()))
    await manager.check()

    deepStrictEqual(manager.activeFallbacks(), [])
    deepStrictEqual(state.snapshot().fallbackSymbols, [])
    deepStrictEqual(logger.messages('info'), [
      'Stream unavailable or stale, REST fallback started',
      'Stream recovered, REST fallback stopped'
    ])
  })

  it('should poll every symbol of a disconnected provider', async () => {
    const { state, binance, kraken, manager } = setup(provider => provider !== 'binance')

    state.applyQuote(quote('XMRUSDT', 160, T0, { provider: 'kraken' }))
    await manager.check()

    deepStrictEqual(manager.activeFallbacks(), ['BTCUSDT', 'ETHUSDT'])
    deepStrictEqual(binance.requested, [['BTCUSDT'], ['ETHUSDT']])
    deepStrictEqual(kraken.requested, [])
  })

  it('should bootstrap every symbol before any stream data', async () => {
    const { state, manager } = setup(() => false)

    await manager.check()

    deepStrictEqual(state.snapshot().fallbackSymbols, ['BTCUSDT', 'ETHUSDT', 'XMRUSDT'])
    strictEqual(state.getQuote('XMRUSDT')?.provider, 'kraken')
  })

  it('should log a failed request and keep the symbol on fallback', async () => {
    const { logger, binance, manager } = setup(provider => provider !== 'binance')
    binance.failure = new Error('socket hang up')

    await manager.check()

    strictEqual(manager.activeFallbacks().includes('BTCUSDT'), true)
    deepStrictEqual(logger.messages('warn'), ['REST fallback failed', 'REST fallback failed'])
  })

  it('should clear fallback symbols on stop', async () => {
    const { state, manager } = setup(() => false)

    await manager.check()
    await manager.stop()

    deepStrictEqual(manager.activeFallbacks(), [])
    deepStrictEqual(state.snapshot().fallbackSymbols, [])
  })

  it('should cancel requests in flight on stop', { timeout: 2000 }, async () => {
    const { state, logger, binance, manager } = setup(() => false)
    binance.hang = true

    manager.start()
    await sleep(10)
    deepStrictEqual(binance.requested, [['BTCUSDT'], ['ETHUSDT']])

    await manager.stop()

    deepStrictEqual(state.snapshot().fallbackSymbols, [])
    deepStrictEqual(logger.messages('warn'), [])
    deepStrictEqual(
      logger.messages('debug').filter(message => message === 'REST fallback request cancelled'),
      ['REST fallback request cancelled', 'REST fallback request cancelled']
    )
  })
})
