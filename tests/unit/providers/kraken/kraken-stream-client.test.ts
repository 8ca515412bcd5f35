import { deepStrictEqual, ok, strictEqual } from 'node:assert'
import { afterEach, describe, it } from 'node:test'
import { KrakenStreamClient } from '../../../../src/providers'
import { sleep } from '../../../../src/utils'
import { FakeSocketFactory } from '../../../helpers/fake-socket'
import { T0, createRegistry, createState } from '../../../helpers/fixtures'

const SUBSCRIBE = {
  event: 'subscribe',
  pair: ['XMR/USDT', 'ESX/USD'],
  subscription: { name: 'ticker' }
}

function status(pair: string, outcome: 'subscribed' | 'error', errorMessage?: string) {
  return {
    channelID: 42,
    event: 'subscriptionStatus',
    status: outcome,
    pair,
    subscription: { name: 'ticker' },
    ...(errorMessage !== undefined ? { errorMessage } : {})
  }
}

describe('KrakenStreamClient', () => {
  let client: KrakenStreamClient | undefined

  afterEach(async () => {
    await client?.stop()
    client = undefined
  })

  function setup() {
    const { state, clock } = createState({
      registry: createRegistry({
        marqueeSymbols: ['XMRUSDT', 'ESXUSD'],
        krakenPairs: { xmrusdt: 'XMR/USDT', esxusd: 'ESX/USD' }
      })
    })
    const factory = new FakeSocketFactory()
    const created = new KrakenStreamClient(
      {
        routes: state.registry.byProvider('kraken'),
        backoff: { initialDelay: 5, maxDelay: 5, jitter: 0 }
      },
      state,
      factory.create
    )
    client = created
    created.start()

    const socket = factory.last
    ok(socket)
    return { state, clock, factory, socket, client: created }
  }

  it('should subscribe to every pair in one request', () => {
    const { socket, client } = setup()
    socket.open()

    strictEqual(socket.url, 'wss://ws.kraken.com')
    deepStrictEqual(socket.sentFrames(), [SUBSCRIBE])
    strictEqual(client.stats().status, 'subscribing')
  })

  it('should count as connected once every pair is acknowledged', () => {
    const { socket, client } = setup()
    socket.open()

    socket.receive(status('XMR/USDT', 'subscribed'))
    strictEqual(client.isConnected(), false)

    socket.receive(status('ESX/USD', 'subscribed'))
    strictEqual(client.isConnected(), true)
  })

  it('should leave a rejected pair out and still connect', () => {
    const { socket, client } = setup()
    socket.open()

    socket.receive(status('XMR/USDT', 'subscribed'))
    socket.receive(status('ESX/USD', 'error', 'Currency pair not supported ESX/USD'))

    strictEqual(client.isConnected(), true)
    strictEqual(client.stats().lastError, 'Subscription to ESX/USD rejected: Currency pair not supported ESX/USD')
  })

  it('should decode ticker frames against the 24h open', () => {
    const { state, socket } = setup()
    socket.open()

    socket.receive({ event: 'heartbeat' })
    socket.receive([42, { c: ['160.50', '0.25'], o: ['158.00', '155.00'], v: ['10', '20'] }, 'ticker', 'XMR/USDT'])

    const quote = state.getQuote('XMRUSDT')
    strictEqual(quote?.price, 160.5)
    strictEqual(quote?.change24h, (160.5 - 155) / 155 * 100)
    strictEqual(quote?.provider, 'kraken')
    strictEqual(quote?.observedAt, T0)
  })

  it('should ignore system events', () => {
    const { socket, client } = setup()
    socket.open()

    socket.receive({ event: 'systemStatus', status: 'online', version: '1.9.0' })

    strictEqual(client.stats().protocolErrors, 0)
    strictEqual(client.stats().messagesReceived, 1)
  })

  it('should count malformed ticker frames', () => {
    const { state, socket, client } = setup()
    socket.open()

    socket.receive([42, { c: ['n/a'], o: ['1', '1'] }, 'ticker', 'XMR/USDT'])
    socket.receive([42, { c: ['1'], o: ['1', '1'] }, 'ticker', 'DOGE/USD'])

    strictEqual(client.stats().protocolErrors, 2)
    strictEqual(state.getQuote('XMRUSDT'), undefined)
  })

  it('should resubscribe the exact pair set after reconnecting', async () => {
    const { factory, socket } = setup()
    socket.open()
    socket.receive(status('XMR/USDT', 'subscribed'))
    socket.receive(status('ESX/USD', 'subscribed'))

    socket.drop(1006, 'abnormal closure')
    await sleep(30)

    const second = factory.last
    ok(second && second !== socket)
    second.open()

    deepStrictEqual(second.sentFrames(), [SUBSCRIBE])
  })
})
