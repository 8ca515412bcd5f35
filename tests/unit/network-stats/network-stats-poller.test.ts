import { deepStrictEqual, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { NetworkError } from '../../../src/network'
import { MempoolClient, NetworkStatsPoller } from '../../../src/network-stats'
import { sleep, toEpochDate } from '../../../src/utils'
import { FakeHttpClient } from '../../helpers/fake-http-client'
import { T0, createState } from '../../helpers/fixtures'
import { MEMPOOL_BASE, mempoolRoutes } from '../../helpers/mempool-routes'
import { RecordingLogger } from '../../helpers/recording-logger'

describe('NetworkStatsPoller', () => {
  function setup() {
    const { state, clock } = createState()
    const http = mempoolRoutes(new FakeHttpClient())
    const logger = new RecordingLogger()
    const poller = new NetworkStatsPoller({ pollIntervalMs: 60000, logger }, state, new MempoolClient(http, 10000))
    return { state, clock, http, logger, poller }
  }

  it('should store a record stamped with the request time', async () => {
    const { state, poller } = setup()

    strictEqual(await poller.poll(), true)

    const stats = state.getNetworkStats()
    strictEqual(stats?.blockHeight, 850000)
    strictEqual(stats?.observedAt, T0)
  })

  it('should keep the previous record when a cycle fails', async () => {
    const { state, clock, http, logger, poller } = setup()
    await poller.poll()
    const before = state.getNetworkStats()

    http.on(`${MEMPOOL_BASE}/v1/mining/hashrate/3m`, { error: new NetworkError('connect ECONNREFUSED', 'ECONNREFUSED') })
    clock.advance(60000)

    strictEqual(await poller.poll(), false)
    deepStrictEqual(state.getNetworkStats(), before)
    deepStrictEqual(logger.messages('warn'), ['Network stats fetch failed'])
    strictEqual(logger.entries.at(-1)?.context?.['consecutiveFailures'], 1)
  })

  it('should log the recovery after failures', async () => {
    const { state, clock, http, logger, poller } = setup()
    http.on(`${MEMPOOL_BASE}/v1/fees/precise`, { error: new NetworkError('socket hang up') })
    await poller.poll()
    await poller.poll()

    mempoolRoutes(http)
    clock.advance(60000)

    strictEqual(await poller.poll(), true)
    deepStrictEqual(logger.messages('info'), ['Network stats recovered'])
    strictEqual(state.getNetworkStats()?.observedAt, toEpochDate(T0 + 60000))
  })

  it('should cancel the request in flight when stopped', { timeout: 2000 }, async () => {
    const { state, http, logger, poller } = setup()
    http.on(`${MEMPOOL_BASE}/v1/fees/precise`, { hang: true })

    poller.start()
    await sleep(10)
    strictEqual(http.requests.length, 1)

    await poller.stop()

    strictEqual(http.requests.length, 1)
    strictEqual(state.getNetworkStats(), undefined)
    deepStrictEqual(logger.messages('warn'), [])
    deepStrictEqual(logger.messages('debug'), ['Network stats fetch cancelled'])
  })
})
