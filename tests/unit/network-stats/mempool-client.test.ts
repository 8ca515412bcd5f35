import { deepStrictEqual, rejects, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { ProtocolError } from '../../../src/network'
import { MempoolClient } from '../../../src/network-stats'
import { FakeHttpClient } from '../../helpers/fake-http-client'
import { T0 } from '../../helpers/fixtures'
import { MEMPOOL_BASE, mempoolRoutes } from '../../helpers/mempool-routes'

const BASE = MEMPOOL_BASE

describe('MempoolClient', () => {
  it('should assemble one record from every endpoint', async () => {
    const http = mempoolRoutes(new FakeHttpClient())

    const stats = await new MempoolClient(http, 10000).fetchStats(T0)

    deepStrictEqual(stats, {
      feeSatPerVb: 12.5,
      blockHeight: 850000,
      miningPool: 'Test Pool',
      networkHashrateEh: 650,
      difficulty: 8.6e13,
      observedAt: T0
    })
    strictEqual(http.requests.length, 5)
    strictEqual(http.requests.every(request => request.options?.timeoutMs === 10000), true)
  })

  it('should name the pool Unknown when the block carries none', async () => {
    const http = mempoolRoutes(new FakeHttpClient(), { difficulty: 8.6e13 })

    const stats = await new MempoolClient(http, 10000).fetchStats(T0)
    strictEqual(stats.miningPool, 'Unknown')
  })

  it('should reject a non-numeric block height', async () => {
    const http = mempoolRoutes(new FakeHttpClient()).on(`${BASE}/blocks/tip/height`, { body: '<html>' })

    await rejects(
      new MempoolClient(http, 10000).fetchStats(T0),
      (error: unknown) => error instanceof ProtocolError && error.message === 'Invalid block height: <html>'
    )
    strictEqual(http.requestsTo(`${BASE}/block-height`).length, 0)
  })

  it('should reject a malformed block hash', async () => {
    const http = mempoolRoutes(new FakeHttpClient()).on(`${BASE}/block-height/850000`, { body: 'not-a-hash' })

    await rejects(new MempoolClient(http, 10000).fetchStats(T0), ProtocolError)
  })

  it('should fail the cycle when the fee is missing', async () => {
    const http = mempoolRoutes(new FakeHttpClient()).on(`${BASE}/v1/fees/precise`, { body: { fastestFee: 20 } })

    await rejects(new MempoolClient(http, 10000).fetchStats(T0), ProtocolError)
  })
})
