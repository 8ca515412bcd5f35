import { z } from 'zod'
import { decimal, decodePayload } from '../network/decode'
import { ProtocolError } from '../network/errors'
import type { HttpClient, RequestOptions } from '../network/http-client'
import type { NetworkStats } from '../models'
import type { EpochDate } from '../utils/dates'

export const MEMPOOL_BASE_URL = 'https://mempool.space/api'

const feesSchema = z.object({
  halfHourFee: decimal
})

const blockSchema = z.object({
  difficulty: decimal,
  extras: z.object({
    pool: z.object({
      name: z.string().min(1).default('Unknown')
    }).default({})
  }).default({})
})

const hashrateSchema = z.object({
  /** H/s */
  currentHashrate: decimal
})

const HEIGHT_PATTERN = /^\d+$/
const HASH_PATTERN = /^[0-9a-f]{64}$/i

/**
 * Client for the mempool.space REST API
 */
export class MempoolClient {
  constructor(
    private readonly http: HttpClient,
    private readonly timeoutMs: number,
    private readonly baseUrl = MEMPOOL_BASE_URL
  ) {}

  /**
   * Fetch one complete record. Every request is bounded by the timeout;
   * any missing field fails the whole cycle. Cancelling the signal abandons
   * the request in flight and skips the rest.
   */
  async fetchStats(observedAt: EpochDate, signal?: AbortSignal): Promise<NetworkStats> {
    const options: RequestOptions = { timeoutMs: this.timeoutMs, signal }

    const fees = decodePayload(feesSchema, await this.http.getJson(`${this.baseUrl}/v1/fees/precise`, options), 'mempool')

    const heightText = (await this.http.getText(`${this.baseUrl}/blocks/tip/height`, options)).trim()
    if (!HEIGHT_PATTERN.test(heightText)) {
      throw new ProtocolError(`Invalid block height: ${heightText.slice(0, 32)}`, 'mempool')
    }
    const blockHeight = Number(heightText)

    const hash = (await this.http.getText(`${this.baseUrl}/block-height/${blockHeight}`, options)).trim()
    if (!HASH_PATTERN.test(hash)) {
      throw new ProtocolError(`Invalid block hash for height ${blockHeight}`, 'mempool')
    }

    const block = decodePayload(blockSchema, await this.http.getJson(`${this.baseUrl}/v1/block/${hash}`, options), 'mempool')
    const hashrate = decodePayload(
      hashrateSchema,
      await this.http.getJson(`${this.baseUrl}/v1/mining/hashrate/3m`, options),
      'mempool'
    )

    return {
      feeSatPerVb: fees.halfHourFee,
      blockHeight,
      miningPool: block.extras.pool.name,
      networkHashrateEh: hashrate.currentHashrate / 1e18,
      difficulty: block.difficulty,
      observedAt
    }
  }
}
