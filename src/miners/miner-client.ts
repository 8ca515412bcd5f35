import { z } from 'zod'
import { decimal, decodePayload } from '../network/decode'
import { ProtocolError } from '../network/errors'
import type { HttpClient } from '../network/http-client'
import type { MinerSample } from './miner-state'

const DIFFICULTY_SUFFIXES: Record<string, number> = {
  '': 1,
  k: 1e3,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15
}

/**
 * Parse a share difficulty sent either as a number or as "4.29G"
 * @throws ProtocolError on anything else
 */
export function parseDifficulty(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ProtocolError(`Invalid difficulty: ${value}`, 'miner')
    }
    return value
  }

  const match = /^\s*(\d+(?:\.\d+)?)\s*([kKMGTP]?)\s*$/.exec(value)
  const multiplier = match ? DIFFICULTY_SUFFIXES[match[2] ?? ''] : undefined
  if (!match || multiplier === undefined) {
    throw new ProtocolError(`Invalid difficulty: ${value}`, 'miner')
  }
  return Number(match[1]) * multiplier
}

/**
 * `/api/system/info` of AxeOS-style firmware (BitAxe, NerdQAxe).
 * Only the fields the dashboard uses are checked; others are ignored.
 */
const systemInfoSchema = z.object({
  /** GH/s */
  hashRate: decimal.refine(value => value >= 0, { message: 'Negative hashrate' }),
  bestDiff: z.union([z.number(), z.string()]).default(0)
})

/**
 * Reads telemetry from one miner on the local network
 */
export class MinerClient {
  constructor(
    private readonly http: HttpClient,
    private readonly timeoutMs: number
  ) {}

  static infoUrl(host: string): string {
    return `http://${host}/api/system/info`
  }

  /**
   * Single bounded poll of one miner
   * @throws on timeout, cancellation, connection failure, non-2xx or unparseable payload
   */
  async fetchSample(host: string, signal?: AbortSignal): Promise<MinerSample> {
    const payload = await this.http.getJson(MinerClient.infoUrl(host), { timeoutMs: this.timeoutMs, signal })
    return MinerClient.decode(payload)
  }

  static decode(payload: unknown): MinerSample {
    const info = decodePayload(systemInfoSchema, payload, 'miner')
    return {
      hashrateTh: info.hashRate / 1000,
      bestDifficulty: parseDifficulty(info.bestDiff)
    }
  }
}
