import type { PriceQuote } from '../../src/models'
import { MarketState, type MarketStateConfig } from '../../src/state/market-state'
import { SymbolRegistry, type SymbolRegistryOptions } from '../../src/symbols/symbol-registry'
import { toEpochDate, type EpochDate } from '../../src/utils/dates'
import { SimulatedTimeSource } from '../../src/utils/time-source'

/** 2024-01-01T00:00:00Z, aligned to every candle length used in tests */
export const T0: EpochDate = toEpochDate(1704067200000)

export function createRegistry(options: Partial<SymbolRegistryOptions> = {}): SymbolRegistry {
  return new SymbolRegistry({
    mainSymbols: ['BTCUSDT', 'ETHUSDT'],
    marqueeSymbols: ['ETHUSDT', 'XMRUSDT', 'RUNECOIN'],
    krakenPairs: { xmrusdt: 'XMR/USDT' },
    coingeckoIds: { runecoin: 'runecoin' },
    priceDecimals: { runecoin: 8 },
    ...options
  })
}

export interface TestState {
  state: MarketState
  clock: SimulatedTimeSource
}

/**
 * Market state on a simulated clock starting at T0
 */
export function createState(overrides: Partial<MarketStateConfig> = {}): TestState {
  const clock = new SimulatedTimeSource(T0)
  const state = new MarketState({
    registry: createRegistry(),
    candleSeconds: 60,
    maxCandles: 14,
    dataTimeoutMs: 300000,
    minerDataTimeoutMs: 60000,
    healthFailureMultiplier: 3,
    minerHosts: [],
    minerActiveThreshold: 0.25,
    minerHashrateFloorTh: 0,
    timeSource: clock,
    ...overrides
  })
  return { state, clock }
}

export function quote(symbol: string, price: number, observedAt: EpochDate, overrides: Partial<PriceQuote> = {}): PriceQuote {
  return {
    symbol,
    price,
    change24h: 0,
    source: 'stream',
    provider: 'binance',
    observedAt,
    ...overrides
  }
}

/**
 * Let pending promise callbacks and I/O callbacks run
 */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve))
}
