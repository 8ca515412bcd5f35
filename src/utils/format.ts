/**
 * Display helpers for snapshot consumers. Pure, no locale state.
 */

const NETWORK_UNITS = ['TH/s', 'PH/s', 'EH/s', 'ZH/s', 'YH/s'] as const
const EH_INDEX = 2

/**
 * Miner hashrate, e.g. "12.34 TH/s"
 */
export function formatHashrate(hashrateTh: number): string {
  return `${hashrateTh.toFixed(2)} TH/s`
}

/**
 * Share difficulty with K/M/G/T scaling, e.g. "4.29 G"
 */
export function formatDifficulty(difficulty: number): string {
  if (difficulty >= 1e12) return `${(difficulty / 1e12).toFixed(2)} T`
  if (difficulty >= 1e9) return `${(difficulty / 1e9).toFixed(2)} G`
  if (difficulty >= 1e6) return `${(difficulty / 1e6).toFixed(2)} M`
  if (difficulty >= 1e3) return `${(difficulty / 1e3).toFixed(2)} K`
  return difficulty.toFixed(0)
}

/**
 * Network hashrate given in EH/s, rescaled to the nearest unit between TH/s and YH/s
 */
export function formatNetworkHashrate(hashrateEh: number): string {
  if (!(hashrateEh > 0)) {
    return '0.00 EH/s'
  }

  let value = hashrateEh
  let index = EH_INDEX
  while (value >= 1000 && index < NETWORK_UNITS.length - 1) {
    value /= 1000
    index++
  }
  while (value < 1 && index > 0) {
    value *= 1000
    index--
  }

  return `${value.toFixed(2)} ${NETWORK_UNITS[index] ?? 'EH/s'}`
}

/**
 * Price with thousands separators, e.g. "67,250.50"
 * @param decimals - Fraction digits, 2 unless the symbol has an override
 */
export function formatPrice(price: number, decimals = 2): string {
  return price.toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals
  })
}

/**
 * Signed percentage, e.g. "+1.23%" or "-0.50%"
 */
export function formatChange(changePercent: number): string {
  const sign = changePercent >= 0 ? '+' : ''
  return `${sign}${changePercent.toFixed(2)}%`
}
