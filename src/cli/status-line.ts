import chalk from 'chalk'
import type { Freshness, MarketSnapshot } from '../models'
import { formatChange, formatHashrate, formatNetworkHashrate, formatPrice } from '../utils/format'

const FRESHNESS_LABELS: Record<Freshness, string> = {
  fresh: '● FRESH',
  stale: '● STALE',
  failed: '● FAILED'
}

/**
 * One console line summarising a snapshot, e.g.
 * `● FRESH | BTCUSDT 67,250.50 +1.23% | miners 75.00 TH/s 2/3 degraded | fee 12 sat/vB, block 850000 (Foundry USA), 650.00 EH/s`
 */
export function formatStatusLine(snapshot: MarketSnapshot, paint: chalk.Chalk = chalk): string {
  const parts: string[] = []

  const label = FRESHNESS_LABELS[snapshot.health.overall]
  switch (snapshot.health.indicator) {
    case 'green':
      parts.push(paint.green(label))
      break
    case 'orange':
      parts.push(paint.yellow(label))
      break
    case 'red':
      parts.push(paint.red(label))
      break
  }

  const quote = snapshot.quotes[snapshot.activeSymbol]
  if (quote) {
    const change = formatChange(quote.change24h)
    const price = `${paint.bold(snapshot.activeSymbol)} ${formatPrice(quote.price, quote.decimals)} ` +
      (quote.change24h >= 0 ? paint.green(change) : paint.red(change))
    parts.push(quote.stale ? `${price} ${paint.gray('(stale)')}` : price)
  } else {
    parts.push(`${paint.bold(snapshot.activeSymbol)} --`)
  }

  if (snapshot.miners.visible) {
    const { totalHashrateTh, activeCount, totalCount, health } = snapshot.miners
    parts.push(`miners ${formatHashrate(totalHashrateTh)} ${activeCount}/${totalCount} ${health}`)
  }

  const network = snapshot.network
  if (network) {
    parts.push(
      `fee ${network.feeSatPerVb} sat/vB, block ${network.blockHeight} (${network.miningPool}), ` +
      formatNetworkHashrate(network.networkHashrateEh)
    )
  } else {
    parts.push('network --')
  }

  if (snapshot.fallbackSymbols.length > 0) {
    parts.push(paint.gray(`rest: ${snapshot.fallbackSymbols.join(',')}`))
  }

  return parts.join(' | ')
}
