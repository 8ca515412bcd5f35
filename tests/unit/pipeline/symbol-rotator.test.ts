import { deepStrictEqual, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { SymbolRotator, type SymbolRotation } from '../../../src/pipeline'
import { sleep } from '../../../src/utils'
import { T0, createRegistry, createState, quote } from '../../helpers/fixtures'

describe('SymbolRotator', () => {
  it('should cycle through main symbols and wrap around', () => {
    const { state } = createState({ registry: createRegistry({ mainSymbols: ['BTCUSDT', 'ETHUSDT', 'SOLUSDT'] }) })
    const rotator = new SymbolRotator({ symbols: state.registry.mainSymbols, intervalMs: 21000 }, state)
    const rotations: SymbolRotation[] = []
    rotator.on('rotate', rotation => rotations.push(rotation))

    strictEqual(rotator.rotate(), 'ETHUSDT')
    strictEqual(rotator.rotate(), 'SOLUSDT')
    strictEqual(rotator.rotate(), 'BTCUSDT')

    strictEqual(state.getActiveSymbol(), 'BTCUSDT')
    deepStrictEqual(rotations, [
      { previous: 'BTCUSDT', next: 'ETHUSDT' },
      { previous: 'ETHUSDT', next: 'SOLUSDT' },
      { previous: 'SOLUSDT', next: 'BTCUSDT' }
    ])
  })

  it('should reset candles when the symbol changes', () => {
    const { state } = createState()
    const rotator = new SymbolRotator({ symbols: state.registry.mainSymbols, intervalMs: 21000 }, state)
    state.applyQuote(quote('BTCUSDT', 100, T0))

    rotator.rotate()

    strictEqual(rotator.current(), 'ETHUSDT')
    strictEqual(state.candles().length, 0)
  })

  it('should never rotate a single symbol', async () => {
    const { state } = createState({ registry: createRegistry({ mainSymbols: ['BTCUSDT'] }) })
    const rotator = new SymbolRotator({ symbols: state.registry.mainSymbols, intervalMs: 1 }, state)
    let fired = false
    rotator.on('rotate', () => {
      fired = true
    })

    strictEqual(rotator.enabled, false)
    rotator.start()
    await sleep(20)
    await rotator.stop()

    strictEqual(rotator.rotate(), 'BTCUSDT')
    strictEqual(fired, false)
  })

  it('should rotate on its interval', async () => {
    const { state } = createState()
    const rotator = new SymbolRotator({ symbols: state.registry.mainSymbols, intervalMs: 5 }, state)
    const first = new Promise<SymbolRotation>(resolve => {
      rotator.on('rotate', resolve)
    })

    rotator.start()
    const rotation = await first
    await rotator.stop()

    deepStrictEqual(rotation, { previous: 'BTCUSDT', next: 'ETHUSDT' })
  })
})
