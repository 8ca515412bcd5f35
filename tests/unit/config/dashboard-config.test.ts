import { deepStrictEqual, ok, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { defaultDashboardConfig, parseDashboardConfig } from '../../../src/config'
import { RecordingLogger } from '../../helpers/recording-logger'

describe('Dashboard Config', () => {
  describe('defaultDashboardConfig', () => {
    it('should provide every option', () => {
      const config = defaultDashboardConfig()

      deepStrictEqual(config.main_symbols, ['BTCUSDT'])
      strictEqual(config.candle_seconds, 60)
      strictEqual(config.max_candles, 14)
      strictEqual(config.data_timeout, 300)
      strictEqual(config.coingecko_poll_interval, 300)
      deepStrictEqual(config.miners_ips, [])
      strictEqual(config.log_dir, undefined)
    })
  })

  describe('parseDashboardConfig', () => {
    it('should keep valid options', () => {
      const config = parseDashboardConfig({
        main_symbols: ['BTCUSDT', 'ETHUSDT'],
        candle_seconds: 300,
        miners_ips: ['192.168.1.50', 'miner-2.local:8080']
      }, new RecordingLogger())

      deepStrictEqual(config.main_symbols, ['BTCUSDT', 'ETHUSDT'])
      strictEqual(config.candle_seconds, 300)
      deepStrictEqual(config.miners_ips, ['192.168.1.50', 'miner-2.local:8080'])
    })

    it('should default an invalid option and warn', () => {
      const logger = new RecordingLogger()
      const config = parseDashboardConfig({ max_candles: 0, data_timeout: 120 }, logger)

      strictEqual(config.max_candles, 14)
      strictEqual(config.data_timeout, 120)
      deepStrictEqual(logger.messages('warn'), ['Invalid configuration option, using default'])
    })

    it('should drop invalid list entries', () => {
      const logger = new RecordingLogger()
      const config = parseDashboardConfig({ main_symbols: ['BTCUSDT', 'not a symbol!', 'ETHUSDT'] }, logger)

      deepStrictEqual(config.main_symbols, ['BTCUSDT', 'ETHUSDT'])
      deepStrictEqual(logger.messages('warn'), ['Ignoring invalid configuration entries'])
    })

    it('should fall back to the default list when nothing valid remains', () => {
      const config = parseDashboardConfig({ main_symbols: ['???'] }, new RecordingLogger())
      deepStrictEqual(config.main_symbols, ['BTCUSDT'])
    })

    it('should strip renderer settings', () => {
      const config = parseDashboardConfig({ display_width: 800, font: 'mono' }, new RecordingLogger())
      ok(!('display_width' in config))
      ok(!('font' in config))
    })

    it('should use defaults for a non-object', () => {
      const logger = new RecordingLogger()
      const config = parseDashboardConfig(['BTCUSDT'], logger)

      deepStrictEqual(config, defaultDashboardConfig())
      deepStrictEqual(logger.messages('warn'), ['Configuration is not an object, using defaults'])
    })
  })
})
