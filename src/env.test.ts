import { describe, it, expect } from 'vitest'
import { loadEnv } from './env'
import { ConfigError } from './errors'

describe('loadEnv', () => {
  it('applies defaults to an empty environment', () => {
    const env = loadEnv({})
    expect(env.identity).toEqual({ deviceId: 'boat-1', serverUrlTemplate: 'ws://localhost:8000/ws/device/{device_id}' })
    expect(env.telemetryIntervalMs).toBe(1000)
    expect(env.logLevel).toBe('info')
    expect(env.deviceMode).toBe('simulated')
    expect(env.reconnectInitialMs).toBe(1000)
    expect(env.reconnectMaxMs).toBe(30_000)
    expect(env.iceConfigUrl).toBeUndefined()
    expect(env.stunUrls).toEqual(['stun:stun.l.google.com:19302'])
    expect(env.pwm).toEqual({ chip: 2, rudderChannel: 3, thrustChannel: 2 })
    expect(env.gps).toEqual({ path: '/dev/ttyACM0', baudRate: 9600 })
    expect(env.headingSource).toBe('compass')
    expect(env.compass).toEqual({ bus: 1, declination: 0 })
    expect(Object.isFrozen(env)).toBe(true)
  })

  it('reads explicit values', () => {
    const env = loadEnv({
      WS_SERVER_URL:      'wss://relay.test/device/{device_id}',
      DEVICE_ID:          'skiff_2',
      TELEMETRY_INTERVAL: '0.5',
      LOG_LEVEL:          'debug',
      DEVICE_MODE:        'hardware',
      STUN_URLS:          'stun:a.test:3478, stun:b.test:3478,',
      ICE_CONFIG_URL:     'http://relay.test/api/',
    })
    expect(env.identity.deviceId).toBe('skiff_2')
    expect(env.telemetryIntervalMs).toBe(500)
    expect(env.logLevel).toBe('debug')
    expect(env.deviceMode).toBe('hardware')
    expect(env.stunUrls).toEqual(['stun:a.test:3478', 'stun:b.test:3478'])
    expect(env.iceConfigUrl).toBe('http://relay.test/api/')
  })

  it('reads the navigation sensor settings', () => {
    const env = loadEnv({ GPS_PORT: '/dev/ttyUSB1', GPS_BAUDRATE: '38400', HEADING_SOURCE: 'gps', COMPASS_DECLINATION: '13.5' })
    expect(env.gps).toEqual({ path: '/dev/ttyUSB1', baudRate: 38400 })
    expect(env.headingSource).toBe('gps')
    expect(env.compass.declination).toBe(13.5)
    expect(() => loadEnv({ HEADING_SOURCE: 'stars' })).toThrow(ConfigError)
  })

  it('clamps tiny telemetry intervals to 100 ms', () => {
    expect(loadEnv({ TELEMETRY_INTERVAL: '0.01' }).telemetryIntervalMs).toBe(100)
  })

  it('treats blank variables as unset', () => {
    const env = loadEnv({ TELEMETRY_INTERVAL: '  ', ICE_CONFIG_URL: '' })
    expect(env.telemetryIntervalMs).toBe(1000)
    expect(env.iceConfigUrl).toBeUndefined()
  })

  it('collects every problem into one ConfigError', () => {
    let caught: unknown
    try {
      loadEnv({ TELEMETRY_INTERVAL: 'fast', DEVICE_ID: 'no spaces', WS_SERVER_URL: 'http://relay.test' })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ConfigError)
    if (!(caught instanceof ConfigError)) return
    expect(caught.issues).toHaveLength(3)
    expect(caught.issues).toContain('TELEMETRY_INTERVAL: expected a number, got "fast"')
    expect(caught.issues).toContain('WS_SERVER_URL: must be a ws:// or wss:// URL')
  })

  it('rejects a zero or negative interval', () => {
    expect(() => loadEnv({ TELEMETRY_INTERVAL: '0' })).toThrow(ConfigError)
    expect(() => loadEnv({ TELEMETRY_INTERVAL: '-1' })).toThrow(ConfigError)
  })

  it('rejects a reconnect cap below the initial delay', () => {
    expect(() => loadEnv({ RECONNECT_INITIAL_MS: '5000', RECONNECT_MAX_MS: '1000' }))
      .toThrow('RECONNECT_MAX_MS: RECONNECT_MAX_MS must not be below RECONNECT_INITIAL_MS')
  })
})
