/** Typed accessors for the device's environment variables. All have field-ready defaults. */
import { z } from 'zod'
import { ConfigError } from './errors'
import { createIdentity, type DeviceIdentity } from './types/device'

export const MIN_TELEMETRY_INTERVAL_S = 0.1

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel   = (typeof LOG_LEVELS)[number]
export type DeviceMode = 'simulated' | 'hardware'
export type HeadingSource = 'compass' | 'gps'

/** Unset and blank variables take `fallback`; anything else must be a finite number. */
const numberVar = (fallback: number) =>
  z.string().trim().optional().transform((raw, ctx) => {
    if (raw === undefined || raw === '') return fallback
    const value = Number(raw)
    if (!Number.isFinite(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${raw}"` })
      return z.NEVER
    }
    return value
  })

const msVar = (fallback: number) => numberVar(fallback).pipe(z.number().int().positive())

const EnvSchema = z.object({
  WS_SERVER_URL: z.string().trim().default('ws://localhost:8000/ws/device/{device_id}')
    .refine((v) => /^wss?:\/\/[^\s]+$/.test(v), 'must be a ws:// or wss:// URL'),
  DEVICE_ID: z.string().trim().default('boat-1')
    .pipe(z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be non-empty and use only letters, digits, "-" and "_"')),
  TELEMETRY_INTERVAL: numberVar(1.0)
    .pipe(z.number().positive())
    .transform((s) => Math.max(s, MIN_TELEMETRY_INTERVAL_S)),
  LOG_LEVEL:              z.enum(LOG_LEVELS).default('info'),
  DEVICE_MODE:            z.enum(['simulated', 'hardware']).default('simulated'),
  RECONNECT_INITIAL_MS:   msVar(1000),
  RECONNECT_MAX_MS:       msVar(30_000),
  HEARTBEAT_MS:           msVar(25_000),
  NEGOTIATION_TIMEOUT_MS: msVar(15_000),
  SHUTDOWN_GRACE_MS:      msVar(5_000),
  ICE_CONFIG_URL:         z.string().trim().optional()
    .transform((v) => (v === '' ? undefined : v))
    .pipe(z.string().url().optional()),
  STUN_URLS:              z.string().default('stun:stun.l.google.com:19302'),
  RTP_PORT:               numberVar(5004).pipe(z.number().int().min(1).max(65_535)),
  PWM_CHIP:               numberVar(2).pipe(z.number().int().nonnegative()),
  RUDDER_CHANNEL:         numberVar(3).pipe(z.number().int().nonnegative()),
  THRUST_CHANNEL:         numberVar(2).pipe(z.number().int().nonnegative()),
  GPS_PORT:               z.string().trim().min(1).default('/dev/ttyACM0'),
  GPS_BAUDRATE:           numberVar(9600).pipe(z.number().int().positive()),
  HEADING_SOURCE:         z.enum(['compass', 'gps']).default('compass'),
  COMPASS_I2C_BUS:        numberVar(1).pipe(z.number().int().nonnegative()),
  COMPASS_DECLINATION:    numberVar(0).pipe(z.number().min(-180).max(180)),
}).refine((e) => e.RECONNECT_MAX_MS >= e.RECONNECT_INITIAL_MS, {
  message: 'RECONNECT_MAX_MS must not be below RECONNECT_INITIAL_MS',
  path:    ['RECONNECT_MAX_MS'],
})

export interface Env {
  identity:             DeviceIdentity
  telemetryIntervalMs:  number
  logLevel:             LogLevel
  deviceMode:           DeviceMode
  reconnectInitialMs:   number
  reconnectMaxMs:       number
  heartbeatMs:          number
  negotiationTimeoutMs: number
  shutdownGraceMs:      number
  iceConfigUrl:         string | undefined
  stunUrls:             readonly string[]
  rtpPort:              number
  pwm: {
    chip:          number
    rudderChannel: number
    thrustChannel: number
  }
  gps: {
    path:     string
    baudRate: number
  }
  headingSource: HeadingSource
  compass: {
    bus:         number
    declination: number
  }
}

/** Reads the configuration once. Throws ConfigError listing every problem. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`))
  }
  const e = parsed.data
  return Object.freeze({
    identity:             createIdentity(e.DEVICE_ID, e.WS_SERVER_URL),
    telemetryIntervalMs:  Math.round(e.TELEMETRY_INTERVAL * 1000),
    logLevel:             e.LOG_LEVEL,
    deviceMode:           e.DEVICE_MODE,
    reconnectInitialMs:   e.RECONNECT_INITIAL_MS,
    reconnectMaxMs:       e.RECONNECT_MAX_MS,
    heartbeatMs:          e.HEARTBEAT_MS,
    negotiationTimeoutMs: e.NEGOTIATION_TIMEOUT_MS,
    shutdownGraceMs:      e.SHUTDOWN_GRACE_MS,
    iceConfigUrl:         e.ICE_CONFIG_URL,
    stunUrls:             e.STUN_URLS.split(',').map((u) => u.trim()).filter((u) => u.length > 0),
    rtpPort:              e.RTP_PORT,
    pwm: {
      chip:          e.PWM_CHIP,
      rudderChannel: e.RUDDER_CHANNEL,
      thrustChannel: e.THRUST_CHANNEL,
    },
    gps: {
      path:     e.GPS_PORT,
      baudRate: e.GPS_BAUDRATE,
    },
    headingSource: e.HEADING_SOURCE,
    compass: {
      bus:         e.COMPASS_I2C_BUS,
      declination: e.COMPASS_DECLINATION,
    },
  })
}
