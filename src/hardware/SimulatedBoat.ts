/**
 * SimulatedBoat — stand-in for the GPS, compass and motors on a bench run.
 *
 * Starts at a random spot on San Francisco Bay and drifts along its heading.
 * Heading and speed wander a little, the battery drains slowly, and commands
 * steer the simulation instead of real hardware.
 */

import type { Logger } from '../logger'
import type { SensorStore } from '../store/sensorStore'
import { CoreReading } from '../types/telemetry'
import type { Actuator, ActuatorResult, NavigationMode, ValidCommand } from '../device/capabilities'
import type { SensorFeed } from './SensorFeed'

const ORIGIN = { latitude: 37.7749, longitude: -122.4194 }
const DEG_PER_KNOT_TICK = 0.0001
const BATTERY_DRAIN_PER_TICK = 0.01
const MAX_SPEED_KNOTS = 10

export interface SimulatedBoatOptions {
  store:    SensorStore
  log:      Logger
  tickMs?:  number
  random?:  () => number
}

export interface SimulationState {
  latitude:  number
  longitude: number
  heading:   number
  speed:     number
  battery:   number
  rudder:    number
  thrust:    number
  mode:      NavigationMode
}

export class SimulatedBoat implements SensorFeed, Actuator {
  private timer: ReturnType<typeof setInterval> | null = null
  private readonly sim: SimulationState
  private readonly store: SensorStore
  private readonly log: Logger
  private readonly tickMs: number
  private readonly random: () => number

  constructor(opts: SimulatedBoatOptions) {
    this.store  = opts.store
    this.log    = opts.log.child({ component: 'simulated-boat' })
    this.tickMs = opts.tickMs ?? 1000
    this.random = opts.random ?? Math.random
    this.sim = {
      latitude:  ORIGIN.latitude  + (this.random() - 0.5) * 0.05,
      longitude: ORIGIN.longitude + (this.random() - 0.5) * 0.05,
      heading:   this.random() * 360,
      speed:     this.random() * 5,
      battery:   100,
      rudder:    0,
      thrust:    0,
      mode:      'autonomous',
    }
  }

  get state(): Readonly<SimulationState> { return { ...this.sim } }

  // ── SensorFeed ─────────────────────────────────────────────────────────────

  start(): void {
    if (this.timer) return
    this.log.info({ latitude: this.sim.latitude, longitude: this.sim.longitude }, 'simulation started')
    this.publish()
    this.timer = setInterval(() => this.tick(), this.tickMs)
  }

  stop(): void {
    if (this.timer) { clearInterval(this.timer); this.timer = null }
  }

  /** Advance the simulation by one tick and publish the readings. */
  tick(): void {
    const s = this.sim
    if (s.mode !== 'hold') {
      const rad = (s.heading * Math.PI) / 180
      s.latitude  += s.speed * DEG_PER_KNOT_TICK * Math.cos(rad)
      s.longitude += s.speed * DEG_PER_KNOT_TICK * Math.sin(rad)
    }
    if (s.mode === 'autonomous') {
      if (this.random() < 0.1)  s.heading = wrapDegrees(s.heading + (this.random() - 0.5) * 10)
      if (this.random() < 0.05) s.speed   = clamp(s.speed + (this.random() - 0.5), 0, MAX_SPEED_KNOTS)
    }
    s.heading = wrapDegrees(s.heading + s.rudder * 0.05)
    s.battery = Math.max(0, s.battery - BATTERY_DRAIN_PER_TICK)
    this.publish()
  }

  private publish(): void {
    const s = this.sim
    const r = this.random
    this.store.getState().pushMany({
      [CoreReading.latitude]:       s.latitude,
      [CoreReading.longitude]:      s.longitude,
      [CoreReading.heading]:        s.heading,
      [CoreReading.speed]:          s.speed,
      [CoreReading.batteryPercent]: s.battery,
      [CoreReading.batteryVoltage]: 12.0 + (s.battery - 50) * 0.04,
      [CoreReading.batteryCurrent]: 2.0 + r(),
      'nav.mode':                s.mode,
      'motor.rudder':            s.rudder,
      'motor.thrust':            s.thrust,
      'system.cpuTemp':          45 + r() * 15,
      'system.signalStrength':   -50 - r() * 30,
      'env.waterTemp':           15 + r() * 5,
      'env.airTemp':             20 + r() * 10,
      'env.airPressure':         1013 + (r() - 0.5) * 10,
      'env.humidity':            60 + r() * 20,
      'env.waterDepth':          15 + r() * 2,
      'env.windSpeed':           5 + r() * 5,
      'env.windDirection':       wrapDegrees(s.heading + 180 + (r() - 0.5) * 45),
    })
  }

  // ── Actuator ───────────────────────────────────────────────────────────────

  async apply(command: ValidCommand, _signal: AbortSignal): Promise<ActuatorResult> {
    const s = this.sim
    switch (command.kind) {
      case 'setHeading':
        s.heading = command.parameters.degrees
        return { heading: s.heading }
      case 'setRudder':
        s.rudder = command.parameters.degrees
        return { rudder: s.rudder }
      case 'setThrust':
        s.thrust = command.parameters.percent
        s.speed  = Math.abs(s.thrust) / 100 * MAX_SPEED_KNOTS
        return { thrust: s.thrust }
      case 'stop':
        s.thrust = 0
        s.speed  = 0
        return { thrust: 0 }
      case 'setMode':
        s.mode = command.parameters.mode
        return { mode: s.mode }
    }
  }

  async close(): Promise<void> {
    this.stop()
    this.sim.thrust = 0
    this.sim.speed  = 0
  }
}

function wrapDegrees(deg: number): number {
  return ((deg % 360) + 360) % 360
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max))
}
