import type { ReadonlyStore } from '../store/readonly'
import type { SensorReading, SensorState } from '../store/sensorStore'
import { CoreReading, type ReadingValue, type TelemetryRecord } from '../types/telemetry'

export interface TelemetrySourceOptions {
  /** A reading older than this is reported with its last value and listed as stale */
  staleAfterMs?: number
  now?:          () => number
}

const CORE_KEYS = new Set<string>(Object.values(CoreReading))

/**
 * Builds telemetry records from the sensor store. `sample()` only reads
 * what the drivers already pushed, so it returns immediately even when a
 * driver is stuck.
 */
export class TelemetrySource {
  private readonly staleAfterMs: number
  private readonly now: () => number

  constructor(private readonly sensors: ReadonlyStore<SensorState>, opts: TelemetrySourceOptions = {}) {
    this.staleAfterMs = opts.staleAfterMs ?? 5000
    this.now          = opts.now ?? Date.now
  }

  sample(): TelemetryRecord {
    const timestamp = this.now()
    const { readings } = this.sensors.getState()
    const stale: string[] = []

    const read = (name: string): ReadingValue => {
      const reading: SensorReading | undefined = readings[name]
      if (!reading) return null
      if (timestamp - reading.at > this.staleAfterMs) stale.push(name)
      return reading.value
    }
    const num = (name: string): number | null => {
      const value = read(name)
      return typeof value === 'number' && Number.isFinite(value) ? value : null
    }

    const position = Object.freeze({
      latitude:  num(CoreReading.latitude),
      longitude: num(CoreReading.longitude),
    })
    const battery = Object.freeze({
      percentage: num(CoreReading.batteryPercent),
      voltage:    num(CoreReading.batteryVoltage),
      current:    num(CoreReading.batteryCurrent),
    })
    const heading = num(CoreReading.heading)
    const speed   = num(CoreReading.speed)

    const sensorReadings: Record<string, ReadingValue> = {}
    for (const name of Object.keys(readings).sort()) {
      if (!CORE_KEYS.has(name)) sensorReadings[name] = read(name)
    }

    return Object.freeze({
      timestamp,
      position,
      heading,
      speed,
      battery,
      sensorReadings: Object.freeze(sensorReadings),
      stale:          Object.freeze(stale),
    })
  }
}
