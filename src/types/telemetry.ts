export type ReadingValue = number | string | boolean | null

/** Sensor store keys that feed the fixed fields of a telemetry record. */
export const CoreReading = {
  latitude:       'gps.latitude',
  longitude:      'gps.longitude',
  heading:        'nav.heading',
  speed:          'nav.speed',
  batteryPercent: 'battery.percentage',
  batteryVoltage: 'battery.voltage',
  batteryCurrent: 'battery.current',
} as const

export interface Position {
  latitude:  number | null
  longitude: number | null
}

export interface BatteryStatus {
  percentage: number | null
  voltage:    number | null
  current:    number | null
}

/** One telemetry snapshot. Frozen once built. */
export interface TelemetryRecord {
  timestamp: number   // ms since epoch
  position:  Readonly<Position>
  heading:   number | null   // degrees, 0 = north
  speed:     number | null   // knots
  battery:   Readonly<BatteryStatus>
  sensorReadings: Readonly<Record<string, ReadingValue>>
  /** Readings that fell back to their last known value */
  stale: readonly string[]
}
