import { createStore } from 'zustand/vanilla'
import type { ReadingValue } from '../types/telemetry'

export interface SensorReading {
  value: ReadingValue
  at:    number   // ms since epoch
}

export interface SensorState {
  /** Monotonically increasing counter, bumped on every write */
  generation: number
  readings:   Readonly<Record<string, SensorReading>>
  push:       (name: string, value: ReadingValue) => void
  pushMany:   (values: Record<string, ReadingValue>) => void
  reset:      () => void
}

/**
 * Latest value per sensor. Drivers write at their own pace; telemetry
 * sampling reads synchronously and never waits on a driver.
 */
export function createSensorStore(now: () => number = Date.now) {
  return createStore<SensorState>((set) => ({
    generation: 0,
    readings:   {},

    push: (name, value) =>
      set((s) => ({
        generation: s.generation + 1,
        readings:   { ...s.readings, [name]: { value, at: now() } },
      })),

    pushMany: (values) =>
      set((s) => {
        const at = now()
        const readings = { ...s.readings }
        for (const [name, value] of Object.entries(values)) readings[name] = { value, at }
        return { generation: s.generation + 1, readings }
      }),

    reset: () => set((s) => ({ generation: s.generation + 1, readings: {} })),
  }))
}

export type SensorStore = ReturnType<typeof createSensorStore>
