import { describe, it, expect } from 'vitest'
import { silentLogger } from '../logger'
import { createSensorStore } from '../store/sensorStore'
import { CoreReading } from '../types/telemetry'
import type { CapabilityCall, ValidCommand } from '../device/capabilities'
import { SimulatedBoat } from './SimulatedBoat'

const cmd = (call: CapabilityCall): ValidCommand => ({ ...call, id: 'cmd-1', issuedAt: 0 })
const signal = new AbortController().signal

function boat() {
  const store = createSensorStore(() => 0)
  // random() = 0.5 puts the start at the origin with heading 180 and speed 2.5
  const sim = new SimulatedBoat({ store, log: silentLogger(), random: () => 0.5 })
  return { store, sim }
}

describe('SimulatedBoat', () => {
  it('starts near the origin with full battery', () => {
    const { sim } = boat()
    expect(sim.state).toMatchObject({ latitude: 37.7749, longitude: -122.4194, heading: 180, speed: 2.5, battery: 100, mode: 'autonomous' })
  })

  it('publishes core and extra readings on every tick', () => {
    const { store, sim } = boat()
    sim.tick()
    const { readings } = store.getState()
    expect(readings[CoreReading.batteryPercent]?.value).toBeCloseTo(99.99)
    expect(readings[CoreReading.heading]?.value).toBe(180)
    expect(readings['nav.mode']?.value).toBe('autonomous')
    expect(readings['env.waterTemp']?.value).toBe(17.5)
  })

  it('drifts along its heading', () => {
    const { sim } = boat()
    const before = sim.state.latitude
    sim.tick()
    // heading 180 is due south
    expect(sim.state.latitude).toBeLessThan(before)
  })

  it('stays put in hold mode', async () => {
    const { sim } = boat()
    await sim.apply(cmd({ kind: 'setMode', parameters: { mode: 'hold' } }), signal)
    const { latitude, longitude } = sim.state
    sim.tick()
    expect(sim.state.latitude).toBe(latitude)
    expect(sim.state.longitude).toBe(longitude)
  })

  it('applies commands to the simulation', async () => {
    const { sim } = boat()
    expect(await sim.apply(cmd({ kind: 'setHeading', parameters: { degrees: 90 } }), signal)).toEqual({ heading: 90 })
    expect(await sim.apply(cmd({ kind: 'setThrust', parameters: { percent: -50 } }), signal)).toEqual({ thrust: -50 })
    expect(sim.state.speed).toBe(5)
    expect(await sim.apply(cmd({ kind: 'setRudder', parameters: { degrees: 20 } }), signal)).toEqual({ rudder: 20 })
    expect(await sim.apply(cmd({ kind: 'stop', parameters: {} }), signal)).toEqual({ thrust: 0 })
    expect(sim.state).toMatchObject({ heading: 90, rudder: 20, thrust: 0, speed: 0 })
  })

  it('turns with the rudder', async () => {
    const { sim } = boat()
    await sim.apply(cmd({ kind: 'setMode', parameters: { mode: 'manual' } }), signal)
    await sim.apply(cmd({ kind: 'setRudder', parameters: { degrees: 100 } }), signal)
    sim.tick()
    expect(sim.state.heading).toBeCloseTo(185)
  })
})
