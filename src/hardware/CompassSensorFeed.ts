import type { PromisifiedBus } from 'i2c-bus'
import type { Logger } from '../logger'
import type { SensorStore } from '../store/sensorStore'
import { CoreReading } from '../types/telemetry'
import { errorMessage } from '../errors'
import { sleep } from '../util/sleep'
import type { SensorFeed } from './SensorFeed'

/** BMM150 geomagnetic sensor registers */
export const BMM150 = {
  address:      0x13,
  chipIdReg:    0x40,
  chipId:       0x32,
  dataReg:      0x42,   // X LSB; six bytes up to Z MSB
  powerReg:     0x4b,
  opModeReg:    0x4c,
  normalMode:   0x00,
  settleMs:     100,
} as const

export type CompassBus = Pick<PromisifiedBus, 'readByte' | 'writeByte' | 'readI2cBlock' | 'close'>

export interface CompassSensorFeedOptions {
  store:        SensorStore
  log:          Logger
  bus:          number
  /** Magnetic declination in degrees, east positive */
  declination?: number
  intervalMs?:  number
  open?:        (bus: number) => Promise<CompassBus>
}

export interface MagneticSample {
  x:       number
  y:       number
  z:       number
  heading: number
}

function twos(value: number, bits: number): number {
  return value >= 1 << (bits - 1) ? value - (1 << bits) : value
}

/** Decode the six data bytes and turn X/Y into a heading in [0, 360). */
export function decodeSample(data: Buffer, declination = 0): MagneticSample {
  const x = twos(data.readUInt16LE(0) >> 3, 13)
  const y = twos(data.readUInt16LE(2) >> 3, 13)
  const z = twos(data.readUInt16LE(4) >> 1, 15)
  const degrees = (Math.atan2(y, x) * 180) / Math.PI + declination
  return { x, y, z, heading: ((degrees % 360) + 360) % 360 }
}

async function openI2cBus(bus: number): Promise<CompassBus> {
  const { openPromisified } = await import('i2c-bus')
  return openPromisified(bus)
}

export class CompassSensorFeed implements SensorFeed {
  private bus: CompassBus | null = null
  private timer: ReturnType<typeof setInterval> | null = null
  private running = false
  private failing = false
  private readonly opts: Required<Omit<CompassSensorFeedOptions, 'log'>> & { log: Logger }

  constructor(opts: CompassSensorFeedOptions) {
    this.opts = {
      declination: 0,
      intervalMs:  100,
      open:        openI2cBus,
      ...opts,
      log:         opts.log.child({ component: 'compass' }),
    }
  }

  start(): void {
    if (this.running) return
    this.running = true
    void this.initialize().then((ready) => {
      if (!ready) return
      if (!this.running) { this.stop(); return }
      this.timer = setInterval(() => { void this.poll() }, this.opts.intervalMs)
    })
  }

  stop(): void {
    this.running = false
    if (this.timer) { clearInterval(this.timer); this.timer = null }
    const bus = this.bus
    this.bus = null
    if (bus) void this._release(bus)
  }

  /** Open the bus, check the chip id and switch the sensor to normal mode. */
  async initialize(): Promise<boolean> {
    const { log } = this.opts
    let bus: CompassBus
    try {
      bus = await this.opts.open(this.opts.bus)
    } catch (err) {
      log.warn({ err: errorMessage(err), bus: this.opts.bus }, 'cannot open I2C bus, compass disabled')
      return false
    }
    try {
      const id = await bus.readByte(BMM150.address, BMM150.chipIdReg)
      if (id !== BMM150.chipId) {
        log.warn({ chipId: id }, 'no BMM150 at 0x13, compass disabled')
        await bus.close()
        return false
      }
      await bus.writeByte(BMM150.address, BMM150.powerReg, 0x01)
      await sleep(BMM150.settleMs)
      await bus.writeByte(BMM150.address, BMM150.opModeReg, BMM150.normalMode)
      await sleep(BMM150.settleMs)
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'compass setup failed, compass disabled')
      await this._release(bus)
      return false
    }
    this.bus = bus
    log.info({ declination: this.opts.declination }, 'compass ready')
    return true
  }

  async poll(): Promise<void> {
    const bus = this.bus
    if (!bus) return
    try {
      const { bytesRead, buffer } = await bus.readI2cBlock(BMM150.address, BMM150.dataReg, 6, Buffer.alloc(6))
      if (bytesRead !== 6) throw new Error(`short read: ${bytesRead} of 6 bytes`)
      const sample = decodeSample(buffer, this.opts.declination)
      this.opts.store.getState().pushMany({
        [CoreReading.heading]: sample.heading,
        'compass.x':           sample.x,
        'compass.y':           sample.y,
        'compass.z':           sample.z,
      })
      this.failing = false
    } catch (err) {
      if (!this.failing) this.opts.log.warn({ err: errorMessage(err) }, 'compass read failed')
      this.failing = true
    }
  }

  private async _release(bus: CompassBus): Promise<void> {
    try {
      await bus.writeByte(BMM150.address, BMM150.powerReg, 0x00)
      await bus.close()
    } catch (err) {
      this.opts.log.warn({ err: errorMessage(err) }, 'compass shutdown failed')
    }
  }
}
