import { readFile } from 'node:fs/promises'
import type { Logger } from '../logger'
import type { SensorStore } from '../store/sensorStore'
import { errorMessage } from '../errors'
import type { SensorFeed } from './SensorFeed'

const THERMAL_ZONE = '/sys/class/thermal/thermal_zone0/temp'

export interface SystemSensorFeedOptions {
  store:        SensorStore
  log:          Logger
  intervalMs?:  number
  thermalPath?: string
  read?:        (path: string) => Promise<string>
}

/** Board health readings (SoC temperature) from sysfs. */
export class SystemSensorFeed implements SensorFeed {
  private timer: ReturnType<typeof setInterval> | null = null
  private failing = false
  private readonly opts: Required<Omit<SystemSensorFeedOptions, 'log'>> & { log: Logger }

  constructor(opts: SystemSensorFeedOptions) {
    this.opts = {
      intervalMs:  5000,
      thermalPath: THERMAL_ZONE,
      read:        (path) => readFile(path, 'utf8'),
      ...opts,
      log:         opts.log.child({ component: 'system-sensors' }),
    }
  }

  start(): void {
    if (this.timer) return
    void this.poll()
    this.timer = setInterval(() => { void this.poll() }, this.opts.intervalMs)
  }

  stop(): void {
    if (this.timer) { clearInterval(this.timer); this.timer = null }
  }

  async poll(): Promise<void> {
    try {
      const milli = Number((await this.opts.read(this.opts.thermalPath)).trim())
      if (!Number.isFinite(milli)) throw new Error(`unreadable value in ${this.opts.thermalPath}`)
      this.opts.store.getState().push('system.cpuTemp', milli / 1000)
      this.failing = false
    } catch (err) {
      // Log the first failure of a streak only
      if (!this.failing) this.opts.log.warn({ err: errorMessage(err) }, 'cpu temperature unavailable')
      this.failing = true
    }
  }
}
