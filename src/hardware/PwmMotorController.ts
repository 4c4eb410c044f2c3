/**
 * PwmMotorController — rudder servo and thrust ESC on the Pi's hardware PWM.
 *
 * Drives the Linux sysfs PWM interface at 50 Hz (20 ms period):
 *
 *   /sys/class/pwm/pwmchip<chip>/export            ← channel number
 *   /sys/class/pwm/pwmchip<chip>/pwm<ch>/period     ← ns
 *   /sys/class/pwm/pwmchip<chip>/pwm<ch>/duty_cycle ← ns
 *   /sys/class/pwm/pwmchip<chip>/pwm<ch>/enable     ← 1 | 0
 *
 * Rudder: 270° servo, 500–2500 µs ⇒ 2.5–12.5 % duty for -135…135°.
 * Thrust: bidirectional ESC, 1000–2000 µs ⇒ 5–10 % duty for -100…100 %,
 *         7.5 % is neutral. Thrust changes ramp in 2 % steps.
 */

import { writeFile } from 'node:fs/promises'
import type { Logger } from '../logger'
import { CommandError } from '../errors'
import { sleep } from '../util/sleep'
import type { Actuator, ActuatorResult, NavigationMode, ValidCommand } from '../device/capabilities'

const PWM_FREQUENCY_HZ = 50
const PERIOD_NS        = 1e9 / PWM_FREQUENCY_HZ
const NEUTRAL_DUTY     = 7.5
const RAMP_STEP        = 2
const DEFAULT_RAMP_MS  = 1000

export function rudderDutyCycle(degrees: number): number {
  return clamp(NEUTRAL_DUTY + (degrees / 135) * 5, 2.5, 12.5)
}

export function thrustDutyCycle(percent: number): number {
  return clamp(NEUTRAL_DUTY + (percent / 100) * 2.5, 5, 10)
}

/** Intermediate thrust levels from `from` to `to`, ending exactly at `to`. */
export function rampSteps(from: number, to: number, step: number = RAMP_STEP): number[] {
  const diff = to - from
  if (Math.abs(diff) <= step) return [to]
  const count = Math.trunc(Math.abs(diff) / step)
  const dir   = Math.sign(diff)
  const steps: number[] = []
  for (let i = 1; i < count; i++) steps.push(from + i * step * dir)
  steps.push(to)
  return steps
}

export interface PwmMotorControllerOptions {
  log:           Logger
  chip:          number
  rudderChannel: number
  thrustChannel: number
  sysfsRoot?:    string
  write?:        (path: string, value: string) => Promise<void>
}

export class PwmMotorController implements Actuator {
  private initialized = false
  private rudder  = 0
  private thrust  = 0
  private heading: number | null = null
  private mode: NavigationMode = 'manual'
  private readonly chipDir: string
  private readonly log: Logger
  private readonly write: (path: string, value: string) => Promise<void>

  constructor(private readonly opts: PwmMotorControllerOptions) {
    this.chipDir = `${opts.sysfsRoot ?? '/sys/class/pwm'}/pwmchip${opts.chip}`
    this.log     = opts.log.child({ component: 'pwm-motors' })
    this.write   = opts.write ?? ((path, value) => writeFile(path, value))
  }

  get status(): { rudder: number; thrust: number; heading: number | null; mode: NavigationMode; initialized: boolean } {
    return { rudder: this.rudder, thrust: this.thrust, heading: this.heading, mode: this.mode, initialized: this.initialized }
  }

  /** Export both channels, set the period and park them at neutral. */
  async initialize(): Promise<void> {
    if (this.initialized) return
    for (const channel of [this.opts.rudderChannel, this.opts.thrustChannel]) {
      await this.exportChannel(channel)
      await this.write(this.channelPath(channel, 'period'), String(PERIOD_NS))
      await this.setDuty(channel, NEUTRAL_DUTY)
      await this.write(this.channelPath(channel, 'enable'), '1')
    }
    this.initialized = true
    this.log.info({ chip: this.opts.chip }, 'motor control initialized')
  }

  async apply(command: ValidCommand, signal: AbortSignal): Promise<ActuatorResult> {
    if (!this.initialized) throw new CommandError('motor control is not initialized')
    switch (command.kind) {
      case 'setRudder': {
        const duty = rudderDutyCycle(command.parameters.degrees)
        await this.setDuty(this.opts.rudderChannel, duty)
        this.rudder = command.parameters.degrees
        return { rudder: this.rudder, dutyCycle: duty }
      }
      case 'setThrust': {
        const duty = await this.rampThrust(command.parameters.percent, command.parameters.rampMs ?? DEFAULT_RAMP_MS, signal)
        return { thrust: this.thrust, dutyCycle: duty }
      }
      case 'stop':
        await this.rampThrust(0, DEFAULT_RAMP_MS, signal)
        return { thrust: 0 }
      case 'setHeading':
        // Target for the autopilot; the PWM layer has no compass loop
        this.heading = command.parameters.degrees
        return { heading: this.heading }
      case 'setMode':
        this.mode = command.parameters.mode
        return { mode: this.mode }
    }
  }

  /** Neutral thrust at once, then disable both channels. */
  async close(): Promise<void> {
    if (!this.initialized) return
    await this.setDuty(this.opts.thrustChannel, NEUTRAL_DUTY)
    this.thrust = 0
    for (const channel of [this.opts.rudderChannel, this.opts.thrustChannel]) {
      await this.write(this.channelPath(channel, 'enable'), '0')
    }
    this.initialized = false
    this.log.info('motor control shut down')
  }

  private async rampThrust(target: number, rampMs: number, signal: AbortSignal): Promise<number> {
    const steps = rampSteps(this.thrust, target)
    const delay = rampMs / steps.length
    let duty = thrustDutyCycle(this.thrust)
    for (const [i, level] of steps.entries()) {
      if (signal.aborted) throw new CommandError('thrust ramp interrupted')
      duty = thrustDutyCycle(level)
      await this.setDuty(this.opts.thrustChannel, duty)
      this.thrust = level
      if (i < steps.length - 1) await sleep(delay, signal)
    }
    this.log.info({ thrust: this.thrust }, 'thrust set')
    return duty
  }

  private async exportChannel(channel: number): Promise<void> {
    try {
      await this.write(`${this.chipDir}/export`, String(channel))
    } catch (err) {
      // EBUSY: already exported by an earlier run
      if (!isErrno(err, 'EBUSY')) throw err
    }
  }

  private setDuty(channel: number, percent: number): Promise<void> {
    return this.write(this.channelPath(channel, 'duty_cycle'), String(Math.round(PERIOD_NS * percent / 100)))
  }

  private channelPath(channel: number, attr: string): string {
    return `${this.chipDir}/pwm${channel}/${attr}`
  }
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max))
}
