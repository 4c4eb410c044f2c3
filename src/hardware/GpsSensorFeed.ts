/**
 * GpsSensorFeed — NMEA 0183 from a serial GPS receiver.
 *
 * GGA sentences give the fix, satellites and altitude. RMC and VTG give speed
 * over ground and course. Sentences with a bad checksum, no fix or a
 * "warning" status publish nothing. A port that errors or closes is reopened
 * after `reopenMs` until the feed stops.
 */

import type { Readable } from 'node:stream'
import { ReadlineParser } from '@serialport/parser-readline'
import { parseNmeaSentence } from 'nmea-simple'
import type { Logger } from '../logger'
import type { SensorStore } from '../store/sensorStore'
import type { ReadingValue } from '../types/telemetry'
import { CoreReading } from '../types/telemetry'
import { errorMessage } from '../errors'
import type { SensorFeed } from './SensorFeed'

export type OpenSerialPort = (path: string, baudRate: number) => Promise<Readable>

export interface GpsSensorFeedOptions {
  store:            SensorStore
  log:              Logger
  path:             string
  baudRate:         number
  /** Publish course over ground as `nav.heading` (no compass fitted) */
  courseAsHeading?: boolean
  reopenMs?:        number
  open?:            OpenSerialPort
}

async function openSerialPort(path: string, baudRate: number): Promise<Readable> {
  // Loaded on demand so simulated runs never touch the native binding
  const { SerialPort } = await import('serialport')
  const port = new SerialPort({ path, baudRate, autoOpen: false })
  await new Promise<void>((resolve, reject) => {
    port.open((err) => (err ? reject(err) : resolve()))
  })
  return port
}

export class GpsSensorFeed implements SensorFeed {
  private port: Readable | null = null
  private reopenTimer: ReturnType<typeof setTimeout> | null = null
  private running = false
  private badSentences = 0
  private readonly opts: Required<Omit<GpsSensorFeedOptions, 'log'>> & { log: Logger }

  constructor(opts: GpsSensorFeedOptions) {
    this.opts = {
      courseAsHeading: false,
      reopenMs:        5000,
      open:            openSerialPort,
      ...opts,
      log:             opts.log.child({ component: 'gps' }),
    }
  }

  /** Lines that failed to parse, checksum errors included */
  get rejected(): number { return this.badSentences }

  start(): void {
    if (this.running) return
    this.running = true
    void this._open()
  }

  stop(): void {
    this.running = false
    if (this.reopenTimer) { clearTimeout(this.reopenTimer); this.reopenTimer = null }
    const port = this.port
    this.port = null
    port?.destroy()
  }

  /** Parse one NMEA line and publish what it carries. */
  handleSentence(line: string): void {
    const packet = this._parse(line.trim())
    if (!packet) return
    const { store, courseAsHeading } = this.opts

    switch (packet.sentenceId) {
      case 'GGA':
        if (packet.fixType === 'none') {
          store.getState().push('gps.fix', false)
          return
        }
        store.getState().pushMany({
          [CoreReading.latitude]:  packet.latitude,
          [CoreReading.longitude]: packet.longitude,
          'gps.altitude':          packet.altitudeMeters,
          'gps.satellites':        packet.satellitesInView,
          'gps.fix':               true,
        })
        return

      case 'RMC':
        if (packet.status !== 'valid') return
        store.getState().pushMany({
          [CoreReading.latitude]:  packet.latitude,
          [CoreReading.longitude]: packet.longitude,
          ...this._motion(packet.speedKnots, packet.trackTrue, courseAsHeading),
        })
        return

      case 'VTG':
        store.getState().pushMany(this._motion(packet.speedKnots, packet.trackTrue, courseAsHeading))
        return

      default:
        return
    }
  }

  // ── Internal ───────────────────────────────────────────────────────────────

  private _parse(line: string): ReturnType<typeof parseNmeaSentence> | null {
    if (!line.startsWith('$')) return null
    try {
      return parseNmeaSentence(line)
    } catch (err) {
      this.badSentences++
      this.opts.log.debug({ err: errorMessage(err), line }, 'unparseable NMEA sentence')
      return null
    }
  }

  private _motion(speedKnots: number, course: number, asHeading: boolean): Record<string, ReadingValue> {
    const values: Record<string, ReadingValue> = {
      [CoreReading.speed]: speedKnots,
      'gps.course':        course,
    }
    if (asHeading) values[CoreReading.heading] = course
    return values
  }

  private async _open(): Promise<void> {
    const { path, baudRate, log } = this.opts
    let port: Readable
    try {
      port = await this.opts.open(path, baudRate)
    } catch (err) {
      log.warn({ err: errorMessage(err), path }, 'cannot open GPS port')
      this._scheduleReopen()
      return
    }
    if (!this.running) {
      port.destroy()
      return
    }

    this.port = port
    log.info({ path, baudRate }, 'GPS port open')
    const lines = port.pipe(new ReadlineParser({ delimiter: '\n' }))
    lines.on('data', (line: string) => this.handleSentence(line))
    port.on('error', (err: Error) => log.warn({ err: err.message, path }, 'GPS port error'))
    port.on('close', () => {
      if (this.port !== port) return
      this.port = null
      log.warn({ path }, 'GPS port closed')
      this._scheduleReopen()
    })
  }

  private _scheduleReopen(): void {
    if (!this.running || this.reopenTimer) return
    this.reopenTimer = setTimeout(() => {
      this.reopenTimer = null
      if (this.running) void this._open()
    }, this.opts.reopenMs)
  }
}
