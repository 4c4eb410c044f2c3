/**
 * Frames from the capture pipeline, received as RTP over local UDP.
 *
 * The encoder runs as its own process and streams to 127.0.0.1:<RTP_PORT>, e.g.
 *   gst-launch-1.0 libcamerasrc ! … ! vp8enc ! rtpvp8pay ! udpsink host=127.0.0.1 port=5004
 *
 * Packets wait in a small ring buffer; when nobody is reading (no active
 * session) the oldest are overwritten, and packets older than `maxAgeMs` are
 * discarded instead of being handed to the next reader.
 */

import { createSocket, type Socket } from 'node:dgram'
import type { Logger } from '../logger'
import { CircularBuffer } from './CircularBuffer'
import type { FrameSupplier, MediaFrame } from './peer'

const RTP_VERSION = 2
const DEFAULT_MAX_AGE_MS = 500

export interface UdpRtpFrameSupplierOptions {
  port:      number
  host?:     string
  capacity?: number
  /** Buffered packets older than this are dropped unread */
  maxAgeMs?: number
  log:       Logger
  now?:      () => number
}

interface Buffered {
  frame: MediaFrame
  at:    number
}

type Waiter = (frame: MediaFrame) => void

export class UdpRtpFrameSupplier implements FrameSupplier {
  private socket: Socket | null = null
  private readonly frames: CircularBuffer<Buffered>
  private readonly waiters = new Set<Waiter>()
  private readonly log: Logger
  private readonly maxAgeMs: number
  private readonly now: () => number
  private expired = 0

  constructor(private readonly opts: UdpRtpFrameSupplierOptions) {
    this.frames   = new CircularBuffer(opts.capacity ?? 256)
    this.log      = opts.log.child({ component: 'rtp-source' })
    this.maxAgeMs = opts.maxAgeMs ?? DEFAULT_MAX_AGE_MS
    this.now      = opts.now ?? Date.now
  }

  /** Buffered packets discarded for age */
  get stale(): number { return this.expired }

  get port(): number | null {
    return this.socket ? this.socket.address().port : null
  }

  start(): Promise<void> {
    if (this.socket) return Promise.resolve()
    const socket = createSocket('udp4')
    this.socket = socket
    socket.on('message', (packet) => this.receive(packet))
    socket.on('error', (err) => this.log.error({ err: err.message }, 'RTP socket error'))
    return new Promise((resolve, reject) => {
      socket.once('error', reject)
      socket.bind(this.opts.port, this.opts.host ?? '127.0.0.1', () => {
        socket.off('error', reject)
        this.log.info({ port: socket.address().port }, 'listening for RTP')
        resolve()
      })
    })
  }

  /** Feed one datagram. Anything that is not RTP version 2 is ignored. */
  receive(packet: Buffer): void {
    if (packet.length < 12 || packet[0] >> 6 !== RTP_VERSION) return
    const [waiter] = this.waiters
    if (waiter) {
      this.waiters.delete(waiter)
      waiter(packet)
      return
    }
    this.frames.push({ frame: packet, at: this.now() })
  }

  nextFrame(signal: AbortSignal): Promise<MediaFrame> {
    const buffered = this._freshest()
    if (buffered) return Promise.resolve(buffered)
    if (signal.aborted) return Promise.reject(abortError())
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.waiters.delete(waiter)
        reject(abortError())
      }
      const waiter: Waiter = (frame) => {
        signal.removeEventListener('abort', onAbort)
        resolve(frame)
      }
      this.waiters.add(waiter)
      signal.addEventListener('abort', onAbort, { once: true })
    })
  }

  /** Oldest buffered packet still young enough to send. */
  private _freshest(): MediaFrame | undefined {
    const cutoff = this.now() - this.maxAgeMs
    for (let item = this.frames.shift(); item; item = this.frames.shift()) {
      if (item.at >= cutoff) return item.frame
      this.expired++
    }
    return undefined
  }

  async close(): Promise<void> {
    const socket = this.socket
    this.socket = null
    this.frames.clear()
    if (!socket) return
    await new Promise<void>((resolve) => socket.close(() => resolve()))
    this.log.info({ dropped: this.frames.dropped, stale: this.expired }, 'RTP source closed')
  }
}

function abortError(): Error {
  const err = new Error('frame wait aborted')
  err.name = 'AbortError'
  return err
}
