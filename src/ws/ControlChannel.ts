/**
 * ControlChannel — the device's one WebSocket connection to the relay server.
 *
 * Owns the connection state machine:
 *
 *   disconnected → connecting → connected ⇄ reconnecting → connecting …
 *                                   any state → closed (terminal, via close())
 *
 * Every transition to `connected` opens a new epoch: the outbound sequence
 * counter restarts at 1 and nothing sent in an earlier epoch is replayed.
 * Reconnects never give up; the delay follows `backoffDelay`.
 *
 * Usage:
 *   const channel = new ControlChannel(identity, { log })
 *   channel.start()
 *   for await (const msg of channel.messages()) { … }   // ends after close()
 *   channel.send({ type: 'telemetry', payload })          // throws SendError when offline
 */

import WebSocket from 'ws'
import type { Logger } from '../logger'
import { SendError, errorMessage } from '../errors'
import { resolveServerUrl, type DeviceIdentity } from '../types/device'
import { decodeFrame, encodeFrame, type InboundMessage, type OutboundMessage } from '../types/protocol'
import { createConnectionStore, type ConnectionSnapshot, type ConnectionState } from '../store/connectionStore'
import { asReadonly, type ReadonlyStore } from '../store/readonly'
import { AsyncQueue } from './AsyncQueue'
import { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from './backoff'

const CLOSE_TIMEOUT_MS = 2000

/** What the session orchestrator needs from a control channel. */
export interface ControlChannelPort {
  readonly state: ReadonlyStore<ConnectionSnapshot>
  start(): void
  send(message: OutboundMessage): number
  messages(): AsyncIterable<InboundMessage>
  close(): Promise<void>
}

export interface ControlChannelOptions {
  log:          Logger
  backoff?:     BackoffPolicy
  heartbeatMs?: number
  /** Consecutive malformed frames tolerated before the connection is dropped */
  maxProtocolErrors?: number
  random?:      () => number
  createSocket?: (url: string) => WebSocket
}

export class ControlChannel implements ControlChannelPort {
  private ws: WebSocket | null = null
  private retryTimer:     ReturnType<typeof setTimeout>  | null = null
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null
  private awaitingPong   = false
  private outboundSeq    = 0
  private protocolErrors = 0
  private readonly url: string
  private readonly inbound = new AsyncQueue<InboundMessage>()
  private readonly store   = createConnectionStore()
  private readonly log: Logger
  private readonly backoff: BackoffPolicy
  private readonly heartbeatMs: number
  private readonly maxProtocolErrors: number
  private readonly random: () => number
  private readonly createSocket: (url: string) => WebSocket

  readonly state: ReadonlyStore<ConnectionSnapshot> = asReadonly(this.store)

  constructor(identity: DeviceIdentity, opts: ControlChannelOptions) {
    this.url               = resolveServerUrl(identity)
    this.log               = opts.log.child({ component: 'control-channel' })
    this.backoff           = opts.backoff ?? DEFAULT_BACKOFF
    this.heartbeatMs       = opts.heartbeatMs ?? 25_000
    this.maxProtocolErrors = opts.maxProtocolErrors ?? 20
    this.random            = opts.random ?? Math.random
    this.createSocket      = opts.createSocket ?? ((url) => new WebSocket(url))
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  get isConnected(): boolean { return this.store.getState().state === 'connected' }

  /** Begin connecting. Calling it again while running is a no-op. */
  start(): void {
    if (this.store.getState().state !== 'disconnected') return
    this._open()
  }

  /**
   * Write one frame and return the sequence number it went out with.
   * `commandResult` keeps the seq of the command it answers.
   */
  send(message: OutboundMessage): number {
    const ws = this.ws
    if (!this.isConnected || !ws || ws.readyState !== WebSocket.OPEN) {
      throw new SendError(`cannot send ${message.type}: channel is ${this.store.getState().state}`)
    }
    const seq = message.type === 'commandResult' ? message.seq : ++this.outboundSeq
    ws.send(encodeFrame(message.type, seq, message.payload))
    return seq
  }

  /** Inbound messages in arrival order, across reconnects, until close(). */
  messages(): AsyncIterable<InboundMessage> {
    return this.inbound
  }

  /** Terminal. Cancels any pending reconnect and waits for the socket to close. */
  async close(): Promise<void> {
    if (this.store.getState().state === 'closed') return
    this._clearRetry()
    this._stopHeartbeat()
    const ws = this.ws
    this.ws = null
    this._setState('closed')
    this.inbound.close()
    if (ws) await this._closeSocket(ws)
    this.log.info('control channel closed')
  }

  // ── Internal ───────────────────────────────────────────────────────────────

  private _setState(state: ConnectionState, patch: Partial<ConnectionSnapshot> = {}): void {
    const prev = this.store.getState()
    if (prev.state === state && Object.keys(patch).length === 0) return
    this.store.setState({ ...patch, state, since: Date.now() })
  }

  private _open(): void {
    if (this.store.getState().state === 'closed') return
    this._setState('connecting')
    this.log.info({ url: this.url, attempt: this.store.getState().attempt }, 'connecting')

    let socket: WebSocket
    try {
      socket = this.createSocket(this.url)
    } catch (err) {
      this._onLost(err)
      return
    }
    this.ws = socket

    socket.on('open', () => {
      if (this.ws !== socket) return
      const epoch = this.store.getState().epoch + 1
      this.outboundSeq    = 0
      this.protocolErrors = 0
      this._setState('connected', { epoch, attempt: 0, lastError: null })
      this._startHeartbeat(socket)
      this.log.info({ epoch }, 'connected')
    })

    socket.on('message', (data, isBinary) => {
      if (this.ws !== socket) return
      this.awaitingPong = false
      if (isBinary) {
        this._protocolError(socket, 'binary frames are not part of the control protocol')
        return
      }
      const decoded = decodeFrame(rawToString(data))
      if (!decoded.ok) {
        this._protocolError(socket, decoded.error)
        return
      }
      this.protocolErrors = 0
      this.inbound.push(decoded.message)
    })

    socket.on('pong', () => { this.awaitingPong = false })

    // 'close' always follows 'error'; reconnect is scheduled from there
    socket.on('error', (err) => {
      if (this.ws !== socket) return
      this.store.setState({ lastError: errorMessage(err) })
      this.log.warn({ err: errorMessage(err) }, 'socket error')
    })

    socket.on('close', (code, reason) => {
      if (this.ws !== socket) return
      this.ws = null
      this._stopHeartbeat()
      this._onLost(`closed with code ${code}${reason.length > 0 ? `: ${reason.toString()}` : ''}`)
    })
  }

  private _onLost(cause: unknown): void {
    if (this.store.getState().state === 'closed') return
    const { attempt, lastError } = this.store.getState()
    const delay = backoffDelay(attempt, this.backoff, this.random)
    this._setState('reconnecting', { attempt: attempt + 1, lastError: lastError ?? errorMessage(cause) })
    this.log.warn({ cause: errorMessage(cause), attempt: attempt + 1, delayMs: Math.round(delay) }, 'connection lost, reconnecting')
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null
      this.store.setState({ lastError: null })
      this._open()
    }, delay)
  }

  private _protocolError(socket: WebSocket, error: string): void {
    this.protocolErrors++
    this.log.warn({ error, consecutive: this.protocolErrors }, 'dropped malformed frame')
    if (this.protocolErrors >= this.maxProtocolErrors) {
      this.log.error('too many malformed frames, dropping connection')
      this.store.setState({ lastError: 'protocol violation' })
      socket.terminate()
    }
  }

  private _startHeartbeat(socket: WebSocket): void {
    this._stopHeartbeat()
    this.awaitingPong = false
    this.heartbeatTimer = setInterval(() => {
      if (this.awaitingPong) {
        this.log.warn('heartbeat timed out')
        this.store.setState({ lastError: 'heartbeat timeout' })
        socket.terminate()
        return
      }
      this.awaitingPong = true
      socket.ping()
    }, this.heartbeatMs)
  }

  private _stopHeartbeat(): void {
    if (this.heartbeatTimer) { clearInterval(this.heartbeatTimer); this.heartbeatTimer = null }
  }

  private _clearRetry(): void {
    if (this.retryTimer) { clearTimeout(this.retryTimer); this.retryTimer = null }
  }

  private _closeSocket(ws: WebSocket): Promise<void> {
    if (ws.readyState === WebSocket.CLOSED) return Promise.resolve()
    return new Promise((resolve) => {
      const timer = setTimeout(() => { ws.terminate(); resolve() }, CLOSE_TIMEOUT_MS)
      ws.once('close', () => { clearTimeout(timer); resolve() })
      if (ws.readyState === WebSocket.CONNECTING) ws.terminate()
      else ws.close(1000, 'device shutdown')
    })
  }
}

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
  return data.toString('utf8')
}
