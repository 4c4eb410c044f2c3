/**
 * SessionOrchestrator — runs the device for the lifetime of the process.
 *
 * Three loops share the event loop and never wait on each other:
 *   inbound    channel.messages() → executor / media manager / pong
 *   telemetry  every interval, one sample → `telemetry` (skipped while offline)
 *   commands   one promise per command → `commandResult`
 *
 * Nothing a child does can end run(): every failure turns into an outcome
 * message for the server or a log line. Sends while offline are dropped, and
 * a command result only goes out in the epoch its command arrived in.
 */

import type { Logger } from '../logger'
import { MediaError, SendError, errorMessage } from '../errors'
import { decodeCommand, type CommandOutcome, type DecodedCommand } from '../types/command'
import type { InboundMessage, OutboundMessage } from '../types/protocol'
import type { TelemetryRecord } from '../types/telemetry'
import type { ConnectionSnapshot } from '../store/connectionStore'
import type { ControlChannelPort } from '../ws/ControlChannel'
import type { CommandExecutor } from '../device/CommandExecutor'
import type { MediaSessionManager, MediaState } from '../media/MediaSessionManager'
import { sleep, untilAborted } from '../util/sleep'

export interface TelemetrySampler {
  sample(): TelemetryRecord
}

export interface SessionOrchestratorOptions {
  channel:             ControlChannelPort
  executor:            CommandExecutor
  media:               MediaSessionManager
  telemetry:           TelemetrySampler
  telemetryIntervalMs: number
  log:                 Logger
  /** How long shutdown waits for running commands before abandoning them */
  shutdownGraceMs?:    number
  now?:                () => number
}

export interface OrchestratorStats {
  telemetrySent:    number
  telemetrySkipped: number
  commandsHandled:  number
  dropped:          number
}

interface InFlight {
  seq:       number
  commandId: string
}

/** Anything with promises to wait for: a Set of tasks or a Map keyed by them. */
interface Pending {
  readonly size: number
  keys(): Iterable<Promise<void>>
}

export class SessionOrchestrator {
  private readonly commands = new Map<Promise<void>, InFlight>()
  private readonly tasks    = new Set<Promise<void>>()
  private readonly log: Logger
  private readonly now: () => number
  private readonly shutdownGraceMs: number
  private running  = false
  private stopping = false

  readonly stats: OrchestratorStats = { telemetrySent: 0, telemetrySkipped: 0, commandsHandled: 0, dropped: 0 }

  constructor(private readonly opts: SessionOrchestratorOptions) {
    this.log             = opts.log.child({ component: 'orchestrator' })
    this.now             = opts.now ?? Date.now
    this.shutdownGraceMs = opts.shutdownGraceMs ?? 5000
  }

  /** Resolves after `signal` aborts and every child reached a terminal state. */
  async run(signal: AbortSignal): Promise<void> {
    if (this.running) throw new Error('orchestrator is already running')
    this.running = true
    const { channel, media } = this.opts

    const unsubscribe = [
      channel.state.subscribe((s, prev) => this._onConnectionChange(s, prev)),
      media.session.subscribe((s, prev) => this._onMediaChange(s, prev)),
      media.onLocalCandidate((payload) => { this._send({ type: 'iceCandidate', payload }) }),
    ]

    channel.start()
    const ticker  = setInterval(() => this._tick(), this.opts.telemetryIntervalMs)
    const inbound = this._consume()
    this.log.info({ telemetryIntervalMs: this.opts.telemetryIntervalMs }, 'device running')

    await untilAborted(signal)
    this.stopping = true
    this.log.info('shutting down')

    clearInterval(ticker)
    await channel.close()
    await inbound
    await media.close('shutdown')
    await this._drainCommands()
    await this._settle(this.tasks)
    await media.idle()
    unsubscribe.forEach((fn) => fn())
    this.running  = false
    this.stopping = false
    this.log.info({ ...this.stats }, 'shutdown complete')
  }

  // ── Inbound ────────────────────────────────────────────────────────────────

  private async _consume(): Promise<void> {
    try {
      for await (const message of this.opts.channel.messages()) {
        this._dispatch(message)
      }
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, 'inbound loop failed')
    }
  }

  private _dispatch(message: InboundMessage): void {
    if (this.stopping) {
      this.log.debug({ type: message.type, seq: message.seq }, 'shutting down, inbound message ignored')
      return
    }
    switch (message.type) {
      case 'command': {
        const decoded = decodeCommand(message.seq, message.payload, this.now())
        const epoch   = this.opts.channel.state.getState().epoch
        const commandId = decoded.ok ? decoded.command.id : decoded.commandId
        this._trackCommand(this._handleCommand(message.seq, decoded, epoch), { seq: message.seq, commandId })
        return
      }
      case 'sessionOffer':
        this._track(this._handleOffer(message.payload.sdp))
        return
      case 'iceCandidate':
        this._track(this.opts.media.handleIceCandidate(message.payload))
        return
      case 'ping':
        this._send({ type: 'pong', payload: { timestamp: this.now() } })
        return
      case 'telemetryAck':
        this.log.trace({ seq: message.seq, upTo: message.payload.upTo }, 'telemetry acknowledged')
        return
      case 'sessionAnswer':
        this.log.warn({ seq: message.seq }, 'unexpected sessionAnswer, the device only answers offers')
        return
      case 'error':
        this.log.warn({ seq: message.seq, ...message.payload }, 'server reported an error')
        return
      case 'unknown':
        this.log.warn({ seq: message.seq, type: message.rawType }, 'unknown message type dropped')
        return
    }
  }

  private async _handleCommand(seq: number, decoded: DecodedCommand, epoch: number): Promise<void> {
    const outcome: CommandOutcome = decoded.ok
      ? await this.opts.executor.execute(decoded.command)
      : { commandId: decoded.commandId, outcome: 'rejected', reason: decoded.reason }
    this.stats.commandsHandled++
    // seq numbers are only valid inside the epoch that issued them
    if (this.opts.channel.state.getState().epoch !== epoch) {
      this.stats.dropped++
      this.log.debug({ seq, commandId: outcome.commandId, epoch }, 'epoch ended, command result dropped')
      return
    }
    this._send({ type: 'commandResult', seq, payload: outcome })
  }

  private async _handleOffer(sdp: string): Promise<void> {
    try {
      const answer = await this.opts.media.handleOffer({ sdp })
      this._send({ type: 'sessionAnswer', payload: answer })
    } catch (err) {
      // failed sessions are reported from _onMediaChange
      if (err instanceof MediaError && err.code === 'superseded') {
        this.log.debug({ err: err.message }, 'offer superseded')
      } else {
        this.log.warn({ err: errorMessage(err) }, 'offer not answered')
      }
    }
  }

  // ── Telemetry ──────────────────────────────────────────────────────────────

  private _tick(): void {
    if (this.opts.channel.state.getState().state !== 'connected') {
      this.stats.telemetrySkipped++
      this.log.debug('offline, telemetry tick skipped')
      return
    }
    let record: TelemetryRecord
    try {
      record = this.opts.telemetry.sample()
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, 'telemetry sample failed')
      return
    }
    if (this._send({ type: 'telemetry', payload: record })) this.stats.telemetrySent++
  }

  // ── Observers ──────────────────────────────────────────────────────────────

  private _onConnectionChange(s: ConnectionSnapshot, prev: ConnectionSnapshot): void {
    if (prev.state === 'connected' && s.state !== 'connected') {
      this.log.warn({ epoch: prev.epoch, state: s.state }, 'epoch ended')
      this._track(this.opts.media.close('connection lost'))
    } else if (s.state === 'connected' && prev.state !== 'connected') {
      this.log.info({ epoch: s.epoch }, 'epoch started')
    }
  }

  private _onMediaChange(s: MediaState, prev: MediaState): void {
    const session = s.session
    if (!session || session.state !== 'failed') return
    if (prev.session?.sessionId === session.sessionId && prev.session.state === 'failed') return
    const failure = session.failure
    this._send({
      type:    'error',
      payload: {
        code:      failure?.code ?? 'negotiation_failed',
        message:   failure?.message ?? 'media session failed',
        sessionId: session.sessionId,
      },
    })
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  /** Returns false when the message was dropped. */
  private _send(message: OutboundMessage): boolean {
    try {
      this.opts.channel.send(message)
      return true
    } catch (err) {
      this.stats.dropped++
      if (err instanceof SendError) this.log.debug({ type: message.type }, 'offline, message dropped')
      else this.log.warn({ type: message.type, err: errorMessage(err) }, 'send failed, message dropped')
      return false
    }
  }

  private _track(task: Promise<void>): void {
    const guarded = task.catch((err: unknown) => {
      this.log.error({ err: errorMessage(err) }, 'background task failed')
    })
    this.tasks.add(guarded)
    void guarded.finally(() => this.tasks.delete(guarded))
  }

  private _trackCommand(task: Promise<void>, command: InFlight): void {
    const guarded = task.catch((err: unknown) => {
      this.log.error({ ...command, err: errorMessage(err) }, 'command handling failed')
    })
    this.commands.set(guarded, command)
    void guarded.finally(() => this.commands.delete(guarded))
  }

  /** Give running commands the grace period, then abort whatever is left. */
  private async _drainCommands(): Promise<void> {
    if (!(await this._settleWithin(this.commands, this.shutdownGraceMs))) {
      this.log.warn({ pending: this.commands.size }, 'commands still running at shutdown, abandoning')
    }
    this.opts.executor.abort()
    if (await this._settleWithin(this.commands, this.shutdownGraceMs)) return
    for (const { seq, commandId } of this.commands.values()) {
      this.log.error({ seq, commandId, outcome: 'failed', reason: 'shutdown' }, 'command abandoned at shutdown')
    }
  }

  private async _settleWithin(set: Pending, ms: number): Promise<boolean> {
    if (set.size === 0) return true
    const timer = new AbortController()
    const done = await Promise.race([
      this._settle(set).then(() => true),
      sleep(ms, timer.signal).then(() => false),
    ])
    timer.abort()
    return done
  }

  private async _settle(set: Pending): Promise<void> {
    while (set.size > 0) await Promise.all([...set.keys()])
  }
}
