import { describe, it, expect, vi, afterEach } from 'vitest'
import { silentLogger, type Logger } from '../logger'
import { SendError } from '../errors'
import type { InboundMessage, OutboundMessage } from '../types/protocol'
import { createConnectionStore } from '../store/connectionStore'
import { createSensorStore } from '../store/sensorStore'
import { asReadonly } from '../store/readonly'
import { AsyncQueue } from '../ws/AsyncQueue'
import type { ControlChannelPort } from '../ws/ControlChannel'
import { CommandExecutor } from '../device/CommandExecutor'
import { TelemetrySource } from '../device/TelemetrySource'
import type { Actuator, ActuatorResult, ValidCommand } from '../device/capabilities'
import { SimulatedBoat } from '../hardware/SimulatedBoat'
import { MediaSessionManager } from '../media/MediaSessionManager'
import type { FrameSupplier, MediaFrame, Peer, PeerEvents, PeerFactory } from '../media/peer'
import { SessionOrchestrator } from './SessionOrchestrator'

const VP8_OFFER = 'v=0\r\nm=video 9 UDP/TLS/RTP/SAVPF 96\r\na=rtpmap:96 VP8/90000\r\n'

/** In-process stand-in for the WebSocket control channel. */
class FakeChannel implements ControlChannelPort {
  private readonly store = createConnectionStore(() => 0)
  private readonly inbound = new AsyncQueue<InboundMessage>()
  readonly state = asReadonly(this.store)
  readonly sent: OutboundMessage[] = []
  started = false

  start(): void { this.started = true }

  connect(): void {
    this.store.setState({ state: 'connected', epoch: this.store.getState().epoch + 1 })
  }

  drop(): void { this.store.setState({ state: 'reconnecting' }) }

  deliver(message: InboundMessage): void { this.inbound.push(message) }

  send(message: OutboundMessage): number {
    if (this.store.getState().state !== 'connected') throw new SendError('offline')
    this.sent.push(message)
    return this.sent.length
  }

  messages(): AsyncIterable<InboundMessage> { return this.inbound }

  async close(): Promise<void> {
    this.store.setState({ state: 'closed' })
    this.inbound.close()
  }

  ofType<T extends OutboundMessage['type']>(type: T): Array<Extract<OutboundMessage, { type: T }>> {
    return this.sent.filter((m): m is Extract<OutboundMessage, { type: T }> => m.type === type)
  }
}

class FakePeer implements Peer {
  constructor(readonly events: PeerEvents) {}
  async answer(): Promise<string> { return 'v=0\r\na=answer\r\n' }
  async addRemoteCandidate(): Promise<void> {}
  writeFrame(_frame: MediaFrame): void {}
  async close(): Promise<void> {}
}

class FakePeers implements PeerFactory {
  readonly created: FakePeer[] = []
  async create(events: PeerEvents): Promise<Peer> {
    const peer = new FakePeer(events)
    this.created.push(peer)
    return peer
  }
}

const idleFrames: FrameSupplier = {
  nextFrame: (signal) => new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true })
  }),
}

/** Holds every command until release() or abort. */
class GatedActuator implements Actuator {
  private gates: Array<() => void> = []
  calls = 0

  async apply(cmd: ValidCommand, signal: AbortSignal): Promise<ActuatorResult> {
    this.calls++
    await new Promise<void>((resolve, reject) => {
      this.gates.push(resolve)
      signal.addEventListener('abort', () => reject(new Error('interrupted')), { once: true })
    })
    return { kind: cmd.kind }
  }

  release(): void { this.gates.shift()?.() }
  async close(): Promise<void> {}
}

function setup(opts: { actuator?: Actuator; shutdownGraceMs?: number; log?: Logger } = {}) {
  const log      = opts.log ?? silentLogger()
  const channel  = new FakeChannel()
  const peers    = new FakePeers()
  const store    = createSensorStore(() => 0)
  const actuator = opts.actuator ?? new SimulatedBoat({ store, log, random: () => 0.5 })
  const media    = new MediaSessionManager({ peers, frames: idleFrames, log, newId: () => 'session-1' })
  const orchestrator = new SessionOrchestrator({
    channel,
    executor:            new CommandExecutor(actuator, log),
    media,
    telemetry:           new TelemetrySource(store, { now: () => 0 }),
    telemetryIntervalMs: 1000,
    shutdownGraceMs:     opts.shutdownGraceMs ?? 5000,
    now:                 () => 1234,
    log,
  })
  const abort   = new AbortController()
  const running = orchestrator.run(abort.signal)
  const stop    = async () => { abort.abort(); await running }
  return { channel, peers, media, orchestrator, stop }
}

afterEach(() => { vi.useRealTimers() })

describe('SessionOrchestrator', () => {
  it('starts the channel when run', async () => {
    const { channel, stop } = setup()
    expect(channel.started).toBe(true)
    await stop()
  })

  it('answers a command with a commandResult carrying the same seq', async () => {
    const { channel, stop } = setup()
    channel.connect()
    channel.deliver({ type: 'command', seq: 1, payload: { kind: 'setHeading', parameters: { degrees: 90 } } })

    await vi.waitFor(() => expect(channel.ofType('commandResult')).toHaveLength(1))
    expect(channel.ofType('commandResult')[0]).toEqual({
      type:    'commandResult',
      seq:     1,
      payload: { commandId: 'cmd-1', outcome: 'completed', result: { heading: 90 } },
    })
    await stop()
  })

  it('rejects malformed and unknown commands without stopping', async () => {
    const { channel, stop } = setup()
    channel.connect()
    channel.deliver({ type: 'command', seq: 5, payload: 'left' })
    channel.deliver({ type: 'command', seq: 6, payload: { id: 'x', kind: 'fly' } })

    await vi.waitFor(() => expect(channel.ofType('commandResult')).toHaveLength(2))
    expect(channel.ofType('commandResult').map((m) => m.payload)).toEqual([
      { commandId: 'cmd-5', outcome: 'rejected', reason: 'malformed command payload' },
      { commandId: 'x', outcome: 'rejected', reason: 'unknown command kind "fly"' },
    ])
    await stop()
  })

  it('sends telemetry once per interval while connected and skips ticks while offline', async () => {
    vi.useFakeTimers()
    const { channel, orchestrator, stop } = setup()
    channel.connect()

    await vi.advanceTimersByTimeAsync(5000)
    expect(channel.ofType('telemetry')).toHaveLength(5)
    expect(channel.ofType('telemetry')[0]?.payload.timestamp).toBe(0)

    channel.drop()
    await vi.advanceTimersByTimeAsync(3000)
    expect(channel.ofType('telemetry')).toHaveLength(5)
    expect(orchestrator.stats).toMatchObject({ telemetrySent: 5, telemetrySkipped: 3 })

    channel.connect()
    await vi.advanceTimersByTimeAsync(1000)
    expect(channel.ofType('telemetry')).toHaveLength(6)
    await stop()
  })

  it('replies to ping with pong and ignores unknown types', async () => {
    const { channel, stop } = setup()
    channel.connect()
    channel.deliver({ type: 'unknown', seq: 1, rawType: 'firmwareUpdate', payload: {} })
    channel.deliver({ type: 'ping', seq: 2, payload: undefined })

    await vi.waitFor(() => expect(channel.sent).toHaveLength(1))
    expect(channel.sent).toEqual([{ type: 'pong', payload: { timestamp: 1234 } }])
    await stop()
  })

  it('answers session offers and forwards local candidates', async () => {
    const { channel, peers, stop } = setup()
    channel.connect()
    channel.deliver({ type: 'sessionOffer', seq: 3, payload: { sdp: VP8_OFFER } })

    await vi.waitFor(() => expect(channel.ofType('sessionAnswer')).toHaveLength(1))
    expect(channel.ofType('sessionAnswer')[0]?.payload).toEqual({ sessionId: 'session-1', sdp: 'v=0\r\na=answer\r\n' })

    peers.created[0]?.events.onLocalCandidate({ candidate: 'candidate:1', sdpMid: '0', sdpMLineIndex: 0 })
    expect(channel.ofType('iceCandidate')).toEqual([{
      type:    'iceCandidate',
      payload: { sessionId: 'session-1', candidate: 'candidate:1', sdpMid: '0', sdpMLineIndex: 0 },
    }])
    await stop()
  })

  it('reports a failed media session to the server', async () => {
    const { channel, stop } = setup()
    channel.connect()
    channel.deliver({ type: 'sessionOffer', seq: 3, payload: { sdp: 'v=0\r\na=rtpmap:96 AV1/90000\r\n' } })

    await vi.waitFor(() => expect(channel.ofType('error')).toHaveLength(1))
    expect(channel.ofType('error')[0]?.payload).toEqual({
      code:      'codec_incompatible',
      message:   'no compatible codec in offer: AV1',
      sessionId: 'session-1',
    })
    expect(channel.ofType('sessionAnswer')).toHaveLength(0)
    await stop()
  })

  it('closes the media session when the connection drops', async () => {
    const { channel, media, stop } = setup()
    channel.connect()
    channel.deliver({ type: 'sessionOffer', seq: 3, payload: { sdp: VP8_OFFER } })
    await vi.waitFor(() => expect(channel.ofType('sessionAnswer')).toHaveLength(1))

    channel.drop()
    expect(media.session.getState().session?.state).toBe('closed')
    await stop()
  })

  it('drops a result that completes after the connection is gone', async () => {
    const actuator = new GatedActuator()
    const { channel, orchestrator, stop } = setup({ actuator })
    channel.connect()
    channel.deliver({ type: 'command', seq: 1, payload: { kind: 'stop' } })
    await vi.waitFor(() => expect(actuator.calls).toBe(1))

    channel.drop()
    actuator.release()
    await vi.waitFor(() => expect(orchestrator.stats.commandsHandled).toBe(1))
    expect(orchestrator.stats.dropped).toBe(1)

    channel.connect()
    expect(channel.ofType('commandResult')).toHaveLength(0)
    await stop()
  })

  it('drops a result whose epoch ended, even after a reconnect', async () => {
    const actuator = new GatedActuator()
    const { channel, orchestrator, stop } = setup({ actuator })
    channel.connect()
    channel.deliver({ type: 'command', seq: 7, payload: { kind: 'stop' } })
    await vi.waitFor(() => expect(actuator.calls).toBe(1))

    channel.drop()
    channel.connect()
    expect(channel.state.getState().epoch).toBe(2)
    actuator.release()

    await vi.waitFor(() => expect(orchestrator.stats.commandsHandled).toBe(1))
    expect(orchestrator.stats.dropped).toBe(1)
    expect(channel.ofType('commandResult')).toHaveLength(0)
    await stop()
  })

  it('sends results of commands that finish within their epoch', async () => {
    const actuator = new GatedActuator()
    const { channel, stop } = setup({ actuator })
    channel.connect()
    channel.deliver({ type: 'command', seq: 2, payload: { kind: 'stop' } })
    await vi.waitFor(() => expect(actuator.calls).toBe(1))

    actuator.release()
    await vi.waitFor(() => expect(channel.ofType('commandResult')).toHaveLength(1))
    expect(channel.ofType('commandResult')[0]).toEqual({
      type:    'commandResult',
      seq:     2,
      payload: { commandId: 'cmd-2', outcome: 'completed', result: { kind: 'stop' } },
    })
    await stop()
  })

  it('logs each command that ignores abort as failed with reason shutdown', async () => {
    const log = silentLogger()
    vi.spyOn(log, 'child').mockReturnValue(log)
    const error = vi.spyOn(log, 'error')
    // never settles, abort or not
    const apply = vi.fn((_cmd: ValidCommand, _signal: AbortSignal) => new Promise<ActuatorResult>(() => {}))
    const { channel, orchestrator, stop } = setup({ actuator: { apply, close: async () => {} }, shutdownGraceMs: 20, log })
    channel.connect()
    channel.deliver({ type: 'command', seq: 4, payload: { id: 'nav-4', kind: 'setRudder', parameters: { degrees: 10 } } })
    await vi.waitFor(() => expect(apply).toHaveBeenCalledTimes(1))

    await stop()
    expect(error).toHaveBeenCalledWith(
      { seq: 4, commandId: 'nav-4', outcome: 'failed', reason: 'shutdown' },
      'command abandoned at shutdown',
    )
    expect(orchestrator.stats.commandsHandled).toBe(0)
  })

  it('abandons commands that outlive the shutdown grace period', async () => {
    const actuator = new GatedActuator()
    const { channel, orchestrator, stop } = setup({ actuator, shutdownGraceMs: 20 })
    channel.connect()
    channel.deliver({ type: 'command', seq: 1, payload: { kind: 'stop' } })
    await vi.waitFor(() => expect(actuator.calls).toBe(1))

    await stop()
    expect(orchestrator.stats.commandsHandled).toBe(1)
    expect(channel.state.getState().state).toBe('closed')
  })

  it('ignores inbound messages once shutdown has begun', async () => {
    const { channel, stop } = setup()
    channel.connect()
    const stopped = stop()
    channel.deliver({ type: 'ping', seq: 1, payload: undefined })
    await stopped
    expect(channel.sent).toHaveLength(0)
  })
})
