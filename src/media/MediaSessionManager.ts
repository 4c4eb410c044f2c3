/**
 * MediaSessionManager — the device side of one WebRTC video session.
 *
 *   (offer) → negotiating ──ICE connected──→ active
 *                 │                            │
 *                 ├─timeout / ICE failure / codec mismatch → failed
 *                 └────────────── close() / epoch end ─────→ closed
 *
 * `failed` and `closed` are terminal; only a fresh offer starts over.
 * At most one session is negotiating or active. A different offer replaces
 * the current session (newest wins); the same offer repeated while the
 * session is still negotiating gets the same answer.
 *
 * Video from the frame supplier flows only while the session is active.
 */

import { randomUUID } from 'node:crypto'
import { createStore } from 'zustand/vanilla'
import type { Logger } from '../logger'
import { MediaError, errorMessage, type MediaErrorCode } from '../errors'
import type { LocalCandidatePayload, RemoteCandidate, SessionOffer } from '../types/protocol'
import { asReadonly, type ReadonlyStore } from '../store/readonly'
import { sleep } from '../util/sleep'
import { SUPPORTED_VIDEO_CODECS, checkCodecs } from './sdp'
import type { FrameSupplier, Peer, PeerConnectivity, PeerFactory } from './peer'

const FRAME_RETRY_MS = 100

export type MediaSessionState = 'negotiating' | 'active' | 'closed' | 'failed'

export interface MediaSession {
  sessionId:  string
  state:      MediaSessionState
  epoch:      number
  offerSdp:   string
  /** Remote candidates, append-only until the session ends */
  candidates: readonly RemoteCandidate[]
  failure:    { code: MediaErrorCode; message: string } | null
  createdAt:  number
}

export interface MediaState {
  session: MediaSession | null
}

export interface SessionAnswer {
  sessionId: string
  sdp:       string
}

export interface MediaSessionManagerOptions {
  peers:                 PeerFactory
  frames:                FrameSupplier
  log:                   Logger
  negotiationTimeoutMs?: number
  supportedCodecs?:      readonly string[]
  /** Connection epoch the session belongs to */
  epoch?:                () => number
  newId?:                () => string
}

type CandidateListener = (candidate: LocalCandidatePayload) => void

/** Handles that belong to one session and die with it. */
interface Live {
  readonly id: string
  peer:     Peer | null
  answer:   Promise<SessionAnswer> | null
  answered: boolean
  applied:  number
  timer:    ReturnType<typeof setTimeout> | null
  pump:     AbortController | null
}

export class MediaSessionManager {
  private current: Live | null = null
  private readonly background = new Set<Promise<void>>()
  private readonly listeners  = new Set<CandidateListener>()
  private readonly store = createStore<MediaState>(() => ({ session: null }))
  private readonly log: Logger
  private readonly negotiationTimeoutMs: number
  private readonly supportedCodecs: readonly string[]
  private readonly epoch: () => number
  private readonly newId: () => string

  readonly session: ReadonlyStore<MediaState> = asReadonly(this.store)

  constructor(private readonly opts: MediaSessionManagerOptions) {
    this.log                  = opts.log.child({ component: 'media-session' })
    this.negotiationTimeoutMs = opts.negotiationTimeoutMs ?? 15_000
    this.supportedCodecs      = opts.supportedCodecs ?? SUPPORTED_VIDEO_CODECS
    this.epoch                = opts.epoch ?? (() => 0)
    this.newId                = opts.newId ?? randomUUID
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  /** Subscribe to local ICE candidates of the current session. */
  onLocalCandidate(fn: CandidateListener): () => void {
    this.listeners.add(fn)
    return () => this.listeners.delete(fn)
  }

  handleOffer(offer: SessionOffer): Promise<SessionAnswer> {
    const session = this.store.getState().session
    const live    = this.current

    if (live?.answer && session?.state === 'negotiating' && session.offerSdp === offer.sdp) {
      this.log.debug({ sessionId: live.id }, 'repeated offer, reusing negotiation')
      return live.answer
    }
    if (live && this._isLive(live)) {
      this._end(live, 'closed', null, 'replaced by a new offer')
    }

    const next: Live = { id: this.newId(), peer: null, answer: null, answered: false, applied: 0, timer: null, pump: null }
    this.current = next
    this.store.setState({
      session: {
        sessionId:  next.id,
        state:      'negotiating',
        epoch:      this.epoch(),
        offerSdp:   offer.sdp,
        candidates: [],
        failure:    null,
        createdAt:  Date.now(),
      },
    })
    this.log.info({ sessionId: next.id }, 'negotiating media session')
    next.answer = this._negotiate(next, offer.sdp)
    return next.answer
  }

  /** Remote candidates are buffered until the answer is ready, then applied in order. */
  async handleIceCandidate(candidate: RemoteCandidate): Promise<void> {
    const live = this.current
    const session = this.store.getState().session
    if (!live || !session || !this._isLive(live)) {
      this.log.debug('ICE candidate without a live session, dropped')
      return
    }
    this._patch({ candidates: [...session.candidates, candidate] })
    if (live.answered) await this._flushCandidates(live)
  }

  /** End the current session, if any, and wait until its video and peer are released. */
  async close(reason = 'closed'): Promise<void> {
    const live = this.current
    if (live && this._isLive(live)) this._end(live, 'closed', null, reason)
    await this.idle()
  }

  /** Resolves once background work (frame pumps, peer teardown) has finished. */
  async idle(): Promise<void> {
    while (this.background.size > 0) await Promise.all([...this.background])
  }

  // ── Negotiation ────────────────────────────────────────────────────────────

  private async _negotiate(live: Live, sdp: string): Promise<SessionAnswer> {
    const codecs = checkCodecs(sdp, this.supportedCodecs)
    if (!codecs.compatible) {
      this._fail(live, 'codec_incompatible', codecs.detail)
      throw new MediaError('codec_incompatible', codecs.detail)
    }

    live.timer = setTimeout(() => {
      live.timer = null
      this._fail(live, 'negotiation_timeout', `no ICE connectivity within ${this.negotiationTimeoutMs} ms`)
    }, this.negotiationTimeoutMs)

    let peer: Peer
    try {
      peer = await this.opts.peers.create({
        onLocalCandidate: (c) => {
          if (this.current !== live || !this._isLive(live)) return
          this.listeners.forEach((fn) => fn({ sessionId: live.id, ...c }))
        },
        onConnectivity: (state) => this._onConnectivity(live, state),
      })
    } catch (err) {
      this._fail(live, 'negotiation_failed', `peer setup failed: ${errorMessage(err)}`)
      throw new MediaError('negotiation_failed', errorMessage(err), { cause: err })
    }

    if (!this._isLive(live)) {
      this._track(this._closePeer(live.id, peer))
      throw new MediaError('superseded', `session ${live.id} ended during negotiation`)
    }
    live.peer = peer

    let answerSdp: string
    try {
      answerSdp = await peer.answer(sdp)
    } catch (err) {
      if (!this._isLive(live)) throw new MediaError('superseded', `session ${live.id} ended during negotiation`)
      this._fail(live, 'negotiation_failed', errorMessage(err))
      throw new MediaError('negotiation_failed', errorMessage(err), { cause: err })
    }
    if (!this._isLive(live)) throw new MediaError('superseded', `session ${live.id} ended during negotiation`)

    live.answered = true
    this._track(this._flushCandidates(live))
    this.log.info({ sessionId: live.id }, 'answer ready')
    return { sessionId: live.id, sdp: answerSdp }
  }

  private async _flushCandidates(live: Live): Promise<void> {
    const peer = live.peer
    if (!peer) return
    while (this._isLive(live)) {
      const candidates = this.store.getState().session?.candidates ?? []
      if (live.applied >= candidates.length) return
      const candidate = candidates[live.applied]
      live.applied++
      try {
        await peer.addRemoteCandidate(candidate)
      } catch (err) {
        this.log.warn({ sessionId: live.id, err: errorMessage(err) }, 'remote ICE candidate rejected')
      }
    }
  }

  private _onConnectivity(live: Live, state: PeerConnectivity): void {
    if (this.current !== live || !this._isLive(live)) return
    const session = this.store.getState().session
    switch (state) {
      case 'connected':
        if (session?.state !== 'negotiating' || !live.peer) return
        if (live.timer) { clearTimeout(live.timer); live.timer = null }
        this._patch({ state: 'active' })
        this.log.info({ sessionId: live.id }, 'media session active')
        this._attach(live, live.peer)
        return
      case 'failed':
        this._fail(live, 'ice_failed', 'ICE connectivity failed')
        return
      case 'closed':
        this._end(live, 'closed', null, 'peer closed')
        return
      case 'connecting':
      case 'disconnected':
        this.log.debug({ sessionId: live.id, state }, 'peer connectivity changed')
        return
    }
  }

  // ── Teardown ───────────────────────────────────────────────────────────────

  private _fail(live: Live, code: MediaErrorCode, message: string): void {
    if (!this._isLive(live)) return
    this.log.warn({ sessionId: live.id, code, message }, 'media session failed')
    this._end(live, 'failed', { code, message }, message)
  }

  /** Synchronous state change; releasing the peer and video continues in the background. */
  private _end(
    live: Live,
    state: 'closed' | 'failed',
    failure: MediaSession['failure'],
    reason: string,
  ): void {
    if (live.timer) { clearTimeout(live.timer); live.timer = null }
    if (live.pump)  { live.pump.abort(); live.pump = null }
    if (this.current === live) this._patch({ state, failure })
    if (state === 'closed') this.log.info({ sessionId: live.id, reason }, 'media session closed')
    const peer = live.peer
    live.peer = null
    if (peer) this._track(this._closePeer(live.id, peer))
  }

  private async _closePeer(sessionId: string, peer: Peer): Promise<void> {
    try {
      await peer.close()
    } catch (err) {
      this.log.warn({ sessionId, err: errorMessage(err) }, 'peer close failed')
    }
  }

  // ── Video ──────────────────────────────────────────────────────────────────

  private _attach(live: Live, peer: Peer): void {
    const controller = new AbortController()
    live.pump = controller
    this._track(this._pump(live.id, peer, controller.signal))
  }

  private async _pump(sessionId: string, peer: Peer, signal: AbortSignal): Promise<void> {
    this.log.info({ sessionId }, 'video attached')
    while (!signal.aborted) {
      try {
        const frame = await this.opts.frames.nextFrame(signal)
        if (signal.aborted) break
        peer.writeFrame(frame)
      } catch (err) {
        if (signal.aborted) break
        this.log.warn({ sessionId, err: errorMessage(err) }, 'frame supply failed')
        await sleep(FRAME_RETRY_MS, signal)
      }
    }
    this.log.info({ sessionId }, 'video detached')
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private _isLive(live: Live): boolean {
    const session = this.store.getState().session
    return this.current === live
      && session?.sessionId === live.id
      && (session.state === 'negotiating' || session.state === 'active')
  }

  private _patch(patch: Partial<MediaSession>): void {
    const session = this.store.getState().session
    if (session) this.store.setState({ session: { ...session, ...patch } })
  }

  private _track(task: Promise<void>): void {
    this.background.add(task)
    void task.finally(() => this.background.delete(task))
  }
}
