import {
  MediaStreamTrack,
  RTCIceCandidate,
  RTCPeerConnection,
  RTCRtpCodecParameters,
} from 'werift'
import type { Logger } from '../logger'
import type { IceServer } from '../api/ice'
import type { MediaFrame, Peer, PeerEvents, PeerFactory, RemoteCandidate } from './peer'

const RTCP_FEEDBACK = [
  { type: 'nack' },
  { type: 'nack', parameter: 'pli' },
  { type: 'goog-remb' },
]

function videoCodecs(): RTCRtpCodecParameters[] {
  return [
    new RTCRtpCodecParameters({
      mimeType:     'video/VP8',
      clockRate:    90_000,
      rtcpFeedback: RTCP_FEEDBACK,
    }),
    new RTCRtpCodecParameters({
      mimeType:     'video/H264',
      clockRate:    90_000,
      rtcpFeedback: RTCP_FEEDBACK,
      parameters:   'profile-level-id=42e01f;packetization-mode=1;level-asymmetry-allowed=1',
    }),
  ]
}

/** Send-only video peer on werift, the pure TypeScript WebRTC stack. */
class WeriftPeer implements Peer {
  private readonly track = new MediaStreamTrack({ kind: 'video' })

  constructor(private readonly pc: RTCPeerConnection, events: PeerEvents) {
    pc.addTransceiver(this.track, { direction: 'sendonly' })
    pc.onIceCandidate.subscribe((candidate) => {
      if (!candidate?.candidate) return
      events.onLocalCandidate({
        candidate:     candidate.candidate,
        sdpMid:        candidate.sdpMid ?? '',
        sdpMLineIndex: candidate.sdpMLineIndex ?? 0,
      })
    })
    pc.connectionStateChange.subscribe((state) => {
      if (state !== 'new') events.onConnectivity(state)
    })
  }

  async answer(offerSdp: string): Promise<string> {
    await this.pc.setRemoteDescription({ type: 'offer', sdp: offerSdp })
    const answer = await this.pc.createAnswer()
    await this.pc.setLocalDescription(answer)
    return this.pc.localDescription?.sdp ?? answer.sdp
  }

  async addRemoteCandidate(candidate: RemoteCandidate): Promise<void> {
    await this.pc.addIceCandidate(new RTCIceCandidate({
      candidate:     candidate.candidate,
      sdpMid:        candidate.sdpMid ?? undefined,
      sdpMLineIndex: candidate.sdpMLineIndex ?? undefined,
    }))
  }

  writeFrame(frame: MediaFrame): void {
    this.track.writeRtp(frame)
  }

  async close(): Promise<void> {
    await this.pc.close()
  }
}

export interface WeriftPeerFactoryOptions {
  log:        Logger
  iceServers: () => Promise<IceServer[]>
}

export class WeriftPeerFactory implements PeerFactory {
  private readonly log: Logger

  constructor(private readonly opts: WeriftPeerFactoryOptions) {
    this.log = opts.log.child({ component: 'webrtc' })
  }

  async create(events: PeerEvents): Promise<Peer> {
    const iceServers = await this.opts.iceServers()
    this.log.debug({ servers: iceServers.length }, 'creating peer connection')
    const pc = new RTCPeerConnection({
      iceServers,
      codecs: { video: videoCodecs() },
    })
    return new WeriftPeer(pc, events)
  }
}
