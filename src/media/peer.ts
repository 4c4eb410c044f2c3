import type { RemoteCandidate } from '../types/protocol'

export type { RemoteCandidate }

/** One encoded video packet from the capture pipeline, ready to go out as RTP. */
export type MediaFrame = Buffer

export type PeerConnectivity = 'connecting' | 'connected' | 'disconnected' | 'failed' | 'closed'

export interface LocalCandidate {
  candidate:     string
  sdpMid:        string
  sdpMLineIndex: number
}

export interface PeerEvents {
  onLocalCandidate: (candidate: LocalCandidate) => void
  onConnectivity:   (state: PeerConnectivity) => void
}

/** A WebRTC peer connection reduced to what a device-side session needs. */
export interface Peer {
  /** Apply a remote offer and return the local answer SDP */
  answer(offerSdp: string): Promise<string>
  addRemoteCandidate(candidate: RemoteCandidate): Promise<void>
  writeFrame(frame: MediaFrame): void
  close(): Promise<void>
}

export interface PeerFactory {
  create(events: PeerEvents): Promise<Peer>
}

/** Source of outbound video. Resolves with the next frame, or rejects. */
export interface FrameSupplier {
  nextFrame(signal: AbortSignal): Promise<MediaFrame>
}
