export const SUPPORTED_VIDEO_CODECS = ['VP8', 'H264'] as const

export interface CodecCheck {
  compatible: boolean
  detail:     string
}

/** Video codec names an SDP offers, from its rtpmap and H.264 fmtp lines. */
export function offeredCodecs(sdp: string): string[] {
  const codecs = new Set<string>()
  for (const line of sdp.split(/\r?\n/)) {
    const rtpmap = /^a=rtpmap:\d+ ([^/\s]+)/.exec(line)
    if (rtpmap?.[1]) codecs.add(rtpmap[1].toUpperCase())
    else if (line.startsWith('a=fmtp:') && line.includes('profile-level-id')) codecs.add('H264')
  }
  return [...codecs]
}

/**
 * Whether the remote offer can carry our video. An offer that names no codecs
 * at all is given the benefit of the doubt; one that names only codecs we
 * cannot send is not.
 */
export function checkCodecs(sdp: string, supported: readonly string[] = SUPPORTED_VIDEO_CODECS): CodecCheck {
  if (sdp.trim() === '') return { compatible: false, detail: 'empty SDP' }
  const offered = offeredCodecs(sdp)
  if (offered.length === 0) return { compatible: true, detail: 'no codecs listed, assuming defaults' }
  const usable = offered.filter((c) => supported.includes(c))
  return usable.length > 0
    ? { compatible: true,  detail: `compatible codecs: ${usable.join(', ')}` }
    : { compatible: false, detail: `no compatible codec in offer: ${offered.join(', ')}` }
}
