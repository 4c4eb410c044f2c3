import { describe, it, expect, vi } from 'vitest'
import { silentLogger } from '../logger'
import { createDeviceClient } from './client'
import { iceServerResolver, stunServers } from './ice'

const STUN = ['stun:stun.test:3478']

function clientAnswering(respond: () => Response) {
  const fetch = vi.fn(async (..._args: Parameters<typeof globalThis.fetch>) => respond())
  const client = createDeviceClient({ baseUrl: 'http://relay.test/api', deviceId: 'boat-1', fetch })
  return { client, fetch }
}

describe('iceServerResolver', () => {
  it('uses the static STUN list without a client', async () => {
    expect(await iceServerResolver(STUN, silentLogger())()).toEqual([{ urls: 'stun:stun.test:3478' }])
  })

  it('flattens servers from the relay and identifies the device', async () => {
    const { client, fetch } = clientAnswering(() => Response.json({
      iceServers: [
        { urls: ['stun:a.test', 'stun:b.test'] },
        { urls: 'turn:t.test', username: 'boat', credential: 'test-secret' },
      ],
    }))
    expect(await iceServerResolver(STUN, silentLogger(), client)()).toEqual([
      { urls: 'stun:a.test', username: undefined, credential: undefined },
      { urls: 'stun:b.test', username: undefined, credential: undefined },
      { urls: 'turn:t.test', username: 'boat', credential: 'test-secret' },
    ])

    const request = fetch.mock.calls[0]?.[0]
    expect(request).toBeInstanceOf(Request)
    if (request instanceof Request) {
      expect(request.url).toBe('http://relay.test/api/ice-servers')
      expect(request.headers.get('X-Device-Id')).toBe('boat-1')
    }
  })

  it('falls back to STUN when the relay answers with garbage', async () => {
    const { client } = clientAnswering(() => Response.json({ servers: 'none' }))
    expect(await iceServerResolver(STUN, silentLogger(), client)()).toEqual(stunServers(STUN))
  })

  it('falls back to STUN when the relay lists no servers', async () => {
    const { client } = clientAnswering(() => Response.json({ iceServers: [] }))
    expect(await iceServerResolver(STUN, silentLogger(), client)()).toEqual(stunServers(STUN))
  })

  it('falls back to STUN on HTTP errors', async () => {
    const { client } = clientAnswering(() => new Response('nope', { status: 404 }))
    expect(await iceServerResolver(STUN, silentLogger(), client)()).toEqual(stunServers(STUN))
  })
})
