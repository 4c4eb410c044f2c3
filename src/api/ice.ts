import { z } from 'zod'
import type { KyInstance } from 'ky'
import type { Logger } from '../logger'
import { errorMessage } from '../errors'

/** One STUN/TURN server. A server listed with several URLs becomes several entries. */
export interface IceServer {
  urls:        string
  username?:   string
  credential?: string
}

const IceConfigSchema = z.object({
  iceServers: z.array(z.object({
    urls:       z.union([z.string(), z.array(z.string())]),
    username:   z.string().optional(),
    credential: z.string().optional(),
  })),
})

export const iceApi = (client: KyInstance) => ({
  fetchIceServers: async (): Promise<IceServer[]> => {
    const body = IceConfigSchema.parse(await client.get('ice-servers').json())
    return body.iceServers.flatMap(({ urls, username, credential }) =>
      (Array.isArray(urls) ? urls : [urls]).map((url) => ({ urls: url, username, credential })))
  },
})

export function stunServers(urls: readonly string[]): IceServer[] {
  return urls.map((url) => ({ urls: url }))
}

/**
 * ICE servers for the next peer connection: the server's list when an API
 * client is configured and answers, the static STUN list otherwise.
 */
export function iceServerResolver(
  fallback: readonly string[],
  log: Logger,
  client?: KyInstance,
): () => Promise<IceServer[]> {
  const api = client ? iceApi(client) : null
  return async () => {
    if (!api) return stunServers(fallback)
    try {
      const servers = await api.fetchIceServers()
      return servers.length > 0 ? servers : stunServers(fallback)
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'ICE config unavailable, using STUN defaults')
      return stunServers(fallback)
    }
  }
}
