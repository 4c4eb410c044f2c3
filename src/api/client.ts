/**
 * ky HTTP client factory for the relay server's device API.
 * Every request identifies the device with an X-Device-Id header.
 */
import ky, { type KyInstance } from 'ky'

export interface DeviceClientOptions {
  baseUrl:   string
  deviceId:  string
  timeoutMs?: number
  fetch?:    typeof fetch
}

export function createDeviceClient(opts: DeviceClientOptions): KyInstance {
  return ky.create({
    prefixUrl: opts.baseUrl,
    timeout:   opts.timeoutMs ?? 5000,
    retry:     { limit: 1 },
    ...(opts.fetch ? { fetch: opts.fetch } : {}),
    hooks: {
      beforeRequest: [
        (req) => { req.headers.set('X-Device-Id', opts.deviceId) },
      ],
    },
  })
}
