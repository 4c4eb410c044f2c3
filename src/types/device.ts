export interface DeviceIdentity {
  readonly deviceId: string
  /** WebSocket URL with `{device_id}` placeholders, e.g. `ws://relay:8000/ws/device/{device_id}` */
  readonly serverUrlTemplate: string
}

export function createIdentity(deviceId: string, serverUrlTemplate: string): DeviceIdentity {
  return Object.freeze({ deviceId, serverUrlTemplate })
}

export function resolveServerUrl(identity: DeviceIdentity): string {
  return identity.serverUrlTemplate.replaceAll('{device_id}', encodeURIComponent(identity.deviceId))
}
