/** Base class for every error the device raises on purpose. */
export class DeviceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Bad or missing configuration. Fatal before the run loop starts. */
export class ConfigError extends DeviceError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`invalid configuration: ${issues.join('; ')}`)
    this.issues = issues
  }
}

/** Outbound message refused because the control channel is not connected. */
export class SendError extends DeviceError {}

/** Actuator-level failure while executing a valid command. */
export class CommandError extends DeviceError {}

export type MediaErrorCode =
  | 'codec_incompatible'
  | 'negotiation_failed'
  | 'negotiation_timeout'
  | 'ice_failed'
  | 'superseded'

export class MediaError extends DeviceError {
  readonly code: MediaErrorCode

  constructor(code: MediaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.code = code
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
