import { z } from 'zod'

/** Every command the device accepts, with the parameters it must carry. */
export const CapabilitySchema = z.discriminatedUnion('kind', [
  z.object({
    kind:       z.literal('setHeading'),
    parameters: z.object({ degrees: z.number().min(0).lt(360) }).strict(),
  }),
  z.object({
    kind:       z.literal('setRudder'),
    parameters: z.object({ degrees: z.number().min(-135).max(135) }).strict(),
  }),
  z.object({
    kind:       z.literal('setThrust'),
    parameters: z.object({
      percent: z.number().min(-100).max(100),
      rampMs:  z.number().int().min(0).max(10_000).optional(),
    }).strict(),
  }),
  z.object({
    kind:       z.literal('stop'),
    parameters: z.object({}).strict(),
  }),
  z.object({
    kind:       z.literal('setMode'),
    parameters: z.object({ mode: z.enum(['manual', 'autonomous', 'hold']) }).strict(),
  }),
])

export type CapabilityCall = z.infer<typeof CapabilitySchema>
export type CommandKind    = CapabilityCall['kind']
export type NavigationMode = Extract<CapabilityCall, { kind: 'setMode' }>['parameters']['mode']

export const COMMAND_KINDS: readonly CommandKind[] = CapabilitySchema.options.map((o) => o.shape.kind.value)

/** A command that passed validation. Only these ever reach an actuator. */
export type ValidCommand = CapabilityCall & {
  id:       string
  issuedAt: number
}

export function isCommandKind(kind: string): kind is CommandKind {
  return COMMAND_KINDS.some((k) => k === kind)
}

export type ActuatorResult = Record<string, unknown> | undefined

/**
 * Applies validated commands to the boat's motors. Implementations may be
 * slow (ramping thrust) and should stop early once `signal` aborts.
 */
export interface Actuator {
  apply(command: ValidCommand, signal: AbortSignal): Promise<ActuatorResult>
  close(): Promise<void>
}
