import { z } from 'zod'

/** A command as received, before validation against the capability table. */
export interface Command {
  id:         string
  kind:       string
  parameters: unknown
  issuedAt:   number   // ms since epoch
}

export type CommandOutcome =
  | { commandId: string; outcome: 'completed'; result?: unknown }
  | { commandId: string; outcome: 'failed';    reason: string }
  | { commandId: string; outcome: 'rejected';  reason: string }

const CommandPayloadSchema = z.object({
  id:         z.string().min(1).optional(),
  kind:       z.string(),
  parameters: z.unknown().optional(),
  issuedAt:   z.union([z.number(), z.string()]).optional(),
})

export type DecodedCommand =
  | { ok: true;  command: Command }
  | { ok: false; commandId: string; reason: string }

/**
 * Turns an inbound `command` payload into a Command. The id defaults to
 * `cmd-<seq>` and issuedAt to the receipt time.
 */
export function decodeCommand(seq: number, payload: unknown, receivedAt: number): DecodedCommand {
  const fallbackId = `cmd-${seq}`
  const parsed = CommandPayloadSchema.safeParse(payload)
  if (!parsed.success) {
    return { ok: false, commandId: fallbackId, reason: 'malformed command payload' }
  }
  const { id, kind, parameters, issuedAt } = parsed.data
  return {
    ok: true,
    command: {
      id:         id ?? fallbackId,
      kind,
      parameters: parameters ?? {},
      issuedAt:   toEpochMs(issuedAt) ?? receivedAt,
    },
  }
}

function toEpochMs(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined
  const ms = typeof value === 'number' ? value : Date.parse(value)
  return Number.isFinite(ms) ? ms : undefined
}
