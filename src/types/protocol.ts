/**
 * Control protocol spoken over the device WebSocket.
 *
 * Every frame is JSON text `{ type, seq, payload }`.
 *
 * Inbound (server → device):
 *   command        { id?, kind, parameters?, issuedAt? }
 *   telemetryAck   { upTo? }
 *   sessionOffer   { sdp }
 *   sessionAnswer  (logged only)
 *   iceCandidate   { candidate, sdpMid?, sdpMLineIndex? }
 *   error          { message?, code? }
 *   ping           (any)
 *
 * Outbound (device → server):
 *   commandResult  CommandOutcome, seq echoes the command's seq
 *   telemetry      TelemetryRecord
 *   sessionAnswer  { sessionId, sdp }
 *   iceCandidate   { sessionId, candidate, sdpMid, sdpMLineIndex }
 *   error          { code, message, sessionId? }
 *   pong           { timestamp }
 */

import { z } from 'zod'
import type { CommandOutcome } from './command'
import type { TelemetryRecord } from './telemetry'

const EnvelopeSchema = z.object({
  type:    z.string().min(1),
  seq:     z.number().int().nonnegative(),
  payload: z.unknown().optional(),
})

export const SessionOfferSchema = z.object({
  sdp: z.string().min(1),
})

export const RemoteCandidateSchema = z.object({
  candidate:     z.string(),
  sdpMid:        z.string().nullish(),
  sdpMLineIndex: z.number().int().nonnegative().nullish(),
})

const TelemetryAckSchema = z.object({
  upTo: z.number().int().nonnegative().optional(),
}).passthrough()

const ServerErrorSchema = z.object({
  message: z.string().optional(),
  code:    z.string().optional(),
}).passthrough()

export type SessionOffer    = z.infer<typeof SessionOfferSchema>
export type RemoteCandidate = z.infer<typeof RemoteCandidateSchema>

export type InboundMessage =
  | { type: 'command';       seq: number; payload: unknown }
  | { type: 'telemetryAck';  seq: number; payload: z.infer<typeof TelemetryAckSchema> }
  | { type: 'sessionOffer';  seq: number; payload: SessionOffer }
  | { type: 'sessionAnswer'; seq: number; payload: unknown }
  | { type: 'iceCandidate';  seq: number; payload: RemoteCandidate }
  | { type: 'error';         seq: number; payload: z.infer<typeof ServerErrorSchema> }
  | { type: 'ping';          seq: number; payload: unknown }
  | { type: 'unknown';       seq: number; rawType: string; payload: unknown }

export interface LocalCandidatePayload {
  sessionId:     string
  candidate:     string
  sdpMid:        string
  sdpMLineIndex: number
}

export type OutboundMessage =
  | { type: 'commandResult'; seq: number; payload: CommandOutcome }
  | { type: 'telemetry';     payload: TelemetryRecord }
  | { type: 'sessionAnswer'; payload: { sessionId: string; sdp: string } }
  | { type: 'iceCandidate';  payload: LocalCandidatePayload }
  | { type: 'error';         payload: { code: string; message: string; sessionId?: string } }
  | { type: 'pong';          payload: { timestamp: number } }

export type DecodeResult =
  | { ok: true;  message: InboundMessage }
  | { ok: false; error: string }

/** Parses one text frame. Unknown `type` values decode to `unknown`, not to an error. */
export function decodeFrame(text: string): DecodeResult {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    return { ok: false, error: 'frame is not valid JSON' }
  }

  const envelope = EnvelopeSchema.safeParse(raw)
  if (!envelope.success) {
    return { ok: false, error: `bad envelope: ${formatIssues(envelope.error)}` }
  }
  const { type, seq, payload } = envelope.data

  switch (type) {
    case 'command':
    case 'sessionAnswer':
    case 'ping':
      return { ok: true, message: { type, seq, payload } }
    case 'sessionOffer':
      return withPayload(SessionOfferSchema, payload, (p) => ({ type, seq, payload: p }))
    case 'iceCandidate':
      return withPayload(RemoteCandidateSchema, payload, (p) => ({ type, seq, payload: p }))
    case 'telemetryAck':
      return withPayload(TelemetryAckSchema, payload ?? {}, (p) => ({ type, seq, payload: p }))
    case 'error':
      return withPayload(ServerErrorSchema, payload ?? {}, (p) => ({ type, seq, payload: p }))
    default:
      return { ok: true, message: { type: 'unknown', seq, rawType: type, payload } }
  }
}

export function encodeFrame(type: OutboundMessage['type'], seq: number, payload: unknown): string {
  return JSON.stringify({ type, seq, payload })
}

function withPayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  build: (p: z.infer<S>) => InboundMessage,
): DecodeResult {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) return { ok: false, error: `bad payload: ${formatIssues(parsed.error)}` }
  return { ok: true, message: build(parsed.data) }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ')
}
