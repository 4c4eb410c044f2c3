import { createStore } from 'zustand/vanilla'

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'closed'

export interface ConnectionSnapshot {
  state:     ConnectionState
  /** Incremented on every transition to `connected` */
  epoch:     number
  /** Consecutive failed attempts since the last successful connect */
  attempt:   number
  lastError: string | null
  since:     number
}

/** Written only by the control channel that creates it. */
export function createConnectionStore(now: () => number = Date.now) {
  return createStore<ConnectionSnapshot>(() => ({
    state:     'disconnected',
    epoch:     0,
    attempt:   0,
    lastError: null,
    since:     now(),
  }))
}
