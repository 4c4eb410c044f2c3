import type { StoreApi } from 'zustand/vanilla'

/** A store handed to readers: they can observe it but never write it. */
export type ReadonlyStore<T> = Pick<StoreApi<T>, 'getState' | 'subscribe'>

export function asReadonly<T>(store: StoreApi<T>): ReadonlyStore<T> {
  return { getState: store.getState, subscribe: store.subscribe }
}
