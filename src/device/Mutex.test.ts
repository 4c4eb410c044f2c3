import { describe, it, expect } from 'vitest'
import { Mutex } from './Mutex'

describe('Mutex', () => {
  it('runs callers one after another in arrival order', async () => {
    const mutex = new Mutex()
    const events: string[] = []
    const job = (name: string, ticks: number) => mutex.runExclusive(async () => {
      events.push(`${name}:start`)
      for (let i = 0; i < ticks; i++) await Promise.resolve()
      events.push(`${name}:end`)
      return name
    })

    const results = await Promise.all([job('a', 5), job('b', 1), job('c', 0)])
    expect(results).toEqual(['a', 'b', 'c'])
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end'])
  })

  it('releases the lock when a caller throws', async () => {
    const mutex = new Mutex()
    await expect(mutex.runExclusive(async () => { throw new Error('boom') })).rejects.toThrow('boom')
    expect(await mutex.runExclusive(async () => 'next')).toBe('next')
  })
})
