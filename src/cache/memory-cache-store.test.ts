import { afterEach, describe, expect, it, vi } from 'vitest'
import { MemoryCacheStore } from './memory-cache-store.js'
import { analysisResult } from '../testing/fixtures.js'
import type { CacheEntry } from '../types/analysis.js'

function entry(fingerprint: string, expiresAt: number): CacheEntry {
  return {
    fingerprint,
    url: `https://example.com/${fingerprint}`,
    payload: analysisResult(),
    createdAt: new Date(0),
    expiresAt: new Date(expiresAt),
  }
}

describe('MemoryCacheStore', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should store and return entries', async () => {
    const store = new MemoryCacheStore()
    const stored = entry('a', 1000)
    await store.set(stored)

    expect(await store.get('a')).toBe(stored)
    expect(await store.get('missing')).toBeNull()
  })

  it('should evict the least recently used entry beyond maxEntries', async () => {
    const store = new MemoryCacheStore({ maxEntries: 2 })
    await store.set(entry('a', 1000))
    await store.set(entry('b', 1000))
    await store.get('a')
    await store.set(entry('c', 1000))

    expect(store.size).toBe(2)
    expect(store.evictions).toBe(1)
    expect(await store.get('b')).toBeNull()
    expect(await store.get('a')).not.toBeNull()
    expect(await store.get('c')).not.toBeNull()
  })

  it('should replace an entry with the same fingerprint without evicting', async () => {
    const store = new MemoryCacheStore({ maxEntries: 1 })
    await store.set(entry('a', 1000))
    const replacement = entry('a', 2000)
    await store.set(replacement)

    expect(store.evictions).toBe(0)
    expect(await store.get('a')).toBe(replacement)
  })

  it('should sweep expired entries', async () => {
    const store = new MemoryCacheStore()
    await store.set(entry('old', 1000))
    await store.set(entry('edge', 2000))
    await store.set(entry('fresh', 5000))

    expect(await store.sweep(2000)).toBe(2)
    expect(store.size).toBe(1)
    expect(await store.get('fresh')).not.toBeNull()
  })

  it('should sweep periodically until closed', async () => {
    vi.useFakeTimers()
    let clock = 0
    const store = new MemoryCacheStore({ sweepIntervalMs: 500, now: () => clock })
    await store.set(entry('a', 1000))
    await store.set(entry('b', 3000))

    clock = 1500
    vi.advanceTimersByTime(500)
    expect(store.size).toBe(1)

    await store.close()
    clock = 5000
    vi.advanceTimersByTime(1000)
    expect(store.size).toBe(1)
  })

  it('should delete and clear entries', async () => {
    const store = new MemoryCacheStore()
    await store.set(entry('a', 1000))
    await store.set(entry('b', 1000))

    await store.delete('a')
    expect(store.size).toBe(1)
    await store.clear()
    expect(store.size).toBe(0)
  })
})
