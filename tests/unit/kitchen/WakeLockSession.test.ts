import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { WakeLockSession } from '@presentation/kitchen/WakeLockSession.ts'
import type {
  VisibilitySource,
  WakeLockProvider,
  WakeLockSentinelLike,
} from '@presentation/kitchen/WakeLockSession.ts'

class FakeSentinel implements WakeLockSentinelLike {
  released = false
  private listeners: (() => void)[] = []

  async release(): Promise<void> {
    this.released = true
    for (const listener of this.listeners) listener()
  }

  addEventListener(_type: 'release', listener: () => void): void {
    this.listeners.push(listener)
  }
}

class FakeWakeLock implements WakeLockProvider {
  sentinels: FakeSentinel[] = []
  fail = false

  async request(): Promise<WakeLockSentinelLike> {
    if (this.fail) throw new Error('battery saver on')
    const sentinel = new FakeSentinel()
    this.sentinels.push(sentinel)
    return sentinel
  }
}

class FakeDocument implements VisibilitySource {
  visibilityState = 'visible'
  listeners = new Set<() => void>()

  addEventListener(_type: 'visibilitychange', listener: () => void): void {
    this.listeners.add(listener)
  }

  removeEventListener(_type: 'visibilitychange', listener: () => void): void {
    this.listeners.delete(listener)
  }

  setVisibility(state: string): void {
    this.visibilityState = state
    for (const listener of this.listeners) listener()
  }
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0))

describe('WakeLockSession', () => {
  let wakeLock: FakeWakeLock
  let doc: FakeDocument

  beforeEach(() => {
    wakeLock = new FakeWakeLock()
    doc = new FakeDocument()
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should hold a lock between acquire and release', async () => {
    const session = new WakeLockSession(wakeLock, doc)

    await session.acquire()
    expect(session.isActive).toBe(true)
    expect(wakeLock.sentinels).toHaveLength(1)

    await session.release()
    expect(session.isActive).toBe(false)
    expect(session.isEnabled).toBe(false)
    expect(wakeLock.sentinels[0].released).toBe(true)
    expect(doc.listeners.size).toBe(0)
  })

  it('should re-acquire when the page becomes visible again', async () => {
    const session = new WakeLockSession(wakeLock, doc)
    await session.acquire()

    // The browser drops the lock when the tab is hidden
    doc.setVisibility('hidden')
    await wakeLock.sentinels[0].release()
    expect(session.isActive).toBe(false)

    doc.setVisibility('visible')
    await flush()
    expect(wakeLock.sentinels).toHaveLength(2)
    expect(session.isActive).toBe(true)
  })

  it('should not re-acquire after release', async () => {
    const session = new WakeLockSession(wakeLock, doc)
    await session.acquire()
    await session.release()

    doc.setVisibility('visible')
    await flush()
    expect(wakeLock.sentinels).toHaveLength(1)
  })

  it('should log and stay inactive when the request fails', async () => {
    wakeLock.fail = true
    const session = new WakeLockSession(wakeLock, doc)

    await session.acquire()
    expect(session.isActive).toBe(false)
    expect(session.isEnabled).toBe(true)
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('should do nothing without wake lock support', async () => {
    const session = new WakeLockSession(null)

    await session.acquire()
    expect(session.isSupported).toBe(false)
    expect(session.isActive).toBe(false)
  })

  it('should toggle kitchen mode', async () => {
    const session = new WakeLockSession(wakeLock, doc)

    expect(await session.toggle()).toBe(true)
    expect(session.isActive).toBe(true)
    expect(await session.toggle()).toBe(false)
    expect(session.isActive).toBe(false)
  })

  it('should request a single lock for overlapping acquires', async () => {
    const session = new WakeLockSession(wakeLock, doc)

    await Promise.all([session.acquire(), session.acquire()])
    expect(wakeLock.sentinels).toHaveLength(1)
    expect(session.isActive).toBe(true)

    await session.release()
    expect(wakeLock.sentinels.every((s) => s.released)).toBe(true)
  })

  it('should share the in-flight request with a visibility change', async () => {
    const session = new WakeLockSession(wakeLock, doc)

    const acquiring = session.acquire()
    doc.setVisibility('visible')
    await acquiring
    await flush()
    expect(wakeLock.sentinels).toHaveLength(1)

    await session.release()
    expect(session.isActive).toBe(false)
    expect(wakeLock.sentinels[0].released).toBe(true)
  })

  it('should release on dispose', async () => {
    const session = new WakeLockSession(wakeLock, doc)
    await session.acquire()
    await session.dispose()
    expect(wakeLock.sentinels[0].released).toBe(true)
  })
})
