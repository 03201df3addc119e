/** The parts of the browser's WakeLockSentinel the session uses. */
export interface WakeLockSentinelLike {
  release(): Promise<void>
  addEventListener(type: 'release', listener: () => void): void
}

/** `navigator.wakeLock` */
export interface WakeLockProvider {
  request(type: 'screen'): Promise<WakeLockSentinelLike>
}

/** `document` */
export interface VisibilitySource {
  readonly visibilityState: string
  addEventListener(type: 'visibilitychange', listener: () => void): void
  removeEventListener(type: 'visibilitychange', listener: () => void): void
}

/**
 * Keeps the screen awake while kitchen mode is on.
 *
 * The browser drops the lock when the tab is hidden; while the session is
 * enabled it requests a new one each time the page becomes visible again.
 * Call dispose() when the page is torn down.
 */
export class WakeLockSession {
  private sentinel: WakeLockSentinelLike | null = null
  private pending: Promise<void> | null = null
  private enabled = false

  constructor(
    private readonly provider: WakeLockProvider | null,
    private readonly visibility: VisibilitySource | null = null,
  ) {}

  get isSupported(): boolean {
    return this.provider !== null
  }

  /** True while a lock is held. */
  get isActive(): boolean {
    return this.sentinel !== null
  }

  get isEnabled(): boolean {
    return this.enabled
  }

  async acquire(): Promise<void> {
    if (!this.enabled) {
      this.enabled = true
      this.visibility?.addEventListener('visibilitychange', this.handleVisibilityChange)
    }
    await this.request()
  }

  async release(): Promise<void> {
    if (this.enabled) {
      this.enabled = false
      this.visibility?.removeEventListener('visibilitychange', this.handleVisibilityChange)
    }

    const sentinel = this.sentinel
    if (!sentinel) return
    this.sentinel = null
    await sentinel.release()
    console.info('Wake lock released')
  }

  /** Flip kitchen mode; resolves to the new enabled state. */
  async toggle(): Promise<boolean> {
    if (this.enabled) {
      await this.release()
    } else {
      await this.acquire()
    }
    return this.enabled
  }

  async dispose(): Promise<void> {
    await this.release()
  }

  /** At most one request is in flight; overlapping callers share it. */
  private request(): Promise<void> {
    if (!this.provider || this.sentinel) return Promise.resolve()
    if (!this.pending) {
      this.pending = this.requestLock(this.provider).finally(() => {
        this.pending = null
      })
    }
    return this.pending
  }

  private async requestLock(provider: WakeLockProvider): Promise<void> {
    try {
      const sentinel = await provider.request('screen')
      // Disabled while the request was in flight, or already holding one
      if (!this.enabled || this.sentinel) {
        await sentinel.release()
        return
      }
      this.sentinel = sentinel
      sentinel.addEventListener('release', () => {
        if (this.sentinel === sentinel) this.sentinel = null
      })
      console.info('Wake lock active')
    } catch (err) {
      // e.g. low battery or a hidden tab
      console.warn('Wake lock request failed:', err)
    }
  }

  private readonly handleVisibilityChange = (): void => {
    if (this.visibility?.visibilityState === 'visible' && this.enabled && !this.sentinel) {
      void this.request()
    }
  }
}
