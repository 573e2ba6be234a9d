/**
 * In-memory async mutex keyed by name.
 *
 * Guards shared writes (image index, results log, per-image build slots).
 * Keys are acquired in sorted order so callers holding several keys
 * never deadlock against each other.
 */
export class KeyLock {
  private readonly tails = new Map<string, Promise<void>>()

  /**
   * Acquire exclusive access to every key.
   * Returns an idempotent release function.
   */
  async acquire(keys: string[]): Promise<() => void> {
    const sorted = [...new Set(keys)].sort()
    const releases: Array<() => void> = []

    for (const key of sorted) {
      const previous = this.tails.get(key) ?? Promise.resolve()
      let release: () => void = () => undefined
      const current = new Promise<void>(resolve => {
        release = resolve
      })
      const tail = previous.then(async () => current)
      this.tails.set(key, tail)
      releases.push(() => {
        release()
        if (this.tails.get(key) === tail) {
          this.tails.delete(key)
        }
      })
      await previous
    }

    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      for (const release of releases) {
        release()
      }
    }
  }

  /**
   * Run `fn` while holding `key`.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire([key])
    try {
      return await fn()
    } finally {
      release()
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
