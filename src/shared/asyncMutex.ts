/**
 * Shared - Async Mutex
 *
 * Promise-chain-based mutual exclusion lock. Holders run strictly one after
 * another in the order they asked for the lock.
 */
export class AsyncMutex {
  #queue: Promise<void> = Promise.resolve()
  #holders = 0

  /** Number of callers holding or waiting for the lock. */
  get pending(): number {
    return this.#holders
  }

  /**
   * Execute `fn` while holding the lock.
   *
   * Not re-entrant: calling `runExclusive` from inside `fn` deadlocks.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release!: () => void
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.#queue
    this.#queue = gate
    this.#holders += 1

    await previous
    try {
      return await fn()
    } finally {
      this.#holders -= 1
      release()
    }
  }
}
