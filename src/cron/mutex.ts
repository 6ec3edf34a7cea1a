// src/cron/mutex.ts — Promise-chain lock shared by the job store and the ledger

export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve()

  /** Acquire the lock, execute fn, then release, whether fn resolves or throws. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.chain
    let release = (): void => {}
    this.chain = new Promise<void>((resolve) => { release = resolve })

    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
