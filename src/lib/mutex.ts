/**
 * Async mutual exclusion. Waiters are granted the lock in the order they
 * asked for it. Critical sections passed to `runExclusive` must not await
 * network or disk I/O.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  async runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    let release: (() => void) | undefined
    const next = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.tail
    this.tail = next

    await previous
    try {
      return await section()
    } finally {
      if (release) release()
    }
  }
}
