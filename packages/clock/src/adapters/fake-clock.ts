import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAt: Milliseconds
  wake: () => void
}

/**
 * Manually driven clock. `sleep()` resolves only once `advance()` or `set()`
 * moves time to or past its deadline, or its signal aborts.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private pending: PendingSleep[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  monotonicMs(): Milliseconds {
    return this.time
  }

  /** Number of sleeps still waiting for time to move. */
  get pendingSleeps(): number {
    return this.pending.length
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: Milliseconds): void {
    this.time = ms

    const due = this.pending
      .filter((p) => p.wakeAt <= this.time)
      .sort((a, b) => a.wakeAt - b.wakeAt)

    for (const p of due) p.wake()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAt: this.time + ms,
        wake: () => {
          this.pending = this.pending.filter((p) => p !== entry)
          signal?.removeEventListener("abort", entry.wake)
          resolve()
        },
      }

      this.pending.push(entry)
      signal?.addEventListener("abort", entry.wake, { once: true })
    })
  }
}
