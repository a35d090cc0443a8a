import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Wall-clock time. Avoid for arithmetic. */
  now(): Date

  /** Wall-clock milliseconds since the Unix epoch. */
  nowMs(): Milliseconds

  /**
   * Milliseconds from an arbitrary origin that never goes backwards.
   * Use for periods and deadlines.
   */
  monotonicMs(): Milliseconds
}

export interface Sleeper {
  /** Resolves after `ms`, or early once `signal` aborts. Never rejects. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
