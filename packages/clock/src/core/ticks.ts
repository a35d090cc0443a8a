import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Yields once per `periodMs` on the clock's monotonic time, starting one
 * period after the first `next()`. Each value is the scheduled tick time.
 *
 * The generator is suspended while the consumer handles a tick, so handling
 * never overlaps. Ticks that fall due during that time are dropped rather
 * than delivered in a burst.
 */
export async function* ticks(
  clock: Clock,
  periodMs: Milliseconds,
): AsyncGenerator<Milliseconds, never, undefined> {
  if (!Number.isFinite(periodMs) || periodMs <= 0) {
    throw new Error(`Invalid periodMs: ${periodMs}`)
  }

  let next = clock.monotonicMs() + periodMs

  while (true) {
    const wait = next - clock.monotonicMs()
    if (wait > 0) await clock.sleep(wait)

    yield next

    const now = clock.monotonicMs()
    next += periodMs
    while (next <= now) next += periodMs
  }
}
