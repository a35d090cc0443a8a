import { FakeClock } from "../../adapters/fake-clock"
import { ticks } from "../ticks"

async function waitForSleeper(clock: FakeClock): Promise<void> {
  await vi.waitFor(() => expect(clock.pendingSleeps).toBe(1))
}

describe("ticks", () => {
  it("rejects a non-positive period", async () => {
    const tick = ticks(new FakeClock(0), 0)

    await expect(tick.next()).rejects.toThrow("Invalid periodMs: 0")
  })

  it("fires one period after the first pull, then every period", async () => {
    const clock = new FakeClock(1_000)
    const tick = ticks(clock, 100)

    const first = tick.next()
    await waitForSleeper(clock)
    clock.advance(100)

    expect(await first).toEqual({ done: false, value: 1_100 })

    const second = tick.next()
    await waitForSleeper(clock)
    clock.advance(100)

    expect(await second).toEqual({ done: false, value: 1_200 })
  })

  it("drops ticks that fell due while the consumer was busy", async () => {
    const clock = new FakeClock(0)
    const tick = ticks(clock, 100)

    const first = tick.next()
    await waitForSleeper(clock)
    clock.advance(100)
    await first

    // consumer takes 250ms handling the first tick
    clock.advance(250)

    const second = tick.next()
    await waitForSleeper(clock)
    clock.advance(50)

    expect(await second).toEqual({ done: false, value: 400 })
  })

  it("does not start sleeping before it is pulled", () => {
    const clock = new FakeClock(0)

    ticks(clock, 100)

    expect(clock.pendingSleeps).toBe(0)
  })
})
