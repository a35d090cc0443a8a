import { describe, expect, it } from "vitest"
import { describeConfigSyncContract } from "../../../ports/__tests__/config-sync.contract"
import type { DnsConfig } from "../../../ports/dns-config"
import { StaticSync } from "../static-sync"

const config: DnsConfig = {
  federations: { myfed: "example.com" },
  stubDomains: {},
  upstreamNameservers: ["10.0.0.10"],
}

describeConfigSyncContract({
  name: "StaticSync",
  make: async () => ({ sync: new StaticSync(config), expected: config }),
})

describe("StaticSync", () => {
  it("returns the config without validating it", async () => {
    const invalid: DnsConfig = {
      federations: {},
      stubDomains: {},
      upstreamNameservers: ["a", "b", "c", "d"],
    }

    await expect(new StaticSync(invalid).fetchOnce()).resolves.toBe(invalid)
  })

  it("never yields from stream()", async () => {
    const iterator = new StaticSync(config).stream()
    const next = iterator.next()
    const idle = Symbol("idle")

    for (let poll = 0; poll < 1000; poll++) {
      const result = await Promise.race([next, Promise.resolve(idle)])
      expect(result).toBe(idle)
    }
  })
})
