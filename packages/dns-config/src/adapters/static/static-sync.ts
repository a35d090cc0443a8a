import type { ConfigSync } from "../../ports/config-sync"
import type { DnsConfig } from "../../ports/dns-config"

/**
 * Serves a fixed config built from startup settings. The config is returned
 * as given, without validation, and never changes.
 */
export class StaticSync implements ConfigSync {
  readonly name = "static"

  constructor(private readonly config: DnsConfig) {}

  async fetchOnce(): Promise<DnsConfig> {
    return this.config
  }

  async *stream(): AsyncGenerator<DnsConfig, void, undefined> {
    await new Promise<void>(() => {})
  }
}
