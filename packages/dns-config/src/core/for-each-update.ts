import type { Logger } from "@dnssync/logger"
import type { DnsConfig } from "../ports/dns-config"
import type { ConfigConsumer } from "./start-sync"

/**
 * Build an `onStream` consumer that applies updates one at a time. A failing
 * `onUpdate` is logged and the next update is still applied.
 */
export function forEachUpdate(
  onUpdate: (config: DnsConfig) => void | Promise<void>,
  deps: { logger: Logger },
): ConfigConsumer["onStream"] {
  const logger = deps.logger.child({ module: "for-each-update" })

  return async (updates) => {
    for await (const config of updates) {
      try {
        await onUpdate(config)
      } catch (err) {
        logger.error("Failed to apply DNS config update", { err })
      }
    }
  }
}
