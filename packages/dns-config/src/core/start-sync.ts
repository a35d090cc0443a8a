import type { Logger } from "@dnssync/logger"
import type { ConfigSync } from "../ports/config-sync"
import type { DnsConfig } from "../ports/dns-config"

export type ConfigConsumer = {
  /** Applies the startup config. Awaited before `startConfigSync` returns. */
  onInitial(config: DnsConfig): void | Promise<void>

  /** Runs for the life of the process, pulling updates from `updates`. */
  onStream(updates: AsyncIterable<DnsConfig>): Promise<void>
}

export type StartedConfigSync = {
  initial: DnsConfig

  /** Settles when the consumer loop ends; rejects with its failure. */
  delivery: Promise<void>
}

export type StartConfigSyncDeps = {
  logger: Logger
}

/**
 * Fetch the startup config, hand it to the consumer, then start update
 * delivery in the background. A failed startup fetch is rethrown.
 */
export async function startConfigSync(
  sync: ConfigSync,
  consumer: ConfigConsumer,
  deps: StartConfigSyncDeps,
): Promise<StartedConfigSync> {
  const logger = deps.logger.child({ module: "start-sync", source: sync.name })

  let initial: DnsConfig

  try {
    initial = await sync.fetchOnce()
  } catch (err) {
    logger.fatal("Failed to load initial DNS config", { err })
    throw err
  }

  await consumer.onInitial(initial)

  logger.info("Initial DNS config applied, watching for updates")

  const delivery = consumer.onStream(sync.stream()).then(
    () => {
      logger.info("DNS config update delivery ended")
    },
    (err: unknown) => {
      logger.fatal("DNS config update delivery failed", { err })
      throw err
    },
  )

  return { initial, delivery }
}
