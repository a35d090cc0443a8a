import type { Clock, Milliseconds } from "@dnssync/clock"
import type { Logger } from "@dnssync/logger"
import type {
  ConfigMapClient,
  ConfigMapEvent,
  ConfigMapRef,
  ConfigMapSnapshot,
  ConfigMapWatch,
} from "../../ports/config-map-client"
import type { ConfigSync } from "../../ports/config-sync"
import type { DnsConfig } from "../../ports/dns-config"
import { decodeConfigEntries } from "../../core/codec/decode-config"
import { DnsConfigError } from "../../core/dns-config.errors"
import { AsyncQueue } from "../../core/sync/async-queue"
import { validateDnsConfig } from "../../core/validation/validate-config"

export const DEFAULT_REWATCH_DELAY_MS: Milliseconds = 1_000
export const DEFAULT_BACKLOG_WARN_SIZE = 100

export type ConfigMapSyncDeps = {
  client: ConfigMapClient
  clock: Clock
  logger: Logger
}

export type ConfigMapSyncOptions = {
  ref: ConfigMapRef

  /** Wait before re-opening a closed or failed watch. */
  rewatchDelayMs?: Milliseconds

  /** Warn when this many watch events are waiting for the consumer. */
  backlogWarnSize?: number
}

type WatchSignal =
  | { kind: "event"; generation: number; event: ConfigMapEvent }
  | { kind: "closed"; generation: number; err?: unknown }

/**
 * Reads config from a ConfigMap and follows it with a watch.
 */
export class ConfigMapSync implements ConfigSync {
  readonly name: string
  private readonly logger: Logger
  private readonly rewatchDelayMs: Milliseconds
  private readonly backlogWarnSize: number

  constructor(
    private readonly deps: ConfigMapSyncDeps,
    private readonly opts: ConfigMapSyncOptions,
  ) {
    this.name = `configmap:${opts.ref.namespace}/${opts.ref.name}`
    this.rewatchDelayMs = opts.rewatchDelayMs ?? DEFAULT_REWATCH_DELAY_MS
    this.backlogWarnSize = opts.backlogWarnSize ?? DEFAULT_BACKLOG_WARN_SIZE
    this.logger = deps.logger.child({
      module: "configmap-sync",
      source: this.name,
      namespace: opts.ref.namespace,
      configMap: opts.ref.name,
    })
  }

  async fetchOnce(): Promise<DnsConfig> {
    let snapshot: ConfigMapSnapshot | null

    try {
      snapshot = await this.deps.client.get(this.opts.ref)
    } catch (err) {
      throw DnsConfigError.readFailed(this.name, err)
    }

    if (!snapshot) throw DnsConfigError.configMapNotFound(this.opts.ref)

    return this.decode(snapshot)
  }

  /**
   * Every ADDED or MODIFIED event that holds a valid config, in arrival
   * order. Consecutive identical configs are all delivered.
   */
  async *stream(): AsyncGenerator<DnsConfig, void, undefined> {
    const queue = new AsyncQueue<WatchSignal>()
    let generation = 0
    let watch: ConfigMapWatch | undefined

    try {
      while (true) {
        if (!watch) {
          generation += 1
          watch = await this.openWatch(queue, generation)

          if (!watch) {
            await this.deps.clock.sleep(this.rewatchDelayMs)
            continue
          }
        }

        const signal = await queue.shift()
        if (signal.generation !== generation) continue

        if (signal.kind === "closed") {
          this.logger.warn("ConfigMap watch closed, re-opening", {
            ...(signal.err !== undefined && { err: signal.err }),
            delayMs: this.rewatchDelayMs,
          })

          watch = undefined
          await this.deps.clock.sleep(this.rewatchDelayMs)
          continue
        }

        const config = this.handleEvent(signal.event)
        if (config) yield config
      }
    } finally {
      watch?.stop()
    }
  }

  private async openWatch(
    queue: AsyncQueue<WatchSignal>,
    generation: number,
  ): Promise<ConfigMapWatch | undefined> {
    try {
      const watch = await this.deps.client.watch(this.opts.ref, {
        onEvent: (event) => {
          queue.push({ kind: "event", generation, event })

          if (queue.size === this.backlogWarnSize) {
            this.logger.warn("ConfigMap events are queuing behind a slow consumer", {
              queued: queue.size,
            })
          }
        },
        onClose: (err) => queue.push({ kind: "closed", generation, err }),
      })

      this.logger.debug("ConfigMap watch opened", { generation })

      return watch
    } catch (err) {
      this.logger.error("Failed to open ConfigMap watch", { err, delayMs: this.rewatchDelayMs })
      return undefined
    }
  }

  private handleEvent(event: ConfigMapEvent): DnsConfig | undefined {
    if (event.type === "DELETED") {
      this.logger.warn("ConfigMap was deleted, keeping the current config")
      return undefined
    }

    try {
      const config = this.decode(event.configMap)

      this.logger.info("ConfigMap updated", {
        event: event.type,
        resourceVersion: event.configMap.resourceVersion,
      })

      return config
    } catch (err) {
      this.logger.error("Ignoring invalid ConfigMap update", {
        err,
        event: event.type,
        resourceVersion: event.configMap.resourceVersion,
      })
      return undefined
    }
  }

  private decode(snapshot: ConfigMapSnapshot): DnsConfig {
    const entries = Object.entries(snapshot.data).map(([name, content]) => ({ name, content }))
    const { config, ignored } = decodeConfigEntries(entries)

    if (ignored.length > 0) {
      this.logger.debug("Ignoring unrecognized ConfigMap keys", { ignored })
    }

    validateDnsConfig(config)

    return config
  }
}
