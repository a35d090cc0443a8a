import type { Clock } from "@dnssync/clock"
import type { Logger } from "@dnssync/logger"
import { ConfigMapSync } from "../adapters/configmap/configmap-sync"
import { DirectorySync } from "../adapters/directory/directory-sync"
import { StaticSync } from "../adapters/static/static-sync"
import type { ConfigMapClient } from "../ports/config-map-client"
import type { ConfigSync } from "../ports/config-sync"
import { createDefaultDnsConfig, type DnsConfig } from "../ports/dns-config"
import type { SyncSettings } from "../ports/settings"
import { DnsConfigError } from "./dns-config.errors"
import { parseNameservers } from "./settings/parse-federations"

export type SelectConfigSyncDeps = {
  clock: Clock
  logger: Logger

  /** Required when `settings.configMap` is set. */
  configMapClient?: ConfigMapClient

  rewatchDelayMs?: number
}

/**
 * Config served when neither a ConfigMap nor a directory is configured.
 */
export function staticConfigFromSettings(settings: SyncSettings): DnsConfig {
  return {
    ...createDefaultDnsConfig(),
    federations: { ...settings.federations },
    upstreamNameservers: parseNameservers(settings.nameServers),
  }
}

export function selectConfigSync(settings: SyncSettings, deps: SelectConfigSyncDeps): ConfigSync {
  const logger = deps.logger.child({ module: "select-sync" })
  const { configMap, configDir } = settings

  if (configMap && configDir !== undefined) {
    throw DnsConfigError.conflictingSources({ configMap, configDir })
  }

  if (configMap) {
    if (!deps.configMapClient) throw DnsConfigError.missingConfigMapClient(configMap)

    logger.info("Using ConfigMap for DNS config", {
      namespace: configMap.namespace,
      configMap: configMap.name,
    })

    return new ConfigMapSync(
      { client: deps.configMapClient, clock: deps.clock, logger: deps.logger },
      {
        ref: configMap,
        ...(deps.rewatchDelayMs !== undefined && { rewatchDelayMs: deps.rewatchDelayMs }),
      },
    )
  }

  if (configDir !== undefined) {
    logger.info("Using directory for DNS config", {
      dir: configDir,
      periodMs: settings.configPeriodMs,
    })

    return new DirectorySync(
      { clock: deps.clock, logger: deps.logger },
      { dir: configDir, periodMs: settings.configPeriodMs },
    )
  }

  const config = staticConfigFromSettings(settings)

  logger.info("No ConfigMap or directory configured, using static DNS config", {
    federations: config.federations,
    upstreamNameservers: config.upstreamNameservers,
  })

  return new StaticSync(config)
}
