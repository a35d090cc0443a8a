import type { Milliseconds } from "@dnssync/clock"
import type { LoggerOptions } from "@dnssync/logger"
import type { ConfigMapRef } from "./config-map-client"

/**
 * Bootstrap parameters that decide where configuration comes from.
 *
 * At most one of `configMap` and `configDir` may be set. With neither, the
 * configuration is built from `federations` and `nameServers`.
 */
export type SyncSettings = {
  clusterDomain: string

  configMap?: ConfigMapRef

  configDir?: string

  /** How often the directory is re-read. */
  configPeriodMs: Milliseconds

  federations: Readonly<Record<string, string>>

  /** Comma-separated upstream nameservers, e.g. `"10.0.0.10,10.0.0.11:5353"`. */
  nameServers: string
}

export type Settings = {
  sync: SyncSettings
  logging: Required<LoggerOptions>
}
