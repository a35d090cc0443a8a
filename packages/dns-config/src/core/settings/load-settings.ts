import { isAppError } from "@dnssync/errors"
import { z } from "zod"
import type { Settings, SyncSettings } from "../../ports/settings"
import { DnsConfigError } from "../dns-config.errors"
import { parseFederations } from "./parse-federations"
import { type SettingsEnv, settingsEnvSchema } from "./settings.schema"

export function createDefaultSyncSettings(): SyncSettings {
  return {
    clusterDomain: "cluster.local.",
    configPeriodMs: 10_000,
    federations: {},
    nameServers: "",
  }
}

export function mapEnvToSettings(env: SettingsEnv): Settings {
  const sync: SyncSettings = {
    clusterDomain: env.DNS_CLUSTER_DOMAIN,
    configPeriodMs: env.DNS_CONFIG_PERIOD_MS,
    federations: parseFederations(env.DNS_FEDERATIONS),
    nameServers: env.DNS_NAMESERVERS,
    ...(env.DNS_CONFIG_MAP !== undefined && {
      configMap: { namespace: env.DNS_CONFIG_MAP_NAMESPACE, name: env.DNS_CONFIG_MAP },
    }),
    ...(env.DNS_CONFIG_DIR !== undefined && { configDir: env.DNS_CONFIG_DIR }),
  }

  return {
    sync,
    logging: { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY },
  }
}

/**
 * Read settings from environment variables. Blank values count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value.trim()
  }

  const result = settingsEnvSchema.safeParse(present)

  if (!result.success) {
    throw DnsConfigError.invalidSettings(z.prettifyError(result.error), result.error)
  }

  try {
    return mapEnvToSettings(result.data)
  } catch (err) {
    if (isAppError(err) && err.code === "invalid_settings") throw err
    throw DnsConfigError.invalidSettings(err instanceof Error ? err.message : String(err), err)
  }
}

export function loadSyncSettings(env: NodeJS.ProcessEnv = process.env): SyncSettings {
  return loadSettings(env).sync
}
