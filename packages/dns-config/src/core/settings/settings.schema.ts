import { logLevelNames } from "@dnssync/logger"
import { z } from "zod"

export const settingsEnvSchema = z.object({
  DNS_CLUSTER_DOMAIN: z.string().default("cluster.local."),

  DNS_CONFIG_MAP: z.string().optional(),
  DNS_CONFIG_MAP_NAMESPACE: z.string().default("kube-system"),

  DNS_CONFIG_DIR: z.string().optional(),
  DNS_CONFIG_PERIOD_MS: z.coerce.number().int().positive().default(10_000),

  DNS_FEDERATIONS: z.string().default(""),
  DNS_NAMESERVERS: z.string().default(""),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type SettingsEnv = z.infer<typeof settingsEnvSchema>
