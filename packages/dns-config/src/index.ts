export {
  ConfigMapSync,
  type ConfigMapSyncDeps,
  type ConfigMapSyncOptions,
  DEFAULT_BACKLOG_WARN_SIZE,
  DEFAULT_REWATCH_DELAY_MS,
} from "./adapters/configmap/configmap-sync"
export {
  KubeConfigMapClient,
  type KubeConfigMapClientDeps,
  toConfigMapSnapshot,
} from "./adapters/configmap/kube/kube-config-map-client"
export { MemoryConfigMapClient } from "./adapters/configmap/memory/memory-config-map-client"
export {
  DirectorySync,
  type DirectorySyncDeps,
  type DirectorySyncOptions,
} from "./adapters/directory/directory-sync"
export { StaticSync } from "./adapters/static/static-sync"
export {
  type ConfigEntry,
  type DecodedConfig,
  decodeConfigEntries,
  decodeConfigJson,
} from "./core/codec/decode-config"
export { dnsConfigSchema, type DnsConfigWire } from "./core/codec/dns-config.schema"
export {
  DnsConfigError,
  type DnsConfigErrorCode,
  MAX_UPSTREAM_NAMESERVERS,
  type ValidationPass,
} from "./core/dns-config.errors"
export { forEachUpdate } from "./core/for-each-update"
export {
  type SelectConfigSyncDeps,
  selectConfigSync,
  staticConfigFromSettings,
} from "./core/select-sync"
export {
  createDefaultSyncSettings,
  loadSettings,
  loadSyncSettings,
  mapEnvToSettings,
} from "./core/settings/load-settings"
export { parseFederations, parseNameservers } from "./core/settings/parse-federations"
export {
  type ConfigConsumer,
  type StartConfigSyncDeps,
  type StartedConfigSync,
  startConfigSync,
} from "./core/start-sync"
export { isDns1123Label, isDns1123Subdomain } from "./core/validation/dns1123"
export {
  validateFederationDomain,
  validateFederationName,
  validateFederations,
} from "./core/validation/federation"
export {
  type HostPort,
  isIpAddress,
  type SplitHostPortResult,
  splitHostPort,
} from "./core/validation/host-port"
export {
  DEFAULT_DNS_PORT,
  validateNameserverIpAndPort,
  validateStubDomains,
  validateStubNameserver,
  validateUpstreamNameservers,
} from "./core/validation/nameserver"
export { validateDnsConfig } from "./core/validation/validate-config"
export type {
  ConfigMapClient,
  ConfigMapEvent,
  ConfigMapEventType,
  ConfigMapRef,
  ConfigMapSnapshot,
  ConfigMapWatch,
  ConfigMapWatchHandlers,
} from "./ports/config-map-client"
export type { ConfigSync } from "./ports/config-sync"
export {
  createDefaultDnsConfig,
  type DnsConfig,
  type DnsConfigField,
  dnsConfigFields,
  isDnsConfigField,
} from "./ports/dns-config"
export type { Settings, SyncSettings } from "./ports/settings"
