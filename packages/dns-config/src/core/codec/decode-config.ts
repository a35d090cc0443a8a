import { type ZodType, z } from "zod"
import {
  createDefaultDnsConfig,
  type DnsConfig,
  type DnsConfigField,
  isDnsConfigField,
} from "../../ports/dns-config"
import { DnsConfigError } from "../dns-config.errors"
import {
  dnsConfigSchema,
  type DnsConfigWire,
  federationsSchema,
  stubDomainsSchema,
  upstreamNameserversSchema,
} from "./dns-config.schema"

/**
 * A named piece of a config snapshot: a ConfigMap data key or a file.
 */
export type ConfigEntry = {
  name: string
  content: string
}

export type DecodedConfig = {
  config: DnsConfig
  /** Entry names that were neither a field name nor a `.json` object. */
  ignored: string[]
}

/**
 * Build a config from snapshot entries, applied in name order.
 *
 * - `federations`, `stubDomains`, `upstreamNameservers`: that field's JSON value
 * - `*.json`: a JSON object with any of those fields
 * - anything else: ignored
 *
 * A field set by a later entry replaces the earlier value. The result is not
 * validated.
 */
export function decodeConfigEntries(entries: readonly ConfigEntry[]): DecodedConfig {
  const config = createDefaultDnsConfig()
  const ignored: string[] = []

  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  for (const entry of sorted) {
    if (isDnsConfigField(entry.name)) {
      applyField(config, entry.name, parseJson(entry), entry.name)
    } else if (entry.name.endsWith(".json")) {
      applyObject(config, decodeWith(dnsConfigSchema, parseJson(entry), entry.name))
    } else {
      ignored.push(entry.name)
    }
  }

  return { config, ignored }
}

/**
 * Decode a single JSON document holding a whole config object.
 */
export function decodeConfigJson(text: string, name = "config.json"): DnsConfig {
  const config = createDefaultDnsConfig()

  applyObject(config, decodeWith(dnsConfigSchema, parseJson({ name, content: text }), name))

  return config
}

function applyField(config: DnsConfig, field: DnsConfigField, raw: unknown, entry: string) {
  switch (field) {
    case "federations":
      config.federations = decodeWith(federationsSchema, raw, entry) ?? {}
      break
    case "stubDomains":
      config.stubDomains = decodeWith(stubDomainsSchema, raw, entry) ?? {}
      break
    case "upstreamNameservers":
      config.upstreamNameservers = decodeWith(upstreamNameserversSchema, raw, entry) ?? []
      break
  }
}

function applyObject(config: DnsConfig, wire: DnsConfigWire) {
  if (wire.federations) config.federations = wire.federations
  if (wire.stubDomains) config.stubDomains = wire.stubDomains
  if (wire.upstreamNameservers) config.upstreamNameservers = wire.upstreamNameservers
}

function parseJson(entry: ConfigEntry): unknown {
  let raw: unknown

  try {
    raw = JSON.parse(entry.content)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw DnsConfigError.malformedConfig(entry.name, `invalid JSON: ${reason}`, err)
  }

  // zod drops an own "__proto__" key from records instead of failing
  if (hasProtoKey(raw)) {
    throw DnsConfigError.malformedConfig(entry.name, '"__proto__" is not allowed as a key')
  }

  return raw
}

function hasProtoKey(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(hasProtoKey)
  if (typeof value !== "object" || value === null) return false

  return Object.hasOwn(value, "__proto__") || Object.values(value).some(hasProtoKey)
}

function decodeWith<T>(schema: ZodType<T>, raw: unknown, entry: string): T {
  const result = schema.safeParse(raw)

  if (!result.success) {
    throw DnsConfigError.malformedConfig(entry, z.prettifyError(result.error), result.error)
  }

  return result.data
}
