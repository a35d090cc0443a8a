/**
 * DNS resolver configuration as read from a ConfigMap, a directory or
 * static settings. The field names are the wire format and must not change.
 */
export type DnsConfig = {
  /** Federation name to domain suffix, e.g. `{ myfed: "example.com" }`. */
  federations: Record<string, string>

  /**
   * Domain suffix to the nameservers that serve it, in order. Entries are
   * `host` or `host:port`; the port defaults to 53.
   */
  stubDomains: Record<string, string[]>

  /** At most three nameservers used for names outside every stub domain. */
  upstreamNameservers: string[]
}

export const dnsConfigFields = ["federations", "stubDomains", "upstreamNameservers"] as const

export type DnsConfigField = (typeof dnsConfigFields)[number]

export function isDnsConfigField(name: string): name is DnsConfigField {
  return dnsConfigFields.some((field) => field === name)
}

export function createDefaultDnsConfig(): DnsConfig {
  return {
    federations: {},
    stubDomains: {},
    upstreamNameservers: [],
  }
}
