import { DnsConfigError, MAX_UPSTREAM_NAMESERVERS } from "../dns-config.errors"
import { isDns1123Subdomain } from "./dns1123"
import { type HostPort, isIpAddress, splitHostPort } from "./host-port"

export const DEFAULT_DNS_PORT = "53"

const MAX_PORT = 65_535

/**
 * Validate one upstream nameserver and return its host and port.
 *
 * A bare IP gets port 53. Otherwise the entry must be `ip:port` with a port
 * in 1-65535.
 */
export function validateNameserverIpAndPort(nameserver: string): HostPort {
  if (isIpAddress(nameserver)) {
    return { host: nameserver, port: DEFAULT_DNS_PORT }
  }

  const split = splitHostPort(nameserver)

  if (!split.ok) {
    throw DnsConfigError.invalidUpstreamNameserver(nameserver, split.reason)
  }

  if (!isIpAddress(split.host)) {
    throw DnsConfigError.invalidUpstreamNameserver(
      nameserver,
      `bad IP address: ${JSON.stringify(split.host)}`,
    )
  }

  const port = /^[+-]?\d+$/.test(split.port) ? Number(split.port) : Number.NaN

  if (!(port >= 1 && port <= MAX_PORT)) {
    throw DnsConfigError.invalidUpstreamNameserver(
      nameserver,
      `bad port number: ${JSON.stringify(split.port)}`,
    )
  }

  return { host: split.host, port: split.port }
}

export function validateUpstreamNameservers(nameservers: readonly string[]): void {
  if (nameservers.length > MAX_UPSTREAM_NAMESERVERS) {
    throw DnsConfigError.tooManyUpstreamNameservers(nameservers.length)
  }

  for (const nameserver of nameservers) {
    validateNameserverIpAndPort(nameserver)
  }
}

/**
 * Stub nameservers split on the first `:` only, so unbracketed IPv6 is not
 * supported here. The port may be 0. An entry whose host is not an IP still
 * passes when the whole entry is a DNS-1123 subdomain.
 */
export function validateStubNameserver(domain: string, nameserver: string): void {
  const colon = nameserver.indexOf(":")
  const host = colon < 0 ? nameserver : nameserver.slice(0, colon)

  if (colon >= 0) {
    const port = nameserver.slice(colon + 1)

    if (!/^\d+$/.test(port) || Number(port) > MAX_PORT) {
      throw DnsConfigError.invalidStubNameserver(domain, nameserver)
    }
  }

  if (!isIpAddress(host) && !isDns1123Subdomain(nameserver)) {
    throw DnsConfigError.invalidStubNameserver(domain, nameserver)
  }
}

export function validateStubDomains(
  stubDomains: Readonly<Record<string, readonly string[]>>,
): void {
  for (const [domain, nameservers] of Object.entries(stubDomains)) {
    if (!isDns1123Subdomain(domain)) {
      throw DnsConfigError.invalidStubDomain(domain)
    }

    for (const nameserver of nameservers) {
      validateStubNameserver(domain, nameserver)
    }
  }
}
