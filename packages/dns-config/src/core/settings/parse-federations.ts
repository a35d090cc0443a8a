import { DnsConfigError } from "../dns-config.errors"
import { validateFederationDomain, validateFederationName } from "../validation/federation"

/**
 * Parse `name=domain[,name=domain...]`. Whitespace around names and domains
 * is trimmed; every pair is validated.
 */
export function parseFederations(value: string): Record<string, string> {
  const federations: Record<string, string> = {}

  if (value.trim() === "") return federations

  for (const pair of value.split(",")) {
    const eq = pair.indexOf("=")

    if (eq < 0) {
      throw DnsConfigError.invalidSettings(`invalid federation format: ${JSON.stringify(pair)}`)
    }

    const name = pair.slice(0, eq).trim()
    const domain = pair.slice(eq + 1).trim()

    validateFederationName(name)
    validateFederationDomain(domain)

    federations[name] = domain
  }

  return federations
}

/**
 * Split a comma-separated nameserver list, dropping empty entries.
 */
export function parseNameservers(value: string): string[] {
  return value
    .split(",")
    .map((ns) => ns.trim())
    .filter((ns) => ns.length > 0)
}
