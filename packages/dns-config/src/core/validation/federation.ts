import { DnsConfigError } from "../dns-config.errors"
import { isDns1123Label, isDns1123Subdomain } from "./dns1123"

/**
 * Federation names become a label of service domain names, so they must be
 * a single DNS-1123 label.
 */
export function validateFederationName(name: string): void {
  if (!isDns1123Label(name)) {
    throw DnsConfigError.invalidFederationName(name)
  }
}

export function validateFederationDomain(domain: string): void {
  if (!isDns1123Subdomain(domain)) {
    throw DnsConfigError.invalidFederationDomain(domain)
  }
}

export function validateFederations(federations: Readonly<Record<string, string>>): void {
  for (const [name, domain] of Object.entries(federations)) {
    validateFederationName(name)
    validateFederationDomain(domain)
  }
}
