import type { DnsConfig } from "../../ports/dns-config"
import { validateFederations } from "./federation"
import { validateStubDomains, validateUpstreamNameservers } from "./nameserver"

/**
 * Throws a `DnsConfigError` for the first invalid entry. Passes run in a
 * fixed order (federations, stub domains, upstream nameservers) so the
 * reported error is deterministic.
 */
export function validateDnsConfig(config: DnsConfig): void {
  validateFederations(config.federations)
  validateStubDomains(config.stubDomains)
  validateUpstreamNameservers(config.upstreamNameservers)
}
