import { BaseError, toAppError } from "@dnssync/errors"
import type { ConfigMapRef } from "../ports/config-map-client"

export type ValidationPass = "federations" | "stubDomains" | "upstreamNameservers"

export type DnsConfigErrorCode =
  | "conflicting_sources"
  | "missing_config_map_client"
  | "invalid_settings"
  | "config_map_not_found"
  | "config_read_failed"
  | "malformed_config"
  | "invalid_federation_name"
  | "invalid_federation_domain"
  | "invalid_stub_domain"
  | "invalid_stub_nameserver"
  | "too_many_upstream_nameservers"
  | "invalid_upstream_nameserver"

export const MAX_UPSTREAM_NAMESERVERS = 3

export class DnsConfigError extends BaseError<DnsConfigErrorCode> {
  static conflictingSources(input: { configMap: ConfigMapRef; configDir: string }) {
    return new DnsConfigError("Cannot use both a ConfigMap and a config directory", {
      code: "conflicting_sources",
      context: {
        namespace: input.configMap.namespace,
        configMap: input.configMap.name,
        configDir: input.configDir,
      },
    })
  }

  static missingConfigMapClient(ref: ConfigMapRef) {
    return new DnsConfigError(
      `ConfigMap ${ref.namespace}/${ref.name} selected but no ConfigMap client was provided`,
      {
        code: "missing_config_map_client",
        context: { namespace: ref.namespace, configMap: ref.name },
        isOperational: false,
      },
    )
  }

  static invalidSettings(details: string, cause?: unknown) {
    return new DnsConfigError(`Invalid settings:\n${details}`, {
      code: "invalid_settings",
      ...(cause !== undefined && { cause }),
    })
  }

  static configMapNotFound(ref: ConfigMapRef) {
    return new DnsConfigError(`ConfigMap ${ref.namespace}/${ref.name} not found`, {
      code: "config_map_not_found",
      context: { namespace: ref.namespace, configMap: ref.name },
      isRetryable: true,
    })
  }

  static readFailed(source: string, cause: unknown) {
    return new DnsConfigError(`Failed to read config from ${source}: ${toAppError(cause).message}`, {
      code: "config_read_failed",
      context: { source },
      cause,
      isRetryable: true,
    })
  }

  static malformedConfig(entry: string, details: string, cause?: unknown) {
    return new DnsConfigError(`Malformed config in ${JSON.stringify(entry)}: ${details}`, {
      code: "malformed_config",
      context: { entry },
      ...(cause !== undefined && { cause }),
    })
  }

  static invalidFederationName(name: string) {
    return new DnsConfigError(`${JSON.stringify(name)} not a valid federation name`, {
      code: "invalid_federation_name",
      context: { pass: "federations", name },
    })
  }

  static invalidFederationDomain(domain: string) {
    return new DnsConfigError(`${JSON.stringify(domain)} not a valid federation domain`, {
      code: "invalid_federation_domain",
      context: { pass: "federations", domain },
    })
  }

  static invalidStubDomain(domain: string) {
    return new DnsConfigError(`invalid domain name: ${JSON.stringify(domain)}`, {
      code: "invalid_stub_domain",
      context: { pass: "stubDomains", domain },
    })
  }

  static invalidStubNameserver(domain: string, nameserver: string) {
    return new DnsConfigError(`invalid nameserver: ${JSON.stringify(nameserver)}`, {
      code: "invalid_stub_nameserver",
      context: { pass: "stubDomains", domain, nameserver },
    })
  }

  static tooManyUpstreamNameservers(count: number) {
    return new DnsConfigError(
      `upstreamNameservers cannot have more than ${MAX_UPSTREAM_NAMESERVERS} entries, got ${count}`,
      {
        code: "too_many_upstream_nameservers",
        context: { pass: "upstreamNameservers", count },
      },
    )
  }

  static invalidUpstreamNameserver(nameserver: string, reason: string) {
    return new DnsConfigError(
      `invalid upstream nameserver ${JSON.stringify(nameserver)}: ${reason}`,
      {
        code: "invalid_upstream_nameserver",
        context: { pass: "upstreamNameservers", nameserver, reason },
      },
    )
  }
}
