import type { DnsConfig } from "./dns-config"

/**
 * A source of validated DNS configuration.
 *
 * Built once at startup from {@link SyncSettings} and passed down to the
 * code that applies the configuration.
 */
export interface ConfigSync {
  /**
   * Human-readable name for logs.
   * Example: "static", "dir:/etc/kube-dns", "configmap:kube-system/kube-dns"
   */
  readonly name: string

  /** Read and validate the current configuration. */
  fetchOnce(): Promise<DnsConfig>

  /**
   * Validated configurations, one at a time, for as long as the process
   * runs. Invalid or unreadable updates are logged and skipped; the stream
   * does not end because of them.
   *
   * The producer is suspended until the consumer asks for the next value.
   * Ending iteration (`break`, `return()`) releases watches and timers.
   */
  stream(): AsyncIterable<DnsConfig>
}
