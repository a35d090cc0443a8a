export type ConfigMapRef = {
  namespace: string
  name: string
}

export type ConfigMapSnapshot = {
  data: Record<string, string>
  resourceVersion?: string
}

export type ConfigMapEventType = "ADDED" | "MODIFIED" | "DELETED"

export type ConfigMapEvent = {
  type: ConfigMapEventType
  configMap: ConfigMapSnapshot
}

export type ConfigMapWatchHandlers = {
  onEvent(event: ConfigMapEvent): void

  /**
   * Called once when the watch ends on its own (server timeout, network
   * error). Not called after {@link ConfigMapWatch.stop}.
   */
  onClose(err?: unknown): void
}

export interface ConfigMapWatch {
  stop(): void
}

/**
 * Read and watch access to a single ConfigMap. Implementations wrap a
 * cluster client the caller has already authenticated.
 */
export interface ConfigMapClient {
  /** Resolves `null` when the ConfigMap does not exist. */
  get(ref: ConfigMapRef): Promise<ConfigMapSnapshot | null>

  /**
   * Start watching. An existing ConfigMap is reported as an ADDED event
   * once the watch is open.
   */
  watch(ref: ConfigMapRef, handlers: ConfigMapWatchHandlers): Promise<ConfigMapWatch>
}
