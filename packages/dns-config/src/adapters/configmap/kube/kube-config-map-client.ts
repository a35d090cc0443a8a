import { CoreV1Api, type KubeConfig, Watch } from "@kubernetes/client-node"
import type {
  ConfigMapClient,
  ConfigMapEvent,
  ConfigMapEventType,
  ConfigMapRef,
  ConfigMapSnapshot,
  ConfigMapWatch,
  ConfigMapWatchHandlers,
} from "../../../ports/config-map-client"

export type KubeConfigMapClientDeps = {
  /** Loaded and authenticated by the caller. */
  kubeConfig: KubeConfig
}

type WatchPhase = ConfigMapEventType | "ERROR" | "BOOKMARK"

const watchPhases: readonly string[] = ["ADDED", "MODIFIED", "DELETED", "ERROR", "BOOKMARK"]

function isWatchPhase(phase: string): phase is WatchPhase {
  return watchPhases.includes(phase)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Narrow a ConfigMap object from the API server. Non-string data values are
 * dropped; `binaryData` is not read.
 */
export function toConfigMapSnapshot(obj: unknown): ConfigMapSnapshot | undefined {
  if (!isRecord(obj)) return undefined

  const data: Record<string, string> = {}

  if (isRecord(obj.data)) {
    for (const [key, value] of Object.entries(obj.data)) {
      if (typeof value === "string") data[key] = value
    }
  }

  const resourceVersion = isRecord(obj.metadata) ? obj.metadata.resourceVersion : undefined

  return {
    data,
    ...(typeof resourceVersion === "string" && { resourceVersion }),
  }
}

export type WatchMessage = ConfigMapEvent | { type: "ERROR"; error: Error }

/**
 * Map one watch callback to an event, a watch error, or nothing for
 * bookmarks and unknown phases.
 */
export function toWatchMessage(phase: string, obj: unknown): WatchMessage | undefined {
  if (!isWatchPhase(phase) || phase === "BOOKMARK") return undefined

  if (phase === "ERROR") {
    const status = isRecord(obj) && typeof obj.message === "string" ? obj.message : JSON.stringify(obj)
    return { type: "ERROR", error: new Error(`ConfigMap watch error: ${status}`) }
  }

  const configMap = toConfigMapSnapshot(obj)
  return configMap ? { type: phase, configMap } : undefined
}

export function isNotFound(err: unknown): boolean {
  return isRecord(err) && (err.code === 404 || err.statusCode === 404)
}

export function configMapWatchPath(namespace: string): string {
  return `/api/v1/namespaces/${encodeURIComponent(namespace)}/configmaps`
}

/**
 * {@link ConfigMapClient} over the Kubernetes API.
 */
export class KubeConfigMapClient implements ConfigMapClient {
  private readonly api: CoreV1Api
  private readonly watcher: Watch

  constructor(deps: KubeConfigMapClientDeps) {
    this.api = deps.kubeConfig.makeApiClient(CoreV1Api)
    this.watcher = new Watch(deps.kubeConfig)
  }

  async get(ref: ConfigMapRef): Promise<ConfigMapSnapshot | null> {
    try {
      const configMap = await this.api.readNamespacedConfigMap({
        name: ref.name,
        namespace: ref.namespace,
      })

      return toConfigMapSnapshot(configMap) ?? null
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async watch(ref: ConfigMapRef, handlers: ConfigMapWatchHandlers): Promise<ConfigMapWatch> {
    let closed = false

    const close = (err?: unknown) => {
      if (closed) return
      closed = true
      handlers.onClose(err)
    }

    const controller = await this.watcher.watch(
      configMapWatchPath(ref.namespace),
      { fieldSelector: `metadata.name=${ref.name}` },
      (phase: string, obj: unknown) => {
        if (closed) return

        const message = toWatchMessage(phase, obj)
        if (!message) return

        if (message.type === "ERROR") {
          close(message.error)
        } else {
          handlers.onEvent(message)
        }
      },
      (err: unknown) => {
        close(err ?? undefined)
      },
    )

    return {
      stop: () => {
        closed = true
        controller.abort()
      },
    }
  }
}
