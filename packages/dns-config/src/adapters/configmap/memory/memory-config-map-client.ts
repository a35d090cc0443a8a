import type {
  ConfigMapClient,
  ConfigMapEventType,
  ConfigMapRef,
  ConfigMapSnapshot,
  ConfigMapWatch,
  ConfigMapWatchHandlers,
} from "../../../ports/config-map-client"

type Watcher = {
  key: string
  handlers: ConfigMapWatchHandlers
}

const keyOf = (ref: ConfigMapRef) => `${ref.namespace}/${ref.name}`

/**
 * In-process ConfigMap store with watch support. Events are delivered
 * synchronously from the mutating call.
 */
export class MemoryConfigMapClient implements ConfigMapClient {
  private readonly store = new Map<string, ConfigMapSnapshot>()
  private watchers: Watcher[] = []
  private readonly failures: unknown[] = []
  private version = 0

  get watcherCount(): number {
    return this.watchers.length
  }

  async get(ref: ConfigMapRef): Promise<ConfigMapSnapshot | null> {
    const snapshot = this.store.get(keyOf(ref))
    return snapshot ? copy(snapshot) : null
  }

  async watch(ref: ConfigMapRef, handlers: ConfigMapWatchHandlers): Promise<ConfigMapWatch> {
    if (this.failures.length > 0) {
      throw this.failures.shift()
    }

    const watcher: Watcher = { key: keyOf(ref), handlers }
    this.watchers.push(watcher)

    const existing = this.store.get(watcher.key)
    if (existing) handlers.onEvent({ type: "ADDED", configMap: copy(existing) })

    return {
      stop: () => {
        this.watchers = this.watchers.filter((w) => w !== watcher)
      },
    }
  }

  /** Create or replace a ConfigMap, emitting ADDED or MODIFIED. */
  set(ref: ConfigMapRef, data: Record<string, string>): void {
    const key = keyOf(ref)
    const type: ConfigMapEventType = this.store.has(key) ? "MODIFIED" : "ADDED"

    this.version += 1
    const snapshot: ConfigMapSnapshot = { data: { ...data }, resourceVersion: String(this.version) }

    this.store.set(key, snapshot)
    this.emit(key, type, snapshot)
  }

  delete(ref: ConfigMapRef): void {
    const key = keyOf(ref)
    const snapshot = this.store.get(key)
    if (!snapshot) return

    this.store.delete(key)
    this.emit(key, "DELETED", snapshot)
  }

  /** End every open watch on `ref` as if the connection dropped. */
  disconnect(ref: ConfigMapRef, err?: unknown): void {
    const key = keyOf(ref)
    const closing = this.watchers.filter((w) => w.key === key)

    this.watchers = this.watchers.filter((w) => w.key !== key)
    for (const w of closing) w.handlers.onClose(err)
  }

  /** Make the next `watch()` call reject with `err`. */
  failNextWatch(err: unknown): void {
    this.failures.push(err)
  }

  private emit(key: string, type: ConfigMapEventType, snapshot: ConfigMapSnapshot) {
    for (const watcher of this.watchers.filter((w) => w.key === key)) {
      watcher.handlers.onEvent({ type, configMap: copy(snapshot) })
    }
  }
}

function copy(snapshot: ConfigMapSnapshot): ConfigMapSnapshot {
  return { ...snapshot, data: { ...snapshot.data } }
}
