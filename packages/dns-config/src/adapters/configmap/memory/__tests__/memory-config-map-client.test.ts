import { describe, expect, it, vi } from "vitest"
import type { ConfigMapEvent, ConfigMapRef } from "../../../../ports/config-map-client"
import { MemoryConfigMapClient } from "../memory-config-map-client"

const ref: ConfigMapRef = { namespace: "kube-system", name: "kube-dns" }
const other: ConfigMapRef = { namespace: "default", name: "kube-dns" }

describe("MemoryConfigMapClient", () => {
  it("returns null for a missing ConfigMap", async () => {
    await expect(new MemoryConfigMapClient().get(ref)).resolves.toBeNull()
  })

  it("stores data with increasing resource versions", async () => {
    const client = new MemoryConfigMapClient()

    client.set(ref, { a: "1" })
    client.set(ref, { a: "2" })

    await expect(client.get(ref)).resolves.toEqual({ data: { a: "2" }, resourceVersion: "2" })
  })

  it("returns copies", async () => {
    const client = new MemoryConfigMapClient()
    client.set(ref, { a: "1" })

    const snapshot = await client.get(ref)
    if (snapshot) snapshot.data.a = "changed"

    await expect(client.get(ref)).resolves.toMatchObject({ data: { a: "1" } })
  })

  it("replays an existing ConfigMap as ADDED when a watch opens", async () => {
    const client = new MemoryConfigMapClient()
    client.set(ref, { a: "1" })
    const onEvent = vi.fn()

    await client.watch(ref, { onEvent, onClose: vi.fn() })

    expect(onEvent).toHaveBeenCalledWith({
      type: "ADDED",
      configMap: { data: { a: "1" }, resourceVersion: "1" },
    })
  })

  it("emits ADDED, MODIFIED and DELETED to watchers of the same ConfigMap only", async () => {
    const client = new MemoryConfigMapClient()
    const onEvent = vi.fn<(event: ConfigMapEvent) => void>()
    const onOtherEvent = vi.fn<(event: ConfigMapEvent) => void>()

    await client.watch(ref, { onEvent, onClose: vi.fn() })
    await client.watch(other, { onEvent: onOtherEvent, onClose: vi.fn() })

    client.set(ref, { a: "1" })
    client.set(ref, { a: "2" })
    client.delete(ref)

    expect(onEvent.mock.calls.map(([event]) => event.type)).toEqual(["ADDED", "MODIFIED", "DELETED"])
    expect(onOtherEvent).not.toHaveBeenCalled()
  })

  it("stops delivering after stop()", async () => {
    const client = new MemoryConfigMapClient()
    const onEvent = vi.fn()

    const watch = await client.watch(ref, { onEvent, onClose: vi.fn() })
    watch.stop()
    client.set(ref, { a: "1" })

    expect(onEvent).not.toHaveBeenCalled()
    expect(client.watcherCount).toBe(0)
  })

  it("closes watches on disconnect", async () => {
    const client = new MemoryConfigMapClient()
    const onClose = vi.fn()
    const err = new Error("reset")

    await client.watch(ref, { onEvent: vi.fn(), onClose })
    client.disconnect(ref, err)

    expect(onClose).toHaveBeenCalledWith(err)
    expect(client.watcherCount).toBe(0)
  })

  it("fails the next watch once", async () => {
    const client = new MemoryConfigMapClient()
    const err = new Error("forbidden")
    const handlers = { onEvent: vi.fn(), onClose: vi.fn() }

    client.failNextWatch(err)

    await expect(client.watch(ref, handlers)).rejects.toBe(err)
    await expect(client.watch(ref, handlers)).resolves.toBeDefined()
  })
})
