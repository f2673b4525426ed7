import { bytes, expectBytesEqual } from "../../tests/bytes"
import type { BytesKeyValueStore } from "../bytes-kv-store"

type CreateStore = () => BytesKeyValueStore

export function describeKvStoreContract(adapterName: string, createStore: CreateStore): void {
  describe(`BytesKeyValueStore contract: ${adapterName}`, () => {
    let store: BytesKeyValueStore

    beforeEach(() => {
      store = createStore()
    })

    describe("basic operations", () => {
      it("returns not_found for a missing key", async () => {
        expect(await store.get("missing")).toStrictEqual({ kind: "not_found" })
        expect(await store.has("missing")).toBe(false)
      })

      it("stores and reads back bytes", async () => {
        await store.set("k", bytes.a())

        const res = await store.get("k")

        expect(res.kind).toBe("found")
        if (res.kind === "found") expectBytesEqual(res.value, bytes.a())
        expect(await store.has("k")).toBe(true)
      })

      it("overwrites an existing value", async () => {
        await store.set("k", bytes.a())
        await store.set("k", bytes.b())

        const res = await store.get("k")

        if (res.kind !== "found") throw new Error("expected found")
        expectBytesEqual(res.value, bytes.b())
      })

      it("deletes idempotently", async () => {
        await store.set("k", bytes.a())
        await store.delete("k")
        await store.delete("k")

        expect(await store.get("k")).toStrictEqual({ kind: "not_found" })
      })

      it("getMany reports each key", async () => {
        await store.set("a", bytes.a())

        const res = await store.getMany(["a", "b"])

        expect([...res.keys()]).toEqual(["a", "b"])
        expect(res.get("a")?.kind).toBe("found")
        expect(res.get("b")).toStrictEqual({ kind: "not_found" })
      })
    })

    describe("versioned writes", () => {
      it("getVersioned returns not_found for a missing key", async () => {
        expect(await store.getVersioned("missing")).toStrictEqual({ kind: "not_found" })
      })

      it("changes the version on every write", async () => {
        await store.set("k", bytes.a())
        const first = await store.getVersioned("k")

        await store.set("k", bytes.b())
        const second = await store.getVersioned("k")

        if (first.kind !== "found" || second.kind !== "found") {
          throw new Error("expected found")
        }
        expect(second.version).not.toBe(first.version)
      })

      it("writes when the version matches", async () => {
        await store.set("k", bytes.a())
        const read = await store.getVersioned("k")
        if (read.kind !== "found") throw new Error("expected found")

        const res = await store.setIfVersion("k", bytes.b(), read.version)

        expect(res.kind).toBe("written")
        const after = await store.getVersioned("k")
        if (after.kind !== "found") throw new Error("expected found")
        expectBytesEqual(after.value, bytes.b())
        if (res.kind === "written") expect(after.version).toBe(res.version)
      })

      it("reports conflict when somebody wrote in between", async () => {
        await store.set("k", bytes.a())
        const read = await store.getVersioned("k")
        if (read.kind !== "found") throw new Error("expected found")

        await store.set("k", bytes.b())

        expect(await store.setIfVersion("k", bytes.a(), read.version)).toStrictEqual({
          kind: "conflict",
        })
      })

      it("reports not_found when the key disappeared", async () => {
        await store.set("k", bytes.a())
        const read = await store.getVersioned("k")
        if (read.kind !== "found") throw new Error("expected found")

        await store.delete("k")

        expect(await store.setIfVersion("k", bytes.b(), read.version)).toStrictEqual({
          kind: "not_found",
        })
      })
    })

    describe("setIfNotExists", () => {
      it("writes an absent key once", async () => {
        expect(await store.setIfNotExists("claim", bytes.a())).toStrictEqual({
          kind: "written",
        })
        expect(await store.setIfNotExists("claim", bytes.b())).toStrictEqual({
          kind: "skipped",
        })

        const res = await store.get("claim")
        if (res.kind !== "found") throw new Error("expected found")
        expectBytesEqual(res.value, bytes.a())
      })

      it("admits exactly one of several concurrent claims", async () => {
        const results = await Promise.all(
          Array.from({ length: 5 }, (_, i) => store.setIfNotExists("claim", bytes.text(`${i}`))),
        )

        expect(results.filter((r) => r.kind === "written")).toHaveLength(1)
      })

      it("yields a versioned entry", async () => {
        await store.setIfNotExists("claim", bytes.a())

        const read = await store.getVersioned("claim")
        if (read.kind !== "found") throw new Error("expected found")

        expect((await store.setIfVersion("claim", bytes.b(), read.version)).kind).toBe(
          "written",
        )
      })
    })
  })
}
