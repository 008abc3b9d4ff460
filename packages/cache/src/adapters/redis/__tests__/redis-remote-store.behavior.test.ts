import { ErrorReply, MultiErrorReply } from "redis"
import { mock } from "vitest-mock-extended"
import { RemoteCache } from "../../remote/remote-cache"
import type { RedisStringClient, RedisStringPipeline } from "../redis-client"
import { RedisRemoteStore } from "../redis-remote-store"

// node-redis types `replies` as ErrorReply[], but successful replies sit beside the errors
const multiErrorReply = (replies: unknown[], errorIndexes: number[]) =>
  new MultiErrorReply(replies as unknown as ErrorReply[], errorIndexes)

describe("RedisRemoteStore", () => {
  let client: ReturnType<typeof mock<RedisStringClient>>
  let store: RedisRemoteStore

  beforeEach(() => {
    client = mock<RedisStringClient>()
    store = new RedisRemoteStore(client, { keyspacePrefix: "test:" })
  })

  describe("command mapping", () => {
    it("get reads the prefixed key", async () => {
      client.get.mockResolvedValue("payload")

      expect(await store.get("k")).toBe("payload")
      expect(client.get).toHaveBeenCalledWith("test:k")
    })

    it("set without a TTL sends no expiry option", async () => {
      client.set.mockResolvedValue("OK")

      expect(await store.set("k", "v")).toBe("OK")
      expect(client.set).toHaveBeenCalledWith("test:k", "v")
    })

    it("set with a TTL sends EX seconds", async () => {
      client.set.mockResolvedValue("OK")

      await store.set("k", "v", 30)

      expect(client.set).toHaveBeenCalledWith("test:k", "v", { EX: 30 })
    })

    it("del sends every prefixed key in one command", async () => {
      client.del.mockResolvedValue(2)

      expect(await store.del(["a", "b"])).toBe(2)
      expect(client.del).toHaveBeenCalledWith(["test:a", "test:b"])
    })

    it("mget keeps the reply aligned with the keys", async () => {
      client.mGet.mockResolvedValue(["1", null])

      expect(await store.mget(["a", "b"])).toStrictEqual(["1", null])
      expect(client.mGet).toHaveBeenCalledWith(["test:a", "test:b"])
    })

    it("exists maps the count to a boolean", async () => {
      client.exists.mockResolvedValueOnce(1).mockResolvedValueOnce(0)

      expect(await store.exists("a")).toBe(true)
      expect(await store.exists("b")).toBe(false)
      expect(client.exists).toHaveBeenNthCalledWith(1, "test:a")
    })

    it("flushAll passes the reply through", async () => {
      client.flushAll.mockResolvedValue("OK")

      expect(await store.flushAll()).toBe("OK")
    })
  })

  describe("pipelineSet", () => {
    let pipeline: ReturnType<typeof mock<RedisStringPipeline>>

    beforeEach(() => {
      pipeline = mock<RedisStringPipeline>()
      client.multi.mockReturnValue(pipeline)
    })

    it("queues every SET on one pipeline and returns one ack per command", async () => {
      pipeline.execAsPipeline.mockResolvedValue(["OK", "OK"])

      const acks = await store.pipelineSet([
        { key: "a", value: "1" },
        { key: "b", value: "2", ttlSeconds: 5 },
      ])

      expect(acks).toStrictEqual(["OK", "OK"])
      expect(client.multi).toHaveBeenCalledTimes(1)
      expect(pipeline.set).toHaveBeenNthCalledWith(1, "test:a", "1")
      expect(pipeline.set).toHaveBeenNthCalledWith(2, "test:b", "2", { EX: 5 })
      expect(pipeline.execAsPipeline).toHaveBeenCalledTimes(1)
    })

    it("maps each failed command of a rejected pipeline to a null ack", async () => {
      pipeline.execAsPipeline.mockRejectedValue(
        multiErrorReply(
          ["OK", new ErrorReply("OOM command not allowed"), "OK", new ErrorReply("READONLY")],
          [1, 3],
        ),
      )

      const acks = await store.pipelineSet([
        { key: "a", value: "1" },
        { key: "b", value: "2" },
        { key: "c", value: "3" },
        { key: "d", value: "4" },
      ])

      expect(acks).toStrictEqual(["OK", null, "OK", null])
    })

    it("propagates any other pipeline failure", async () => {
      pipeline.execAsPipeline.mockRejectedValue(new Error("connection lost"))

      await expect(store.pipelineSet([{ key: "a", value: "1" }])).rejects.toThrow(
        "connection lost",
      )
    })

    it("lets RemoteCache.setMultiple report false when one write gets an error reply", async () => {
      pipeline.execAsPipeline.mockRejectedValue(
        multiErrorReply(["OK", new ErrorReply("OOM command not allowed")], [1]),
      )
      const cache = new RemoteCache<string>({ store: new RedisRemoteStore(client) })

      const ok = await cache.setMultiple([
        ["a", "1"],
        ["b", "2"],
      ])

      expect(ok).toBe(false)
      expect(pipeline.set).toHaveBeenNthCalledWith(1, "a", '{"json":"1"}')
      expect(pipeline.set).toHaveBeenNthCalledWith(2, "b", '{"json":"2"}')
    })
  })

  describe("empty batches", () => {
    it("sends nothing for empty del, mget and pipelineSet", async () => {
      expect(await store.del([])).toBe(0)
      expect(await store.mget([])).toStrictEqual([])
      expect(await store.pipelineSet([])).toStrictEqual([])

      expect(client.del).not.toHaveBeenCalled()
      expect(client.mGet).not.toHaveBeenCalled()
      expect(client.multi).not.toHaveBeenCalled()
    })
  })

  describe("keyspace prefix", () => {
    it("defaults to no prefix", async () => {
      client.get.mockResolvedValue(null)
      const unprefixed = new RedisRemoteStore(client)

      await unprefixed.get("k")

      expect(client.get).toHaveBeenCalledWith("k")
    })
  })
})
