import { describeSimpleCacheContract } from "../../../ports/__tests__/simple-cache.contract"
import type { JsonValue } from "../../../ports/json-value"
import { InMemoryRemoteStore } from "../../../tests/utils/in-memory-remote-store"
import { RemoteCache } from "../remote-cache"

describeSimpleCacheContract("RemoteCache", async () => ({
  cache: new RemoteCache<JsonValue>({ store: new InMemoryRemoteStore() }),
}))
