import { describeLockContract } from "../../../ports/__tests__/lock.contract"
import { MemoryLock } from "../memory-lock"

describe("MemoryLock contract", () => {
  describeLockContract({
    name: "MemoryLock",
    defaultTimeoutMs: () => 0,
    make: () => ({ lock: new MemoryLock() }),
  })
})
