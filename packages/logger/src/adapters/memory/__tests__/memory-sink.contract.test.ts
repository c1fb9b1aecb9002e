import { describeSinkContract } from "../../../ports/__tests__/sink.contract"
import { MemorySink } from "../memory-sink"

describeSinkContract({
  name: "MemorySink",
  make: () => {
    const sink = new MemorySink()

    return {
      sink,
      read: () => sink.messages.join("").split("\n").filter(Boolean),
    }
  },
})
