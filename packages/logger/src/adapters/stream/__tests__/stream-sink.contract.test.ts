import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from "node:fs"
import os from "node:os"
import path from "node:path"
import { MemoryLock } from "@logbook/lock"
import { describeSinkContract } from "../../../ports/__tests__/sink.contract"
import { LockedStreamWriter } from "../locked-stream-writer"
import { StreamSink } from "../stream-sink"

describeSinkContract({
  name: "StreamSink",
  make: () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), "stream-sink-"))
    const file = path.join(dir, "out.log")
    const fd = openSync(file, "a")

    return {
      sink: new StreamSink(new LockedStreamWriter({ fd }, { lock: new MemoryLock() })),
      read: () => readFileSync(file, "utf8").split("\n").filter(Boolean),
      cleanup: () => {
        closeSync(fd)
        rmSync(dir, { recursive: true, force: true })
      },
    }
  },
})
