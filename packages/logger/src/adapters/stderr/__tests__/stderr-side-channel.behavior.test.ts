import { SinkIOError } from "../../../errors/logger-error"
import { createStderrSideChannel, StderrSideChannel } from "../stderr-side-channel"

describe("StderrSideChannel behavior", () => {
  it("writes one prefixed line to standard error by default", () => {
    const write = vi.fn()

    new StderrSideChannel({ write }).report("Rotation skipped")

    expect(write).toHaveBeenCalledWith(2, "[logbook] Rotation skipped\n")
  })

  it("appends the error description", () => {
    const write = vi.fn()
    const err = new SinkIOError("open", "/logs/app.0.log", new Error("denied"))

    createStderrSideChannel({ fd: 7, write }).report("Message dropped", err)

    expect(write).toHaveBeenCalledWith(
      7,
      "[logbook] Message dropped: SinkIOError (sink_io): Can't open '/logs/app.0.log' <- Error: denied\n",
    )
  })

  it("never throws when standard error fails", () => {
    const write = vi.fn(() => {
      throw new Error("closed")
    })

    expect(() => new StderrSideChannel({ write }).report("anything")).not.toThrow()
    expect(write).toHaveBeenCalledTimes(1)
  })
})
