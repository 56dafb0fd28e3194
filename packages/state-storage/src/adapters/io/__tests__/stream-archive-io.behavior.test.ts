import { PassThrough, Readable, Writable } from "node:stream"
import { readArchiveStream, writeArchiveStream } from "../stream-archive-io"

describe("stream archive io", () => {
  describe("readArchiveStream", () => {
    it("consumes the stream to its end", async () => {
      const stream = Readable.from([Buffer.from([1, 2]), Buffer.from([3])])

      const result = await readArchiveStream(stream)

      expect(result.ok && Array.from(result.value)).toEqual([1, 2, 3])
    })

    it("rejects a destroyed stream without reading", async () => {
      const stream = new PassThrough()
      stream.destroy()

      const result = await readArchiveStream(stream)

      expect(!result.ok && result.error.message).toBe(
        "Unable to load states: stream is not readable",
      )
    })

    it("wraps stream failures with their cause", async () => {
      const cause = new Error("connection reset")
      const stream = new Readable({
        read() {
          this.destroy(cause)
        },
      })

      const result = await readArchiveStream(stream)

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe("io_unavailable")
      expect(result.error.cause).toBe(cause)
    })
  })

  describe("writeArchiveStream", () => {
    it("writes every chunk and counts the bytes", async () => {
      const chunks: number[][] = []
      const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          chunks.push(Array.from(chunk))
          callback()
        },
      })

      const result = await writeArchiveStream(sink, [Uint8Array.of(1, 2), Uint8Array.of(3)])

      expect(result).toEqual({ ok: true, value: 3 })
      expect(chunks).toEqual([[1, 2], [3]])
    })

    it("rejects an ended stream", async () => {
      const sink = new PassThrough()
      sink.end()

      const result = await writeArchiveStream(sink, [Uint8Array.of(1)])

      expect(!result.ok && result.error.message).toBe(
        "Unable to store states: stream is not writable",
      )
    })

    it("reports the bytes flushed before a failed write", async () => {
      let calls = 0
      const sink = new Writable({
        write(_chunk, _encoding, callback) {
          calls++
          callback(calls > 1 ? new Error("disk full") : null)
        },
      })

      const result = await writeArchiveStream(sink, [Uint8Array.of(1, 2), Uint8Array.of(3)])
      await new Promise((resolve) => setImmediate(resolve))

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe("io_unavailable")
      expect(result.error.context).toEqual({ bytesWritten: 2 })
      expect(sink.destroyed).toBe(true)
    })

    it("absorbs the error event of a failing stream", async () => {
      const cause = new Error("disk full")
      const sink = new Writable({
        write(_chunk, _encoding, callback) {
          callback(cause)
        },
      })

      const result = await writeArchiveStream(sink, [Uint8Array.of(1)])
      await new Promise((resolve) => setImmediate(resolve))

      expect(!result.ok && result.error.cause).toBe(cause)
      expect(sink.listenerCount("error")).toBe(1)
    })

    it("detaches its error listener after a successful write", async () => {
      const sink = new PassThrough()

      await writeArchiveStream(sink, [Uint8Array.of(1)])

      expect(sink.listenerCount("error")).toBe(0)
    })
  })
})
