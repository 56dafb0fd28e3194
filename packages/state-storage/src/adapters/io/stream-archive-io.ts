import type { Readable, Writable } from "node:stream"
import { buffer } from "node:stream/consumers"
import type { ArchiveOutcome } from "../../ports/archive-result"
import { IoUnavailableError } from "../../core/errors/errors"

/** Consumes `stream` to its end. */
export async function readArchiveStream(
  stream: Readable,
): Promise<ArchiveOutcome<Uint8Array>> {
  if (stream.destroyed || !stream.readable) {
    return {
      ok: false,
      error: new IoUnavailableError("Unable to load states: stream is not readable"),
    }
  }

  try {
    return { ok: true, value: await buffer(stream) }
  } catch (err) {
    return {
      ok: false,
      error: new IoUnavailableError("Unable to load states: stream failed", { cause: err }),
    }
  }
}

/**
 * Writes `chunks` to `stream`, resolving once each has been flushed. The
 * stream is left open; ending it is up to the caller.
 *
 * A failing stream emits `error` after the write callback has already
 * reported it. The listener attached here absorbs that event and stays on the
 * destroyed stream, so a failure surfaces only through the returned outcome.
 */
export async function writeArchiveStream(
  stream: Writable,
  chunks: readonly Uint8Array[],
): Promise<ArchiveOutcome<number>> {
  if (stream.destroyed || !stream.writable) {
    return {
      ok: false,
      error: new IoUnavailableError("Unable to store states: stream is not writable"),
    }
  }

  let streamError: Error | undefined
  const onError = (err: Error) => {
    streamError ??= err
  }
  stream.on("error", onError)

  let bytesWritten = 0

  try {
    for (const chunk of chunks) {
      await writeChunk(stream, chunk)
      bytesWritten += chunk.byteLength
    }
  } catch (err) {
    return {
      ok: false,
      error: new IoUnavailableError("Unable to store states: stream failed", {
        context: { bytesWritten },
        cause: err,
      }),
    }
  }

  stream.off("error", onError)

  if (streamError) {
    return {
      ok: false,
      error: new IoUnavailableError("Unable to store states: stream failed", {
        context: { bytesWritten },
        cause: streamError,
      }),
    }
  }

  return { ok: true, value: bytesWritten }
}

function writeChunk(stream: Writable, chunk: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(chunk, (err) => (err ? reject(err) : resolve()))
  })
}
