import type { ArchiveHeader } from "../../ports/archive-header"
import type { ArchiveOutcome } from "../../ports/archive-result"
import type { StateSpace } from "../../ports/state-space"
import { TruncatedArchiveError } from "../errors/errors"
import type { ByteReader } from "./byte-reader"

/**
 * Serializes `records` back to back into one buffer, with a stride of the
 * space's serialization length and no per-record metadata.
 */
export function encodeRecords<R>(space: StateSpace<R>, records: readonly R[]): Uint8Array {
  const stride = space.getSerializationLength()
  const body = new Uint8Array(stride * records.length)

  records.forEach((record, i) => {
    space.serialize(body.subarray(i * stride, (i + 1) * stride), record)
  })

  return body
}

/**
 * Reads the record body described by a validated header in a single read and
 * deserializes every slot into a freshly allocated record.
 *
 * Metadata bytes trailing each record are skipped. A body of zero bytes
 * (no records, or records and metadata of zero length) yields no records. If
 * the space throws while deserializing, the records allocated so far are
 * freed before rethrowing.
 */
export function decodeRecords<R>(
  reader: ByteReader,
  header: ArchiveHeader,
  space: StateSpace<R>,
): ArchiveOutcome<R[]> {
  const length = space.getSerializationLength()
  const stride = length + header.metadataSize
  const total = header.recordCount * stride

  if (!Number.isSafeInteger(total)) {
    return {
      ok: false,
      error: new TruncatedArchiveError("Declared state data exceeds addressable size", {
        recordCount: header.recordCount,
        stride,
      }),
    }
  }

  if (total === 0) return { ok: true, value: [] }

  const body = reader.readBytes(total)
  if (body === null) {
    return {
      ok: false,
      error: new TruncatedArchiveError("Unable to read state data. Incorrect file format", {
        recordCount: header.recordCount,
        expectedBytes: total,
        availableBytes: reader.remaining,
      }),
    }
  }

  const records: R[] = []

  try {
    for (let i = 0; i < header.recordCount; i++) {
      const record = space.allocRecord()
      records.push(record)
      space.deserialize(record, body.subarray(i * stride, i * stride + length))
    }
  } catch (err) {
    for (const record of records) {
      space.freeRecord(record)
    }
    throw err
  }

  return { ok: true, value: records }
}
