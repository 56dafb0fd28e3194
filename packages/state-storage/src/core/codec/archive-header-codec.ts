import type { ArchiveFormat } from "../../ports/archive-format"
import { ARCHIVE_MARKER, type ArchiveHeader } from "../../ports/archive-header"
import type { ArchiveOutcome } from "../../ports/archive-result"
import type { Signature, StateSpace } from "../../ports/state-space"
import {
  BadMagicError,
  IoUnavailableError,
  SignatureMismatchError,
  TruncatedArchiveError,
} from "../errors/errors"
import type { ByteReader } from "./byte-reader"
import { ByteWriter } from "./byte-writer"

export function archiveHeaderLength(signature: Signature, format: ArchiveFormat): number {
  return 4 + 4 * signature.length + 2 * format.sizeWidth
}

/**
 * Encodes the archive preamble.
 *
 * @remarks
 * The signature is written verbatim, so its leading element doubles as the
 * length field that {@link decodeArchiveHeader} reads back.
 */
export function encodeArchiveHeader(
  signature: Signature,
  recordCount: number,
  format: ArchiveFormat,
): Uint8Array {
  const writer = new ByteWriter(archiveHeaderLength(signature, format), format)

  writer.writeUint32(ARCHIVE_MARKER)
  for (const element of signature) {
    writer.writeInt32(element)
  }
  writer.writeSize(recordCount)
  writer.writeSize(0)

  return writer.toBytes()
}

/**
 * Reads and validates the archive preamble against `space`.
 *
 * The expected signature length comes from the current space, not from the
 * archive; the stored length is only cross-checked against it.
 */
export function decodeArchiveHeader(
  reader: ByteReader,
  space: Pick<StateSpace<unknown>, "computeSignature">,
): ArchiveOutcome<ArchiveHeader> {
  if (reader.length === 0) {
    return fail(new IoUnavailableError("Unable to load states: the archive is empty"))
  }

  const marker = reader.readUint32()
  if (marker === null) {
    return fail(
      new TruncatedArchiveError("Expected archive marker. Incorrect file format", {
        field: "marker",
        availableBytes: reader.remaining,
      }),
    )
  }
  if (marker !== ARCHIVE_MARKER) {
    return fail(new BadMagicError(marker))
  }

  const expected = space.computeSignature()
  const signature = readSignature(reader, expected)
  if (!signature.ok) return signature

  const recordCount = readSize(reader, "recordCount", "Expected number of states")
  if (!recordCount.ok) return recordCount

  const metadataSize = readSize(reader, "metadataSize", "Expected metadata size")
  if (!metadataSize.ok) return metadataSize

  if (recordCount.value > 0 && reader.remaining === 0) {
    return fail(
      new TruncatedArchiveError("Expected state data. Incorrect file format", {
        recordCount: recordCount.value,
      }),
    )
  }

  return {
    ok: true,
    value: {
      marker,
      signature: signature.value,
      recordCount: recordCount.value,
      metadataSize: metadataSize.value,
    },
  }
}

function readSignature(reader: ByteReader, expected: Signature): ArchiveOutcome<number[]> {
  const mismatch = (stored: number[]) =>
    fail(
      new SignatureMismatchError("State space signatures do not match", {
        expected: [...expected],
        stored,
      }),
    )

  const length = reader.readInt32()
  if (length === null || length !== expected[0]) {
    return mismatch(length === null ? [] : [length])
  }

  const stored = [length]
  for (let i = 0; i < length; i++) {
    const element = reader.readInt32()
    if (element === null) return mismatch(stored)

    stored.push(element)
    if (element !== expected[i + 1]) return mismatch(stored)
  }

  return { ok: true, value: stored }
}

function readSize(
  reader: ByteReader,
  field: "recordCount" | "metadataSize",
  description: string,
): ArchiveOutcome<number> {
  const raw = reader.readSize()
  if (raw === null) {
    return fail(
      new TruncatedArchiveError(`${description}. Incorrect file format`, {
        field,
        availableBytes: reader.remaining,
      }),
    )
  }

  if (raw > BigInt(Number.MAX_SAFE_INTEGER)) {
    return fail(
      new TruncatedArchiveError(`${description}. Declared value is out of range`, {
        field,
        declared: raw.toString(),
      }),
    )
  }

  return { ok: true, value: Number(raw) }
}

function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}
