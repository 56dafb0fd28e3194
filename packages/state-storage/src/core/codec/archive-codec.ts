import type { ArchiveFormat } from "../../ports/archive-format"
import type { ArchiveHeader } from "../../ports/archive-header"
import type { ArchiveOutcome } from "../../ports/archive-result"
import type { StateSpace } from "../../ports/state-space"
import { decodeArchiveHeader, encodeArchiveHeader } from "./archive-header-codec"
import { ByteReader } from "./byte-reader"
import { decodeRecords, encodeRecords } from "./record-stream-codec"

export type EncodedArchive = {
  header: Uint8Array
  body: Uint8Array
}

export type DecodedArchive<R> = {
  header: ArchiveHeader
  records: R[]
}

export function encodeArchive<R>(
  space: StateSpace<R>,
  records: readonly R[],
  format: ArchiveFormat,
): EncodedArchive {
  return {
    header: encodeArchiveHeader(space.computeSignature(), records.length, format),
    body: encodeRecords(space, records),
  }
}

/**
 * Validates the header, then decodes the body. Nothing is deserialized unless
 * the header matched `space`.
 */
export function decodeArchive<R>(
  bytes: Uint8Array,
  space: StateSpace<R>,
  format: ArchiveFormat,
): ArchiveOutcome<DecodedArchive<R>> {
  const reader = new ByteReader(bytes, format)

  const header = decodeArchiveHeader(reader, space)
  if (!header.ok) return header

  const records = decodeRecords(reader, header.value, space)
  if (!records.ok) return records

  return { ok: true, value: { header: header.value, records: records.value } }
}
