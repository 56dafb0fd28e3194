import { endianness } from "node:os"
import type { ArchiveFormat, ByteOrder } from "../../ports/archive-format"

export function hostByteOrder(): ByteOrder {
  return endianness() === "LE" ? "le" : "be"
}

/** Host byte order with 64-bit size fields. */
export function defaultArchiveFormat(): ArchiveFormat {
  return { byteOrder: hostByteOrder(), sizeWidth: 8 }
}
