import type { ArchiveFormat } from "../../ports/archive-format"

/**
 * Forward-only cursor over archive bytes.
 *
 * Every read returns `null` instead of throwing when fewer bytes remain than
 * requested, and a failed read does not advance the cursor.
 */
export class ByteReader {
  private readonly view: DataView
  private readonly littleEndian: boolean
  private offset = 0

  constructor(
    private readonly bytes: Uint8Array,
    private readonly format: ArchiveFormat,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    this.littleEndian = format.byteOrder === "le"
  }

  get length(): number {
    return this.bytes.byteLength
  }

  get position(): number {
    return this.offset
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset
  }

  readUint32(): number | null {
    if (this.remaining < 4) return null

    const value = this.view.getUint32(this.offset, this.littleEndian)
    this.offset += 4
    return value
  }

  readInt32(): number | null {
    if (this.remaining < 4) return null

    const value = this.view.getInt32(this.offset, this.littleEndian)
    this.offset += 4
    return value
  }

  /** Reads an unsigned size field of the configured width. */
  readSize(): bigint | null {
    const width = this.format.sizeWidth
    if (this.remaining < width) return null

    const value =
      width === 8
        ? this.view.getBigUint64(this.offset, this.littleEndian)
        : BigInt(this.view.getUint32(this.offset, this.littleEndian))
    this.offset += width
    return value
  }

  /** Returns a view onto the next `length` bytes without copying them. */
  readBytes(length: number): Uint8Array | null {
    if (this.remaining < length) return null

    const slice = this.bytes.subarray(this.offset, this.offset + length)
    this.offset += length
    return slice
  }
}
