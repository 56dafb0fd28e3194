import type { ArchiveFormat } from "../../ports/archive-format"

/** Fills a fixed-size buffer front to back. */
export class ByteWriter {
  private readonly bytes: Uint8Array
  private readonly view: DataView
  private readonly littleEndian: boolean
  private offset = 0

  constructor(
    size: number,
    private readonly format: ArchiveFormat,
  ) {
    this.bytes = new Uint8Array(size)
    this.view = new DataView(this.bytes.buffer)
    this.littleEndian = format.byteOrder === "le"
  }

  writeUint32(value: number): this {
    this.view.setUint32(this.offset, value, this.littleEndian)
    this.offset += 4
    return this
  }

  writeInt32(value: number): this {
    this.view.setInt32(this.offset, value, this.littleEndian)
    this.offset += 4
    return this
  }

  writeSize(value: number): this {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Size field must be a non-negative safe integer, got ${value}`)
    }

    if (this.format.sizeWidth === 8) {
      this.view.setBigUint64(this.offset, BigInt(value), this.littleEndian)
    } else {
      if (value > 0xffff_ffff) {
        throw new RangeError(`Size field ${value} does not fit in 4 bytes`)
      }
      this.view.setUint32(this.offset, value, this.littleEndian)
    }

    this.offset += this.format.sizeWidth
    return this
  }

  toBytes(): Uint8Array {
    return this.bytes
  }
}
