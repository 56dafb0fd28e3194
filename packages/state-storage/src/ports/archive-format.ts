export type ByteOrder = "le" | "be"

/** Width in bytes of the archive's size fields (record count, metadata size). */
export type SizeWidth = 4 | 8

/**
 * Integer layout of an archive.
 *
 * @remarks
 * Archives carry no byte-order mark. Writer and reader must agree on the
 * format out of band; the default follows the host.
 */
export type ArchiveFormat = Readonly<{
  byteOrder: ByteOrder
  sizeWidth: SizeWidth
}>
