import type { Signature } from "./state-space"

/** First four bytes of every archive. */
export const ARCHIVE_MARKER = 0x4c504d4f

export type ArchiveHeader = Readonly<{
  marker: number
  signature: Signature
  recordCount: number
  /**
   * Per-record side-data length. Always 0 on write; on read the bytes are
   * skipped and not interpreted.
   */
  metadataSize: number
}>
