import type { Readable, Writable } from "node:stream"

/** A file path, a readable stream, or the archive bytes themselves. */
export type ArchiveSource = string | Readable | Uint8Array

/** A file path or a writable stream. */
export type ArchiveTarget = string | Writable
