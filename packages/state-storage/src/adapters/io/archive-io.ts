import type { ArchiveSource, ArchiveTarget } from "../../ports/archive-io"
import type { ArchiveOutcome } from "../../ports/archive-result"
import { readArchiveFile, writeArchiveFile } from "./file-archive-io"
import { readArchiveStream, writeArchiveStream } from "./stream-archive-io"

export function readArchive(source: ArchiveSource): Promise<ArchiveOutcome<Uint8Array>> {
  if (typeof source === "string") return readArchiveFile(source)
  if (source instanceof Uint8Array) return Promise.resolve({ ok: true, value: source })

  return readArchiveStream(source)
}

export function writeArchive(
  target: ArchiveTarget,
  chunks: readonly Uint8Array[],
): Promise<ArchiveOutcome<number>> {
  if (typeof target === "string") return writeArchiveFile(target, chunks)

  return writeArchiveStream(target, chunks)
}

/** Short label for logs: the path, or the kind of in-process source. */
export function describeArchive(archive: ArchiveSource | ArchiveTarget): string {
  if (typeof archive === "string") return archive
  if (archive instanceof Uint8Array) return "buffer"

  return "stream"
}
