import type { FileHandle } from "node:fs/promises"
import * as fs from "node:fs/promises"
import type { ArchiveOutcome } from "../../ports/archive-result"
import { IoUnavailableError } from "../../core/errors/errors"

/**
 * Reads a whole archive file. The handle is closed on every path, including
 * read failures.
 */
export async function readArchiveFile(filePath: string): Promise<ArchiveOutcome<Uint8Array>> {
  const opened = await openFile(filePath, "r")
  if (!opened.ok) return opened

  const handle = opened.value

  try {
    return { ok: true, value: await handle.readFile() }
  } catch (err) {
    return {
      ok: false,
      error: new IoUnavailableError(`Unable to read archive ${filePath}`, {
        context: { path: filePath },
        cause: err,
      }),
    }
  } finally {
    await handle.close()
  }
}

/**
 * Writes `chunks` in order to `filePath`, truncating any existing file.
 *
 * @remarks
 * Writes go straight to the destination; a failure part-way leaves a partial
 * file behind.
 */
export async function writeArchiveFile(
  filePath: string,
  chunks: readonly Uint8Array[],
): Promise<ArchiveOutcome<number>> {
  const opened = await openFile(filePath, "w")
  if (!opened.ok) return opened

  const handle = opened.value
  let bytesWritten = 0

  try {
    for (const chunk of chunks) {
      await handle.writeFile(chunk)
      bytesWritten += chunk.byteLength
    }

    return { ok: true, value: bytesWritten }
  } catch (err) {
    return {
      ok: false,
      error: new IoUnavailableError(`Unable to write archive ${filePath}`, {
        context: { path: filePath, bytesWritten },
        cause: err,
      }),
    }
  } finally {
    await handle.close()
  }
}

async function openFile(
  filePath: string,
  flags: "r" | "w",
): Promise<ArchiveOutcome<FileHandle>> {
  try {
    return { ok: true, value: await fs.open(filePath, flags) }
  } catch (err) {
    const action = flags === "r" ? "load" : "store"

    return {
      ok: false,
      error: new IoUnavailableError(`Unable to ${action} states: cannot open ${filePath}`, {
        context: { path: filePath, errno: (err as NodeJS.ErrnoException).code },
        cause: err,
      }),
    }
  }
}
