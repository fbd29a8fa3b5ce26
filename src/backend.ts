/**
 * Output backends turn a rendered document into a PDF file.
 */

import { mkdir, rename, rm, stat } from "node:fs/promises"
import { dirname } from "node:path"
import type { BackendKind } from "./config.js"
import { BackendError, errorMessage } from "./errors.js"
import { logger } from "./logger.js"
import type { RenderedDocument } from "./types.js"
import type { WorkArea } from "./workarea.js"

export interface OutputBackend {
  readonly name: BackendKind
  /**
   * Writes the PDF for `document` to `outputPath`. Intermediate files go into
   * `workArea`. Rejects with a {@link BackendError} on failure, leaving nothing
   * at `outputPath`.
   */
  write(document: RenderedDocument, outputPath: string, workArea: WorkArea): Promise<void>
}

/**
 * Temporary sibling of the destination the PDF is produced into before the rename.
 */
export function partialPath(outputPath: string): string {
  return `${outputPath}.${process.pid}.partial`
}

/**
 * Runs `produce` against a temporary path next to `outputPath`, then renames the
 * result into place. The rename only happens for a non-empty file; on any
 * failure the temporary file is removed and the destination is left untouched.
 */
export async function writeAtomically(
  outputPath: string,
  produce: (tempPath: string) => Promise<void>,
): Promise<void> {
  const tempPath = partialPath(outputPath)
  try {
    await mkdir(dirname(outputPath), { recursive: true })
    await produce(tempPath)
    const info = await stat(tempPath).catch(() => null)
    if (!info || info.size === 0) {
      throw new BackendError("PDF backend produced no output")
    }
    await rename(tempPath, outputPath)
  } catch (error) {
    await rm(tempPath, { force: true }).catch((rmError: unknown) => {
      logger.warn({ tempPath, error: errorMessage(rmError) }, "Failed to remove partial PDF")
    })
    if (error instanceof BackendError) {
      throw error
    }
    throw new BackendError(`Failed to write PDF: ${errorMessage(error)}`)
  }
}
