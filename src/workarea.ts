/**
 * Scoped temporary directory owning every intermediate file of one conversion.
 */

import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { CleanupError, errorMessage } from "./errors.js"
import { logger } from "./logger.js"

const WORK_AREA_PREFIX = "md2pdf-"

export class WorkArea {
  private disposed = false

  private constructor(readonly dir: string) {}

  /**
   * Creates a fresh, uniquely named directory under `root` (the OS temp dir by default).
   */
  static async create(root: string = tmpdir()): Promise<WorkArea> {
    const dir = await mkdtemp(join(root, WORK_AREA_PREFIX))
    logger.debug({ dir }, "Created working area")
    return new WorkArea(dir)
  }

  /**
   * Path of a file inside the working area.
   */
  file(name: string): string {
    if (this.disposed) {
      throw new Error(`Working area ${this.dir} has already been removed`)
    }
    return join(this.dir, name)
  }

  /**
   * Removes the directory and everything in it. Safe to call more than once.
   * Failures are logged and returned, never thrown.
   */
  async dispose(): Promise<CleanupError | null> {
    if (this.disposed) {
      return null
    }
    this.disposed = true
    try {
      await rm(this.dir, { recursive: true, force: true })
      logger.debug({ dir: this.dir }, "Cleaned up working area")
      return null
    } catch (error) {
      const cleanupError = new CleanupError(this.dir, errorMessage(error))
      logger.warn({ dir: this.dir, error: cleanupError.message }, "Failed to clean up working area")
      return cleanupError
    }
  }
}
