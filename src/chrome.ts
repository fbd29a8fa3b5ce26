/**
 * PDF backend that prints the rendered HTML with headless Chrome or Chromium.
 */

import { writeFile } from "node:fs/promises"
import { pathToFileURL } from "node:url"
import { type OutputBackend, writeAtomically } from "./backend.js"
import { BackendError, BackendTimeoutError } from "./errors.js"
import { logger } from "./logger.js"
import { runTool } from "./process.js"
import type { RenderedDocument } from "./types.js"
import type { WorkArea } from "./workarea.js"

/**
 * Executables tried in order when no Chrome path is configured.
 */
export const CHROME_CANDIDATES = [
  "google-chrome",
  "chromium",
  "chromium-browser",
  "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
  "/usr/bin/google-chrome",
  "/usr/bin/chromium-browser",
]

/** Virtual time Chrome grants the page before printing. */
const VIRTUAL_TIME_BUDGET_MS = 5000

export interface ChromeBackendOptions {
  chromePath?: string
  timeoutMs: number
}

/**
 * Command-line arguments for a headless print-to-PDF run.
 */
export function chromeArgs(htmlPath: string, pdfPath: string): string[] {
  return [
    "--headless",
    "--disable-gpu",
    "--no-sandbox",
    "--disable-dev-shm-usage",
    "--disable-extensions",
    `--print-to-pdf=${pdfPath}`,
    "--no-pdf-header-footer",
    "--print-to-pdf-no-header",
    "--run-all-compositor-stages-before-draw",
    `--virtual-time-budget=${VIRTUAL_TIME_BUDGET_MS}`,
    "--allow-file-access-from-files",
    pathToFileURL(htmlPath).href,
  ]
}

export class ChromeBackend implements OutputBackend {
  readonly name = "chrome" as const

  constructor(private readonly options: ChromeBackendOptions) {}

  async write(document: RenderedDocument, outputPath: string, workArea: WorkArea): Promise<void> {
    const htmlPath = workArea.file("document.html")
    await writeFile(htmlPath, document.html, "utf-8")

    const candidates = this.options.chromePath ? [this.options.chromePath] : CHROME_CANDIDATES
    await writeAtomically(outputPath, async (tempPath) => {
      for (const command of candidates) {
        logger.debug({ command }, "Printing to PDF with Chrome")
        const outcome = await runTool(command, chromeArgs(htmlPath, tempPath), {
          timeoutMs: this.options.timeoutMs,
        })
        switch (outcome.status) {
          case "ok":
            return
          case "not-found":
            continue
          case "timeout":
            throw new BackendTimeoutError(outcome.timeoutMs, outcome.stderr.trim())
          case "failed":
            throw new BackendError(
              `Chrome (${command}) failed to print the document`,
              outcome.diagnostics,
            )
        }
      }
      throw new BackendError(
        `No Chrome/Chromium executable found (tried: ${candidates.join(", ")})`,
      )
    })
  }
}
