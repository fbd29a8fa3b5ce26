import { chmod, readdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { pathToFileURL } from "node:url"
import { describe, expect, it } from "vitest"
import { ChromeBackend, chromeArgs } from "./chrome.js"
import { BackendError, BackendTimeoutError } from "./errors.js"
import { useTempDirs } from "./test-support.js"
import type { RenderedDocument } from "./types.js"
import { WorkArea } from "./workarea.js"

const DOCUMENT: RenderedDocument = {
  title: "Doc",
  html: "<!DOCTYPE html><html><body><p>hi</p></body></html>\n",
  layout: [],
}

describe("chromeArgs", () => {
  it("prints the HTML file to the given PDF path", () => {
    const args = chromeArgs("/work/document.html", "/out/doc.pdf.partial")

    expect(args).toContain("--headless")
    expect(args).toContain("--print-to-pdf=/out/doc.pdf.partial")
    expect(args).toContain("--no-pdf-header-footer")
    expect(args[args.length - 1]).toBe(pathToFileURL("/work/document.html").href)
  })
})

describe("ChromeBackend", () => {
  const tempDir = useTempDirs()

  it("fails when no browser executable exists", async () => {
    const dir = await tempDir()
    const area = await WorkArea.create(dir)
    const backend = new ChromeBackend({ chromePath: "/nonexistent/chrome", timeoutMs: 10000 })

    try {
      await expect(backend.write(DOCUMENT, join(dir, "doc.pdf"), area)).rejects.toThrow(
        "No Chrome/Chromium executable found (tried: /nonexistent/chrome)",
      )
    } finally {
      await area.dispose()
    }
    expect(await readdir(dir)).toEqual([])
  })

  it("carries the engine's output when it exits with an error", async () => {
    const dir = await tempDir()
    const area = await WorkArea.create(dir)
    // node rejects the Chrome flags and exits non-zero
    const backend = new ChromeBackend({ chromePath: process.execPath, timeoutMs: 10000 })

    const error = await backend.write(DOCUMENT, join(dir, "doc.pdf"), area).catch((e: unknown) => e)
    await area.dispose()

    expect(error).toBeInstanceOf(BackendError)
    expect(error).toMatchObject({
      message: `Chrome (${process.execPath}) failed to print the document`,
      code: "backend",
    })
    expect(error instanceof BackendError && error.diagnostics.length > 0).toBe(true)
    expect(await readdir(dir)).toEqual([])
  })

  it("keeps what the engine printed before it timed out", async () => {
    const dir = await tempDir()
    const script = join(await tempDir(), "slow-chrome")
    await writeFile(script, '#!/bin/sh\necho "still loading" >&2\nexec sleep 10\n')
    await chmod(script, 0o755)
    const area = await WorkArea.create(dir)
    const backend = new ChromeBackend({ chromePath: script, timeoutMs: 1000 })

    const error = await backend.write(DOCUMENT, join(dir, "doc.pdf"), area).catch((e: unknown) => e)
    await area.dispose()

    expect(error).toBeInstanceOf(BackendTimeoutError)
    expect(error).toMatchObject({
      message: "PDF backend timed out after 1000ms",
      code: "backend-timeout",
      diagnostics: "still loading",
    })
    expect(await readdir(dir)).toEqual([])
  })
})
