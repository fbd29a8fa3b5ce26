import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach } from "vitest"
import type { DiagramAdapter } from "./diagrams.js"
import type { DiagramKind } from "./types.js"

/** A 1x1 PNG. */
export const ONE_PIXEL_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
  "base64",
)

/**
 * Returns a factory for temporary directories that are removed after each test.
 */
export function useTempDirs(): () => Promise<string> {
  const created: string[] = []
  afterEach(async () => {
    await Promise.all(created.splice(0).map((dir) => rm(dir, { recursive: true, force: true })))
  })
  return async () => {
    const dir = await mkdtemp(join(tmpdir(), "md2pdf-test-"))
    created.push(dir)
    return dir
  }
}

/**
 * In-process diagram adapter that writes a fixed PNG and records what it was given.
 */
export class FakeDiagramAdapter implements DiagramAdapter {
  readonly sources: string[] = []

  constructor(
    readonly kind: DiagramKind,
    private readonly failure?: Error,
  ) {}

  async render(source: string, outputPath: string): Promise<void> {
    this.sources.push(source)
    if (this.failure) {
      throw this.failure
    }
    await writeFile(outputPath, ONE_PIXEL_PNG)
  }
}

/**
 * Keys adapters by their kind, as the converter expects them.
 */
export function adapterMap(...adapters: DiagramAdapter[]): Map<DiagramKind, DiagramAdapter> {
  return new Map(adapters.map((adapter): [DiagramKind, DiagramAdapter] => [adapter.kind, adapter]))
}
