/**
 * Diagram renderer adapters.
 * Render fenced diagram blocks to PNG images using external command-line tools:
 * Mermaid CLI (`mmdc`) and PlantUML (`plantuml` or `java -jar plantuml.jar`).
 */

import { stat, writeFile } from "node:fs/promises"
import { basename, dirname, extname, join } from "node:path"
import type { ConverterConfig } from "./config.js"
import {
  DiagramSyntaxError,
  DiagramTimeoutError,
  RendererUnavailable,
} from "./errors.js"
import { logger } from "./logger.js"
import { runTool, type ToolOutcome } from "./process.js"
import type { DiagramKind } from "./types.js"

/**
 * Turns diagram source text into a raster image at `outputPath`.
 *
 * Implementations reject with a {@link DiagramRenderError} subclass:
 * {@link RendererUnavailable} when the tool is missing, {@link DiagramSyntaxError}
 * when the tool rejects the diagram, {@link DiagramTimeoutError} when it hangs.
 */
export interface DiagramAdapter {
  readonly kind: DiagramKind
  render(source: string, outputPath: string): Promise<void>
}

/**
 * Fenced code block language tags rendered as diagrams.
 */
export const DIAGRAM_LANGUAGES: Readonly<Record<string, DiagramKind>> = {
  mermaid: "mermaid",
  mmd: "mermaid",
  plantuml: "plantuml",
  puml: "plantuml",
  uml: "plantuml",
}

/**
 * Maps a fence language tag to a diagram kind, or `null` for ordinary code.
 */
export function diagramKindFor(language: string | null): DiagramKind | null {
  if (!language) {
    return null
  }
  const key = language.toLowerCase()
  return Object.hasOwn(DIAGRAM_LANGUAGES, key) ? DIAGRAM_LANGUAGES[key] : null
}

/**
 * Converts a tool outcome into either its stdout or the matching diagram error.
 */
function expectSuccess(
  kind: DiagramKind,
  command: string,
  outcome: ToolOutcome,
): Buffer {
  switch (outcome.status) {
    case "ok":
      return outcome.stdout
    case "not-found":
      throw new RendererUnavailable(kind, command)
    case "timeout":
      throw new DiagramTimeoutError(kind, outcome.timeoutMs)
    case "failed":
      throw new DiagramSyntaxError(kind, outcome.diagnostics)
  }
}

async function ensureImageWritten(kind: DiagramKind, outputPath: string): Promise<void> {
  const info = await stat(outputPath).catch(() => null)
  if (!info || info.size === 0) {
    throw new DiagramSyntaxError(kind, `renderer produced no image at ${outputPath}`)
  }
}

function requireSource(kind: DiagramKind, source: string): string {
  const code = source.trim()
  if (!code) {
    throw new DiagramSyntaxError(kind, "diagram source is empty")
  }
  return code
}

export type MermaidAdapterOptions = ConverterConfig["diagrams"]["mermaid"] & {
  timeoutMs: number
}

/**
 * Mermaid renderer using mermaid-cli (mmdc). The diagram source is written to a
 * `.mmd` file next to the image.
 */
export class MermaidCliAdapter implements DiagramAdapter {
  readonly kind = "mermaid" as const

  constructor(private readonly options: MermaidAdapterOptions) {}

  async render(source: string, outputPath: string): Promise<void> {
    const code = requireSource(this.kind, source)
    const inputPath = join(dirname(outputPath), `${basename(outputPath, extname(outputPath))}.mmd`)
    await writeFile(inputPath, code, "utf-8")
    const args = [
      "-i",
      inputPath,
      "-o",
      outputPath,
      "-e",
      "png",
      "-b",
      this.options.background,
      "-t",
      this.options.theme,
      "-w",
      String(this.options.width),
      "--quiet",
    ]
    if (this.options.puppeteerConfig) {
      args.push("-p", this.options.puppeteerConfig)
    }

    const outcome = await runTool(this.options.command, args, {
      timeoutMs: this.options.timeoutMs,
    })
    expectSuccess(this.kind, this.options.command, outcome)
    await ensureImageWritten(this.kind, outputPath)
  }
}

export type PlantUmlAdapterOptions = ConverterConfig["diagrams"]["plantuml"] & {
  timeoutMs: number
}

/**
 * PlantUML renderer in pipe mode: source on stdin, PNG on stdout.
 * Runs `java -jar <jarPath>` when a jar is configured, else the `plantuml` command.
 */
export class PlantUmlAdapter implements DiagramAdapter {
  readonly kind = "plantuml" as const

  constructor(private readonly options: PlantUmlAdapterOptions) {}

  async render(source: string, outputPath: string): Promise<void> {
    const code = requireSource(this.kind, source)
    const [command, args]: [string, string[]] = this.options.jarPath
      ? ["java", ["-jar", this.options.jarPath, "-tpng", "-pipe"]]
      : [this.options.command, ["-tpng", "-pipe"]]

    const outcome = await runTool(command, args, {
      timeoutMs: this.options.timeoutMs,
      input: code,
    })
    const png = expectSuccess(this.kind, command, outcome)
    if (png.length === 0) {
      throw new DiagramSyntaxError(this.kind, "renderer produced no image")
    }
    await writeFile(outputPath, png)
  }
}

/**
 * Builds the adapters for every diagram kind enabled in the config.
 */
export function createDiagramAdapters(config: ConverterConfig): Map<DiagramKind, DiagramAdapter> {
  const adapters = new Map<DiagramKind, DiagramAdapter>()
  const timeoutMs = config.timeouts.diagramMs
  const { mermaid, plantuml } = config.diagrams

  if (mermaid.enabled) {
    adapters.set("mermaid", new MermaidCliAdapter({ ...mermaid, timeoutMs }))
  }
  if (plantuml.enabled) {
    adapters.set("plantuml", new PlantUmlAdapter({ ...plantuml, timeoutMs }))
  }

  logger.debug({ kinds: [...adapters.keys()] }, "Diagram adapters configured")
  return adapters
}
