/**
 * Markdown to PDF converter module.
 * Runs the conversion pipeline: validate the input, normalize the markdown,
 * render diagrams, render the document, write the PDF (and optionally the HTML),
 * and always remove the working area afterwards.
 */

import { readFile, stat, writeFile } from "node:fs/promises"
import { basename, dirname, extname, resolve } from "node:path"
import type { OutputBackend } from "./backend.js"
import { ChromeBackend } from "./chrome.js"
import { type ConverterConfig, DEFAULT_CONFIG } from "./config.js"
import { createDiagramAdapters, type DiagramAdapter } from "./diagrams.js"
import {
  BackendError,
  ConversionError,
  DiagramFailuresError,
  DiagramRenderError,
  DocumentRenderError,
  errorMessage,
  InputNotFoundError,
} from "./errors.js"
import { CodeHighlighter } from "./highlighter.js"
import { logger } from "./logger.js"
import { collectDiagrams, normalizeMarkdown } from "./normalizer.js"
import { PdfKitBackend } from "./paginator.js"
import { DocumentRenderer } from "./renderer.js"
import type {
  Block,
  ConversionResult,
  ConversionWarning,
  DiagramKind,
  RenderedDocument,
  SourceDocument,
} from "./types.js"
import { WorkArea } from "./workarea.js"

export type PipelineState =
  | "Init"
  | "Validated"
  | "Normalized"
  | "DiagramsRendered"
  | "DocumentRendered"
  | "PdfWritten"
  | "CleanedUp"
  | "Error"

/**
 * Collaborators the converter would otherwise build from its config.
 */
export interface ConverterDependencies {
  adapters?: ReadonlyMap<DiagramKind, DiagramAdapter>
  backend?: OutputBackend
  highlighter?: CodeHighlighter
}

/**
 * Replaces a markdown extension with `extension`, or appends it.
 */
export function defaultOutputPath(inputPath: string, extension: string): string {
  return /\.(md|markdown)$/i.test(inputPath)
    ? inputPath.replace(/\.(md|markdown)$/i, extension)
    : `${inputPath}${extension}`
}

/**
 * Builds the output backend selected in the config.
 */
export function createBackend(config: ConverterConfig): OutputBackend {
  switch (config.backend) {
    case "chrome":
      return new ChromeBackend({
        chromePath: config.chromePath,
        timeoutMs: config.timeouts.backendMs,
      })
    case "pdfkit":
      return new PdfKitBackend({
        format: config.page.format,
        margin: config.page.margin,
        timeoutMs: config.timeouts.backendMs,
      })
  }
}

interface DiagramPhase {
  diagrams: Map<string, string>
  warnings: ConversionWarning[]
  total: number
}

/**
 * Converts markdown files to PDF.
 */
export class MarkdownToPdfConverter {
  private readonly adapters: ReadonlyMap<DiagramKind, DiagramAdapter>
  private readonly backend: OutputBackend
  private readonly highlighter: CodeHighlighter
  private readonly renderer: DocumentRenderer
  private currentState: PipelineState = "Init"
  private visited: PipelineState[] = ["Init"]

  constructor(
    private readonly config: ConverterConfig = DEFAULT_CONFIG,
    dependencies: ConverterDependencies = {},
  ) {
    this.adapters = dependencies.adapters ?? createDiagramAdapters(config)
    this.backend = dependencies.backend ?? createBackend(config)
    this.highlighter = dependencies.highlighter ?? new CodeHighlighter(config.theme)
    this.renderer = new DocumentRenderer(this.highlighter)
  }

  /**
   * State the most recent conversion reached.
   */
  get state(): PipelineState {
    return this.currentState
  }

  /**
   * States visited by the most recent conversion, in order.
   */
  get history(): readonly PipelineState[] {
    return this.visited
  }

  private transition(next: PipelineState): void {
    logger.debug({ from: this.currentState, to: next }, "Pipeline state changed")
    this.currentState = next
    this.visited.push(next)
  }

  /**
   * Converts a markdown file to PDF.
   *
   * @param inputPath - Input markdown file path
   * @param outputPath - Output PDF path (defaults to input with .pdf extension)
   * @returns Output paths and the warnings collected along the way
   * @throws {ConversionError} On any fatal error, after the working area is removed
   */
  async convert(inputPath: string, outputPath?: string): Promise<ConversionResult> {
    this.currentState = "Init"
    this.visited = ["Init"]
    const output = resolve(outputPath ?? defaultOutputPath(inputPath, ".pdf"))
    let workArea: WorkArea | null = null

    try {
      workArea = await WorkArea.create(this.config.tempRoot)

      const source = await this.loadSource(inputPath)
      this.transition("Validated")

      const blocks = normalizeMarkdown(source)
      this.transition("Normalized")

      const diagramPhase = await this.renderDiagrams(blocks, workArea)
      this.transition("DiagramsRendered")

      const { document, warnings: renderWarnings } = await this.renderDocument(
        blocks,
        diagramPhase.diagrams,
        source,
      )
      this.transition("DocumentRendered")

      await this.writePdf(document, output, workArea)
      this.transition("PdfWritten")

      const warnings = [...diagramPhase.warnings, ...renderWarnings]
      const htmlPath = await this.writeHtmlCopy(document, source, warnings)

      logger.info(
        {
          input: source.path,
          output,
          htmlPath,
          diagramsRendered: diagramPhase.diagrams.size,
          warnings: warnings.length,
        },
        "Successfully converted markdown to PDF",
      )

      if (this.config.diagrams.strict && diagramPhase.warnings.length > 0) {
        throw new DiagramFailuresError(diagramPhase.warnings.length)
      }

      return {
        outputPath: output,
        ...(htmlPath ? { htmlPath } : {}),
        warnings,
        diagrams: { total: diagramPhase.total, rendered: diagramPhase.diagrams.size },
      }
    } catch (error) {
      this.transition("Error")
      throw error
    } finally {
      if (workArea) {
        await workArea.dispose()
      }
      this.transition("CleanedUp")
    }
  }

  /**
   * Releases the syntax highlighter.
   */
  dispose(): void {
    this.highlighter.dispose()
  }

  private async loadSource(inputPath: string): Promise<SourceDocument> {
    const path = resolve(inputPath)
    try {
      const info = await stat(path)
      if (!info.isFile()) {
        throw new InputNotFoundError(inputPath)
      }
      const markdown = await readFile(path, "utf-8")
      return { markdown, path, baseDir: dirname(path) }
    } catch (error) {
      if (error instanceof InputNotFoundError) {
        throw error
      }
      logger.debug({ inputPath, error: errorMessage(error) }, "Input file could not be read")
      throw new InputNotFoundError(inputPath)
    }
  }

  /**
   * Renders each diagram on its own. A failure is recorded as a warning and the
   * block is left without an image.
   */
  private async renderDiagrams(blocks: readonly Block[], workArea: WorkArea): Promise<DiagramPhase> {
    const diagramBlocks = collectDiagrams(blocks)
    const diagrams = new Map<string, string>()
    const warnings: ConversionWarning[] = []
    logger.info({ count: diagramBlocks.length }, "Found diagrams in markdown")

    for (const block of diagramBlocks) {
      const adapter = this.adapters.get(block.diagramKind)
      if (!adapter) {
        const message = `${block.id}: ${block.diagramKind} diagrams are disabled`
        logger.warn({ diagramId: block.id }, message)
        warnings.push({ code: "diagram-disabled", message, blockId: block.id })
        continue
      }

      const imagePath = workArea.file(`${block.id}.png`)
      logger.debug({ diagramId: block.id, kind: block.diagramKind }, "Rendering diagram")
      try {
        await adapter.render(block.source, imagePath)
        diagrams.set(block.id, imagePath)
        logger.info({ diagramId: block.id, imagePath }, "Successfully rendered diagram")
      } catch (error) {
        const code = error instanceof DiagramRenderError ? error.code : "diagram-error"
        const message = `${block.id}: ${errorMessage(error)}`
        logger.warn(
          {
            diagramId: block.id,
            diagnostics: error instanceof DiagramRenderError ? error.diagnostics : undefined,
          },
          message,
        )
        warnings.push({ code, message, blockId: block.id })
      }
    }

    return { diagrams, warnings, total: diagramBlocks.length }
  }

  private async renderDocument(
    blocks: readonly Block[],
    diagrams: ReadonlyMap<string, string>,
    source: SourceDocument,
  ): Promise<{ document: RenderedDocument; warnings: ConversionWarning[] }> {
    try {
      return await this.renderer.render(blocks, diagrams, {
        fallbackTitle: basename(source.path, extname(source.path)),
        format: this.config.page.format,
        margin: this.config.page.margin,
      })
    } catch (error) {
      throw new DocumentRenderError(`Failed to render document: ${errorMessage(error)}`, {
        cause: error,
      })
    }
  }

  private async writePdf(
    document: RenderedDocument,
    output: string,
    workArea: WorkArea,
  ): Promise<void> {
    logger.debug({ backend: this.backend.name, output }, "Writing PDF")
    try {
      await this.backend.write(document, output, workArea)
    } catch (error) {
      if (error instanceof ConversionError) {
        throw error
      }
      throw new BackendError(`PDF backend failed: ${errorMessage(error)}`)
    }
  }

  /**
   * Writes the intermediate HTML when enabled. A failure here is a warning: the
   * PDF has already been written.
   */
  private async writeHtmlCopy(
    document: RenderedDocument,
    source: SourceDocument,
    warnings: ConversionWarning[],
  ): Promise<string | undefined> {
    if (!this.config.output.html) {
      return undefined
    }
    const htmlPath = resolve(this.config.output.htmlPath ?? defaultOutputPath(source.path, ".html"))
    try {
      await writeFile(htmlPath, document.html, "utf-8")
      return htmlPath
    } catch (error) {
      const message = `Failed to write HTML copy to ${htmlPath}: ${errorMessage(error)}`
      logger.warn({ htmlPath }, message)
      warnings.push({ code: "html-write-failed", message })
      return undefined
    }
  }
}
