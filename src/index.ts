/**
 * md2pdf - Markdown to PDF Converter
 *
 * Converts markdown files with mermaid and PlantUML diagrams to PDF.
 * Diagrams are rendered to PNG by external tools and embedded in the document.
 * Uses Shiki (shiki/bundle/full) for syntax highlighting.
 */

export type { OutputBackend } from "./backend.js"
export { ChromeBackend } from "./chrome.js"
export {
  type ConverterConfig,
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfig,
  parseConfigOverrides,
} from "./config.js"
export {
  createBackend,
  defaultOutputPath,
  MarkdownToPdfConverter,
  type PipelineState,
} from "./converter.js"
export {
  createDiagramAdapters,
  type DiagramAdapter,
  MermaidCliAdapter,
  PlantUmlAdapter,
} from "./diagrams.js"
export * from "./errors.js"
export { CodeHighlighter } from "./highlighter.js"
export { logger } from "./logger.js"
export { collectDiagrams, normalizeMarkdown } from "./normalizer.js"
export { PdfKitBackend } from "./paginator.js"
export { DocumentRenderer } from "./renderer.js"
export type * from "./types.js"
