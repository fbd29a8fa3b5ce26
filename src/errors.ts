/**
 * Error taxonomy for the conversion pipeline.
 *
 * Fatal errors abort the pipeline after cleanup. Diagram errors are recoverable
 * and end up as warnings. Cleanup errors are only ever logged.
 */

import type { DiagramKind } from "./types.js"

export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly fatal: boolean,
  ) {
    super(message)
    this.name = "ConversionError"
  }
}

export class InputNotFoundError extends ConversionError {
  constructor(public readonly inputPath: string) {
    super(`Input file not found or not readable: ${inputPath}`, "input-not-found", true)
    this.name = "InputNotFoundError"
  }
}

export class ConfigError extends ConversionError {
  constructor(message: string) {
    super(message, "invalid-config", true)
    this.name = "ConfigError"
  }
}

/**
 * Base class for a single diagram that could not be turned into an image.
 */
export class DiagramRenderError extends ConversionError {
  constructor(
    message: string,
    code: string,
    public readonly diagramKind: DiagramKind,
    public readonly diagnostics: string,
  ) {
    super(message, code, false)
    this.name = "DiagramRenderError"
  }
}

export class DiagramSyntaxError extends DiagramRenderError {
  constructor(diagramKind: DiagramKind, diagnostics: string) {
    super(
      `${diagramKind} diagram failed to render: ${firstLine(diagnostics)}`,
      "diagram-syntax",
      diagramKind,
      diagnostics,
    )
    this.name = "DiagramSyntaxError"
  }
}

export class RendererUnavailable extends DiagramRenderError {
  constructor(
    diagramKind: DiagramKind,
    public readonly command: string,
  ) {
    super(
      `${diagramKind} renderer "${command}" is not available`,
      "renderer-unavailable",
      diagramKind,
      "",
    )
    this.name = "RendererUnavailable"
  }
}

export class DiagramTimeoutError extends DiagramRenderError {
  constructor(diagramKind: DiagramKind, timeoutMs: number) {
    super(
      `${diagramKind} renderer timed out after ${timeoutMs}ms`,
      "diagram-timeout",
      diagramKind,
      "",
    )
    this.name = "DiagramTimeoutError"
  }
}

export class DocumentRenderError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "document-render", true)
    this.name = "DocumentRenderError"
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

/**
 * The PDF backend failed. `diagnostics` holds the engine's output verbatim.
 */
export class BackendError extends ConversionError {
  constructor(
    message: string,
    public readonly diagnostics = "",
    code = "backend",
  ) {
    super(message, code, true)
    this.name = "BackendError"
  }
}

export class BackendTimeoutError extends BackendError {
  constructor(timeoutMs: number, diagnostics = "") {
    super(`PDF backend timed out after ${timeoutMs}ms`, diagnostics, "backend-timeout")
    this.name = "BackendTimeoutError"
  }
}

export class CleanupError extends ConversionError {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Failed to clean up ${path}: ${reason}`, "cleanup", false)
    this.name = "CleanupError"
  }
}

export class DiagramFailuresError extends ConversionError {
  constructor(public readonly failures: number) {
    super(`${failures} diagram(s) failed to render`, "diagram-failures", true)
    this.name = "DiagramFailuresError"
  }
}

function firstLine(text: string): string {
  const line = text
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l.length > 0)
  return line ?? "no diagnostic output"
}

/**
 * Returns the message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Formats an error as the single summary line shown to users.
 */
export function describeError(error: unknown): string {
  if (error instanceof BackendError && error.diagnostics) {
    return `${error.message}: ${firstLine(error.diagnostics)}`
  }
  return errorMessage(error)
}
