/**
 * The convert command behind the CLI, separated from argument parsing.
 */

import { type ConfigOverrides, type ConverterConfig, loadConfig, mergeConfig } from "./config.js"
import { MarkdownToPdfConverter } from "./converter.js"
import { describeError } from "./errors.js"
import { logger } from "./logger.js"

export interface CliOptions {
  input: string
  output?: string
  html?: boolean
  htmlPath?: string
  backend?: "chrome" | "pdfkit"
  config?: string
  strictDiagrams?: boolean
  chromePath?: string
  mermaidPath?: string
}

/**
 * Builds the converter config from the config file and command-line flags.
 * Flags win over the file.
 */
export function resolveCliConfig(options: CliOptions): ConverterConfig {
  const base = loadConfig(options.config)
  const overrides: ConfigOverrides = {
    backend: options.backend,
    chromePath: options.chromePath,
    diagrams: {
      strict: options.strictDiagrams,
      mermaid: { command: options.mermaidPath },
    },
  }
  if (options.html || options.htmlPath) {
    overrides.output = { html: true, htmlPath: options.htmlPath || undefined }
  }
  return mergeConfig(base, overrides)
}

/**
 * Runs one conversion and returns the process exit code.
 */
export async function runConvert(options: CliOptions): Promise<number> {
  let converter: MarkdownToPdfConverter | undefined
  try {
    converter = new MarkdownToPdfConverter(resolveCliConfig(options))
    const result = await converter.convert(options.input, options.output)
    for (const warning of result.warnings) {
      logger.warn({ code: warning.code }, warning.message)
    }
    logger.info(
      { output: result.outputPath, html: result.htmlPath, warnings: result.warnings.length },
      "PDF created",
    )
    return 0
  } catch (error) {
    logger.error({ input: options.input }, describeError(error))
    return 1
  } finally {
    converter?.dispose()
  }
}
