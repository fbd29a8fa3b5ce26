/**
 * Converter configuration.
 *
 * Everything the pipeline needs is carried by an explicit {@link ConverterConfig}
 * handed to the converter at construction. The CLI builds one from defaults, an
 * optional JSON file and its own flags.
 */

import { existsSync, readFileSync } from "node:fs"
import { join } from "node:path"
import { z } from "zod"
import { ConfigError, errorMessage } from "./errors.js"

export type BackendKind = "chrome" | "pdfkit"

export type PageFormat = "A4" | "LETTER"

export interface ConverterConfig {
  backend: BackendKind
  /** Chrome or Chromium executable. Searched for when unset. */
  chromePath?: string
  page: {
    format: PageFormat
    /** Page margin in PDF points. */
    margin: number
  }
  /** Shiki theme used for code blocks. */
  theme: string
  diagrams: {
    /** Fail the run (after writing the PDF) when any diagram could not be rendered. */
    strict: boolean
    mermaid: {
      enabled: boolean
      command: string
      theme: "default" | "dark" | "forest" | "neutral" | "base"
      background: string
      width: number
      puppeteerConfig?: string
    }
    plantuml: {
      enabled: boolean
      command: string
      jarPath?: string
    }
  }
  timeouts: {
    diagramMs: number
    backendMs: number
  }
  output: {
    /** Also write the intermediate HTML next to the PDF. */
    html: boolean
    htmlPath?: string
  }
  /** Directory the working area is created under. Defaults to the OS temp dir. */
  tempRoot?: string
}

export const DEFAULT_CONFIG: ConverterConfig = {
  backend: "chrome",
  page: {
    format: "A4",
    margin: 28.35,
  },
  theme: "github-light",
  diagrams: {
    strict: false,
    mermaid: {
      enabled: true,
      command: "mmdc",
      theme: "default",
      background: "white",
      width: 1200,
    },
    plantuml: {
      enabled: true,
      command: "plantuml",
    },
  },
  timeouts: {
    diagramMs: 30000,
    backendMs: 90000,
  },
  output: {
    html: false,
  },
}

const DEFAULT_CONFIG_FILES = ["md2pdf.config.json", ".md2pdf.json"]

const configFileSchema = z
  .object({
    backend: z.enum(["chrome", "pdfkit"]),
    chromePath: z.string().min(1),
    page: z
      .object({
        format: z.enum(["A4", "LETTER"]),
        margin: z.number().nonnegative(),
      })
      .partial(),
    theme: z.string().min(1),
    diagrams: z
      .object({
        strict: z.boolean(),
        mermaid: z
          .object({
            enabled: z.boolean(),
            command: z.string().min(1),
            theme: z.enum(["default", "dark", "forest", "neutral", "base"]),
            background: z.string().min(1),
            width: z.number().int().positive(),
            puppeteerConfig: z.string().min(1),
          })
          .partial(),
        plantuml: z
          .object({
            enabled: z.boolean(),
            command: z.string().min(1),
            jarPath: z.string().min(1),
          })
          .partial(),
      })
      .partial(),
    timeouts: z
      .object({
        diagramMs: z.number().int().positive(),
        backendMs: z.number().int().positive(),
      })
      .partial(),
    output: z
      .object({
        html: z.boolean(),
        htmlPath: z.string().min(1),
      })
      .partial(),
    tempRoot: z.string().min(1),
  })
  .partial()
  .strict()

export type ConfigOverrides = z.infer<typeof configFileSchema>

type Section<K extends keyof ConfigOverrides> = NonNullable<ConfigOverrides[K]>

/**
 * Merges overrides into a config. Nested sections merge key by key; a missing
 * override leaves the base value in place.
 */
export function mergeConfig(base: ConverterConfig, overrides: ConfigOverrides): ConverterConfig {
  const page: Section<"page"> = overrides.page ?? {}
  const diagrams: Section<"diagrams"> = overrides.diagrams ?? {}
  const mermaid: NonNullable<Section<"diagrams">["mermaid"]> = diagrams.mermaid ?? {}
  const plantuml: NonNullable<Section<"diagrams">["plantuml"]> = diagrams.plantuml ?? {}
  const timeouts: Section<"timeouts"> = overrides.timeouts ?? {}
  const output: Section<"output"> = overrides.output ?? {}

  return {
    backend: overrides.backend ?? base.backend,
    chromePath: overrides.chromePath ?? base.chromePath,
    page: {
      format: page.format ?? base.page.format,
      margin: page.margin ?? base.page.margin,
    },
    theme: overrides.theme ?? base.theme,
    diagrams: {
      strict: diagrams.strict ?? base.diagrams.strict,
      mermaid: {
        enabled: mermaid.enabled ?? base.diagrams.mermaid.enabled,
        command: mermaid.command ?? base.diagrams.mermaid.command,
        theme: mermaid.theme ?? base.diagrams.mermaid.theme,
        background: mermaid.background ?? base.diagrams.mermaid.background,
        width: mermaid.width ?? base.diagrams.mermaid.width,
        puppeteerConfig: mermaid.puppeteerConfig ?? base.diagrams.mermaid.puppeteerConfig,
      },
      plantuml: {
        enabled: plantuml.enabled ?? base.diagrams.plantuml.enabled,
        command: plantuml.command ?? base.diagrams.plantuml.command,
        jarPath: plantuml.jarPath ?? base.diagrams.plantuml.jarPath,
      },
    },
    timeouts: {
      diagramMs: timeouts.diagramMs ?? base.timeouts.diagramMs,
      backendMs: timeouts.backendMs ?? base.timeouts.backendMs,
    },
    output: {
      html: output.html ?? base.output.html,
      htmlPath: output.htmlPath ?? base.output.htmlPath,
    },
    tempRoot: overrides.tempRoot ?? base.tempRoot,
  }
}

/**
 * Validates a parsed JSON value as config overrides.
 *
 * @throws {ConfigError} If the value does not match the config schema
 */
export function parseConfigOverrides(value: unknown, source = "config"): ConfigOverrides {
  const parsed = configFileSchema.safeParse(value)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")
    throw new ConfigError(`Invalid ${source}: ${issues}`)
  }
  return parsed.data
}

/**
 * Loads config from a JSON file merged over {@link DEFAULT_CONFIG}.
 *
 * Without an explicit path the default file names are tried in the current
 * directory; finding none yields the defaults. An explicit path that does not
 * exist is an error.
 */
export function loadConfig(configPath?: string, cwd = process.cwd()): ConverterConfig {
  let configFile: string | undefined
  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`)
    }
    configFile = configPath
  } else {
    configFile = DEFAULT_CONFIG_FILES.map((name) => join(cwd, name)).find((path) => existsSync(path))
  }

  if (!configFile) {
    return DEFAULT_CONFIG
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(configFile, "utf-8"))
  } catch (error) {
    throw new ConfigError(`Failed to read config from ${configFile}: ${errorMessage(error)}`)
  }
  return mergeConfig(DEFAULT_CONFIG, parseConfigOverrides(raw, configFile))
}
