/**
 * Syntax highlighting with Shiki (shiki/bundle/full).
 * Language tags are looked up in a fixed table; anything not in it is rendered as
 * plain monospace text.
 */

import {
  type BundledLanguage,
  type BundledTheme,
  bundledThemes,
  createHighlighter,
  type Highlighter,
} from "shiki/bundle/full"
import { errorMessage } from "./errors.js"
import { logger } from "./logger.js"
import { escapeHtml } from "./template.js"
import type { CodeToken } from "./types.js"

const DEFAULT_THEME: BundledTheme = "github-light"
const PLAIN_BACKGROUND = "#f6f8fa"
const PLAIN_FOREGROUND = "#24292e"

/**
 * Supported languages for syntax highlighting.
 */
const SUPPORTED_LANGUAGES: BundledLanguage[] = [
  "typescript",
  "tsx",
  "javascript",
  "jsx",
  "json",
  "jsonc",
  "markdown",
  "yaml",
  "bash",
  "shell",
  "python",
  "go",
  "rust",
  "java",
  "c",
  "cpp",
  "csharp",
  "php",
  "ruby",
  "swift",
  "kotlin",
  "html",
  "css",
  "scss",
  "sql",
  "xml",
  "diff",
  "dockerfile",
  "toml",
  "ini",
]

const LANGUAGE_ALIASES: Readonly<Record<string, BundledLanguage>> = {
  ts: "typescript",
  js: "javascript",
  mjs: "javascript",
  cjs: "javascript",
  sh: "bash",
  zsh: "bash",
  console: "shell",
  py: "python",
  yml: "yaml",
  md: "markdown",
  golang: "go",
  rs: "rust",
  "c++": "cpp",
  cs: "csharp",
  "c#": "csharp",
  rb: "ruby",
  kt: "kotlin",
  htm: "html",
  docker: "dockerfile",
  patch: "diff",
}

const LANGUAGE_TABLE: ReadonlyMap<string, BundledLanguage> = new Map<string, BundledLanguage>([
  ...SUPPORTED_LANGUAGES.map((lang): [string, BundledLanguage] => [lang, lang]),
  ...Object.entries(LANGUAGE_ALIASES),
])

/**
 * Maps a fence language tag to a Shiki language, or `null` when it has no highlighter.
 */
export function resolveLanguage(language: string | null): BundledLanguage | null {
  if (!language) {
    return null
  }
  return LANGUAGE_TABLE.get(language.trim().toLowerCase()) ?? null
}

function isBundledTheme(name: string): name is BundledTheme {
  return Object.hasOwn(bundledThemes, name)
}

export interface HighlightedCode {
  /** Shiki language used, `null` when the block was left plain. */
  readonly language: BundledLanguage | null
  readonly html: string
  readonly lines: readonly (readonly CodeToken[])[]
  readonly background: string
  readonly foreground: string
}

function tokensToHtml(
  lines: readonly (readonly CodeToken[])[],
  background: string,
  foreground: string,
  language: string,
): string {
  const body = lines
    .map((line) =>
      line
        .map((token) =>
          token.color
            ? `<span style="color:${token.color}">${escapeHtml(token.text)}</span>`
            : escapeHtml(token.text),
        )
        .join(""),
    )
    .join("\n")
  return `<pre class="shiki" data-language="${escapeHtml(language)}" style="background-color:${background};color:${foreground}"><code>${body}</code></pre>`
}

/**
 * Renders a code block without highlighting.
 */
export function plainCode(code: string): HighlightedCode {
  const lines = code.split("\n").map((text) => [{ text }])
  return {
    language: null,
    html: `<pre class="plain"><code>${escapeHtml(code)}</code></pre>`,
    lines,
    background: PLAIN_BACKGROUND,
    foreground: PLAIN_FOREGROUND,
  }
}

/**
 * Lazily initialized Shiki highlighter bound to one theme.
 */
export class CodeHighlighter {
  private readonly theme: BundledTheme
  private shikiHighlighter: Highlighter | null = null

  constructor(theme: string = DEFAULT_THEME) {
    if (!isBundledTheme(theme)) {
      logger.warn({ theme, fallback: DEFAULT_THEME }, "Unknown Shiki theme, using default")
      this.theme = DEFAULT_THEME
    } else {
      this.theme = theme
    }
  }

  /**
   * Returns the Shiki highlighter instance (lazy initialization).
   *
   * @throws {Error} If initialization fails
   */
  private async getShikiHighlighter(): Promise<Highlighter> {
    if (!this.shikiHighlighter) {
      logger.debug(
        { theme: this.theme, languages: SUPPORTED_LANGUAGES.length },
        "Initializing Shiki highlighter",
      )
      try {
        this.shikiHighlighter = await createHighlighter({
          themes: [this.theme],
          langs: SUPPORTED_LANGUAGES,
        })
      } catch (error) {
        throw new Error(`Failed to initialize Shiki highlighter: ${errorMessage(error)}`)
      }
      logger.debug("Shiki highlighter initialized successfully")
    }
    return this.shikiHighlighter
  }

  /**
   * Highlights one code block. Unknown languages, and highlighting failures, fall
   * back to plain monospace.
   */
  async highlight(code: string, language: string | null): Promise<HighlightedCode> {
    const lang = resolveLanguage(language)
    if (!lang) {
      if (language) {
        logger.debug({ language }, "No highlighter for language, rendering plain")
      }
      return plainCode(code)
    }

    const highlighter = await this.getShikiHighlighter()
    try {
      const tokens = highlighter.codeToTokensBase(code, { lang, theme: this.theme })
      const { bg, fg } = highlighter.getTheme(this.theme)
      const lines = tokens.map((line) =>
        line.map((token): CodeToken => ({ text: token.content, color: token.color })),
      )
      return {
        language: lang,
        html: tokensToHtml(lines, bg, fg, lang),
        lines,
        background: bg,
        foreground: fg,
      }
    } catch (error) {
      logger.warn(
        { language, lang, error: errorMessage(error) },
        "Failed to highlight code block, using plain code",
      )
      return plainCode(code)
    }
  }

  /**
   * Releases the Shiki highlighter.
   */
  dispose(): void {
    this.shikiHighlighter?.dispose()
    this.shikiHighlighter = null
  }
}
