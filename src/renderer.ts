/**
 * Document renderer module.
 * Walks the normalized blocks and produces the styled HTML document together
 * with the structured layout the direct PDF backend paginates. Local images and
 * rendered diagrams are embedded as base64 data URLs so the HTML does not depend
 * on the working area surviving.
 */

import { readFile } from "node:fs/promises"
import { extname } from "node:path"
import type { PageFormat } from "./config.js"
import { errorMessage } from "./errors.js"
import type { CodeHighlighter } from "./highlighter.js"
import { logger } from "./logger.js"
import { inlineText } from "./normalizer.js"
import { escapeHtml, wrapInHtmlDocument } from "./template.js"
import type {
  Block,
  ColumnAlign,
  ConversionWarning,
  DiagramBlock,
  Inline,
  LayoutBlock,
  RenderedDiagrams,
  RenderedDocument,
  TextRun,
} from "./types.js"

const URL_SCHEME = /^[a-z][a-z\d+.-]*:/i

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
}

/** Image formats the direct PDF backend can place on a page. */
const PAGINATABLE_IMAGES = new Set([".png", ".jpg", ".jpeg"])

export interface RenderOptions {
  /** Used as the document title when there is no level-1 heading. */
  fallbackTitle: string
  format: PageFormat
  margin: number
}

export interface RenderOutcome {
  document: RenderedDocument
  warnings: ConversionWarning[]
}

interface Rendered {
  html: string
  layout: LayoutBlock[]
}

type RunStyle = Omit<TextRun, "text">

/** A local image inside a paragraph that the direct PDF backend can place. */
interface InlineImage {
  image: string
  alt: string
  style: RunStyle
}

type RunPiece = TextRun | InlineImage

/**
 * Placeholder text shown where a diagram could not be rendered.
 */
export function diagramPlaceholder(block: DiagramBlock): string {
  return `Diagram ${block.id} (${block.diagramKind}) could not be rendered`
}

function slugify(text: string): string {
  return (
    text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s-]/gu, "")
      .trim()
      .replace(/\s+/g, "-") || "section"
  )
}

function alignStyle(align: ColumnAlign): string {
  return align ? ` style="text-align:${align}"` : ""
}

function titleAttr(title: string | undefined): string {
  return title ? ` title="${escapeHtml(title)}"` : ""
}

function stripTags(html: string): string {
  return html
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<[^>]*>/g, "")
    .trim()
}

/**
 * State of a single render pass.
 */
class RenderPass {
  readonly warnings: ConversionWarning[] = []
  private readonly dataUrls = new Map<string, string | null>()
  private readonly slugs = new Map<string, number>()

  constructor(
    private readonly highlighter: CodeHighlighter,
    private readonly diagrams: RenderedDiagrams,
  ) {}

  async blocks(blocks: readonly Block[]): Promise<Rendered> {
    const html: string[] = []
    const layout: LayoutBlock[] = []
    for (const block of blocks) {
      const rendered = await this.block(block)
      html.push(rendered.html)
      layout.push(...rendered.layout)
    }
    return { html: html.join("\n"), layout }
  }

  private async block(block: Block): Promise<Rendered> {
    switch (block.kind) {
      case "heading": {
        const tag = `h${block.level}`
        return {
          html: `<${tag} id="${this.slug(block.text)}">${await this.inlines(block.content)}</${tag}>`,
          layout: [{ kind: "heading", level: block.level, text: block.text }],
        }
      }
      case "paragraph":
        return {
          html: `<p>${await this.inlines(block.content)}</p>`,
          layout: await this.paragraphLayout(block.content),
        }
      case "code": {
        const highlighted = await this.highlighter.highlight(block.text, block.language)
        return { html: highlighted.html, layout: [{ kind: "code", lines: highlighted.lines }] }
      }
      case "diagram":
        return this.diagram(block)
      case "table":
        return this.table(block)
      case "image":
        return this.image(block.source, block.alt, block.title)
      case "link":
        return {
          html: `<p class="link"><a href="${escapeHtml(block.target)}"${titleAttr(block.title)}>${escapeHtml(block.text)}</a></p>`,
          layout: [{ kind: "paragraph", runs: [{ text: block.text, link: block.target }] }],
        }
      case "blockquote": {
        const inner = await this.blocks(block.children)
        return {
          html: `<blockquote>\n${inner.html}\n</blockquote>`,
          layout: [{ kind: "blockquote", children: inner.layout }],
        }
      }
      case "rule":
        return { html: "<hr>", layout: [{ kind: "rule" }] }
      case "list":
        return this.list(block)
      case "html": {
        const text = stripTags(block.value)
        return {
          html: block.value,
          layout: text ? [{ kind: "paragraph", runs: [{ text }] }] : [],
        }
      }
    }
  }

  private async diagram(block: DiagramBlock): Promise<Rendered> {
    const imagePath = this.diagrams.get(block.id)
    if (imagePath) {
      const dataUrl = await this.dataUrl(imagePath)
      if (dataUrl) {
        const alt = `${block.diagramKind} diagram`
        return {
          html: `<figure class="diagram" data-diagram="${block.id}"><img src="${dataUrl}" alt="${alt}"></figure>`,
          layout: [{ kind: "image", path: imagePath, alt }],
        }
      }
      this.warn("diagram-unreadable", `Rendered image for ${block.id} could not be read`, block.id)
    }

    const message = diagramPlaceholder(block)
    return {
      html: `<div class="placeholder" data-diagram="${block.id}">${escapeHtml(message)}</div>`,
      layout: [{ kind: "placeholder", message }],
    }
  }

  private async table(block: Extract<Block, { kind: "table" }>): Promise<Rendered> {
    const [header = [], ...body] = block.rows
    const headerCells = await Promise.all(
      header.map(async (cell, i) => `<th${alignStyle(block.align[i])}>${await this.inlines(cell)}</th>`),
    )
    const bodyRows = await Promise.all(
      body.map(async (row) => {
        const cells = await Promise.all(
          row.map(async (cell, i) => `<td${alignStyle(block.align[i])}>${await this.inlines(cell)}</td>`),
        )
        return `<tr>${cells.join("")}</tr>`
      }),
    )
    const html = [
      "<table>",
      `<thead><tr>${headerCells.join("")}</tr></thead>`,
      `<tbody>${bodyRows.join("")}</tbody>`,
      "</table>",
    ].join("\n")

    return {
      html,
      layout: [
        {
          kind: "table",
          align: block.align,
          header: header.map((cell) => inlineText(cell)),
          rows: body.map((row) => row.map((cell) => inlineText(cell))),
        },
      ],
    }
  }

  private async list(block: Extract<Block, { kind: "list" }>): Promise<Rendered> {
    const items: string[] = []
    const layoutItems: { checked: boolean | null; children: LayoutBlock[] }[] = []
    for (const item of block.items) {
      const inner = await this.blocks(item.children)
      if (item.checked === null) {
        items.push(`<li>${inner.html}</li>`)
      } else {
        const checked = item.checked ? " checked" : ""
        items.push(`<li class="task"><input type="checkbox" disabled${checked}> ${inner.html}</li>`)
      }
      layoutItems.push({ checked: item.checked, children: inner.layout })
    }

    const open = block.ordered
      ? block.start === 1
        ? "<ol>"
        : `<ol start="${block.start}">`
      : "<ul>"
    const close = block.ordered ? "</ol>" : "</ul>"
    return {
      html: [open, ...items, close].join("\n"),
      layout: [{ kind: "list", ordered: block.ordered, start: block.start, items: layoutItems }],
    }
  }

  private async image(source: string, alt: string, title?: string): Promise<Rendered> {
    const label = alt ? `[image: ${alt}]` : "[image]"
    if (URL_SCHEME.test(source)) {
      return {
        html: `<p><img src="${escapeHtml(source)}" alt="${escapeHtml(alt)}"${titleAttr(title)}></p>`,
        layout: [{ kind: "paragraph", runs: [{ text: label, link: source }] }],
      }
    }

    const dataUrl = await this.dataUrl(source)
    if (!dataUrl) {
      this.warn("image-missing", `Image not found: ${source}`)
      const message = `Image not found: ${alt || source}`
      return {
        html: `<div class="placeholder">${escapeHtml(message)}</div>`,
        layout: [{ kind: "placeholder", message }],
      }
    }

    const paginatable = PAGINATABLE_IMAGES.has(extname(source).toLowerCase())
    return {
      html: `<p><img src="${dataUrl}" alt="${escapeHtml(alt)}"${titleAttr(title)}></p>`,
      layout: paginatable
        ? [{ kind: "image", path: source, alt }]
        : [{ kind: "paragraph", runs: [{ text: label, italic: true }] }],
    }
  }

  /**
   * Splits a paragraph at its placeable local images, so they are drawn like
   * standalone images between the surrounding text.
   */
  private async paragraphLayout(inlines: readonly Inline[]): Promise<LayoutBlock[]> {
    const layout: LayoutBlock[] = []
    let pending: TextRun[] = []
    const flush = (): void => {
      if (pending.some((run) => run.text.trim())) {
        layout.push({ kind: "paragraph", runs: pending })
      }
      pending = []
    }

    for (const piece of pieces(inlines, {})) {
      if (!("image" in piece)) {
        pending.push(piece)
      } else if (await this.dataUrl(piece.image)) {
        flush()
        layout.push({ kind: "image", path: piece.image, alt: piece.alt })
      } else {
        pending.push({ ...piece.style, text: inlineImageLabel(piece.alt) })
      }
    }
    flush()
    return layout
  }

  private async inlines(inlines: readonly Inline[]): Promise<string> {
    const parts: string[] = []
    for (const inline of inlines) {
      parts.push(await this.inline(inline))
    }
    return parts.join("")
  }

  private async inline(inline: Inline): Promise<string> {
    switch (inline.type) {
      case "text":
        return escapeHtml(inline.value)
      case "emphasis":
        return `<em>${await this.inlines(inline.children)}</em>`
      case "strong":
        return `<strong>${await this.inlines(inline.children)}</strong>`
      case "delete":
        return `<del>${await this.inlines(inline.children)}</del>`
      case "code":
        return `<code>${escapeHtml(inline.value)}</code>`
      case "break":
        return "<br>"
      case "html":
        return inline.value
      case "link":
        return `<a href="${escapeHtml(inline.target)}"${titleAttr(inline.title)}>${await this.inlines(inline.children)}</a>`
      case "image": {
        const src = URL_SCHEME.test(inline.source)
          ? escapeHtml(inline.source)
          : await this.dataUrl(inline.source)
        if (!src) {
          this.warn("image-missing", `Image not found: ${inline.source}`)
          return `<span class="placeholder">${escapeHtml(`Image not found: ${inline.alt || inline.source}`)}</span>`
        }
        return `<img src="${src}" alt="${escapeHtml(inline.alt)}"${titleAttr(inline.title)}>`
      }
    }
  }

  /**
   * Reads a local file as a data URL. Returns `null` when it cannot be read.
   */
  private async dataUrl(path: string): Promise<string | null> {
    const cached = this.dataUrls.get(path)
    if (cached !== undefined) {
      return cached
    }
    let dataUrl: string | null
    try {
      const bytes = await readFile(path)
      const mime = IMAGE_MIME_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream"
      dataUrl = `data:${mime};base64,${bytes.toString("base64")}`
    } catch (error) {
      logger.debug({ path, error: errorMessage(error) }, "Failed to read image")
      dataUrl = null
    }
    this.dataUrls.set(path, dataUrl)
    return dataUrl
  }

  private slug(text: string): string {
    const base = slugify(text)
    const seen = this.slugs.get(base) ?? 0
    this.slugs.set(base, seen + 1)
    return seen === 0 ? base : `${base}-${seen}`
  }

  private warn(code: string, message: string, blockId?: string): void {
    logger.warn({ code, blockId }, message)
    this.warnings.push(blockId ? { code, message, blockId } : { code, message })
  }
}

function inlineImageLabel(alt: string): string {
  return alt ? `[${alt}]` : "[image]"
}

/**
 * Flattens inline content into uniformly styled runs for the direct PDF layout,
 * leaving placeable local images as separate pieces.
 */
function pieces(inlines: readonly Inline[], style: RunStyle): RunPiece[] {
  return inlines.flatMap((inline): RunPiece[] => {
    switch (inline.type) {
      case "text":
        return [{ ...style, text: inline.value }]
      case "code":
        return [{ ...style, text: inline.value, code: true }]
      case "break":
        return [{ ...style, text: "\n" }]
      case "emphasis":
        return pieces(inline.children, { ...style, italic: true })
      case "strong":
        return pieces(inline.children, { ...style, bold: true })
      case "delete":
        return pieces(inline.children, { ...style, strike: true })
      case "link":
        return pieces(inline.children, { ...style, link: inline.target })
      case "image":
        if (!URL_SCHEME.test(inline.source) && PAGINATABLE_IMAGES.has(extname(inline.source).toLowerCase())) {
          return [{ image: inline.source, alt: inline.alt, style }]
        }
        return [{ ...style, text: inlineImageLabel(inline.alt) }]
      case "html":
        return []
    }
  })
}

/**
 * Renders normalized blocks into a {@link RenderedDocument}. Writes no files.
 */
export class DocumentRenderer {
  constructor(private readonly highlighter: CodeHighlighter) {}

  async render(
    blocks: readonly Block[],
    diagrams: RenderedDiagrams,
    options: RenderOptions,
  ): Promise<RenderOutcome> {
    const pass = new RenderPass(this.highlighter, diagrams)
    const body = await pass.blocks(blocks)
    const firstTitle = blocks.find((block) => block.kind === "heading" && block.level === 1)
    const title = firstTitle?.kind === "heading" && firstTitle.text ? firstTitle.text : options.fallbackTitle

    const html = wrapInHtmlDocument(body.html, {
      title,
      format: options.format,
      margin: options.margin,
    })
    logger.debug(
      { blocks: blocks.length, htmlLength: html.length, warnings: pass.warnings.length },
      "Document rendered",
    )
    return { document: { title, html, layout: body.layout }, warnings: pass.warnings }
  }
}
