/**
 * PDF backend that lays the document out directly with pdfkit, without a browser.
 * Uses the standard PDF fonts (Helvetica, Courier).
 */

import { createWriteStream } from "node:fs"
import { readFile } from "node:fs/promises"
import PDFDocument from "pdfkit"
import sharp from "sharp"
import { type OutputBackend, writeAtomically } from "./backend.js"
import type { PageFormat } from "./config.js"
import { BackendTimeoutError, errorMessage } from "./errors.js"
import { logger } from "./logger.js"
import { withTimeout } from "./process.js"
import type {
  CodeToken,
  HeadingLevel,
  LayoutBlock,
  RenderedDocument,
  TextRun,
} from "./types.js"

const FONT = {
  regular: "Helvetica",
  bold: "Helvetica-Bold",
  italic: "Helvetica-Oblique",
  boldItalic: "Helvetica-BoldOblique",
  mono: "Courier",
  monoBold: "Courier-Bold",
}

const HEADING_SIZES: Record<HeadingLevel, number> = { 1: 22, 2: 18, 3: 15, 4: 13, 5: 12, 6: 11 }
const BODY_SIZE = 11
const CODE_SIZE = 9
const TABLE_SIZE = 10
const INDENT = 20
const PADDING = 6

const COLOR = {
  text: "#24292e",
  muted: "#6a737d",
  link: "#0366d6",
  border: "#dfe2e5",
  headerFill: "#f6f8fa",
  codeFill: "#f6f8fa",
  placeholderFill: "#ffeef0",
  placeholderBorder: "#cb2431",
  placeholderText: "#86181d",
}

export interface PdfKitBackendOptions {
  format: PageFormat
  margin: number
  timeoutMs: number
}

export interface Size {
  width: number
  height: number
}

/**
 * Scales an image down to fit the content box, preserving its aspect ratio.
 * Images already narrower than `maxWidth` keep their size unless too tall.
 */
export function fitImage(natural: Size, maxWidth: number, maxHeight: number): Size {
  let scale = Math.min(1, maxWidth / natural.width)
  if (natural.height * scale > maxHeight) {
    scale = maxHeight / natural.height
  }
  return { width: natural.width * scale, height: natural.height * scale }
}

interface LoadedImage {
  data: Buffer
  size: Size
}

/** Image bytes and dimensions by path; `null` for images that could not be read. */
type ImageTable = ReadonlyMap<string, LoadedImage | null>

function imagePaths(blocks: readonly LayoutBlock[]): string[] {
  return blocks.flatMap((block) => {
    switch (block.kind) {
      case "image":
        return [block.path]
      case "blockquote":
        return imagePaths(block.children)
      case "list":
        return block.items.flatMap((item) => imagePaths(item.children))
      default:
        return []
    }
  })
}

/**
 * Reads every image the layout places and measures it with sharp.
 */
async function loadImages(blocks: readonly LayoutBlock[]): Promise<ImageTable> {
  const images = new Map<string, LoadedImage | null>()
  for (const path of imagePaths(blocks)) {
    if (images.has(path)) {
      continue
    }
    try {
      const data = await readFile(path)
      const { width, height } = await sharp(data).metadata()
      if (!width || !height) {
        throw new Error("unknown image dimensions")
      }
      images.set(path, { data, size: { width, height } })
    } catch (error) {
      logger.warn({ path, error: errorMessage(error) }, "Failed to embed image")
      images.set(path, null)
    }
  }
  return images
}

function fontFor(run: TextRun): string {
  if (run.code) {
    return run.bold ? FONT.monoBold : FONT.mono
  }
  if (run.bold && run.italic) {
    return FONT.boldItalic
  }
  if (run.bold) {
    return FONT.bold
  }
  return run.italic ? FONT.italic : FONT.regular
}

/**
 * Draws layout blocks onto a pdfkit document, adding pages as content overflows.
 */
class PageWriter {
  private pageNumber = 1
  private textColor = COLOR.text

  constructor(
    private readonly doc: PDFKit.PDFDocument,
    private readonly margin: number,
    private readonly images: ImageTable,
  ) {
    doc.on("pageAdded", () => {
      this.pageNumber++
    })
  }

  get left(): number {
    return this.margin
  }

  get contentWidth(): number {
    return this.doc.page.width - 2 * this.margin
  }

  private get bottom(): number {
    return this.doc.page.height - this.margin
  }

  private get contentHeight(): number {
    return this.doc.page.height - 2 * this.margin
  }

  private ensureSpace(height: number): void {
    if (this.doc.y + height > this.bottom && this.doc.y > this.margin) {
      this.doc.addPage()
    }
  }

  private finish(x: number, y: number, gap = 0.5): void {
    this.doc.x = x
    this.doc.y = y
    this.doc.moveDown(gap)
  }

  blocks(blocks: readonly LayoutBlock[], x: number, width: number): void {
    for (const block of blocks) {
      this.block(block, x, width)
    }
  }

  private block(block: LayoutBlock, x: number, width: number): void {
    switch (block.kind) {
      case "heading":
        return this.heading(block.level, block.text, x, width)
      case "paragraph":
        return this.paragraph(block.runs, x, width)
      case "code":
        return this.code(block.lines, x, width)
      case "image":
        return this.image(block.path, block.alt, x, width)
      case "placeholder":
        return this.placeholder(block.message, x, width)
      case "table":
        return this.table(block, x, width)
      case "list":
        return this.list(block, x, width)
      case "blockquote":
        return this.blockquote(block.children, x, width)
      case "rule":
        return this.rule(x, width)
    }
  }

  private heading(level: HeadingLevel, text: string, x: number, width: number): void {
    const { doc } = this
    doc.moveDown(0.6)
    doc.font(FONT.bold).fontSize(HEADING_SIZES[level])
    this.ensureSpace(doc.currentLineHeight(true) * 2)
    doc.fillColor(COLOR.text).text(text, x, doc.y, { width })
    if (level <= 2) {
      const y = doc.y + 2
      doc.moveTo(x, y).lineTo(x + width, y).lineWidth(0.5).strokeColor(COLOR.border).stroke()
      this.finish(x, y + 4, 0.3)
    } else {
      this.finish(x, doc.y, 0.3)
    }
  }

  private paragraph(runs: readonly TextRun[], x: number, width: number): void {
    const { doc } = this
    const visible = runs.filter((run) => run.text.length > 0)
    if (visible.length === 0) {
      return
    }
    doc.font(FONT.regular).fontSize(BODY_SIZE)
    this.ensureSpace(doc.currentLineHeight(true))

    visible.forEach((run, index) => {
      doc
        .font(fontFor(run))
        .fontSize(run.code ? CODE_SIZE + 1 : BODY_SIZE)
        .fillColor(run.link ? COLOR.link : this.textColor)
      const options = {
        width,
        continued: index < visible.length - 1,
        underline: Boolean(run.link),
        strike: Boolean(run.strike),
        ...(run.link ? { link: run.link } : {}),
      }
      if (index === 0) {
        doc.text(run.text, x, doc.y, options)
      } else {
        doc.text(run.text, options)
      }
    })
    this.finish(x, doc.y)
  }

  private code(lines: readonly (readonly CodeToken[])[], x: number, width: number): void {
    const { doc } = this
    doc.font(FONT.mono).fontSize(CODE_SIZE)
    const lineHeight = doc.currentLineHeight(true) + 1
    const band = (top: number, height: number) => {
      doc.rect(x, top, width, height).fill(COLOR.codeFill)
    }

    this.ensureSpace(PADDING + lineHeight)
    let y = doc.y
    band(y, PADDING)
    y += PADDING

    const nextLine = () => {
      if (y + lineHeight > this.bottom) {
        doc.addPage()
        y = doc.y
      }
      band(y, lineHeight)
    }

    for (const line of lines) {
      nextLine()
      let cx = x + PADDING
      for (const token of line) {
        if (!token.text) {
          continue
        }
        const tokenWidth = doc.widthOfString(token.text)
        if (cx + tokenWidth > x + width - PADDING && cx > x + PADDING) {
          y += lineHeight
          cx = x + PADDING
          nextLine()
        }
        doc.fillColor(token.color ?? COLOR.text).text(token.text, cx, y, { lineBreak: false })
        cx += tokenWidth
      }
      y += lineHeight
    }

    band(y, PADDING)
    this.finish(x, y + PADDING)
  }

  private image(path: string, alt: string, x: number, width: number): void {
    const { doc } = this
    const loaded = this.images.get(path)
    if (!loaded) {
      this.placeholder(`Image could not be embedded: ${alt || path}`, x, width)
      return
    }

    const size = fitImage(loaded.size, width, this.contentHeight)
    this.ensureSpace(size.height)
    const y = doc.y
    doc.image(loaded.data, x + (width - size.width) / 2, y, { width: size.width, height: size.height })
    this.finish(x, y + size.height)
  }

  private placeholder(message: string, x: number, width: number): void {
    const { doc } = this
    doc.font(FONT.italic).fontSize(BODY_SIZE)
    const textWidth = width - 2 * PADDING
    const height = doc.heightOfString(message, { width: textWidth }) + 2 * PADDING
    this.ensureSpace(height)
    const y = doc.y
    doc
      .rect(x, y, width, height)
      .lineWidth(0.75)
      .fillAndStroke(COLOR.placeholderFill, COLOR.placeholderBorder)
    doc.fillColor(COLOR.placeholderText).text(message, x + PADDING, y + PADDING, { width: textWidth })
    this.finish(x, y + height)
  }

  private table(
    block: Extract<LayoutBlock, { kind: "table" }>,
    x: number,
    width: number,
  ): void {
    const { doc } = this
    const columns = block.header.length
    if (columns === 0) {
      return
    }
    const columnWidth = width / columns
    const cellWidth = columnWidth - 2 * PADDING

    const drawRow = (cells: readonly string[], header: boolean) => {
      const font = header ? FONT.bold : FONT.regular
      doc.font(font).fontSize(TABLE_SIZE)
      const textHeight = Math.max(
        doc.currentLineHeight(),
        ...cells.map((cell) => doc.heightOfString(cell || " ", { width: cellWidth })),
      )
      const height = textHeight + 2 * PADDING
      this.ensureSpace(height)
      const y = doc.y

      cells.forEach((cell, i) => {
        const cx = x + i * columnWidth
        if (header) {
          doc.rect(cx, y, columnWidth, height).fill(COLOR.headerFill)
        }
        doc.rect(cx, y, columnWidth, height).lineWidth(0.5).strokeColor(COLOR.border).stroke()
        doc
          .font(font)
          .fontSize(TABLE_SIZE)
          .fillColor(COLOR.text)
          .text(cell, cx + PADDING, y + PADDING, {
            width: cellWidth,
            align: block.align[i] ?? "left",
          })
      })
      doc.x = x
      doc.y = y + height
    }

    drawRow(block.header, true)
    for (const row of block.rows) {
      drawRow(row, false)
    }
    this.finish(x, doc.y)
  }

  private list(block: Extract<LayoutBlock, { kind: "list" }>, x: number, width: number): void {
    const { doc } = this
    block.items.forEach((item, index) => {
      const marker =
        item.checked === null
          ? block.ordered
            ? `${block.start + index}.`
            : "•"
          : item.checked
            ? "[x]"
            : "[ ]"
      doc.font(FONT.regular).fontSize(BODY_SIZE)
      const lineHeight = doc.currentLineHeight(true)
      this.ensureSpace(lineHeight)
      const y = doc.y
      doc.fillColor(COLOR.text).text(marker, x, y, { width: INDENT, lineBreak: false })
      doc.x = x + INDENT
      doc.y = y
      if (item.children.length === 0) {
        doc.y = y + lineHeight
      }
      this.blocks(item.children, x + INDENT, width - INDENT)
    })
    this.finish(x, doc.y, 0.2)
  }

  private blockquote(children: readonly LayoutBlock[], x: number, width: number): void {
    const { doc } = this
    const startY = doc.y
    const startPage = this.pageNumber
    const previousColor = this.textColor
    this.textColor = COLOR.muted
    this.blocks(children, x + 12, width - 12)
    this.textColor = previousColor
    if (this.pageNumber === startPage) {
      doc.rect(x, startY, 3, doc.y - startY).fill(COLOR.border)
    }
    this.finish(x, doc.y, 0.2)
  }

  private rule(x: number, width: number): void {
    const { doc } = this
    doc.moveDown(0.3)
    const y = doc.y
    doc.moveTo(x, y).lineTo(x + width, y).lineWidth(1).strokeColor(COLOR.border).stroke()
    this.finish(x, y + 8)
  }
}

/**
 * Writes the layout of `document` to `path` as a PDF.
 */
export async function paginate(
  document: RenderedDocument,
  path: string,
  options: Pick<PdfKitBackendOptions, "format" | "margin">,
): Promise<void> {
  const images = await loadImages(document.layout)
  return new Promise<void>((resolve, reject) => {
    const doc = new PDFDocument({
      size: options.format,
      margin: options.margin,
      info: { Title: document.title, Creator: "md2pdf" },
    })
    const stream = createWriteStream(path)
    stream.on("finish", () => resolve())
    stream.on("error", reject)
    doc.on("error", reject)
    doc.pipe(stream)

    try {
      const writer = new PageWriter(doc, options.margin, images)
      writer.blocks(document.layout, writer.left, writer.contentWidth)
      doc.end()
    } catch (error) {
      stream.destroy()
      reject(error)
    }
  })
}

export class PdfKitBackend implements OutputBackend {
  readonly name = "pdfkit" as const

  constructor(private readonly options: PdfKitBackendOptions) {}

  async write(document: RenderedDocument, outputPath: string): Promise<void> {
    const { timeoutMs } = this.options
    await writeAtomically(outputPath, (tempPath) =>
      withTimeout(
        paginate(document, tempPath, this.options),
        timeoutMs,
        () => new BackendTimeoutError(timeoutMs),
      ),
    )
    logger.debug({ outputPath, blocks: document.layout.length }, "PDF written with pdfkit")
  }
}
