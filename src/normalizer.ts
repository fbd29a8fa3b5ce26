/**
 * Markdown normalizer module.
 * Parses markdown (GFM) into the ordered block sequence the renderer walks,
 * pulling fenced diagram blocks out as diagram blocks with stable ids.
 */

import { isAbsolute, resolve } from "node:path"
import type {
  Code,
  Definition,
  Nodes,
  PhrasingContent,
  RootContent,
  Table,
} from "mdast"
import { fromMarkdown } from "mdast-util-from-markdown"
import { gfmFromMarkdown } from "mdast-util-gfm"
import { gfm } from "micromark-extension-gfm"
import { diagramKindFor } from "./diagrams.js"
import type { Block, ColumnAlign, DiagramBlock, Inline, SourceDocument } from "./types.js"

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})/
const FENCE_CLOSE = /^(`{3,}|~{3,})$/
const CONTAINER_PREFIX = /^[ \t>]*/
const URL_SCHEME = /^[a-z][a-z\d+.-]*:/i

/**
 * Returns the opening fence line of a fenced code block whose source never
 * closes it, or `null` for a closed fence or an indented code block.
 *
 * `raw` is the block's source from its opening fence to its end, including the
 * blockquote and list prefixes of continuation lines.
 */
export function unclosedFenceLine(raw: string): string | null {
  const lines = raw.split("\n")
  const opening = FENCE_OPEN.exec(lines[0])
  if (!opening) {
    return null
  }
  const marker = opening[1]
  if (lines.length > 1) {
    const last = lines[lines.length - 1].replace(CONTAINER_PREFIX, "").trimEnd()
    const closing = FENCE_CLOSE.exec(last)
    if (closing && closing[1][0] === marker[0] && closing[1].length >= marker.length) {
      return null
    }
  }
  return lines[0].trim()
}

/**
 * Flattens inline content to plain text.
 */
export function inlineText(inlines: readonly Inline[]): string {
  return inlines
    .map((inline) => {
      switch (inline.type) {
        case "text":
        case "code":
          return inline.value
        case "emphasis":
        case "strong":
        case "delete":
        case "link":
          return inlineText(inline.children)
        case "image":
          return inline.alt
        case "break":
          return " "
        case "html":
          return ""
      }
    })
    .join("")
}

/**
 * Returns every diagram block in document order, including nested ones.
 */
export function collectDiagrams(blocks: readonly Block[]): DiagramBlock[] {
  const diagrams: DiagramBlock[] = []
  for (const block of blocks) {
    if (block.kind === "diagram") {
      diagrams.push(block)
    } else if (block.kind === "blockquote") {
      diagrams.push(...collectDiagrams(block.children))
    } else if (block.kind === "list") {
      for (const item of block.items) {
        diagrams.push(...collectDiagrams(item.children))
      }
    }
  }
  return diagrams
}

function collectDefinitions(node: Nodes, definitions: Map<string, Definition>): void {
  if (node.type === "definition") {
    if (!definitions.has(node.identifier)) {
      definitions.set(node.identifier, node)
    }
    return
  }
  if ("children" in node) {
    for (const child of node.children) {
      collectDefinitions(child, definitions)
    }
  }
}

/**
 * Walks one mdast tree. Holds the diagram counter so ids follow document order.
 */
class BlockBuilder {
  private diagramCount = 0

  constructor(
    private readonly markdown: string,
    private readonly baseDir: string,
    private readonly definitions: ReadonlyMap<string, Definition>,
  ) {}

  blocks(nodes: readonly RootContent[]): Block[] {
    return nodes.flatMap((node) => this.block(node))
  }

  private block(node: RootContent): Block[] {
    switch (node.type) {
      case "heading": {
        const content = this.inlines(node.children)
        return [{ kind: "heading", level: node.depth, text: inlineText(content).trim(), content }]
      }
      case "paragraph":
        return [this.paragraph(this.inlines(node.children))]
      case "code": {
        const fenceLine = this.unclosedFence(node)
        if (fenceLine !== null) {
          return [plainTextParagraph(node.value ? `${fenceLine}\n${node.value}` : fenceLine)]
        }
        const language = node.lang ?? null
        const diagramKind = diagramKindFor(language)
        if (diagramKind) {
          const id = `diagram_${this.diagramCount++}`
          return [{ kind: "diagram", id, diagramKind, source: node.value }]
        }
        return [{ kind: "code", language, text: node.value }]
      }
      case "table":
        return [this.table(node)]
      case "blockquote":
        return [{ kind: "blockquote", children: this.blocks(node.children) }]
      case "thematicBreak":
        return [{ kind: "rule" }]
      case "list":
        return [
          {
            kind: "list",
            ordered: node.ordered ?? false,
            start: node.start ?? 1,
            items: node.children.map((item) => ({
              checked: item.checked ?? null,
              children: this.blocks(item.children),
            })),
          },
        ]
      case "html":
        return [{ kind: "html", value: node.value }]
      case "footnoteDefinition": {
        const children = this.blocks(node.children)
        const label: Block = {
          kind: "paragraph",
          content: [{ type: "text", value: `[^${node.label ?? node.identifier}]:` }],
        }
        return [label, ...children]
      }
      default:
        return []
    }
  }

  /**
   * CommonMark runs a fence that is never closed to the end of its container as
   * code. Such a block is kept as plain text instead.
   */
  private unclosedFence(node: Code): string | null {
    const start = node.position?.start.offset
    const end = node.position?.end.offset
    if (start === undefined || end === undefined) {
      return null
    }
    const raw = this.markdown.slice(start, end)
    // An indented block's first source line is also the first line of its value.
    if (node.value && raw.split("\n")[0].trim() === node.value.split("\n")[0].trim()) {
      return null
    }
    return unclosedFenceLine(raw)
  }

  /**
   * A paragraph holding exactly one image, or one link to plain text, is promoted to a block of its own.
   */
  private paragraph(content: Inline[]): Block {
    const meaningful = content.filter((inline) => !(inline.type === "text" && !inline.value.trim()))
    if (meaningful.length === 1) {
      const only = meaningful[0]
      if (only.type === "image") {
        return { kind: "image", source: only.source, alt: only.alt, title: only.title }
      }
      if (only.type === "link" && only.children.every((child) => child.type === "text")) {
        return { kind: "link", target: only.target, text: inlineText(only.children), title: only.title }
      }
    }
    return { kind: "paragraph", content }
  }

  /**
   * Every row is padded with empty cells or truncated to the header's width.
   */
  private table(node: Table): Block {
    const header = node.children[0]
    const width = header ? header.children.length : 0
    const align: ColumnAlign[] = Array.from({ length: width }, (_, i) => node.align?.[i] ?? null)
    const rows = node.children.map((row) => {
      const cells = row.children.slice(0, width).map((cell) => this.inlines(cell.children))
      while (cells.length < width) {
        cells.push([])
      }
      return cells
    })
    return { kind: "table", align, rows }
  }

  private inlines(nodes: readonly PhrasingContent[]): Inline[] {
    return nodes.flatMap((node) => this.inline(node))
  }

  private inline(node: PhrasingContent): Inline[] {
    switch (node.type) {
      case "text":
        return [{ type: "text", value: node.value }]
      case "emphasis":
        return [{ type: "emphasis", children: this.inlines(node.children) }]
      case "strong":
        return [{ type: "strong", children: this.inlines(node.children) }]
      case "delete":
        return [{ type: "delete", children: this.inlines(node.children) }]
      case "inlineCode":
        return [{ type: "code", value: node.value }]
      case "break":
        return [{ type: "break" }]
      case "html":
        return [{ type: "html", value: node.value }]
      case "link":
        return [
          {
            type: "link",
            target: node.url,
            title: node.title ?? undefined,
            children: this.inlines(node.children),
          },
        ]
      case "image":
        return [
          {
            type: "image",
            source: this.resolveAsset(node.url),
            alt: node.alt ?? "",
            title: node.title ?? undefined,
          },
        ]
      case "linkReference": {
        const definition = this.definitions.get(node.identifier)
        const children = this.inlines(node.children)
        if (!definition) {
          return children
        }
        return [
          {
            type: "link",
            target: definition.url,
            title: definition.title ?? undefined,
            children,
          },
        ]
      }
      case "imageReference": {
        const definition = this.definitions.get(node.identifier)
        const alt = node.alt ?? ""
        if (!definition) {
          return [{ type: "text", value: alt }]
        }
        return [
          {
            type: "image",
            source: this.resolveAsset(definition.url),
            alt,
            title: definition.title ?? undefined,
          },
        ]
      }
      case "footnoteReference":
        return [{ type: "text", value: `[^${node.label ?? node.identifier}]` }]
      default:
        return []
    }
  }

  /**
   * Resolves a relative image path against the document's directory. URLs with a
   * scheme, fragments and absolute paths are returned unchanged.
   */
  private resolveAsset(url: string): string {
    if (!url || URL_SCHEME.test(url) || url.startsWith("#") || isAbsolute(url)) {
      return url
    }
    return resolve(this.baseDir, url)
  }
}

/**
 * Turns the lines of an unterminated fence into one plain-text paragraph.
 */
function plainTextParagraph(text: string): Block {
  const content: Inline[] = []
  text
    .replace(/\s+$/, "")
    .split("\n")
    .forEach((line, index) => {
      if (index > 0) {
        content.push({ type: "break" })
      }
      content.push({ type: "text", value: line })
    })
  return { kind: "paragraph", content }
}

/**
 * Parses a markdown document into an ordered sequence of blocks.
 *
 * Never throws on malformed markdown. Output is deterministic for identical input.
 */
export function normalizeMarkdown(source: SourceDocument): Block[] {
  const markdown = source.markdown.replace(/\r\n?/g, "\n")
  const tree = fromMarkdown(markdown, {
    extensions: [gfm()],
    mdastExtensions: [gfmFromMarkdown()],
  })

  const definitions = new Map<string, Definition>()
  collectDefinitions(tree, definitions)

  return new BlockBuilder(markdown, source.baseDir, definitions).blocks(tree.children)
}
