/**
 * Shared document model types.
 *
 * Blocks are produced once by the normalizer and never mutated afterwards.
 */

export type DiagramKind = "mermaid" | "plantuml"

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

export type ColumnAlign = "left" | "right" | "center" | null

/**
 * Raw markdown plus the directory relative references resolve against.
 */
export interface SourceDocument {
  readonly markdown: string
  readonly path: string
  readonly baseDir: string
}

export type Inline =
  | { readonly type: "text"; readonly value: string }
  | { readonly type: "emphasis"; readonly children: readonly Inline[] }
  | { readonly type: "strong"; readonly children: readonly Inline[] }
  | { readonly type: "delete"; readonly children: readonly Inline[] }
  | { readonly type: "code"; readonly value: string }
  | {
      readonly type: "link"
      readonly target: string
      readonly title?: string
      readonly children: readonly Inline[]
    }
  | { readonly type: "image"; readonly source: string; readonly alt: string; readonly title?: string }
  | { readonly type: "break" }
  | { readonly type: "html"; readonly value: string }

export interface ListItem {
  /** `null` for a plain item, a boolean for a task list item. */
  readonly checked: boolean | null
  readonly children: readonly Block[]
}

export type Block =
  | {
      readonly kind: "heading"
      readonly level: HeadingLevel
      readonly text: string
      readonly content: readonly Inline[]
    }
  | { readonly kind: "paragraph"; readonly content: readonly Inline[] }
  | { readonly kind: "code"; readonly language: string | null; readonly text: string }
  | {
      readonly kind: "diagram"
      readonly id: string
      readonly diagramKind: DiagramKind
      readonly source: string
    }
  | {
      readonly kind: "table"
      readonly align: readonly ColumnAlign[]
      /** `rows[0]` is the header row; every row has `align.length` cells. */
      readonly rows: readonly (readonly (readonly Inline[])[])[]
    }
  | { readonly kind: "image"; readonly source: string; readonly alt: string; readonly title?: string }
  | { readonly kind: "link"; readonly target: string; readonly text: string; readonly title?: string }
  | { readonly kind: "blockquote"; readonly children: readonly Block[] }
  | { readonly kind: "rule" }
  | {
      readonly kind: "list"
      readonly ordered: boolean
      readonly start: number
      readonly items: readonly ListItem[]
    }
  | { readonly kind: "html"; readonly value: string }

export type DiagramBlock = Extract<Block, { kind: "diagram" }>

/**
 * Diagram id to the PNG rendered for it inside the working area.
 */
export type RenderedDiagrams = ReadonlyMap<string, string>

/**
 * A run of text with uniform styling, used by the direct PDF layout.
 */
export interface TextRun {
  readonly text: string
  readonly bold?: boolean
  readonly italic?: boolean
  readonly code?: boolean
  readonly strike?: boolean
  readonly link?: string
}

export interface CodeToken {
  readonly text: string
  readonly color?: string
}

export type LayoutBlock =
  | { readonly kind: "heading"; readonly level: HeadingLevel; readonly text: string }
  | { readonly kind: "paragraph"; readonly runs: readonly TextRun[] }
  | { readonly kind: "code"; readonly lines: readonly (readonly CodeToken[])[] }
  | { readonly kind: "image"; readonly path: string; readonly alt: string }
  | { readonly kind: "placeholder"; readonly message: string }
  | {
      readonly kind: "table"
      readonly align: readonly ColumnAlign[]
      readonly header: readonly string[]
      readonly rows: readonly (readonly string[])[]
    }
  | {
      readonly kind: "list"
      readonly ordered: boolean
      readonly start: number
      readonly items: readonly {
        readonly checked: boolean | null
        readonly children: readonly LayoutBlock[]
      }[]
    }
  | { readonly kind: "blockquote"; readonly children: readonly LayoutBlock[] }
  | { readonly kind: "rule" }

/**
 * Output of the document renderer, handed to an output backend.
 */
export interface RenderedDocument {
  readonly title: string
  readonly html: string
  readonly layout: readonly LayoutBlock[]
}

export interface ConversionWarning {
  readonly code: string
  readonly message: string
  readonly blockId?: string
}

export interface ConversionResult {
  readonly outputPath: string
  readonly htmlPath?: string
  readonly warnings: readonly ConversionWarning[]
  readonly diagrams: { readonly total: number; readonly rendered: number }
}
