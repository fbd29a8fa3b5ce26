import { access, readFile, readdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { type OutputBackend, writeAtomically } from "./backend.js"
import { type ConfigOverrides, DEFAULT_CONFIG, mergeConfig } from "./config.js"
import {
  type ConverterDependencies,
  defaultOutputPath,
  MarkdownToPdfConverter,
} from "./converter.js"
import {
  BackendError,
  BackendTimeoutError,
  DiagramFailuresError,
  DiagramSyntaxError,
  DiagramTimeoutError,
  DocumentRenderError,
  InputNotFoundError,
} from "./errors.js"
import { CodeHighlighter, type HighlightedCode } from "./highlighter.js"
import { withTimeout } from "./process.js"
import { adapterMap, FakeDiagramAdapter, ONE_PIXEL_PNG, useTempDirs } from "./test-support.js"

const TITLE_AND_DIAGRAM = "# Title\n\n```mermaid\ngraph TD\n  A-->B\n```\n"
const MISSING_MMDC = "/nonexistent/mmdc"

class BrokenHighlighter extends CodeHighlighter {
  override async highlight(): Promise<HighlightedCode> {
    throw new Error("tokenizer crashed")
  }
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  )
}

describe("MarkdownToPdfConverter", () => {
  const tempDir = useTempDirs()
  const converters: MarkdownToPdfConverter[] = []
  let docsDir: string
  let tempRoot: string

  afterEach(() => {
    for (const converter of converters.splice(0)) {
      converter.dispose()
    }
  })

  function createConverter(overrides: ConfigOverrides = {}, dependencies: ConverterDependencies = {}) {
    const config = mergeConfig(mergeConfig(DEFAULT_CONFIG, { backend: "pdfkit", tempRoot }), overrides)
    const converter = new MarkdownToPdfConverter(config, dependencies)
    converters.push(converter)
    return converter
  }

  async function writeMarkdown(markdown: string, name = "notes.md"): Promise<string> {
    docsDir = await tempDir()
    tempRoot = await tempDir()
    const path = join(docsDir, name)
    await writeFile(path, markdown)
    return path
  }

  async function readPdfHeader(path: string): Promise<string> {
    return (await readFile(path)).subarray(0, 5).toString("latin1")
  }

  it("converts a document without diagrams with no warnings", async () => {
    const input = await writeMarkdown("# Notes\n\nPlain *text* with `code`.\n\n```ts\nconst x = 1\n```\n")
    const converter = createConverter()

    const result = await converter.convert(input)

    expect(result).toEqual({
      outputPath: join(docsDir, "notes.pdf"),
      warnings: [],
      diagrams: { total: 0, rendered: 0 },
    })
    expect(await readPdfHeader(result.outputPath)).toBe("%PDF-")
    expect(converter.history).toEqual([
      "Init",
      "Validated",
      "Normalized",
      "DiagramsRendered",
      "DocumentRendered",
      "PdfWritten",
      "CleanedUp",
    ])
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("writes to an explicit output path", async () => {
    const input = await writeMarkdown("text")
    const output = join(await tempDir(), "out", "report.pdf")

    const result = await createConverter().convert(input, output)

    expect(result.outputPath).toBe(output)
    expect(await readPdfHeader(output)).toBe("%PDF-")
  })

  it("embeds diagrams rendered by the adapter", async () => {
    const input = await writeMarkdown(TITLE_AND_DIAGRAM)
    const mermaid = new FakeDiagramAdapter("mermaid")
    const converter = createConverter(
      { output: { html: true } },
      { adapters: adapterMap(mermaid) },
    )

    const result = await converter.convert(input)

    expect(mermaid.sources).toEqual(["graph TD\n  A-->B"])
    expect(result.warnings).toEqual([])
    expect(result.diagrams).toEqual({ total: 1, rendered: 1 })
    expect(result.htmlPath).toBe(join(docsDir, "notes.html"))
    const html = await readFile(join(docsDir, "notes.html"), "utf-8")
    expect(html).toContain("<title>Title</title>")
    expect(html).toContain(
      `<figure class="diagram" data-diagram="diagram_0"><img src="data:image/png;base64,${ONE_PIXEL_PNG.toString("base64")}" alt="mermaid diagram"></figure>`,
    )
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("still writes the PDF when the diagram tool is absent", async () => {
    const input = await writeMarkdown(TITLE_AND_DIAGRAM)
    const converter = createConverter({
      diagrams: { mermaid: { command: MISSING_MMDC } },
      output: { html: true },
    })

    const result = await converter.convert(input)

    expect(result.warnings).toEqual([
      {
        code: "renderer-unavailable",
        message: `diagram_0: mermaid renderer "${MISSING_MMDC}" is not available`,
        blockId: "diagram_0",
      },
    ])
    expect(result.diagrams).toEqual({ total: 1, rendered: 0 })
    expect(await readPdfHeader(result.outputPath)).toBe("%PDF-")
    const html = await readFile(join(docsDir, "notes.html"), "utf-8")
    expect(html).toContain(
      '<div class="placeholder" data-diagram="diagram_0">Diagram diagram_0 (mermaid) could not be rendered</div>',
    )
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("records a diagram syntax error as a warning and keeps going", async () => {
    const input = await writeMarkdown(`${TITLE_AND_DIAGRAM}\n\`\`\`mermaid\ngraph LR\n  C-->D\n\`\`\`\n`)
    const broken = new FakeDiagramAdapter("mermaid", new DiagramSyntaxError("mermaid", "Parse error on line 2"))
    const converter = createConverter({}, { adapters: adapterMap(broken) })

    const result = await converter.convert(input)

    expect(broken.sources).toEqual(["graph TD\n  A-->B", "graph LR\n  C-->D"])
    expect(result.warnings.map((warning) => warning.message)).toEqual([
      "diagram_0: mermaid diagram failed to render: Parse error on line 2",
      "diagram_1: mermaid diagram failed to render: Parse error on line 2",
    ])
    expect(result.warnings.every((warning) => warning.code === "diagram-syntax")).toBe(true)
  })

  it("records a diagram timeout as a warning and still writes the PDF", async () => {
    const input = await writeMarkdown(TITLE_AND_DIAGRAM)
    const slow = new FakeDiagramAdapter("mermaid", new DiagramTimeoutError("mermaid", 50))
    const converter = createConverter({}, { adapters: adapterMap(slow) })

    const result = await converter.convert(input)

    expect(result.warnings).toEqual([
      {
        code: "diagram-timeout",
        message: "diagram_0: mermaid renderer timed out after 50ms",
        blockId: "diagram_0",
      },
    ])
    expect(result.diagrams).toEqual({ total: 1, rendered: 0 })
    expect(await readPdfHeader(result.outputPath)).toBe("%PDF-")
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("warns about diagrams of a disabled kind", async () => {
    const input = await writeMarkdown("```plantuml\n@startuml\nA -> B\n@enduml\n```\n")
    const converter = createConverter({ diagrams: { plantuml: { enabled: false } } })

    const result = await converter.convert(input)

    expect(result.warnings).toEqual([
      {
        code: "diagram-disabled",
        message: "diagram_0: plantuml diagrams are disabled",
        blockId: "diagram_0",
      },
    ])
  })

  it("fails in strict mode after writing the PDF", async () => {
    const input = await writeMarkdown(TITLE_AND_DIAGRAM)
    const converter = createConverter({
      diagrams: { strict: true, mermaid: { command: MISSING_MMDC } },
    })

    const error = await converter.convert(input).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(DiagramFailuresError)
    expect(error).toMatchObject({ message: "1 diagram(s) failed to render", failures: 1 })
    expect(await readPdfHeader(join(docsDir, "notes.pdf"))).toBe("%PDF-")
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("rejects a missing input and cleans up", async () => {
    await writeMarkdown("unused")
    const input = join(docsDir, "missing.md")
    const converter = createConverter()

    await expect(converter.convert(input)).rejects.toThrow(InputNotFoundError)
    expect(converter.history).toEqual(["Init", "Error", "CleanedUp"])
    expect(await readdir(tempRoot)).toEqual([])
    expect(await exists(join(docsDir, "missing.pdf"))).toBe(false)
  })

  it("rejects a directory as input", async () => {
    await writeMarkdown("unused")
    await expect(createConverter().convert(docsDir)).rejects.toThrow(InputNotFoundError)
  })

  it("wraps backend failures and leaves no output", async () => {
    const input = await writeMarkdown("# Broken")
    const backend: OutputBackend = {
      name: "pdfkit",
      write: () => Promise.reject(new Error("boom")),
    }
    const converter = createConverter({}, { backend })

    const error = await converter.convert(input).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(BackendError)
    expect(error).toMatchObject({ message: "PDF backend failed: boom", fatal: true })
    expect(await exists(join(docsDir, "notes.pdf"))).toBe(false)
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("removes the partial PDF when the backend times out", async () => {
    const input = await writeMarkdown("# Slow")
    const backend: OutputBackend = {
      name: "chrome",
      write: (_document, outputPath) =>
        writeAtomically(outputPath, async (tempPath) => {
          await writeFile(tempPath, "%PDF")
          await withTimeout(new Promise<void>(() => {}), 50, () => new BackendTimeoutError(50))
        }),
    }
    const converter = createConverter({}, { backend })

    await expect(converter.convert(input)).rejects.toThrow(BackendTimeoutError)
    expect(converter.history).toEqual([
      "Init",
      "Validated",
      "Normalized",
      "DiagramsRendered",
      "DocumentRendered",
      "Error",
      "CleanedUp",
    ])
    expect(await readdir(docsDir)).toEqual(["notes.md"])
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("fails with a document render error when highlighting throws", async () => {
    const input = await writeMarkdown("# Code\n\n```ts\nconst x = 1\n```\n")
    const converter = createConverter({}, { highlighter: new BrokenHighlighter() })

    const error = await converter.convert(input).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(DocumentRenderError)
    expect(error).toMatchObject({ message: "Failed to render document: tokenizer crashed", fatal: true })
    expect(converter.history).toEqual([
      "Init",
      "Validated",
      "Normalized",
      "DiagramsRendered",
      "Error",
      "CleanedUp",
    ])
    expect(await exists(join(docsDir, "notes.pdf"))).toBe(false)
    expect(await readdir(tempRoot)).toEqual([])
  })

  it("keeps the tail of an unterminated fence as text", async () => {
    const input = await writeMarkdown("# Title\n\n```mermaid\ngraph TD\n  A-->B\n")
    const converter = createConverter({ output: { html: true } })

    const result = await converter.convert(input)

    expect(result.diagrams).toEqual({ total: 0, rendered: 0 })
    const html = await readFile(join(docsDir, "notes.html"), "utf-8")
    expect(html).toContain("<p>```mermaid<br>graph TD<br>  A--&gt;B</p>")
  })

  it("embeds local images referenced relative to the document", async () => {
    const input = await writeMarkdown("![pixel](pixel.png)\n")
    await writeFile(join(docsDir, "pixel.png"), ONE_PIXEL_PNG)

    const result = await createConverter().convert(input)

    expect(result.warnings).toEqual([])
    expect(await readPdfHeader(result.outputPath)).toBe("%PDF-")
  })

  it("produces byte-identical HTML for identical input", async () => {
    const input = await writeMarkdown(`${TITLE_AND_DIAGRAM}\n| a | b |\n|---|---|\n| 1 |\n`)
    const adapters = adapterMap(new FakeDiagramAdapter("mermaid"))
    const first = join(docsDir, "first.html")
    const second = join(docsDir, "second.html")

    await createConverter({ output: { html: true, htmlPath: first } }, { adapters }).convert(input)
    await createConverter({ output: { html: true, htmlPath: second } }, { adapters }).convert(input)

    expect(await readFile(second, "utf-8")).toBe(await readFile(first, "utf-8"))
  })
})

describe("defaultOutputPath", () => {
  it("replaces a markdown extension", () => {
    expect(defaultOutputPath("docs/notes.md", ".pdf")).toBe("docs/notes.pdf")
    expect(defaultOutputPath("docs/NOTES.Markdown", ".html")).toBe("docs/NOTES.html")
  })

  it("appends to other names", () => {
    expect(defaultOutputPath("README", ".pdf")).toBe("README.pdf")
    expect(defaultOutputPath("notes.txt", ".pdf")).toBe("notes.txt.pdf")
  })
})
