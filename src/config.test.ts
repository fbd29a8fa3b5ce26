import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { DEFAULT_CONFIG, loadConfig, mergeConfig, parseConfigOverrides } from "./config.js"
import { ConfigError } from "./errors.js"
import { useTempDirs } from "./test-support.js"

describe("mergeConfig", () => {
  it("overrides only the keys that are given", () => {
    const config = mergeConfig(DEFAULT_CONFIG, {
      backend: "pdfkit",
      page: { margin: 36 },
      diagrams: { mermaid: { command: "/opt/mmdc" } },
    })

    expect(config.backend).toBe("pdfkit")
    expect(config.page).toEqual({ format: "A4", margin: 36 })
    expect(config.diagrams.mermaid).toEqual({ ...DEFAULT_CONFIG.diagrams.mermaid, command: "/opt/mmdc" })
    expect(config.diagrams.plantuml).toEqual(DEFAULT_CONFIG.diagrams.plantuml)
    expect(config.timeouts).toEqual(DEFAULT_CONFIG.timeouts)
  })

  it("does not modify the base config", () => {
    mergeConfig(DEFAULT_CONFIG, { theme: "nord", output: { html: true } })
    expect(DEFAULT_CONFIG.theme).toBe("github-light")
    expect(DEFAULT_CONFIG.output.html).toBe(false)
  })
})

describe("parseConfigOverrides", () => {
  it("accepts a partial config", () => {
    expect(parseConfigOverrides({ diagrams: { strict: true } })).toEqual({ diagrams: { strict: true } })
  })

  it("reports the path of an invalid value", () => {
    expect(() => parseConfigOverrides({ backend: "word" }, "md2pdf.json")).toThrow(ConfigError)
    expect(() => parseConfigOverrides({ backend: "word" }, "md2pdf.json")).toThrow(
      /^Invalid md2pdf\.json: backend: /,
    )
    expect(() => parseConfigOverrides({ timeouts: { diagramMs: -1 } })).toThrow(
      /^Invalid config: timeouts\.diagramMs: /,
    )
  })

  it("rejects unknown keys", () => {
    expect(() => parseConfigOverrides({ bogus: 1 })).toThrow(/^Invalid config: \(root\): /)
  })
})

describe("loadConfig", () => {
  const tempDir = useTempDirs()

  it("returns the defaults when no config file exists", async () => {
    const cwd = await tempDir()
    expect(loadConfig(undefined, cwd)).toBe(DEFAULT_CONFIG)
  })

  it("reads md2pdf.config.json from the working directory", async () => {
    const cwd = await tempDir()
    await writeFile(
      join(cwd, "md2pdf.config.json"),
      JSON.stringify({ backend: "pdfkit", page: { format: "LETTER" } }),
    )

    const config = loadConfig(undefined, cwd)

    expect(config.backend).toBe("pdfkit")
    expect(config.page).toEqual({ format: "LETTER", margin: DEFAULT_CONFIG.page.margin })
  })

  it("reads an explicit config path", async () => {
    const dir = await tempDir()
    const path = join(dir, "custom.json")
    await writeFile(path, JSON.stringify({ diagrams: { plantuml: { jarPath: "/opt/plantuml.jar" } } }))

    expect(loadConfig(path).diagrams.plantuml.jarPath).toBe("/opt/plantuml.jar")
  })

  it("fails for an explicit path that does not exist", async () => {
    const dir = await tempDir()
    const path = join(dir, "missing.json")
    expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`)
  })

  it("fails for a file that is not JSON", async () => {
    const dir = await tempDir()
    const path = join(dir, "broken.json")
    await writeFile(path, "{ backend: ")

    expect(() => loadConfig(path)).toThrow(ConfigError)
    expect(() => loadConfig(path)).toThrow(`Failed to read config from ${path}`)
  })
})
