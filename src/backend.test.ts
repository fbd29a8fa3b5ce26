import { readFile, readdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { partialPath, writeAtomically } from "./backend.js"
import { BackendError } from "./errors.js"
import { useTempDirs } from "./test-support.js"

describe("writeAtomically", () => {
  const tempDir = useTempDirs()

  it("renames the produced file into place", async () => {
    const dir = await tempDir()
    const output = join(dir, "out.pdf")

    await writeAtomically(output, (tempPath) => writeFile(tempPath, "%PDF-1.7"))

    expect(await readFile(output, "utf-8")).toBe("%PDF-1.7")
    expect(await readdir(dir)).toEqual(["out.pdf"])
  })

  it("creates the destination directory", async () => {
    const dir = await tempDir()
    const output = join(dir, "nested", "out.pdf")

    await writeAtomically(output, (tempPath) => writeFile(tempPath, "%PDF-1.7"))

    expect(await readFile(output, "utf-8")).toBe("%PDF-1.7")
  })

  it("rejects empty output and removes the partial file", async () => {
    const dir = await tempDir()
    const output = join(dir, "out.pdf")

    await expect(writeAtomically(output, (tempPath) => writeFile(tempPath, ""))).rejects.toThrow(
      "PDF backend produced no output",
    )
    expect(await readdir(dir)).toEqual([])
  })

  it("leaves an existing destination untouched when the backend fails", async () => {
    const dir = await tempDir()
    const output = join(dir, "out.pdf")
    await writeFile(output, "previous")

    const error = await writeAtomically(output, async (tempPath) => {
      await writeFile(tempPath, "half")
      throw new Error("engine crashed")
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(BackendError)
    expect(error).toMatchObject({ message: "Failed to write PDF: engine crashed", code: "backend" })
    expect(await readFile(output, "utf-8")).toBe("previous")
    expect(await readdir(dir)).toEqual(["out.pdf"])
  })

  it("passes backend errors through unchanged", async () => {
    const dir = await tempDir()
    const failure = new BackendError("Chrome failed", "crash")

    await expect(
      writeAtomically(join(dir, "out.pdf"), () => Promise.reject(failure)),
    ).rejects.toBe(failure)
  })
})

describe("partialPath", () => {
  it("places the partial file beside the destination", () => {
    expect(partialPath("/out/doc.pdf")).toBe(`/out/doc.pdf.${process.pid}.partial`)
  })
})
