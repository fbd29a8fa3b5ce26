import { describe, expect, it } from "vitest"
import {
  BackendError,
  BackendTimeoutError,
  describeError,
  DiagramSyntaxError,
  InputNotFoundError,
} from "./errors.js"

describe("describeError", () => {
  it("appends the first line of backend diagnostics", () => {
    const error = new BackendError("Chrome failed", "\n  [ERROR] crashed\nstack")
    expect(describeError(error)).toBe("Chrome failed: [ERROR] crashed")
  })

  it("uses the message of other errors", () => {
    expect(describeError(new InputNotFoundError("notes.md"))).toBe(
      "Input file not found or not readable: notes.md",
    )
    expect(describeError("plain")).toBe("plain")
  })
})

describe("error taxonomy", () => {
  it("marks diagram errors recoverable and backend errors fatal", () => {
    expect(new DiagramSyntaxError("plantuml", "")).toMatchObject({
      fatal: false,
      code: "diagram-syntax",
      message: "plantuml diagram failed to render: no diagnostic output",
    })
    expect(new BackendTimeoutError(90000)).toMatchObject({
      fatal: true,
      code: "backend-timeout",
      message: "PDF backend timed out after 90000ms",
    })
  })
})
