/**
 * Runs external tools (diagram renderers, the PDF engine) with a hard timeout.
 */

import { spawn } from "node:child_process"
import { logger } from "./logger.js"

export interface RunToolOptions {
  timeoutMs: number
  /** Written to the tool's stdin, which is then closed. */
  input?: string
  cwd?: string
}

export type ToolOutcome =
  | { readonly status: "ok"; readonly stdout: Buffer; readonly stderr: string }
  | { readonly status: "not-found"; readonly command: string; readonly message: string }
  | { readonly status: "timeout"; readonly timeoutMs: number; readonly stderr: string }
  | {
      readonly status: "failed"
      readonly exitCode: number | null
      readonly signal: NodeJS.Signals | null
      readonly diagnostics: string
    }

const MISSING_TOOL_CODES = new Set(["ENOENT", "EACCES"])

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error
}

/**
 * Spawns `command` and collects its output.
 *
 * Never rejects: a missing executable, a timeout and a non-zero exit are all
 * reported through the returned outcome so callers can map them onto their own
 * error types. On timeout the child is killed with SIGKILL.
 */
export function runTool(
  command: string,
  args: readonly string[],
  options: RunToolOptions,
): Promise<ToolOutcome> {
  return new Promise<ToolOutcome>((resolve) => {
    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    let timer: NodeJS.Timeout | undefined
    let settled = false

    const finish = (outcome: ToolOutcome) => {
      if (settled) {
        return
      }
      settled = true
      if (timer) {
        clearTimeout(timer)
      }
      resolve(outcome)
    }

    const stderrText = () => Buffer.concat(stderrChunks).toString("utf-8")

    logger.debug({ command, args }, "Running external tool")
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["pipe", "pipe", "pipe"],
    })

    timer = setTimeout(() => {
      child.kill("SIGKILL")
      finish({ status: "timeout", timeoutMs: options.timeoutMs, stderr: stderrText() })
    }, options.timeoutMs)

    child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk))
    child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk))

    child.on("error", (error) => {
      if (isErrnoException(error) && error.code && MISSING_TOOL_CODES.has(error.code)) {
        finish({ status: "not-found", command, message: error.message })
      } else {
        finish({ status: "failed", exitCode: null, signal: null, diagnostics: error.message })
      }
    })

    child.on("close", (exitCode, signal) => {
      const stdout = Buffer.concat(stdoutChunks)
      const stderr = stderrText()
      if (exitCode === 0) {
        finish({ status: "ok", stdout, stderr })
        return
      }
      const diagnostics =
        stderr.trim() ||
        stdout.toString("utf-8").trim() ||
        (signal ? `terminated by ${signal}` : `exited with code ${exitCode}`)
      finish({ status: "failed", exitCode, signal, diagnostics })
    })

    // A tool that exits before reading its input makes the write fail with EPIPE;
    // the exit status is what gets reported.
    child.stdin.on("error", (error) => {
      logger.debug({ command, error: error.message }, "Tool closed stdin early")
    })
    child.stdin.end(options.input)
  })
}

/**
 * Rejects with `onTimeout()` when `promise` has not settled after `timeoutMs`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
