#!/usr/bin/env node

/**
 * Command-line interface for md2pdf.
 */

import yargs from "yargs"
import { hideBin } from "yargs/helpers"
import { runConvert } from "./command.js"
import { describeError } from "./errors.js"
import { logger } from "./logger.js"

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("md2pdf")
    .usage("$0 <input> [options]")
    .command(
      ["convert <input>", "$0 <input>"],
      "Convert markdown file to PDF",
      (yargs) => {
        return yargs
          .positional("input", {
            describe: "Input markdown file",
            type: "string",
            demandOption: true,
          })
          .option("output", {
            alias: "o",
            describe:
              "Output PDF file path (default: input filename with .pdf extension in same directory)",
            type: "string",
          })
          .option("html", {
            describe: "Also write the intermediate HTML next to the PDF",
            type: "boolean",
          })
          .option("html-path", {
            describe: "Write the intermediate HTML to this path (implies --html)",
            type: "string",
          })
          .option("backend", {
            alias: "b",
            describe: "PDF backend: headless Chrome or direct pdfkit layout",
            choices: ["chrome", "pdfkit"] as const,
          })
          .option("config", {
            alias: "c",
            describe: "Path to a JSON config file",
            type: "string",
          })
          .option("strict-diagrams", {
            describe: "Exit with an error when any diagram fails to render",
            type: "boolean",
          })
          .option("chrome-path", {
            describe: "Chrome or Chromium executable",
            type: "string",
          })
          .option("mermaid-path", {
            describe: "Mermaid CLI (mmdc) executable",
            type: "string",
          })
      },
      async (argv) => {
        process.exitCode = await runConvert({
          input: String(argv.input),
          output: argv.output,
          html: argv.html,
          htmlPath: argv.htmlPath,
          backend: argv.backend,
          config: argv.config,
          strictDiagrams: argv.strictDiagrams,
          chromePath: argv.chromePath,
          mermaidPath: argv.mermaidPath,
        })
      },
    )
    .version("1.0.0")
    .help()
    .alias("help", "h")
    .alias("version", "v")
    .strict()
    .parseAsync()
}

main().catch((error: unknown) => {
  logger.fatal({ error: describeError(error) }, "Fatal error occurred")
  process.exit(1)
})
