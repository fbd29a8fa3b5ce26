/**
 * HTML page template for the rendered document.
 */

import type { PageFormat } from "./config.js"

// Configuration constants
const HTML_MAX_WIDTH = "800px"

/**
 * Escapes text for use in HTML content and attribute values.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;")
}

export interface PageOptions {
  title: string
  format: PageFormat
  /** Page margin in PDF points. */
  margin: number
}

/**
 * Wraps HTML content in a complete, self-contained HTML document.
 *
 * @param content - HTML body content
 * @param page - Title and print settings
 * @returns Complete HTML document
 */
export function wrapInHtmlDocument(content: string, page: PageOptions): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(page.title)}</title>
    <style>
        @page {
            size: ${page.format === "LETTER" ? "letter" : "A4"};
            margin: ${page.margin}pt;
        }
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', 'Noto Sans', Helvetica, Arial, sans-serif;
            max-width: ${HTML_MAX_WIDTH};
            margin: 0 auto;
            padding: 20px;
            line-height: 1.6;
            color: #24292e;
            background-color: #ffffff;
            -webkit-print-color-adjust: exact;
            print-color-adjust: exact;
        }
        @media print {
            body {
                max-width: none;
                padding: 0;
            }
        }
        h1, h2, h3, h4, h5, h6 {
            margin-top: 1.5em;
            margin-bottom: 0.5em;
            font-weight: 600;
            line-height: 1.25;
            page-break-after: avoid;
        }
        h1 {
            font-size: 2em;
            border-bottom: 1px solid #eaecef;
            padding-bottom: 0.3em;
        }
        h2 {
            font-size: 1.5em;
            border-bottom: 1px solid #eaecef;
            padding-bottom: 0.3em;
        }
        h3 { font-size: 1.25em; }
        h4 { font-size: 1em; }
        h5 { font-size: 0.875em; }
        h6 { font-size: 0.85em; color: #6a737d; }
        a {
            color: #0366d6;
            text-decoration: underline;
        }
        code:not(pre code) {
            background-color: #f4f4f4;
            padding: 2px 6px;
            border-radius: 3px;
            font-family: 'SFMono-Regular', Consolas, 'Liberation Mono', Menlo, monospace;
            font-size: 0.9em;
        }
        pre.shiki, pre.plain {
            padding: 16px;
            border-radius: 6px;
            overflow-x: auto;
            line-height: 1.45;
            page-break-inside: avoid;
            font-family: 'SFMono-Regular', Consolas, 'Liberation Mono', Menlo, monospace;
        }
        pre.plain {
            background-color: #f6f8fa;
        }
        pre.shiki code, pre.plain code {
            background-color: transparent;
            padding: 0;
            font-size: 0.9em;
        }
        table {
            border-collapse: collapse;
            width: 100%;
            margin: 1em 0;
        }
        th, td {
            border: 1px solid #dfe2e5;
            padding: 8px 13px;
            text-align: left;
        }
        th {
            background-color: #f6f8fa;
            font-weight: 600;
        }
        tr:nth-child(2n) {
            background-color: #f6f8fa;
        }
        blockquote {
            margin: 1em 0;
            padding: 0 1em;
            color: #6a737d;
            border-left: 0.25em solid #dfe2e5;
        }
        li.task {
            list-style: none;
        }
        img {
            max-width: 100%;
            height: auto;
        }
        figure.diagram {
            margin: 1em 0;
            text-align: center;
            page-break-inside: avoid;
        }
        .placeholder {
            border: 1px dashed #cb2431;
            background-color: #ffeef0;
            color: #86181d;
            padding: 8px 13px;
            border-radius: 6px;
            font-style: italic;
        }
    </style>
</head>
<body>
${content}
</body>
</html>
`
}
