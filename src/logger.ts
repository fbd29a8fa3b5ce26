/**
 * Process-wide pino logger for md2pdf.
 *
 * Outside production, records are pretty-printed to stderr at debug level.
 * In production they are emitted as JSON at info level. `LOG_LEVEL` overrides
 * either default.
 */

import pino from "pino"

const isDevelopment = process.env.NODE_ENV !== "production"

const DEFAULT_LOG_LEVEL = isDevelopment ? "debug" : "info"

export const logger = pino({
  name: "md2pdf",
  level: process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,name",
          // stderr
          destination: 2,
        },
      }
    : undefined,
})
