import type { ZodError } from 'zod'
import type { OutputFormat } from './args.js'

export interface OutputFormatter {
  /** Output successful result to stdout */
  success<T>(data: T): void
  /** Output error to stderr and exit with code 1 */
  error(message: string, details?: unknown): never
  /** Output progress message to stderr (skipped in quiet mode) */
  progress(message: string): void
}

/**
 * Create an output formatter based on format and quiet settings
 */
export const createFormatter = (format: OutputFormat, quiet: boolean): OutputFormatter => {
  const progress = (message: string) => {
    if (!quiet) {
      process.stderr.write(`${message}\n`)
    }
  }

  if (format === 'json') {
    return {
      success: <T>(data: T) => {
        console.log(JSON.stringify(data, null, 2))
      },
      error: (message: string, details?: unknown): never => {
        console.error(JSON.stringify({ success: false, error: message, details }, null, 2))
        process.exit(1)
      },
      progress,
    }
  }

  return {
    success: <T>(data: T) => {
      console.log(typeof data === 'string' ? data : JSON.stringify(data, null, 2))
    },
    error: (message: string, details?: unknown): never => {
      console.error(`Error: ${message}`)
      if (details) {
        console.error(details)
      }
      process.exit(1)
    },
    progress,
  }
}

/**
 * One line per issue, prefixed with the field path when there is one
 */
export const describeZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
