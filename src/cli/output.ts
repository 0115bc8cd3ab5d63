import type { OutputFormat } from './args.js'

/**
 * What every command hands to the formatter. `formatted` is set in text mode only.
 */
export interface CommandResult {
  success: true
  formatted?: string
}

export interface OutputFormatter {
  /** Print the command result to stdout: the JSON document, or its text rendering */
  success(result: CommandResult): void
  /** Print the failure to stderr and exit 1 */
  error(message: string): never
  /** Status line on stderr, silenced by --quiet */
  progress(message: string): void
  /** Warning on stderr, printed even with --quiet */
  warn(message: string): void
}

/**
 * Stdout carries only the result so `order-spend yearly | jq` keeps working;
 * everything else goes to stderr.
 *
 * @example
 * const formatter = createFormatter('text', false)
 * formatter.progress('Loading orders...')
 * formatter.success({ success: true, formatted: '2024: $130.00' })
 */
export const createFormatter = (format: OutputFormat, quiet: boolean): OutputFormatter => ({
  success: (result) => {
    if (format === 'text' && result.formatted !== undefined) {
      console.log(result.formatted)
      return
    }
    const { formatted: _text, ...data } = result
    console.log(JSON.stringify(data, null, 2))
  },

  error: (message): never => {
    if (format === 'json') {
      console.error(JSON.stringify({ success: false, error: message }, null, 2))
    } else {
      console.error(`Error: ${message}`)
    }
    process.exit(1)
  },

  progress: (message) => {
    if (!quiet) process.stderr.write(`${message}\n`)
  },

  warn: (message) => {
    process.stderr.write(`Warning: ${message}\n`)
  },
})
