/**
 * CLI UI utilities
 *
 * - Data reaches stdout only through the output sink
 * - Everything else (progress, warnings, errors) goes to stderr
 */

import type { ErrorRecord } from '../types.js'
import type { Palette } from './lib/colors.js'

export interface Streams {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export interface ReporterOptions {
  palette: Palette
  quiet: boolean
  verbose: boolean
  debug: boolean
}

export interface Reporter {
  readonly palette: Palette
  /** Write display text (help, version) to stdout */
  output(data: string): void
  /** Informational line, dropped in quiet mode */
  log(message: string): void
  verbose(message: string): void
  debug(message: string): void
  success(message: string): void
  warn(message: string): void
  /** Always shown, even in quiet mode */
  error(message: string): void
  /** Undecorated stderr line, always shown */
  raw(message: string): void
}

export function createReporter(streams: Streams, options: ReporterOptions): Reporter {
  const { palette, quiet } = options
  const { c, symbols } = palette
  const line = (message: string) => streams.stderr(`${message}\n`)

  return {
    palette,
    output: data => streams.stdout(data.endsWith('\n') ? data : `${data}\n`),
    log: message => {
      if (!quiet) line(message)
    },
    verbose: message => {
      if (options.verbose && !quiet) line(c.muted(`[keyseal] ${message}`))
    },
    debug: message => {
      if (options.debug) line(c.muted(`[keyseal:debug] ${message}`))
    },
    success: message => {
      if (!quiet) line(`${symbols.success} ${c.success(message)}`)
    },
    warn: message => {
      if (!quiet) line(`${symbols.warning} ${c.warning(message)}`)
    },
    error: message => line(`${symbols.error} ${c.error(message)}`),
    raw: line
  }
}

/**
 * Format key-value pairs, keys padded to the same width
 */
export function formatKeyValue(pairs: Array<[string, string]>, separator = '='): string {
  if (pairs.length === 0) return ''
  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length))
  return pairs
    .map(([k, v]) => `${k.padEnd(maxKeyLen)} ${separator} ${v}`)
    .join('\n')
}

/**
 * Render a structured error on stderr
 *
 * Quiet mode keeps the message and drops the suggestion.
 */
export function renderError(reporter: Reporter, record: ErrorRecord, options: { quiet: boolean; debug: boolean }): void {
  const { c } = reporter.palette
  reporter.error(record.message)

  if (record.suggestion && !options.quiet) {
    reporter.log(`  ${c.label('Suggestion:')} ${record.suggestion}`)
  }

  if (record.stack) {
    reporter.raw(c.muted(record.stack))
  }

  if (options.debug) {
    const pairs = Object.entries(record.options).map(([k, v]): [string, string] => [`--${k}`, String(v)])
    reporter.debug(`${record.kind} (${record.code})`)
    if (pairs.length > 0) {
      reporter.debug(`options:\n${formatKeyValue(pairs)}`)
    }
  }
}
