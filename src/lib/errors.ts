/**
 * keyseal Error Hierarchy
 *
 * Typed error classes for the CLI and programmatic usage.
 *
 * Hierarchy:
 *   KeysealError (base)
 *   ├── ParseError (malformed/unknown flag)
 *   │   └── ConfigError
 *   ├── CommandAmbiguousError (zero or conflicting modes)
 *   ├── KeyResolutionError (key could not be obtained)
 *   │   ├── NoKeySpecifiedError
 *   │   ├── KeyFileNotFoundError
 *   │   ├── KeychainEntryNotFoundError
 *   │   ├── InteractiveAbortError
 *   │   ├── InvalidKeyError
 *   │   ├── PasswordMismatchError
 *   │   └── WrongPasswordError
 *   ├── WriteError (output sink unwritable)
 *   └── ExecutionError (cryptography or editor failure)
 *       ├── DecryptionError
 *       ├── InputFileNotFoundError
 *       └── EditorError
 */

import type { ErrorKind, ErrorRecord, OptionModel, OptionValue } from '../types.js'
import { maskValue } from './masking.js'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all keyseal errors
 */
export class KeysealError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Taxonomy bucket, decides the exit code */
  readonly kind: ErrorKind

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, kind: ErrorKind, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'KeysealError'
    this.code = code
    this.kind = kind
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }
}

// =============================================================================
// Parse Errors
// =============================================================================

export class ParseError extends KeysealError {
  constructor(message: string, code = 'INVALID_ARGUMENT', options?: ErrorOptions) {
    super(message, code, 'ParseError', {
      suggestion: 'Run "keyseal --help" to see the supported flags',
      ...options
    })
    this.name = 'ParseError'
  }
}

/**
 * Thrown when ~/.keyseal/config.yaml has invalid content
 */
export class ConfigError extends ParseError {
  constructor(message: string, configPath: string, cause?: Error) {
    super(`Invalid config in ${configPath}: ${message}`, 'INVALID_CONFIG', {
      suggestion: 'Check the YAML syntax and field types of your keyseal config',
      context: { configPath },
      cause
    })
    this.name = 'ConfigError'
  }
}

// =============================================================================
// Command Selection Errors
// =============================================================================

export class CommandAmbiguousError extends KeysealError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, 'CommandAmbiguous', options)
    this.name = 'CommandAmbiguousError'
  }
}

// =============================================================================
// Key Resolution Errors
// =============================================================================

export class KeyResolutionError extends KeysealError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, 'KeyResolutionError', options)
    this.name = 'KeyResolutionError'
  }
}

export class NoKeySpecifiedError extends KeyResolutionError {
  constructor() {
    super('No private key specified', 'NO_KEY_SPECIFIED', {
      suggestion: 'Pass the key with -k, -K <file>, -x <keychain entry> or -i'
    })
    this.name = 'NoKeySpecifiedError'
  }
}

export class KeyFileNotFoundError extends KeyResolutionError {
  constructor(filePath: string, cause?: Error) {
    super(`Key file not found or unreadable: ${filePath}`, 'KEY_FILE_NOT_FOUND', {
      suggestion: 'Check if the key file path is correct',
      context: { filePath },
      cause
    })
    this.name = 'KeyFileNotFoundError'
  }
}

export class KeychainEntryNotFoundError extends KeyResolutionError {
  constructor(label: string) {
    super(`No keychain entry named "${label}"`, 'KEYCHAIN_NOT_FOUND', {
      suggestion: `Store a key first with "keyseal -g -x ${label}"`,
      context: { label }
    })
    this.name = 'KeychainEntryNotFoundError'
  }
}

export class InteractiveAbortError extends KeyResolutionError {
  constructor(what: string, cause?: Error) {
    super(`No ${what} entered`, 'INTERACTIVE_ABORT', { cause })
    this.name = 'InteractiveAbortError'
  }
}

export class InvalidKeyError extends KeyResolutionError {
  constructor(sourceType: string) {
    super(`The private key from ${sourceType} is not a valid keyseal key`, 'INVALID_KEY', {
      suggestion: 'Generate a key with "keyseal -g"',
      context: { sourceType }
    })
    this.name = 'InvalidKeyError'
  }
}

export class PasswordMismatchError extends KeyResolutionError {
  constructor() {
    super('Passwords do not match', 'PASSWORD_MISMATCH')
    this.name = 'PasswordMismatchError'
  }
}

export class WrongPasswordError extends KeyResolutionError {
  constructor(cause?: Error) {
    super('Invalid password for the private key', 'WRONG_PASSWORD', { cause })
    this.name = 'WrongPasswordError'
  }
}

// =============================================================================
// Output Errors
// =============================================================================

export class WriteError extends KeysealError {
  constructor(filePath: string, cause?: Error) {
    super(`Unable to write output to ${filePath}`, 'WRITE_FAILED', 'WriteError', {
      suggestion: 'Check that the directory exists and is writable',
      context: { filePath },
      cause
    })
    this.name = 'WriteError'
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

export class ExecutionError extends KeysealError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, 'ExecutionError', options)
    this.name = 'ExecutionError'
  }
}

export class DecryptionError extends ExecutionError {
  constructor(reason: string, cause?: Error) {
    super(`Decryption failed: ${reason}`, 'DECRYPTION_FAILED', {
      suggestion: 'Ensure you are using the correct private key',
      cause
    })
    this.name = 'DecryptionError'
  }
}

export class InputFileNotFoundError extends ExecutionError {
  constructor(filePath: string, cause?: Error) {
    super(`Input file not found or unreadable: ${filePath}`, 'INPUT_NOT_FOUND', {
      suggestion: 'Check if the file path given to --file is correct',
      context: { filePath },
      cause
    })
    this.name = 'InputFileNotFoundError'
  }
}

export class EditorError extends ExecutionError {
  constructor(editor: string, reason: string, cause?: Error) {
    super(`Editor "${editor}" failed: ${reason}`, 'EDITOR_FAILED', {
      suggestion: 'Set $EDITOR to a command that waits until the file is closed',
      context: { editor },
      cause
    })
    this.name = 'EditorError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isKeysealError(error: unknown): error is KeysealError {
  return error instanceof KeysealError
}

// =============================================================================
// Helpers
// =============================================================================

const EXIT_CODES: Record<ErrorKind, number> = {
  ParseError: 2,
  CommandAmbiguous: 3,
  KeyResolutionError: 4,
  WriteError: 5,
  ExecutionError: 6
}

/**
 * Process exit status for an error kind
 */
export function exitCodeFor(kind: ErrorKind): number {
  return EXIT_CODES[kind]
}

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isKeysealError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a KeysealError if needed
 */
export function wrapError(error: unknown): KeysealError {
  if (isKeysealError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, 'UNKNOWN_ERROR', { cause: error })
  }
  return new ExecutionError(String(error), 'UNKNOWN_ERROR')
}

const SENSITIVE_OPTIONS = new Set(['private-key', 'string'])

/**
 * Long-flag view of the option model with sensitive values masked
 */
export function redactOptions(model: OptionModel | null): Record<string, OptionValue> {
  if (!model) return {}

  const result: Record<string, OptionValue> = {}
  for (const [field, value] of Object.entries(model)) {
    if (value === undefined || value === false) continue
    const flag = field.replace(/[A-Z]/g, ch => `-${ch.toLowerCase()}`)
    result[flag] = SENSITIVE_OPTIONS.has(flag) && typeof value === 'string'
      ? maskValue(value)
      : value
  }
  return result
}

function collectStack(error: Error): string {
  const parts = [error.stack ?? `${error.name}: ${error.message}`]
  let cause: unknown = error.cause
  while (cause instanceof Error) {
    parts.push(`Caused by: ${cause.stack ?? cause.message}`)
    cause = cause.cause
  }
  return parts.join('\n')
}

/**
 * Convert any thrown value into the structured record rendered by the CLI
 */
export function toErrorRecord(
  error: unknown,
  model: OptionModel | null,
  options: { trace?: boolean } = {}
): ErrorRecord {
  const wrapped = wrapError(error)
  const record: ErrorRecord = {
    kind: wrapped.kind,
    code: wrapped.code,
    message: wrapped.message,
    options: redactOptions(model)
  }
  if (wrapped.suggestion) {
    record.suggestion = wrapped.suggestion
  }
  if (options.trace) {
    record.stack = collectStack(wrapped)
  }
  return record
}
