/**
 * keyseal Option Model
 *
 * Flag definitions shared by the argument parser and the option model builder.
 */

import type { Capabilities, OptionModel } from '../types.js'
import { ParseError } from './errors.js'

export type OptionType = 'boolean' | 'string' | 'number'

export interface OptionDefinition {
  /** Long flag name without dashes */
  name: string
  short: string
  type: OptionType
  description: string
  /** Only offered when the capability is present */
  requires?: keyof Capabilities
}

/** Hidden introspection flag, stripped before parsing */
export const DICTIONARY_FLAG = '--dictionary'

export const OPTION_DEFINITIONS: readonly OptionDefinition[] = [
  // Modes
  { name: 'encrypt', short: 'e', type: 'boolean', description: 'Encrypt mode' },
  { name: 'decrypt', short: 'd', type: 'boolean', description: 'Decrypt mode' },
  { name: 'edit', short: 't', type: 'boolean', description: 'Decrypt, open an encrypted file in $EDITOR, re-encrypt' },

  // Create a new private key
  { name: 'generate', short: 'g', type: 'boolean', description: 'Generate a new private key' },
  { name: 'password', short: 'p', type: 'boolean', description: 'Encrypt the new key with a password' },
  {
    name: 'keychain',
    short: 'x',
    type: 'string',
    description: 'Add to (or read from) the OS keychain under this name',
    requires: 'keychain'
  },
  { name: 'password-timeout', short: 'M', type: 'number', description: 'Seconds a key password stays cached' },
  { name: 'no-password-cache', short: 'P', type: 'boolean', description: 'Disable caching of key passwords' },

  // Read existing private key from
  { name: 'interactive', short: 'i', type: 'boolean', description: 'Paste or type the key interactively' },
  { name: 'private-key', short: 'k', type: 'string', description: 'Private key as a string' },
  { name: 'keyfile', short: 'K', type: 'string', description: 'Private key from a file' },

  // Data to encrypt/decrypt
  { name: 'string', short: 's', type: 'string', description: 'String to encrypt/decrypt' },
  { name: 'file', short: 'f', type: 'string', description: 'File to read from' },
  { name: 'output', short: 'o', type: 'string', description: 'File to write to' },

  // Flags
  { name: 'backup', short: 'b', type: 'boolean', description: 'Create a backup file in edit mode' },
  { name: 'verbose', short: 'v', type: 'boolean', description: 'Show additional information' },
  { name: 'trace', short: 'T', type: 'boolean', description: 'Print a backtrace of any errors' },
  { name: 'debug', short: 'D', type: 'boolean', description: 'Print debugging information' },
  { name: 'quiet', short: 'q', type: 'boolean', description: 'Silence all output' },
  { name: 'version', short: 'V', type: 'boolean', description: 'Print version' },
  { name: 'no-color', short: 'N', type: 'boolean', description: 'Disable color output' },

  // Utility
  { name: 'bash-completion', short: 'a', type: 'string', description: 'Append shell completion to a file' },

  // Help & examples
  { name: 'examples', short: 'E', type: 'boolean', description: 'Show several examples' },
  { name: 'help', short: 'h', type: 'boolean', description: 'Show help' }
]

/**
 * Flags offered on this platform
 */
export function availableOptions(capabilities: Capabilities): OptionDefinition[] {
  return OPTION_DEFINITIONS.filter(def => !def.requires || capabilities[def.requires])
}

/**
 * Sorted, space-joined list of every recognized long flag
 */
export function listFlagNames(capabilities: Capabilities): string {
  return availableOptions(capabilities)
    .map(def => `--${def.name}`)
    .sort()
    .join(' ')
}

/**
 * Remove the hidden --dictionary flag from argv
 */
export function stripDictionary(argv: readonly string[]): { argv: string[]; dictionary: boolean } {
  const rest = argv.filter(arg => arg !== DICTIONARY_FLAG)
  return { argv: rest, dictionary: rest.length !== argv.length }
}

function createReader(raw: Record<string, unknown>) {
  return {
    flag(name: string): boolean {
      return raw[name] === true
    },

    text(name: string): string | undefined {
      const value = raw[name]
      if (value === undefined || value === null || value === false) return undefined
      if (typeof value === 'string') return value
      if (typeof value === 'number') return String(value)
      throw new ParseError(`Missing value for --${name}`, 'MISSING_VALUE', { context: { flag: name } })
    },

    integer(name: string): number | undefined {
      const value = raw[name]
      if (value === undefined || value === null) return undefined
      const parsed = typeof value === 'string' && /^\d+$/.test(value.trim())
        ? Number(value.trim())
        : value
      if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
        throw new ParseError(
          `--${name} expects a non-negative integer, got "${String(value)}"`,
          'INVALID_INTEGER',
          { context: { flag: name } }
        )
      }
      return parsed
    },

    // Parsers differ on whether --no-x arrives under its own name or as x=false
    negated(name: string): boolean {
      return raw[`no-${name}`] === true || raw[name] === false
    }
  }
}

/**
 * Build the frozen option model from parser output
 */
export function buildOptionModel(raw: Record<string, unknown>, capabilities: Capabilities): OptionModel {
  const read = createReader(raw)

  const model: OptionModel = {
    encrypt: read.flag('encrypt'),
    decrypt: read.flag('decrypt'),
    edit: read.flag('edit'),
    generate: read.flag('generate'),
    password: read.flag('password'),
    keychain: capabilities.keychain ? read.text('keychain') : undefined,
    interactive: read.flag('interactive'),
    privateKey: read.text('private-key'),
    keyfile: read.text('keyfile'),
    passwordTimeout: read.integer('password-timeout'),
    noPasswordCache: read.negated('password-cache'),
    string: read.text('string'),
    file: read.text('file'),
    output: read.text('output'),
    backup: read.flag('backup'),
    verbose: read.flag('verbose'),
    trace: read.flag('trace'),
    debug: read.flag('debug'),
    quiet: read.flag('quiet'),
    version: read.flag('version'),
    noColor: read.negated('color'),
    bashCompletion: read.text('bash-completion'),
    examples: read.flag('examples'),
    help: read.flag('help')
  }

  return Object.freeze(model)
}
