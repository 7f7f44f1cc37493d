/**
 * keyseal CLI schema
 *
 * Builds the cli-args-parser instance from the shared flag definitions.
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { createCLI, type CLISchema } from 'cli-args-parser'
import type { Capabilities, OptionModel } from '../types.js'
import { availableOptions, buildOptionModel, type OptionDefinition } from '../lib/options.js'
import { ParseError } from '../lib/errors.js'
import type { Palette } from './lib/colors.js'

export const PROGRAM_NAME = 'keyseal'

// Version is injected at build time or read from package.json
export const VERSION = process.env.KEYSEAL_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from src/cli or dist/cli to the package root
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

function toSchemaOption(def: OptionDefinition) {
  const { short, description } = def
  switch (def.type) {
    case 'boolean':
      return { short, type: 'boolean' as const, default: false, description }
    case 'string':
      return { short, type: 'string' as const, description }
    case 'number':
      return { short, type: 'number' as const, description }
  }
}

export function buildCliSchema(capabilities: Capabilities, palette: Palette): CLISchema {
  const options: NonNullable<CLISchema['options']> = {}
  for (const def of availableOptions(capabilities)) {
    options[def.name] = toSchemaOption(def)
  }

  return {
    name: PROGRAM_NAME,
    version: VERSION,
    description: 'Encrypt, decrypt or edit data with a private key',
    autoShort: false,
    strict: true,
    formatter: palette.formatter,
    options,
    commands: {}
  }
}

export function createKeysealCli(capabilities: Capabilities, palette: Palette) {
  return createCLI(buildCliSchema(capabilities, palette))
}

export type KeysealCli = ReturnType<typeof createKeysealCli>

/**
 * Parse argv into the frozen option model
 */
export function parseArgv(cli: KeysealCli, argv: string[], capabilities: Capabilities): OptionModel {
  const result = cli.parse(argv)

  if (result.errors.length > 0) {
    throw new ParseError(result.errors.map(String).join('; '), 'INVALID_ARGUMENT', {
      context: { errors: result.errors.map(String) }
    })
  }

  if (result.command.length > 0 || result.rest.length > 0) {
    const extra = [...result.command, ...result.rest].map(String)
    throw new ParseError(`Unexpected argument: ${extra[0]}`, 'UNEXPECTED_ARGUMENT', {
      context: { arguments: extra }
    })
  }

  return buildOptionModel(result.options as Record<string, unknown>, capabilities)
}
