/**
 * Shared command context
 */

import type {
  CommandPlan,
  CryptoService,
  DataInput,
  EditorService,
  InputService,
  KeyPlan,
  KeychainService,
  KeysealConfig,
  OptionModel,
  PasswordCache
} from '../../types.js'
import fs from 'node:fs'
import { InputFileNotFoundError } from '../../lib/errors.js'
import type { Reporter } from '../ui.js'

export interface Services {
  crypto: CryptoService
  keychain: KeychainService | null
  input: InputService
  editor: EditorService
  passwordCache: PasswordCache
}

export interface CommandContext {
  model: OptionModel
  command: CommandPlan
  keyPlan: KeyPlan
  config: KeysealConfig
  services: Services
  reporter: Reporter
}

/**
 * Read the data to encrypt/decrypt
 */
export async function readInput(input: DataInput, services: Services): Promise<string> {
  switch (input.type) {
    case 'string':
      return input.value
    case 'file':
      try {
        return fs.readFileSync(input.path, 'utf8')
      } catch (err) {
        throw new InputFileNotFoundError(input.path, err instanceof Error ? err : undefined)
      }
    case 'stdin':
      return services.input.readStdin()
    case 'none':
      return ''
  }
}
