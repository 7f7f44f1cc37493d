/**
 * keyseal CLI - Decrypt Command
 */

import { readInput, type CommandContext } from './context.js'

export async function runDecrypt(context: CommandContext, key: string): Promise<string> {
  const { command, services, reporter } = context
  const ciphertext = await readInput(command.input, services)
  reporter.verbose(`Decrypting ${command.input.type} input`)
  return services.crypto.decrypt(ciphertext.trim(), key)
}
