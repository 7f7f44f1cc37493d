/**
 * keyseal CLI - Encrypt Command
 */

import { readInput, type CommandContext } from './context.js'

export async function runEncrypt(context: CommandContext, key: string): Promise<string> {
  const { command, services, reporter } = context
  const plaintext = await readInput(command.input, services)
  reporter.verbose(`Encrypting ${plaintext.length} characters from ${command.input.type}`)
  return services.crypto.encrypt(plaintext, key)
}
