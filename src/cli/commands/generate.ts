/**
 * keyseal CLI - Generate Command
 *
 * Creates a new private key, optionally password-protected and stored in
 * the keychain. The key itself is the payload.
 */

import { promptNewPassword } from '../../lib/key-loader.js'
import type { CommandContext } from './context.js'

export async function runGenerate(context: CommandContext): Promise<string> {
  const { keyPlan, services, reporter } = context

  const password = keyPlan.passwordProtect
    ? await promptNewPassword(services.input)
    : undefined
  const key = services.crypto.generateKey({ password })
  reporter.verbose(`Generated a new ${password !== undefined ? 'password-protected ' : ''}private key`)

  if (keyPlan.keychainTarget !== undefined && services.keychain) {
    services.keychain.write(keyPlan.keychainTarget, key)
    reporter.success(`Key stored in the keychain as "${keyPlan.keychainTarget}"`)
  }

  return key
}
