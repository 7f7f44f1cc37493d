/**
 * keyseal Keychain
 *
 * Stores private keys as generic passwords in the macOS keychain through
 * the `security` tool.
 */

import { execFileSync } from 'node:child_process'
import os from 'node:os'
import type { Capabilities, KeychainService } from '../types.js'
import { ExecutionError } from './errors.js'

const KEYCHAIN_KIND = 'keyseal private key'

/** `security` exits with 44 when an item does not exist */
const ITEM_NOT_FOUND = 44

export type SecurityRunner = (args: string[]) => string

const runSecurity: SecurityRunner = args =>
  execFileSync('security', args, { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] })

function exitStatus(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status
  }
  return null
}

/**
 * Platform features, resolved once at startup
 */
export function detectCapabilities(platform: NodeJS.Platform = process.platform): Capabilities {
  return { keychain: platform === 'darwin' }
}

export class MacKeychain implements KeychainService {
  constructor(
    private readonly account: string = os.userInfo().username,
    private readonly run: SecurityRunner = runSecurity
  ) {}

  read(label: string): string | null {
    try {
      return this.run(['find-generic-password', '-a', this.account, '-s', label, '-w']).trim()
    } catch (err) {
      if (exitStatus(err) === ITEM_NOT_FOUND) return null
      throw new ExecutionError(`Keychain lookup for "${label}" failed`, 'KEYCHAIN_FAILED', {
        context: { label },
        cause: err instanceof Error ? err : undefined
      })
    }
  }

  write(label: string, key: string): void {
    try {
      this.run(['add-generic-password', '-a', this.account, '-D', KEYCHAIN_KIND, '-s', label, '-w', key, '-U'])
    } catch (err) {
      throw new ExecutionError(`Unable to store key "${label}" in the keychain`, 'KEYCHAIN_FAILED', {
        context: { label },
        cause: err instanceof Error ? err : undefined
      })
    }
  }
}

/**
 * Keychain collaborator for this platform, or null where there is none
 */
export function createKeychain(capabilities: Capabilities): KeychainService | null {
  return capabilities.keychain ? new MacKeychain() : null
}
