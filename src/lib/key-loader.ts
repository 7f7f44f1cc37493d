/**
 * keyseal Key Loader
 *
 * Performs the I/O a key plan calls for: reads key files, queries the
 * keychain, prompts, and unlocks password-protected keys.
 */

import fs from 'node:fs'
import type {
  CryptoService,
  InputService,
  KeychainService,
  KeyPlan,
  KeySource,
  PasswordCache
} from '../types.js'
import {
  InteractiveAbortError,
  InvalidKeyError,
  KeyFileNotFoundError,
  KeyResolutionError,
  KeychainEntryNotFoundError,
  PasswordMismatchError
} from './errors.js'
import { passwordCacheId } from './password-cache.js'

export interface KeyLoaderServices {
  crypto: CryptoService
  keychain: KeychainService | null
  input: InputService
  passwordCache: PasswordCache
  /** Diagnostics sink, never receives key material */
  log?: (message: string) => void
}

/**
 * Prompt for a secret, mapping an empty answer or an aborted prompt to InteractiveAbortError
 */
export async function promptRequired(input: InputService, label: string, what: string): Promise<string> {
  let answer: string
  try {
    answer = await input.promptSecret(label)
  } catch (err) {
    throw new InteractiveAbortError(what, err instanceof Error ? err : undefined)
  }
  if (answer.trim() === '') {
    throw new InteractiveAbortError(what)
  }
  return answer
}

/**
 * Ask for a new password twice
 */
export async function promptNewPassword(input: InputService): Promise<string> {
  const password = await promptRequired(input, 'New password: ', 'password')
  const confirmation = await promptRequired(input, 'Confirm password: ', 'password')
  if (password !== confirmation) {
    throw new PasswordMismatchError()
  }
  return password
}

function readKeyFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8').trim()
  } catch (err) {
    throw new KeyFileNotFoundError(filePath, err instanceof Error ? err : undefined)
  }
}

async function readSource(source: KeySource, services: KeyLoaderServices): Promise<string> {
  switch (source.type) {
    case 'inline':
      return source.value.trim()

    case 'keyfile':
      return readKeyFile(source.path)

    case 'keychain': {
      if (!services.keychain) {
        throw new KeyResolutionError('The OS keychain is not available on this platform', 'KEYCHAIN_UNAVAILABLE')
      }
      const key = services.keychain.read(source.label)
      if (key === null) {
        throw new KeychainEntryNotFoundError(source.label)
      }
      return key.trim()
    }

    case 'interactive':
      return (await promptRequired(services.input, 'Private key: ', 'private key')).trim()

    case 'generated':
      return services.crypto.generateKey()
  }
}

async function unlock(protectedKey: string, plan: KeyPlan, services: KeyLoaderServices): Promise<string> {
  const { crypto, input, passwordCache, log } = services
  const cacheId = passwordCacheId(protectedKey)

  if (plan.passwordCache.enabled) {
    const cached = passwordCache.get(cacheId)
    if (cached !== undefined) {
      log?.('Using cached key password')
      return crypto.unlockKey(protectedKey, cached)
    }
  }

  const password = await promptRequired(input, 'Password: ', 'password')
  const key = crypto.unlockKey(protectedKey, password)

  if (plan.passwordCache.enabled) {
    passwordCache.set(cacheId, password, plan.passwordCache.timeoutSeconds)
    log?.(`Key password cached for ${plan.passwordCache.timeoutSeconds}s`)
  }
  return key
}

/**
 * Obtain the plain private key described by the plan
 */
export async function acquireKey(plan: KeyPlan, services: KeyLoaderServices): Promise<string> {
  services.log?.(`Reading private key from ${plan.source.type}`)
  const key = await readSource(plan.source, services)

  switch (services.crypto.inspectKey(key)) {
    case 'plain':
      return key
    case 'protected':
      return unlock(key, plan, services)
    case 'invalid':
      throw new InvalidKeyError(plan.source.type)
  }
}
