/**
 * keyseal Private Key Resolver
 *
 * Decides where the private key comes from. Precedence, first match wins:
 * 1. --generate      new key (--keychain becomes the place to store it)
 * 2. --interactive   prompt without echo
 * 3. --private-key   key given inline
 * 4. --keyfile       key read from a file
 * 5. --keychain      key read from the OS keychain
 *
 * Lower-precedence sources given alongside the winner are reported as ignored.
 */

import type {
  KeyPlan,
  KeySource,
  KeySourceFlag,
  KeysealConfig,
  OptionModel,
  PasswordCachePolicy
} from '../types.js'
import { NoKeySpecifiedError } from './errors.js'

export const DEFAULT_PASSWORD_TIMEOUT = 300

interface Candidate {
  flag: KeySourceFlag
  source: KeySource | null
}

function candidates(model: OptionModel): Candidate[] {
  return [
    { flag: '--generate', source: model.generate ? { type: 'generated' } : null },
    { flag: '--interactive', source: model.interactive ? { type: 'interactive' } : null },
    {
      flag: '--private-key',
      source: model.privateKey !== undefined ? { type: 'inline', value: model.privateKey } : null
    },
    { flag: '--keyfile', source: model.keyfile !== undefined ? { type: 'keyfile', path: model.keyfile } : null },
    {
      flag: '--keychain',
      source: model.keychain !== undefined ? { type: 'keychain', label: model.keychain } : null
    }
  ]
}

/**
 * Password cache settings: flags win over config, config over defaults
 */
export function resolvePasswordCache(model: OptionModel, config: KeysealConfig = {}): PasswordCachePolicy {
  return {
    enabled: !model.noPasswordCache && config.password_cache !== false,
    timeoutSeconds: model.passwordTimeout ?? config.password_timeout ?? DEFAULT_PASSWORD_TIMEOUT
  }
}

/**
 * Resolve the single key source for this invocation
 */
export function resolveKeyPlan(model: OptionModel, config: KeysealConfig = {}): KeyPlan {
  const passwordCache = resolvePasswordCache(model, config)

  if (model.generate) {
    // On generate, --keychain names the entry that receives the new key
    const ignored = candidates(model)
      .filter(c => c.source && c.flag !== '--generate' && c.flag !== '--keychain')
      .map(c => c.flag)
    return {
      source: { type: 'generated' },
      passwordProtect: model.password,
      passwordCache,
      keychainTarget: model.keychain,
      ignored
    }
  }

  const present = candidates(model).filter(c => c.source !== null)
  const winner = present[0]
  if (!winner?.source) {
    throw new NoKeySpecifiedError()
  }

  return {
    source: winner.source,
    passwordProtect: model.password,
    passwordCache,
    ignored: present.slice(1).map(c => c.flag)
  }
}
