/**
 * keyseal
 *
 * Library entry: the option model, the key/command/output selectors and the
 * default collaborators, for embedding the CLI's decision logic elsewhere.
 */

export type * from './types.js'

export { OPTION_DEFINITIONS, buildOptionModel, listFlagNames, stripDictionary } from './lib/options.js'
export { resolveKeyPlan, resolvePasswordCache, DEFAULT_PASSWORD_TIMEOUT } from './lib/key-resolver.js'
export { selectCommand } from './lib/command-selector.js'
export { selectOutput, writeToSink } from './lib/output-selector.js'
export { acquireKey } from './lib/key-loader.js'
export { nodeCrypto, encrypt, decrypt, generateKey, protectKey, unlockKey, inspectKey } from './lib/crypto.js'
export { MacKeychain, createKeychain, detectCapabilities } from './lib/keychain.js'
export { FilePasswordCache, getPasswordCachePath } from './lib/password-cache.js'
export { loadConfig } from './lib/config-loader.js'
export * from './lib/errors.js'
export { runCli, type CliDependencies } from './cli/app.js'
