#!/usr/bin/env node
/**
 * keyseal CLI
 *
 * Encrypt, decrypt or edit data with a private key
 */

import { runCli, type CliDependencies } from './app.js'
import { nodeCrypto } from '../lib/crypto.js'
import { createKeychain, detectCapabilities } from '../lib/keychain.js'
import { terminalInput } from '../lib/input.js'
import { ProcessEditor, resolveEditorCommand } from '../lib/editor.js'
import { FilePasswordCache, getPasswordCachePath } from '../lib/password-cache.js'
import { loadConfig } from '../lib/config-loader.js'
import { formatErrorForCli } from '../lib/errors.js'

const capabilities = detectCapabilities()

const deps: CliDependencies = {
  streams: {
    stdout: text => { process.stdout.write(text) },
    stderr: text => { process.stderr.write(text) }
  },
  env: process.env,
  isTTY: process.stderr.isTTY ?? false,
  capabilities,
  loadConfig: () => loadConfig(process.env),
  createServices: config => ({
    crypto: nodeCrypto,
    keychain: createKeychain(capabilities),
    input: terminalInput,
    editor: new ProcessEditor(resolveEditorCommand(process.env, config)),
    passwordCache: new FilePasswordCache(getPasswordCachePath(process.env))
  })
}

runCli(process.argv.slice(2), deps)
  .then(code => {
    process.exitCode = code
  })
  .catch(err => {
    // runCli renders its own errors; this only catches failures in rendering
    console.error(`Fatal error: ${formatErrorForCli(err)}`)
    process.exitCode = 1
  })
