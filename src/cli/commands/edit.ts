/**
 * keyseal CLI - Edit Command
 *
 * Decrypts a file into a private temp directory, opens it in the editor and
 * re-encrypts it in place when the content changed.
 *
 * @example
 * keyseal -t -f secrets.enc -K ~/.keyseal/key
 * keyseal -t -f secrets.enc -K ~/.keyseal/key -b   # keeps secrets.enc.bak
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { ExecutionError, WriteError } from '../../lib/errors.js'
import { readInput, type CommandContext } from './context.js'

export function backupPath(filePath: string): string {
  return `${filePath}.bak`
}

function writeFile(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, { mode: 0o600 })
  } catch (err) {
    throw new WriteError(filePath, err instanceof Error ? err : undefined)
  }
}

/**
 * Edit an encrypted file in place; the outcome goes to the reporter
 */
export async function runEdit(context: CommandContext, key: string): Promise<void> {
  const { command, services, reporter } = context
  if (command.input.type !== 'file') {
    throw new ExecutionError('Edit mode needs an encrypted file', 'EDIT_REQUIRES_FILE')
  }

  const filePath = command.input.path
  const ciphertext = await readInput(command.input, services)
  const plaintext = services.crypto.decrypt(ciphertext.trim(), key)

  if (command.backup) {
    writeFile(backupPath(filePath), ciphertext)
    reporter.verbose(`Backup written to ${backupPath(filePath)}`)
  }

  const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyseal-'))
  const workFile = path.join(workDir, path.basename(filePath).replace(/\.enc$/, '') || 'plaintext')

  try {
    fs.writeFileSync(workFile, plaintext, { mode: 0o600 })
    await services.editor.edit(workFile)
    const edited = fs.readFileSync(workFile, 'utf8')

    if (edited === plaintext) {
      reporter.log(`No changes to ${filePath}`)
      return
    }

    writeFile(filePath, services.crypto.encrypt(edited, key))
    reporter.success(`Saved ${filePath}`)
  } finally {
    fs.rmSync(workDir, { recursive: true, force: true })
  }
}
