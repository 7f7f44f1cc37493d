/**
 * keyseal CLI - Bash Completion
 *
 * Appends the generated completion script to a shell rc file.
 */

import fs from 'node:fs'
import { WriteError } from '../../lib/errors.js'

export const COMPLETION_MARKER = '# keyseal bash completion'

/**
 * Append the script unless the file already carries it
 *
 * Returns false when the completion was already installed.
 */
export function appendCompletion(filePath: string, script: string): boolean {
  let existing = ''
  try {
    existing = fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf8') : ''
  } catch (err) {
    throw new WriteError(filePath, err instanceof Error ? err : undefined)
  }

  if (existing.includes(COMPLETION_MARKER)) {
    return false
  }

  const separator = existing === '' || existing.endsWith('\n') ? '' : '\n'
  try {
    fs.appendFileSync(filePath, `${separator}${COMPLETION_MARKER}\n${script.trimEnd()}\n`)
  } catch (err) {
    throw new WriteError(filePath, err instanceof Error ? err : undefined)
  }
  return true
}
