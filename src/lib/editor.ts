/**
 * keyseal Editor
 *
 * Runs the user's editor on a file and waits for it to exit.
 */

import { spawn } from 'node:child_process'
import type { EditorService, KeysealConfig } from '../types.js'
import { EditorError } from './errors.js'

/**
 * Editor command: $VISUAL, then $EDITOR, then config, then vi
 */
export function resolveEditorCommand(env: NodeJS.ProcessEnv, config: KeysealConfig = {}): string {
  return env.VISUAL || env.EDITOR || config.editor || 'vi'
}

export class ProcessEditor implements EditorService {
  constructor(private readonly command: string) {}

  edit(filePath: string): Promise<void> {
    const [program, ...args] = this.command.trim().split(/\s+/)

    return new Promise<void>((resolve, reject) => {
      const child = spawn(program, [...args, filePath], { stdio: 'inherit' })

      child.on('error', err => {
        reject(new EditorError(this.command, err.message, err))
      })

      child.on('close', code => {
        if (code === 0) {
          resolve()
        } else {
          reject(new EditorError(this.command, `exited with code ${code ?? 'null'}`))
        }
      })
    })
  }
}
