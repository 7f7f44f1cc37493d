/**
 * keyseal Input
 *
 * Secret prompts on the controlling terminal and whole-stdin reads.
 */

import type { InputService } from '../types.js'

const CTRL_C = '\u0003'
const CTRL_D = '\u0004'
const BACKSPACE = ['\u007f', '\b']

/**
 * Prompt on stderr with echo disabled (raw mode)
 */
export function promptSecret(
  label: string,
  input: NodeJS.ReadStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    if (!input.isTTY || typeof input.setRawMode !== 'function') {
      reject(new Error('Interactive prompt requires a terminal'))
      return
    }

    let value = ''
    output.write(label)

    const cleanup = (): void => {
      input.off('data', onData)
      input.setRawMode(false)
      input.pause()
      output.write('\n')
    }

    const onData = (chunk: Buffer | string): void => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8')

      for (const char of text) {
        if (char === '\r' || char === '\n' || char === CTRL_D) {
          cleanup()
          resolve(value)
          return
        }
        if (char === CTRL_C) {
          cleanup()
          reject(new Error('Prompt interrupted'))
          return
        }
        if (BACKSPACE.includes(char)) {
          value = value.slice(0, -1)
          continue
        }
        value += char
      }
    }

    input.resume()
    input.setRawMode(true)
    input.on('data', onData)
  })
}

/**
 * Read all of stdin as UTF-8
 */
export async function readStdin(input: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of input) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)
  }
  return Buffer.concat(chunks).toString('utf8')
}

export const terminalInput: InputService = {
  promptSecret: label => promptSecret(label),
  readStdin: () => readStdin()
}
