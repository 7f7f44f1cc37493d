/**
 * Shared fakes for keyseal tests
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type {
  EditorService,
  InputService,
  KeychainService,
  OptionModel
} from '../src/types.js'

export function makeModel(overrides: Partial<OptionModel> = {}): OptionModel {
  return {
    encrypt: false,
    decrypt: false,
    edit: false,
    generate: false,
    password: false,
    interactive: false,
    noPasswordCache: false,
    backup: false,
    verbose: false,
    trace: false,
    debug: false,
    quiet: false,
    version: false,
    noColor: false,
    examples: false,
    help: false,
    ...overrides
  }
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `keyseal-${prefix}-`))
}

/**
 * Answers prompts from a queue; an empty queue behaves like Ctrl+C
 */
export class FakeInput implements InputService {
  readonly prompts: string[] = []

  constructor(private readonly answers: string[] = [], private readonly stdin = '') {}

  async promptSecret(label: string): Promise<string> {
    this.prompts.push(label)
    const answer = this.answers.shift()
    if (answer === undefined) {
      throw new Error('Prompt interrupted')
    }
    return answer
  }

  async readStdin(): Promise<string> {
    return this.stdin
  }
}

export class FakeKeychain implements KeychainService {
  readonly entries = new Map<string, string>()

  read(label: string): string | null {
    return this.entries.get(label) ?? null
  }

  write(label: string, key: string): void {
    this.entries.set(label, key)
  }
}

/**
 * Rewrites the file the way a user would in their editor
 */
export class FakeEditor implements EditorService {
  readonly seen: string[] = []

  constructor(private readonly transform: (content: string) => string = content => content) {}

  async edit(filePath: string): Promise<void> {
    const content = fs.readFileSync(filePath, 'utf8')
    this.seen.push(content)
    fs.writeFileSync(filePath, this.transform(content))
  }
}
