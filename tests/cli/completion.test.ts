/**
 * Tests for bash completion installation
 */

import fs from 'node:fs'
import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { COMPLETION_MARKER, appendCompletion } from '../../src/cli/commands/completion.js'
import { WriteError } from '../../src/lib/errors.js'
import { makeTempDir } from '../helpers.js'

describe('completion', () => {
  let tempDir: string
  let rcPath: string

  beforeEach(() => {
    tempDir = makeTempDir('completion')
    rcPath = path.join(tempDir, '.bashrc')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should create the file with the marked script', () => {
    expect(appendCompletion(rcPath, 'complete -F _keyseal keyseal\n\n')).toBe(true)
    expect(fs.readFileSync(rcPath, 'utf8')).toBe(`${COMPLETION_MARKER}\ncomplete -F _keyseal keyseal\n`)
  })

  it('should append after existing content on a new line', () => {
    fs.writeFileSync(rcPath, 'export PATH=/bin')
    appendCompletion(rcPath, 'complete -F _keyseal keyseal')
    expect(fs.readFileSync(rcPath, 'utf8')).toBe(
      `export PATH=/bin\n${COMPLETION_MARKER}\ncomplete -F _keyseal keyseal\n`
    )
  })

  it('should not install twice', () => {
    appendCompletion(rcPath, 'complete -F _keyseal keyseal')
    expect(appendCompletion(rcPath, 'complete -F _keyseal keyseal')).toBe(false)
    expect(fs.readFileSync(rcPath, 'utf8').split(COMPLETION_MARKER)).toHaveLength(2)
  })

  it('should raise WriteError when the file cannot be written', () => {
    expect(() => appendCompletion(path.join(tempDir, 'missing', '.bashrc'), 'x')).toThrow(WriteError)
  })
})
