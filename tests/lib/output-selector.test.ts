/**
 * Tests for the output selector
 */

import fs from 'node:fs'
import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { selectOutput, writeToSink } from '../../src/lib/output-selector.js'
import { WriteError } from '../../src/lib/errors.js'
import { makeModel, makeTempDir } from '../helpers.js'

describe('output-selector', () => {
  describe('selectOutput', () => {
    it('should write to stdout by default', () => {
      expect(selectOutput(makeModel({ encrypt: true }))).toEqual({ type: 'stdout' })
    })

    it('should suppress output with --quiet', () => {
      expect(selectOutput(makeModel({ quiet: true }))).toEqual({ type: 'suppressed' })
    })

    it('should prefer --output over --quiet', () => {
      expect(selectOutput(makeModel({ quiet: true, output: 'out.enc' }))).toEqual({
        type: 'file',
        path: 'out.enc'
      })
    })

    it('should prefer --output over --quiet whichever was set first', () => {
      const outputFirst = makeModel({ output: 'out.enc', quiet: true })
      const quietFirst = makeModel({ quiet: true, output: 'out.enc' })
      expect(selectOutput(outputFirst)).toEqual(selectOutput(quietFirst))
    })
  })

  describe('writeToSink', () => {
    let tempDir: string
    let written: string[]

    beforeEach(() => {
      tempDir = makeTempDir('output')
      written = []
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    const io = () => ({ stdout: (text: string) => { written.push(text) } })

    it('should append a newline on stdout', () => {
      writeToSink({ type: 'stdout' }, 'hello', io())
      writeToSink({ type: 'stdout' }, 'world\n', io())
      expect(written).toEqual(['hello\n', 'world\n'])
    })

    it('should write files verbatim', () => {
      const target = path.join(tempDir, 'out.enc')
      writeToSink({ type: 'file', path: target }, 'payload', io())
      expect(fs.readFileSync(target, 'utf8')).toBe('payload')
      expect(written).toEqual([])
    })

    it('should discard suppressed output', () => {
      writeToSink({ type: 'suppressed' }, 'payload', io())
      expect(written).toEqual([])
    })

    it('should raise WriteError for an unwritable path', () => {
      const target = path.join(tempDir, 'missing-dir', 'out.enc')
      expect(() => writeToSink({ type: 'file', path: target }, 'payload', io())).toThrow(WriteError)
      expect(() => writeToSink({ type: 'file', path: target }, 'payload', io())).toThrow(
        `Unable to write output to ${target}`
      )
    })
  })
})
