/**
 * Tests for stdin input
 */

import { Readable } from 'node:stream'
import { describe, it, expect } from 'vitest'
import { readStdin } from '../../src/lib/input.js'

describe('input', () => {
  describe('readStdin', () => {
    it('should concatenate every chunk', async () => {
      const stream = Readable.from([Buffer.from('hello '), Buffer.from('world\n')])
      expect(await readStdin(stream)).toBe('hello world\n')
    })

    it('should return an empty string for empty input', async () => {
      expect(await readStdin(Readable.from([]))).toBe('')
    })
  })
})
