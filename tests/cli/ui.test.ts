/**
 * Tests for CLI UI utilities
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { createReporter, formatKeyValue, renderError, type Streams } from '../../src/cli/ui.js'
import { createPalette } from '../../src/cli/lib/colors.js'
import type { ErrorRecord } from '../../src/types.js'

describe('ui', () => {
  let out: string[]
  let err: string[]
  let streams: Streams

  beforeEach(() => {
    out = []
    err = []
    streams = {
      stdout: text => { out.push(text) },
      stderr: text => { err.push(text) }
    }
  })

  const reporter = (flags: { quiet?: boolean; verbose?: boolean; debug?: boolean } = {}) =>
    createReporter(streams, {
      palette: createPalette({ color: false }),
      quiet: flags.quiet ?? false,
      verbose: flags.verbose ?? false,
      debug: flags.debug ?? false
    })

  describe('createReporter', () => {
    it('should keep stdout for output only', () => {
      const r = reporter({ verbose: true })
      r.output('keyseal v1.0.0')
      r.log('note')
      r.verbose('detail')
      r.success('done')
      r.warn('careful')
      expect(out).toEqual(['keyseal v1.0.0\n'])
      expect(err).toEqual(['note\n', '[keyseal] detail\n', '[OK] done\n', '[WARN] careful\n'])
    })

    it('should drop everything but errors in quiet mode', () => {
      const r = reporter({ quiet: true, verbose: true })
      r.log('note')
      r.verbose('detail')
      r.success('done')
      r.warn('careful')
      r.error('boom')
      expect(err).toEqual(['[ERROR] boom\n'])
    })

    it('should print debug lines only with debug', () => {
      reporter().debug('hidden')
      reporter({ debug: true }).debug('shown')
      expect(err).toEqual(['[keyseal:debug] shown\n'])
    })
  })

  describe('formatKeyValue', () => {
    it('should pad keys to the same width', () => {
      expect(formatKeyValue([['--encrypt', 'true'], ['--private-key', '****']])).toBe(
        '--encrypt     = true\n--private-key = ****'
      )
    })

    it('should return an empty string for no pairs', () => {
      expect(formatKeyValue([])).toBe('')
    })
  })

  describe('renderError', () => {
    const record: ErrorRecord = {
      kind: 'KeyResolutionError',
      code: 'NO_KEY_SPECIFIED',
      message: 'No private key specified',
      suggestion: 'Pass the key with -k',
      options: { encrypt: true, 'private-key': '****' }
    }

    it('should print the message and suggestion', () => {
      renderError(reporter(), record, { quiet: false, debug: false })
      expect(err.join('')).toBe('[ERROR] No private key specified\n  Suggestion: Pass the key with -k\n')
    })

    it('should drop the suggestion in quiet mode', () => {
      renderError(reporter({ quiet: true }), record, { quiet: true, debug: false })
      expect(err.join('')).toBe('[ERROR] No private key specified\n')
    })

    it('should add kind, code and options in debug mode', () => {
      renderError(reporter({ debug: true }), record, { quiet: false, debug: true })
      expect(err).toEqual([
        '[ERROR] No private key specified\n',
        '  Suggestion: Pass the key with -k\n',
        '[keyseal:debug] KeyResolutionError (NO_KEY_SPECIFIED)\n',
        '[keyseal:debug] options:\n--encrypt     = true\n--private-key = ****\n'
      ])
    })

    it('should print the stack when present', () => {
      renderError(reporter(), { ...record, suggestion: undefined, stack: 'Error: x\n    at y' }, { quiet: false, debug: false })
      expect(err).toEqual(['[ERROR] No private key specified\n', 'Error: x\n    at y\n'])
    })
  })
})
