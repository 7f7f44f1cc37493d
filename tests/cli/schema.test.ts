/**
 * Tests for argv parsing into the option model
 */

import { describe, it, expect } from 'vitest'
import { createKeysealCli, parseArgv } from '../../src/cli/schema.js'
import { createPalette } from '../../src/cli/lib/colors.js'
import { selectCommand } from '../../src/lib/command-selector.js'
import { resolveKeyPlan } from '../../src/lib/key-resolver.js'
import { selectOutput } from '../../src/lib/output-selector.js'
import { ParseError } from '../../src/lib/errors.js'

const CAPS = { keychain: false }

function parse(argv: string[], capabilities = CAPS) {
  return parseArgv(createKeysealCli(capabilities, createPalette({ color: false })), argv, capabilities)
}

describe('schema', () => {
  it('should parse short and long flags alike', () => {
    expect(parse(['-e', '-s', 'hello', '-k', 'mykey'])).toEqual(
      parse(['--encrypt', '--string', 'hello', '--private-key', 'mykey'])
    )
  })

  it('should produce models that differ only in noColor', () => {
    const argv = ['-d', '-f', 'secrets.enc', '-K', 'test.key', '-v']
    const plain = parse(argv)
    const noColor = parse([...argv, '-N'])
    expect(noColor.noColor).toBe(true)
    expect({ ...noColor, noColor: false }).toEqual(plain)
  })

  it('should plan a password-protected key generation into a file', () => {
    const model = parse(['-g', '-p', '-o', 'key.enc'])
    expect(selectCommand(model).kind).toBe('generate')
    const plan = resolveKeyPlan(model)
    expect(plan.source).toEqual({ type: 'generated' })
    expect(plan.passwordProtect).toBe(true)
    expect(selectOutput(model)).toEqual({ type: 'file', path: 'key.enc' })
  })

  it('should plan an inline-key encryption to stdout', () => {
    const model = parse(['-e', '-s', 'hello', '-k', 'mykey'])
    expect(selectCommand(model)).toEqual({
      kind: 'encrypt',
      input: { type: 'string', value: 'hello' },
      backup: false,
      ignored: []
    })
    expect(resolveKeyPlan(model).source).toEqual({ type: 'inline', value: 'mykey' })
    expect(selectOutput(model)).toEqual({ type: 'stdout' })
  })

  it('should pick --output over --quiet regardless of argument order', () => {
    const sink = { type: 'file', path: 'out.enc' }
    expect(selectOutput(parse(['-e', '-q', '-o', 'out.enc']))).toEqual(sink)
    expect(selectOutput(parse(['-e', '-o', 'out.enc', '-q']))).toEqual(sink)
  })

  it('should read --password-timeout as a number', () => {
    expect(parse(['-d', '-M', '60']).passwordTimeout).toBe(60)
  })

  it('should offer --keychain only with the capability', () => {
    expect(() => parse(['-d', '-x', 'work'])).toThrow(ParseError)
    expect(parse(['-d', '-x', 'work'], { keychain: true }).keychain).toBe('work')
  })

  it('should reject stray positional arguments', () => {
    expect(() => parse(['-e', 'extra'])).toThrow(ParseError)
  })
})
