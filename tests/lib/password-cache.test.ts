/**
 * Tests for the file-backed password cache
 */

import fs from 'node:fs'
import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  FilePasswordCache,
  getPasswordCachePath,
  passwordCacheId
} from '../../src/lib/password-cache.js'
import { WriteError } from '../../src/lib/errors.js'
import { makeTempDir } from '../helpers.js'

describe('password-cache', () => {
  let tempDir: string
  let cachePath: string
  let now: number

  beforeEach(() => {
    tempDir = makeTempDir('cache')
    cachePath = path.join(tempDir, '.keyseal', 'password-cache.json')
    now = 1_000
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  const clock = () => now

  it('should return a stored password before it expires', () => {
    new FilePasswordCache(cachePath, clock).set('id', 'test-secret', 60)

    now += 59_999
    expect(new FilePasswordCache(cachePath, clock).get('id')).toBe('test-secret')

    now += 1
    expect(new FilePasswordCache(cachePath, clock).get('id')).toBeUndefined()
  })

  it('should create the file readable by the owner only', () => {
    new FilePasswordCache(cachePath, clock).set('id', 'test-secret', 60)
    expect(fs.statSync(cachePath).mode & 0o777).toBe(0o600)
  })

  it('should drop expired entries when writing', () => {
    const cache = new FilePasswordCache(cachePath, clock)
    cache.set('old', 'test-secret', 1)
    now += 5_000
    cache.set('new', 'test-secret', 60)

    expect(Object.keys(JSON.parse(fs.readFileSync(cachePath, 'utf8')))).toEqual(['new'])
  })

  it('should not store anything with a zero timeout', () => {
    new FilePasswordCache(cachePath, clock).set('id', 'test-secret', 0)
    expect(fs.existsSync(cachePath)).toBe(false)
  })

  it('should treat a missing or corrupt file as empty', () => {
    expect(new FilePasswordCache(cachePath, clock).get('id')).toBeUndefined()

    fs.mkdirSync(path.dirname(cachePath), { recursive: true })
    fs.writeFileSync(cachePath, '{not json')
    expect(new FilePasswordCache(cachePath, clock).get('id')).toBeUndefined()
  })

  it('should raise WriteError when the cache cannot be written', () => {
    const blocker = path.join(tempDir, 'blocker')
    fs.writeFileSync(blocker, '')
    const cache = new FilePasswordCache(path.join(blocker, 'password-cache.json'), clock)
    expect(() => cache.set('id', 'test-secret', 60)).toThrow(WriteError)
  })

  describe('getPasswordCachePath', () => {
    it('should default to ~/.keyseal/password-cache.json', () => {
      expect(getPasswordCachePath({}, '/home/test')).toBe(
        path.join('/home/test', '.keyseal', 'password-cache.json')
      )
    })

    it('should honor KEYSEAL_PASSWORD_CACHE', () => {
      expect(getPasswordCachePath({ KEYSEAL_PASSWORD_CACHE: '/tmp/cache.json' }, '/home/test')).toBe(
        '/tmp/cache.json'
      )
    })
  })

  describe('passwordCacheId', () => {
    it('should be a short stable hash that ignores whitespace', () => {
      const id = passwordCacheId('locked-key')
      expect(id).toMatch(/^[0-9a-f]{16}$/)
      expect(passwordCacheId('locked-key\n')).toBe(id)
      expect(passwordCacheId('other-key')).not.toBe(id)
    })
  })
})
