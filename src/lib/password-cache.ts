/**
 * keyseal Password Cache
 *
 * Key passwords are kept in ~/.keyseal/password-cache.json (mode 0600) so
 * later invocations within the timeout can unlock the same key without a
 * prompt. Entries are keyed by a hash of the protected key and pruned once
 * expired.
 */

import crypto from 'node:crypto'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { PasswordCache } from '../types.js'
import { WriteError } from './errors.js'

const CACHE_DIR = '.keyseal'
const CACHE_FILE = 'password-cache.json'

interface Entry {
  password: string
  expiresAt: number
}

type Entries = Record<string, Entry>

function isEntry(value: unknown): value is Entry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'password' in value &&
    typeof value.password === 'string' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number'
  )
}

/**
 * Cache file for this environment
 */
export function getPasswordCachePath(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): string {
  return env.KEYSEAL_PASSWORD_CACHE || path.join(homeDir, CACHE_DIR, CACHE_FILE)
}

export class FilePasswordCache implements PasswordCache {
  constructor(
    private readonly filePath: string,
    private readonly now: () => number = Date.now
  ) {}

  get(id: string): string | undefined {
    const entry = this.load()[id]
    if (!entry || entry.expiresAt <= this.now()) return undefined
    return entry.password
  }

  set(id: string, password: string, ttlSeconds: number): void {
    if (ttlSeconds <= 0) return
    const entries = this.load()
    entries[id] = { password, expiresAt: this.now() + ttlSeconds * 1000 }
    this.save(entries)
  }

  /**
   * Live entries only; a missing or unreadable file is an empty cache
   */
  private load(): Entries {
    let parsed: unknown
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf8'))
    } catch {
      return {}
    }
    if (typeof parsed !== 'object' || parsed === null) return {}

    const now = this.now()
    const entries: Entries = {}
    for (const [id, entry] of Object.entries(parsed)) {
      if (isEntry(entry) && entry.expiresAt > now) {
        entries[id] = entry
      }
    }
    return entries
  }

  private save(entries: Entries): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 })
      fs.writeFileSync(this.filePath, JSON.stringify(entries), { mode: 0o600 })
    } catch (err) {
      throw new WriteError(this.filePath, err instanceof Error ? err : undefined)
    }
  }
}

/**
 * Cache id for a protected key (never the key itself)
 */
export function passwordCacheId(protectedKey: string): string {
  return crypto.createHash('sha256').update(protectedKey.trim()).digest('hex').slice(0, 16)
}
