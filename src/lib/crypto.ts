/**
 * keyseal Crypto Module
 *
 * Symmetric encryption with a 256-bit private key.
 *
 * Flow (encrypt):
 * 1. Deflate the plaintext (optional)
 * 2. Encrypt with AES-256-GCM under a random 12-byte IV
 * 3. Package as an EncryptedEnvelope and serialize to base64 JSON
 *
 * Password-protected keys use the same envelope, with the AES key derived
 * from the password via scrypt.
 */

import crypto from 'node:crypto'
import zlib from 'node:zlib'
import type { CryptoService, EncryptOptions, GenerateKeyOptions, KeyKind } from '../types.js'
import { DecryptionError, WrongPasswordError } from './errors.js'

const KEY_BYTES = 32
const IV_BYTES = 12
const SALT_BYTES = 16

export interface EncryptedEnvelope {
  v: 1
  alg: 'aes-256-gcm' | 'scrypt+aes-256-gcm'
  iv: string
  data: string
  tag: string
  /** Payload was deflated before encryption */
  z?: boolean
  /** scrypt salt (password-protected keys only) */
  salt?: string
}

// ============================================================================
// Envelope helpers
// ============================================================================

function seal(payload: Buffer, aesKey: Buffer): Pick<EncryptedEnvelope, 'iv' | 'data' | 'tag'> {
  const iv = crypto.randomBytes(IV_BYTES)
  const cipher = crypto.createCipheriv('aes-256-gcm', aesKey, iv)
  const data = Buffer.concat([cipher.update(payload), cipher.final()])
  return {
    iv: iv.toString('base64'),
    data: data.toString('base64'),
    tag: cipher.getAuthTag().toString('base64')
  }
}

function open(envelope: EncryptedEnvelope, aesKey: Buffer): Buffer {
  const decipher = crypto.createDecipheriv('aes-256-gcm', aesKey, Buffer.from(envelope.iv, 'base64'))
  decipher.setAuthTag(Buffer.from(envelope.tag, 'base64'))
  return Buffer.concat([
    decipher.update(Buffer.from(envelope.data, 'base64')),
    decipher.final()
  ])
}

/**
 * Check if data is an encrypted envelope
 */
export function isEnvelope(data: unknown): data is EncryptedEnvelope {
  if (typeof data !== 'object' || data === null) return false
  const obj = data as Record<string, unknown>
  return (
    obj.v === 1 &&
    (obj.alg === 'aes-256-gcm' || obj.alg === 'scrypt+aes-256-gcm') &&
    typeof obj.iv === 'string' &&
    typeof obj.data === 'string' &&
    typeof obj.tag === 'string'
  )
}

export function serializeEnvelope(envelope: EncryptedEnvelope): string {
  return Buffer.from(JSON.stringify(envelope), 'utf8').toString('base64')
}

/**
 * Parse a serialized envelope, or null when the text is not one
 */
export function parseEnvelope(serialized: string): EncryptedEnvelope | null {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(serialized.trim(), 'base64').toString('utf8'))
    return isEnvelope(parsed) ? parsed : null
  } catch {
    return null
  }
}

function decodeKey(key: string): Buffer | null {
  const trimmed = key.trim()
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(trimmed)) return null
  const bytes = Buffer.from(trimmed, 'base64')
  return bytes.length === KEY_BYTES ? bytes : null
}

function requireKey(key: string): Buffer {
  const bytes = decodeKey(key)
  if (!bytes) {
    throw new DecryptionError('private key is not a 256-bit base64 key')
  }
  return bytes
}

// ============================================================================
// Keys
// ============================================================================

/**
 * Generate a new base64 private key
 */
export function generateKey(options: GenerateKeyOptions = {}): string {
  const key = crypto.randomBytes(KEY_BYTES).toString('base64')
  return options.password !== undefined ? protectKey(key, options.password) : key
}

/**
 * Encrypt a private key with a password
 */
export function protectKey(key: string, password: string): string {
  const salt = crypto.randomBytes(SALT_BYTES)
  const derived = crypto.scryptSync(password, salt, KEY_BYTES)
  return serializeEnvelope({
    v: 1,
    alg: 'scrypt+aes-256-gcm',
    salt: salt.toString('base64'),
    ...seal(Buffer.from(key, 'utf8'), derived)
  })
}

/**
 * Decrypt a password-protected private key
 */
export function unlockKey(protectedKey: string, password: string): string {
  const envelope = parseEnvelope(protectedKey)
  if (!envelope || envelope.alg !== 'scrypt+aes-256-gcm' || envelope.salt === undefined) {
    throw new DecryptionError('private key is not password-protected')
  }
  const derived = crypto.scryptSync(password, Buffer.from(envelope.salt, 'base64'), KEY_BYTES)
  try {
    return open(envelope, derived).toString('utf8')
  } catch (err) {
    throw new WrongPasswordError(err instanceof Error ? err : undefined)
  }
}

/**
 * Tell plain keys, password-protected keys and garbage apart
 */
export function inspectKey(key: string): KeyKind {
  if (decodeKey(key)) return 'plain'
  const envelope = parseEnvelope(key)
  if (envelope?.alg === 'scrypt+aes-256-gcm' && envelope.salt !== undefined) return 'protected'
  return 'invalid'
}

// ============================================================================
// Data
// ============================================================================

export function encrypt(plaintext: string, key: string, options: EncryptOptions = {}): string {
  const aesKey = requireKey(key)
  const compress = options.compress ?? true
  const payload = Buffer.from(plaintext, 'utf8')
  return serializeEnvelope({
    v: 1,
    alg: 'aes-256-gcm',
    ...seal(compress ? zlib.deflateSync(payload) : payload, aesKey),
    ...(compress ? { z: true } : {})
  })
}

export function decrypt(ciphertext: string, key: string): string {
  const aesKey = requireKey(key)
  const envelope = parseEnvelope(ciphertext)
  if (!envelope || envelope.alg !== 'aes-256-gcm') {
    throw new DecryptionError('input is not keyseal ciphertext')
  }

  let payload: Buffer
  try {
    payload = open(envelope, aesKey)
  } catch (err) {
    throw new DecryptionError('wrong key or corrupted data', err instanceof Error ? err : undefined)
  }

  return (envelope.z ? zlib.inflateSync(payload) : payload).toString('utf8')
}

/**
 * Default cryptography collaborator
 */
export const nodeCrypto: CryptoService = {
  encrypt,
  decrypt,
  generateKey,
  inspectKey,
  unlockKey
}
