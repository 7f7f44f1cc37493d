/**
 * keyseal Types
 */

// ============================================================================
// Options
// ============================================================================

/**
 * Platform features resolved once at startup
 */
export interface Capabilities {
  /** OS keychain is available (enables --keychain) */
  keychain: boolean
}

/**
 * Normalized view of the command line
 *
 * Built once per invocation and frozen.
 */
export interface OptionModel {
  // Modes
  encrypt: boolean
  decrypt: boolean
  edit: boolean
  generate: boolean
  // Key creation
  password: boolean
  keychain?: string
  // Key input
  interactive: boolean
  privateKey?: string
  keyfile?: string
  // Key caching
  passwordTimeout?: number
  noPasswordCache: boolean
  // Data
  string?: string
  file?: string
  output?: string
  // Edit
  backup: boolean
  // Diagnostics / UX
  verbose: boolean
  trace: boolean
  debug: boolean
  quiet: boolean
  version: boolean
  noColor: boolean
  // Utility
  bashCompletion?: string
  examples: boolean
  help: boolean
}

export type OptionValue = string | number | boolean

// ============================================================================
// Derived plans
// ============================================================================

export type CommandKind = 'generate' | 'encrypt' | 'decrypt' | 'edit'

export type DataInput =
  | { type: 'string'; value: string }
  | { type: 'file'; path: string }
  | { type: 'stdin' }
  | { type: 'none' }

export interface CommandPlan {
  kind: CommandKind
  input: DataInput
  /** Write <file>.bak before editing */
  backup: boolean
  /** Flags that were given but have no effect for this command */
  ignored: string[]
}

export type KeySource =
  | { type: 'inline'; value: string }
  | { type: 'keyfile'; path: string }
  | { type: 'keychain'; label: string }
  | { type: 'interactive' }
  | { type: 'generated' }

export type KeySourceFlag = '--generate' | '--interactive' | '--private-key' | '--keyfile' | '--keychain'

export interface PasswordCachePolicy {
  enabled: boolean
  timeoutSeconds: number
}

export interface KeyPlan {
  source: KeySource
  /** Protect a newly generated key with a password */
  passwordProtect: boolean
  passwordCache: PasswordCachePolicy
  /** Keychain entry that receives a generated key */
  keychainTarget?: string
  /** Lower-precedence key sources that were also given */
  ignored: KeySourceFlag[]
}

export type OutputSink =
  | { type: 'file'; path: string }
  | { type: 'stdout' }
  | { type: 'suppressed' }

// ============================================================================
// Errors
// ============================================================================

export type ErrorKind =
  | 'ParseError'
  | 'CommandAmbiguous'
  | 'KeyResolutionError'
  | 'WriteError'
  | 'ExecutionError'

/**
 * Structured error rendered at the top level
 */
export interface ErrorRecord {
  kind: ErrorKind
  code: string
  message: string
  suggestion?: string
  /** Resolved option set, sensitive values masked */
  options: Record<string, OptionValue>
  /** Only with --trace */
  stack?: string
}

// ============================================================================
// Configuration
// ============================================================================

export interface KeysealConfig {
  /** Seconds an unlocked key password stays cached */
  password_timeout?: number
  /** Cache key passwords at all */
  password_cache?: boolean
  /** Editor command for --edit */
  editor?: string
  /** Colored output */
  color?: boolean
}

// ============================================================================
// Collaborators
// ============================================================================

export interface EncryptOptions {
  /** Deflate before encrypting (default: true) */
  compress?: boolean
}

export interface GenerateKeyOptions {
  /** Protect the new key with this password */
  password?: string
}

export type KeyKind = 'plain' | 'protected' | 'invalid'

export interface CryptoService {
  encrypt(plaintext: string, key: string, options?: EncryptOptions): string
  decrypt(ciphertext: string, key: string): string
  generateKey(options?: GenerateKeyOptions): string
  inspectKey(key: string): KeyKind
  unlockKey(protectedKey: string, password: string): string
}

export interface KeychainService {
  read(label: string): string | null
  write(label: string, key: string): void
}

export interface InputService {
  /** Prompt without echoing the answer */
  promptSecret(label: string): Promise<string>
  readStdin(): Promise<string>
}

export interface EditorService {
  /** Open the file in the editor and wait for it to exit */
  edit(filePath: string): Promise<void>
}

export interface PasswordCache {
  get(id: string): string | undefined
  set(id: string, password: string, ttlSeconds: number): void
}
