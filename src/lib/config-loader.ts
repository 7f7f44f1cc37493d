/**
 * keyseal Config Loader
 *
 * Loads optional defaults from ~/.keyseal/config.yaml (or $KEYSEAL_CONFIG).
 * Command-line flags always win over these values.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { KeysealConfig } from '../types.js'
import { ConfigError } from './errors.js'

const CONFIG_DIR = '.keyseal'
const CONFIG_FILE = 'config.yaml'

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => env[varName] || defaultValue)
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] || '')
}

/**
 * Path of the config file for this environment
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): string {
  return env.KEYSEAL_CONFIG || path.join(homeDir, CONFIG_DIR, CONFIG_FILE)
}

function validateConfig(raw: unknown, configPath: string, env: NodeJS.ProcessEnv): KeysealConfig {
  if (raw === null || raw === undefined) return {}
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError('expected a mapping at the top level', configPath)
  }

  const config: KeysealConfig = {}
  for (const [field, value] of Object.entries(raw)) {
    switch (field) {
      case 'password_timeout':
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
          throw new ConfigError('password_timeout must be a non-negative integer', configPath)
        }
        config.password_timeout = value
        break

      case 'password_cache':
      case 'color':
        if (typeof value !== 'boolean') {
          throw new ConfigError(`${field} must be true or false`, configPath)
        }
        config[field] = value
        break

      case 'editor':
        if (typeof value !== 'string' || value.trim() === '') {
          throw new ConfigError('editor must be a non-empty string', configPath)
        }
        config.editor = expandEnvVars(value, env)
        break

      default:
        throw new ConfigError(`unknown field "${field}"`, configPath)
    }
  }
  return config
}

/**
 * Load the config file; a missing file yields an empty config
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): KeysealConfig {
  const configPath = getConfigPath(env, homeDir)
  if (!fs.existsSync(configPath)) {
    return {}
  }

  let raw: unknown
  try {
    raw = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), configPath, err instanceof Error ? err : undefined)
  }

  return validateConfig(raw, configPath, env)
}
