import { isLogLevel, type LogLevel } from '@shared/logger'
import dotenv from 'dotenv'
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_REPO_TIMEOUT_MS,
  GIT_BACKENDS,
  isGitBackendType,
  type GitBackendType
} from './shared/constants'
import { ValidationError } from './shared/errors'

export type Configuration = {
  backend: GitBackendType
  concurrency: number
  repoTimeoutMs: number
  /** Where the watched-set file lives; undefined uses the platform config dir */
  configDir?: string
  logLevel: LogLevel
}

type Env = Record<string, string | undefined>

/**
 * Loads `.env` into `process.env`. Existing variables win.
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined)
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim()
  if (!raw) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${key} must be an integer >= ${min}, got "${raw}"`, key)
  }
  return value
}

/**
 * GREPO_GIT_BACKEND, defaulting to isomorphic-git.
 */
export function readBackendType(env: Env = process.env): GitBackendType {
  const backend = env.GREPO_GIT_BACKEND?.trim() || 'isomorphic-git'
  if (!isGitBackendType(backend)) {
    throw new ValidationError(
      `GREPO_GIT_BACKEND must be one of ${GIT_BACKENDS.join(', ')}, got "${backend}"`,
      'GREPO_GIT_BACKEND'
    )
  }
  return backend
}

export function loadConfiguration(env: Env = process.env): Configuration {
  const backend = readBackendType(env)

  const logLevel = env.LOG_LEVEL?.trim() || 'info'
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`LOG_LEVEL must be debug, info, warn or error, got "${logLevel}"`, 'LOG_LEVEL')
  }

  return {
    backend,
    concurrency: readInteger(env, 'GREPO_CONCURRENCY', DEFAULT_CONCURRENCY, 1),
    repoTimeoutMs: readInteger(env, 'GREPO_REPO_TIMEOUT_MS', DEFAULT_REPO_TIMEOUT_MS, 0),
    configDir: env.GREPO_CONFIG_DIR?.trim() || undefined,
    logLevel
  }
}
