/**
 * Git Backend Factory
 *
 * Provides a centralized way to create and access git backend instances.
 */

import { log } from '@shared/logger'
import { readBackendType } from '../../config'
import type { GitBackendType } from '../../shared/constants'
import type { GitBackend } from './interface'
import { IsomorphicGitBackend } from './IsomorphicGitBackend'
import { SimpleGitBackend } from './SimpleGitBackend'

/**
 * Configuration for backend creation
 */
export interface GitBackendConfig {
  /**
   * Which backend to use
   * Defaults to GREPO_GIT_BACKEND, then isomorphic-git
   */
  type?: GitBackendType

  /**
   * Whether to log backend creation
   */
  verbose?: boolean
}

/**
 * Singleton backend instance
 * Cached to avoid recreating backends on every operation
 */
let cachedBackend: GitBackend | null = null

/**
 * Create a git backend instance
 */
export function createGitBackend(config: GitBackendConfig = {}): GitBackend {
  const type = config.type ?? readBackendType()

  if (config.verbose) {
    log.info(`[GitBackend] Creating backend: ${type}`)
  }

  switch (type) {
    case 'simple-git':
      return new SimpleGitBackend()
    case 'isomorphic-git':
      return new IsomorphicGitBackend()
  }
}

/**
 * Get the singleton git backend instance
 *
 * @param config - Optional configuration (only used on first call)
 */
export function getGitBackend(config: GitBackendConfig = {}): GitBackend {
  if (cachedBackend) {
    return cachedBackend
  }

  cachedBackend = createGitBackend(config)

  if (config.verbose) {
    log.info(`[GitBackend] Using backend: ${cachedBackend.name}`)
  }

  return cachedBackend
}

/**
 * Reset the cached backend instance
 *
 * Useful for testing or when switching backends at runtime
 */
export function resetGitBackend(): void {
  cachedBackend = null
}
