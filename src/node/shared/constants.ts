/**
 * Engine-wide defaults.
 */

/**
 * Repositories processed in parallel when the caller does not say otherwise.
 */
export const DEFAULT_CONCURRENCY = 4

/**
 * Per-repository deadline. A hung or oversized repository is marked failed
 * after this long instead of blocking the whole run. 0 disables the deadline.
 */
export const DEFAULT_REPO_TIMEOUT_MS = 30_000

/**
 * Base path used when no configuration has been saved yet.
 */
export const DEFAULT_BASE_PATH = '/repos'

export const GIT_BACKENDS = ['isomorphic-git', 'simple-git'] as const
export type GitBackendType = (typeof GIT_BACKENDS)[number]

export function isGitBackendType(value: string): value is GitBackendType {
  return GIT_BACKENDS.some((backend) => backend === value)
}
