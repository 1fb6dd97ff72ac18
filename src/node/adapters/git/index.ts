/**
 * Git Backend Module
 *
 * Read-only repository access behind one interface, backed by isomorphic-git,
 * the git CLI (simple-git) or in-memory fixtures.
 *
 * Usage:
 * ```typescript
 * import { getGitBackend } from '../adapters/git'
 *
 * const git = getGitBackend()
 * const repo = await git.openRepository('api', '/repos/api')
 * const branches = await git.listLocalBranches(repo)
 * ```
 */

export { createGitBackend, getGitBackend, resetGitBackend } from './factory'
export type { GitBackendConfig } from './factory'

export type { GitBackend } from './interface'

export type {
  CommitNode,
  HeadState,
  OpenRepositoryOptions,
  RepositoryRef,
  WalkOptions
} from './types'

export { InMemoryGitBackend } from './InMemoryGitBackend'
export type { MemoryCommit, MemoryRepository } from './InMemoryGitBackend'
export { IsomorphicGitBackend } from './IsomorphicGitBackend'
export { SimpleGitBackend } from './SimpleGitBackend'

export { formatAuthor, isGitDirectory, locateGitDir, readHead } from './utils'
