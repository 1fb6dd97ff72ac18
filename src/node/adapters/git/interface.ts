/**
 * Git Backend Interface
 *
 * The read-only capabilities the search engine needs from a repository.
 * The engine depends only on this interface, so the backend can be swapped
 * (isomorphic-git, the git CLI through simple-git) or replaced by an
 * in-memory fake in tests.
 */

import type { Branch } from '@shared/types'
import type { CommitNode, HeadState, OpenRepositoryOptions, RepositoryRef, WalkOptions } from './types'

export interface GitBackend {
  /**
   * Get the backend name for logging/debugging
   */
  readonly name: string

  /**
   * Open the repository at `path`.
   *
   * @throws RepoOpenError when the path is missing, unreadable or not a repository
   */
  openRepository(repoName: string, path: string, options?: OpenRepositoryOptions): Promise<RepositoryRef>

  /**
   * List local branches (`refs/heads/*`) in the order the repository yields them.
   *
   * @throws GitError
   */
  listLocalBranches(repo: RepositoryRef): Promise<Branch[]>

  /**
   * Resolve where HEAD points.
   *
   * @throws GitError when HEAD or the branch it names cannot be read
   */
  currentHead(repo: RepositoryRef): Promise<HeadState>

  /**
   * Resolve a local branch name to its tip commit id.
   *
   * @throws GitError
   */
  resolveBranchTip(repo: RepositoryRef, branchName: string): Promise<string>

  /**
   * Walk every commit reachable from `tipId`, children before parents.
   * Checks `repo.signal` between commits.
   */
  walkAncestryFrom(repo: RepositoryRef, tipId: string, options?: WalkOptions): AsyncIterable<CommitNode>
}
