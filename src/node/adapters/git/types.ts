/**
 * Git Backend Types
 *
 * Type definitions shared by every backend, independent of the library that
 * reads the repository (isomorphic-git, simple-git, in-memory fixtures).
 */

import type { Commit } from '@shared/types'

/**
 * An opened repository, valid for the duration of one engine call.
 */
export type RepositoryRef = {
  repoName: string
  /** `basePath/repoName` as given */
  path: string
  /** Absolute path of the git directory (`.git` for a working copy, `path` for a bare repo) */
  gitdir: string
  /** Where objects and refs live; `gitdir` except in a linked worktree */
  commondir: string
  /** Aborts backend reads issued through this handle */
  signal?: AbortSignal
}

export type OpenRepositoryOptions = {
  signal?: AbortSignal
}

/**
 * Where HEAD points.
 */
export type HeadState =
  | { kind: 'branch'; branchName: string }
  | { kind: 'unborn'; branchName: string }
  | { kind: 'detached'; commitId: string }

/**
 * A commit as read by a backend, with the links the revision walk follows.
 */
export type CommitNode = Commit & {
  parents: string[]
  /** Committer time in seconds since the epoch */
  timestamp: number
}

export type WalkOptions = {
  /**
   * Stop after this many commits. Undefined walks the full history.
   */
  maxCommits?: number
}
