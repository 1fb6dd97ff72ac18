/**
 * Records produced by the multi-repository search engine.
 *
 * Every record is a read-only snapshot rebuilt from on-disk repository state
 * on each call; nothing here is cached between calls.
 */

/**
 * The set of repositories an engine call operates on.
 * Names are resolved against `basePath`; uniqueness is the config layer's job.
 */
export type WatchedRepositorySet = {
  readonly basePath: string
  readonly repoNames: readonly string[]
}

export type Branch = {
  repoName: string
  branchName: string
}

export type Commit = {
  /** 40-character hex object id */
  id: string
  /** `Name <email>` */
  author: string
  /** Full message with trailing whitespace removed */
  message: string
}

/**
 * A commit found by walking `branchName`. The same commit id shows up once
 * per branch that reaches it.
 */
export type SearchMatch = {
  repoName: string
  branchName: string
  commit: Commit
}

/**
 * Exactly-once view of commit search results, keyed by repo and commit id.
 */
export type CommitOccurrence = {
  repoName: string
  commit: Commit
  branchNames: string[]
}

/** Returned by `currentBranchName` when HEAD is unborn or detached. */
export const NO_CURRENT_BRANCH = '(no branch)'

export type RepoOutcome<T, E = Error> =
  | { status: 'opened'; repoName: string; value: T }
  | { status: 'failed'; repoName: string; error: E }

export type BranchMap = Map<string, Branch[]>

export function isOpened<T, E>(
  outcome: RepoOutcome<T, E>
): outcome is Extract<RepoOutcome<T, E>, { status: 'opened' }> {
  return outcome.status === 'opened'
}
