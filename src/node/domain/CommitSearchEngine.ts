/**
 * CommitSearchEngine - walks branch histories and filters commits.
 *
 * Every branch is walked over its full history, so a commit shared by two
 * branches is reported once per branch. Use `groupMatchesByCommit` for an
 * exactly-once view.
 */

import type { Branch, Commit, CommitOccurrence, SearchMatch } from '@shared/types'
import type { CommitNode, GitBackend, RepositoryRef } from '../adapters/git'
import { BranchResolutionError, describeError } from '../shared/errors'
import { BranchCatalog } from './BranchCatalog'

export type WalkBranchOptions = {
  /** Safety cap on commits read per branch; unset walks the full history */
  maxCommits?: number
}

export class CommitSearchEngine {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Commits reachable from the branch tip, each before its parents.
   *
   * @throws BranchResolutionError when the tip cannot be resolved or history cannot be read
   */
  public static async *walkBranch(
    backend: GitBackend,
    repo: RepositoryRef,
    branch: Branch,
    options: WalkBranchOptions = {}
  ): AsyncGenerator<Commit> {
    const fail = (error: unknown): unknown => {
      if (repo.signal?.aborted) return error
      return new BranchResolutionError(
        `Cannot walk ${repo.repoName}/${branch.branchName}: ${describeError(error)}`,
        repo.repoName,
        branch.branchName,
        error
      )
    }

    let tipId: string
    try {
      tipId = await backend.resolveBranchTip(repo, branch.branchName)
    } catch (error) {
      throw fail(error)
    }

    const walk = backend.walkAncestryFrom(repo, tipId, { maxCommits: options.maxCommits })
    const iterator = walk[Symbol.asyncIterator]()
    try {
      for (;;) {
        let step: IteratorResult<CommitNode>
        try {
          step = await iterator.next()
        } catch (error) {
          throw fail(error)
        }
        if (step.done) return
        const { id, author, message } = step.value
        yield { id, author, message }
      }
    } finally {
      await iterator.return?.()
    }
  }

  public static matchesPattern(commit: Commit, pattern: string, includeAuthor: boolean): boolean {
    return commit.message.includes(pattern) || (includeAuthor && commit.author.includes(pattern))
  }

  /**
   * Matching commits across every local branch of one repository, in branch
   * order then walk order.
   *
   * @throws BranchResolutionError
   */
  public static async searchRepository(
    backend: GitBackend,
    repo: RepositoryRef,
    pattern: string,
    includeAuthor: boolean,
    options: WalkBranchOptions = {}
  ): Promise<SearchMatch[]> {
    const matches: SearchMatch[] = []
    const branches = await BranchCatalog.listLocalBranches(backend, repo)

    for (const branch of branches) {
      for await (const commit of CommitSearchEngine.walkBranch(backend, repo, branch, options)) {
        if (CommitSearchEngine.matchesPattern(commit, pattern, includeAuthor)) {
          matches.push({ repoName: repo.repoName, branchName: branch.branchName, commit })
        }
      }
    }

    return matches
  }

  /**
   * Collapses per-branch matches into one entry per (repo, commit id), keeping
   * first-seen order and listing every branch that reached the commit.
   */
  public static groupMatchesByCommit(matches: SearchMatch[]): CommitOccurrence[] {
    const byKey = new Map<string, CommitOccurrence>()

    for (const match of matches) {
      const key = `${match.repoName}\u0000${match.commit.id}`
      const existing = byKey.get(key)
      if (existing) {
        if (!existing.branchNames.includes(match.branchName)) {
          existing.branchNames.push(match.branchName)
        }
        continue
      }
      byKey.set(key, {
        repoName: match.repoName,
        commit: match.commit,
        branchNames: [match.branchName]
      })
    }

    return Array.from(byKey.values())
  }
}
