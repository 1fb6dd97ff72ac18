/**
 * SearchAggregator - runs the engine across a watched repository set.
 *
 * Each repository is opened, inspected and released inside its own task:
 * - tasks run on a bounded worker pool and results keep `repoNames` order
 * - every task has its own deadline; an overrun marks only that repo failed
 * - a repo that cannot be opened is skipped and logged, never fatal
 * - the caller's signal cancels the whole call (OperationCancelledError)
 *
 * Commit search is the one place where a failure escalates: a branch that
 * cannot be resolved or walked fails the whole search with SearchError and
 * cancels the remaining repository tasks.
 */

import { log } from '@shared/logger'
import { isOpened } from '@shared/types'
import type {
  Branch,
  BranchMap,
  CommitOccurrence,
  RepoOutcome,
  SearchMatch,
  WatchedRepositorySet
} from '@shared/types'
import type { GitBackend, RepositoryRef } from '../adapters/git'
import { getGitBackend } from '../adapters/git'
import { BranchCatalog } from '../domain/BranchCatalog'
import { CommitSearchEngine } from '../domain/CommitSearchEngine'
import { RepositoryHandle } from '../domain/RepositoryHandle'
import { DEFAULT_CONCURRENCY, DEFAULT_REPO_TIMEOUT_MS } from '../shared/constants'
import {
  AppError,
  BranchResolutionError,
  describeError,
  OperationCancelledError,
  SearchError
} from '../shared/errors'
import { mapWithConcurrency, withDeadline } from '../utils/concurrency'

export type EngineOptions = {
  /** Cancels the whole call */
  signal?: AbortSignal
  /** Deadline per repository in ms; 0 disables it */
  repoTimeoutMs?: number
  /** Repositories processed in parallel */
  concurrency?: number
  /** Safety cap on commits read per branch during commit search */
  maxCommitsPerBranch?: number
}

export type CommitSearchResult =
  | { success: true; matches: SearchMatch[] }
  | { success: false; error: SearchError }

export type SearchAggregatorDependencies = {
  backend?: GitBackend
  /** Defaults applied when a call leaves an option unset */
  defaults?: Omit<EngineOptions, 'signal'>
}

type RepoTask<T> = (repo: RepositoryRef) => Promise<T>

export class SearchAggregator {
  private readonly backend: GitBackend
  private readonly defaults: Omit<EngineOptions, 'signal'>

  constructor(dependencies: SearchAggregatorDependencies = {}) {
    this.backend = dependencies.backend ?? getGitBackend()
    this.defaults = dependencies.defaults ?? {}
  }

  /**
   * Local branches of every repository, one outcome per name in set order.
   */
  async listBranchOutcomes(
    set: WatchedRepositorySet,
    options: EngineOptions = {}
  ): Promise<RepoOutcome<Branch[], AppError>[]> {
    return this.forEachRepo(set, (repo) => BranchCatalog.listLocalBranches(this.backend, repo), options)
  }

  /**
   * Plain listing. Repositories that fail are left out; repositories without
   * branches map to an empty list.
   */
  async listBranches(set: WatchedRepositorySet, options: EngineOptions = {}): Promise<BranchMap> {
    const outcomes = await this.listBranchOutcomes(set, options)
    const result: BranchMap = new Map()
    for (const outcome of outcomes) {
      if (isOpened(outcome)) result.set(outcome.repoName, outcome.value)
    }
    return result
  }

  /**
   * Current branch of every repository. A HEAD that cannot be resolved fails
   * only its own repository.
   */
  async currentBranches(
    set: WatchedRepositorySet,
    options: EngineOptions = {}
  ): Promise<RepoOutcome<string, AppError>[]> {
    return this.forEachRepo(set, (repo) => BranchCatalog.currentBranchName(this.backend, repo), options)
  }

  /**
   * Branches whose name contains `pattern`. Repositories without a match are
   * absent from the result.
   */
  async branchSearch(
    set: WatchedRepositorySet,
    pattern: string,
    options: EngineOptions = {}
  ): Promise<BranchMap> {
    const outcomes = await this.listBranchOutcomes(set, options)
    const result: BranchMap = new Map()
    for (const outcome of outcomes) {
      if (!isOpened(outcome)) continue
      const matches = BranchCatalog.filterByName(outcome.value, pattern)
      if (matches.length > 0) result.set(outcome.repoName, matches)
    }
    return result
  }

  /**
   * Commits whose message (or, with `includeAuthor`, author) contains
   * `pattern`, walking every local branch of every repository.
   */
  async commitSearch(
    set: WatchedRepositorySet,
    pattern: string,
    includeAuthor: boolean,
    options: EngineOptions = {}
  ): Promise<CommitSearchResult> {
    const maxCommits = options.maxCommitsPerBranch ?? this.defaults.maxCommitsPerBranch
    const outcomes = await this.forEachRepo(
      set,
      (repo) =>
        CommitSearchEngine.searchRepository(this.backend, repo, pattern, includeAuthor, {
          maxCommits
        }),
      options,
      (error) => error instanceof BranchResolutionError
    )

    for (const outcome of outcomes) {
      if (outcome.status === 'failed' && outcome.error instanceof BranchResolutionError) {
        return {
          success: false,
          error: new SearchError(
            `Commit search for "${pattern}" failed: ${outcome.error.message}`,
            pattern,
            outcome.error
          )
        }
      }
    }

    return {
      success: true,
      matches: outcomes.flatMap((outcome) => (isOpened(outcome) ? outcome.value : []))
    }
  }

  /**
   * Exactly-once view of commit search results.
   */
  groupMatchesByCommit(matches: SearchMatch[]): CommitOccurrence[] {
    return CommitSearchEngine.groupMatchesByCommit(matches)
  }

  /**
   * Opens every repository in the set and runs `task` on it.
   *
   * @param isFatal - a failure matching this predicate cancels the other tasks
   * @throws OperationCancelledError when the caller's signal aborts
   */
  async forEachRepo<T>(
    set: WatchedRepositorySet,
    task: RepoTask<T>,
    options: EngineOptions = {},
    isFatal?: (error: AppError) => boolean
  ): Promise<RepoOutcome<T, AppError>[]> {
    const { signal } = options
    const repoTimeoutMs = options.repoTimeoutMs ?? this.defaults.repoTimeoutMs ?? DEFAULT_REPO_TIMEOUT_MS
    const concurrency = options.concurrency ?? this.defaults.concurrency ?? DEFAULT_CONCURRENCY

    if (signal?.aborted) {
      throw new OperationCancelledError()
    }

    const run = new AbortController()
    const onCallerAbort = (): void => run.abort(new OperationCancelledError())
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    const startedAt = Date.now()
    try {
      const outcomes = await mapWithConcurrency(set.repoNames, concurrency, async (repoName) =>
        this.runRepoTask(set.basePath, repoName, task, {
          signal: run.signal,
          repoTimeoutMs,
          onFatal: isFatal
            ? (error) => {
                if (isFatal(error) && !run.signal.aborted) {
                  run.abort(new OperationCancelledError(`Cancelled after ${repoName} failed`))
                }
              }
            : undefined
        })
      )

      if (signal?.aborted) {
        throw new OperationCancelledError()
      }

      log.debug(
        `[SearchAggregator] ${set.repoNames.length} repos in ${Date.now() - startedAt}ms ` +
          `(${outcomes.filter((outcome) => outcome.status === 'failed').length} failed)`
      )
      return outcomes
    } finally {
      signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  private async runRepoTask<T>(
    basePath: string,
    repoName: string,
    task: RepoTask<T>,
    context: {
      signal: AbortSignal
      repoTimeoutMs: number
      onFatal?: (error: AppError) => void
    }
  ): Promise<RepoOutcome<T, AppError>> {
    try {
      const value = await withDeadline(
        async (signal) => {
          const opened = await RepositoryHandle.open(this.backend, basePath, repoName, { signal })
          if (!opened.success) throw opened.error
          return task(opened.repo)
        },
        { timeoutMs: context.repoTimeoutMs, signal: context.signal, label: `Repository ${repoName}` }
      )
      return { status: 'opened', repoName, value }
    } catch (error) {
      const appError = error instanceof AppError ? error : new AppError(describeError(error), error)
      context.onFatal?.(appError)

      if (appError instanceof OperationCancelledError) {
        log.debug(`[SearchAggregator] ${repoName} cancelled`)
      } else {
        log.warn(`[SearchAggregator] Skipping ${repoName}: ${appError.message}`)
      }
      return { status: 'failed', repoName, error: appError }
    }
  }
}
