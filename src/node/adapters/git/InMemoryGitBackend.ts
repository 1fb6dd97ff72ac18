/**
 * In-Memory Git Backend
 *
 * Fixture-driven backend for exercising traversal and aggregation logic
 * without touching real repositories. Repositories are keyed by path.
 */

import type { Branch } from '@shared/types'
import { setTimeout as sleep } from 'timers/promises'
import { walkTopological } from '../../domain/RevisionWalker'
import { GitError, RepoOpenError } from '../../shared/errors'
import type { GitBackend } from './interface'
import type { CommitNode, HeadState, OpenRepositoryOptions, RepositoryRef, WalkOptions } from './types'

export type MemoryCommit = {
  id: string
  message: string
  author?: string
  parents?: string[]
  /** Committer time in seconds; defaults to 0 */
  timestamp?: number
}

export type MemoryRepository = {
  commits?: MemoryCommit[]
  /** Branch name to tip id, in listing order. Tips may name unknown commits. */
  branches?: Record<string, string>
  /** Defaults to the first branch, or an unborn `main` when there are none */
  head?: HeadState | { kind: 'corrupt' }
  /** Make listing branches fail */
  brokenBranchList?: boolean
  /** Delay applied to every backend call */
  latencyMs?: number
  isBare?: boolean
}

export class InMemoryGitBackend implements GitBackend {
  readonly name = 'in-memory'

  private readonly repos: Map<string, MemoryRepository>

  constructor(repos: Record<string, MemoryRepository> = {}) {
    this.repos = new Map(Object.entries(repos))
  }

  setRepository(path: string, repo: MemoryRepository): void {
    this.repos.set(path, repo)
  }

  async openRepository(
    repoName: string,
    path: string,
    options: OpenRepositoryOptions = {}
  ): Promise<RepositoryRef> {
    const fixture = this.repos.get(path)
    if (!fixture) {
      throw new RepoOpenError(`Cannot open ${repoName} at ${path}: path does not exist`, repoName, path, 'missing')
    }
    await this.wait(fixture, options.signal)
    const gitdir = fixture.isBare ? path : `${path}/.git`
    return { repoName, path, gitdir, commondir: gitdir, signal: options.signal }
  }

  async listLocalBranches(repo: RepositoryRef): Promise<Branch[]> {
    const fixture = await this.fixture(repo)
    if (fixture.brokenBranchList) {
      throw new GitError('[InMemoryGitBackend] listLocalBranches failed: refs unreadable', 'listLocalBranches')
    }
    return Object.keys(fixture.branches ?? {}).map((branchName) => ({
      repoName: repo.repoName,
      branchName
    }))
  }

  async currentHead(repo: RepositoryRef): Promise<HeadState> {
    const fixture = await this.fixture(repo)
    const head = fixture.head ?? this.defaultHead(fixture)
    if (head.kind === 'corrupt') {
      throw new GitError('[InMemoryGitBackend] currentHead failed: malformed HEAD', 'currentHead')
    }
    return head
  }

  async resolveBranchTip(repo: RepositoryRef, branchName: string): Promise<string> {
    const fixture = await this.fixture(repo)
    const tip = fixture.branches?.[branchName]
    if (tip === undefined) {
      throw new GitError(`[InMemoryGitBackend] resolveBranchTip failed: no branch ${branchName}`, 'resolveBranchTip')
    }
    return tip
  }

  walkAncestryFrom(
    repo: RepositoryRef,
    tipId: string,
    options: WalkOptions = {}
  ): AsyncIterable<CommitNode> {
    return walkTopological(tipId, (id) => this.readCommit(repo, id), {
      signal: repo.signal,
      maxCommits: options.maxCommits
    })
  }

  private async readCommit(repo: RepositoryRef, id: string): Promise<CommitNode> {
    const fixture = await this.fixture(repo)
    const commit = fixture.commits?.find((candidate) => candidate.id === id)
    if (!commit) {
      throw new GitError(`[InMemoryGitBackend] readCommit failed: no object ${id}`, 'readCommit')
    }
    return {
      id: commit.id,
      author: commit.author ?? 'Test User <test@example.com>',
      message: commit.message,
      parents: commit.parents ?? [],
      timestamp: commit.timestamp ?? 0
    }
  }

  private defaultHead(fixture: MemoryRepository): HeadState {
    const first = Object.keys(fixture.branches ?? {})[0]
    return first ? { kind: 'branch', branchName: first } : { kind: 'unborn', branchName: 'main' }
  }

  private async fixture(repo: RepositoryRef): Promise<MemoryRepository> {
    const fixture = this.repos.get(repo.path)
    if (!fixture) {
      throw new GitError(`[InMemoryGitBackend] repository vanished: ${repo.path}`, 'fixture')
    }
    await this.wait(fixture, repo.signal)
    return fixture
  }

  private async wait(fixture: MemoryRepository, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    if (fixture.latencyMs) {
      await sleep(fixture.latencyMs, undefined, { signal })
    }
  }
}
