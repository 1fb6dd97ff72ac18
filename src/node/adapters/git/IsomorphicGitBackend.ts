/**
 * Isomorphic-Git Backend
 *
 * Reads repositories with isomorphic-git, a pure JavaScript implementation
 * that needs no git binary. The ancestry walk reads commit objects one by one
 * through the shared revision walker.
 *
 * Each opened repository gets a session that lives as long as its
 * RepositoryRef: the isomorphic-git object cache (packfile indexes), the
 * commits already read, and the shallow boundary of a shallow clone.
 */

import type { Branch } from '@shared/types'
import fs from 'fs'
import git, { Errors } from 'isomorphic-git'
import path from 'path'
import { walkTopological } from '../../domain/RevisionWalker'
import { GitError } from '../../shared/errors'
import type { GitBackend } from './interface'
import type { CommitNode, HeadState, OpenRepositoryOptions, RepositoryRef, WalkOptions } from './types'
import {
  errorCode,
  formatAuthor,
  isCommitId,
  locateGitDir,
  readHead,
  toBranchName,
  toBranchRef
} from './utils'

type RepositorySession = {
  /** Passed through to isomorphic-git, which keeps parsed packfiles here */
  cache: object
  commits: Map<string, Promise<CommitNode>>
  shallow?: Promise<ReadonlySet<string>>
}

export class IsomorphicGitBackend implements GitBackend {
  readonly name = 'isomorphic-git'

  private readonly sessions = new WeakMap<RepositoryRef, RepositorySession>()

  async openRepository(
    repoName: string,
    repoPath: string,
    options: OpenRepositoryOptions = {}
  ): Promise<RepositoryRef> {
    const { gitdir, commondir } = await locateGitDir(repoName, repoPath)
    const repo: RepositoryRef = { repoName, path: repoPath, gitdir, commondir, signal: options.signal }
    this.sessions.set(repo, { cache: {}, commits: new Map() })
    return repo
  }

  async listLocalBranches(repo: RepositoryRef): Promise<Branch[]> {
    try {
      const names = await git.listBranches({ fs, gitdir: repo.commondir })
      return names
        .filter((name) => name !== 'HEAD')
        .map((branchName) => ({ repoName: repo.repoName, branchName }))
    } catch (error) {
      throw this.createError('listLocalBranches', error)
    }
  }

  async currentHead(repo: RepositoryRef): Promise<HeadState> {
    const head = await readHead(repo.gitdir)
    if (head.kind === 'detached') {
      return { kind: 'detached', commitId: head.commitId }
    }

    const branchName = toBranchName(head.ref)
    if (!branchName) {
      throw new GitError(`HEAD points outside refs/heads: ${head.ref}`, 'currentHead')
    }

    const target = await this.readRefTarget(repo, head.ref)
    if (target === null) {
      return { kind: 'unborn', branchName }
    }
    if (!isCommitId(target)) {
      throw new GitError(`Branch ${branchName} holds an invalid object id`, 'currentHead')
    }
    return { kind: 'branch', branchName }
  }

  async resolveBranchTip(repo: RepositoryRef, branchName: string): Promise<string> {
    try {
      const tip = await git.resolveRef({ fs, gitdir: repo.commondir, ref: toBranchRef(branchName) })
      if (!isCommitId(tip)) {
        throw new GitError(`Branch ${branchName} holds an invalid object id`, 'resolveBranchTip')
      }
      return tip
    } catch (error) {
      if (error instanceof GitError) throw error
      throw this.createError('resolveBranchTip', error)
    }
  }

  walkAncestryFrom(
    repo: RepositoryRef,
    tipId: string,
    options: WalkOptions = {}
  ): AsyncIterable<CommitNode> {
    return walkTopological(tipId, (oid) => this.readCommit(repo, oid), {
      signal: repo.signal,
      maxCommits: options.maxCommits
    })
  }

  /**
   * Reads a commit once per session; branches sharing history reuse it.
   */
  private readCommit(repo: RepositoryRef, oid: string): Promise<CommitNode> {
    const session = this.session(repo)
    let pending = session.commits.get(oid)
    if (!pending) {
      pending = this.loadCommit(repo, session, oid)
      session.commits.set(oid, pending)
    }
    return pending
  }

  private async loadCommit(repo: RepositoryRef, session: RepositorySession, oid: string): Promise<CommitNode> {
    try {
      const [{ commit }, shallow] = await Promise.all([
        git.readCommit({ fs, gitdir: repo.commondir, oid, cache: session.cache }),
        this.shallowBoundary(repo, session)
      ])
      return {
        id: oid,
        author: formatAuthor(commit.author.name, commit.author.email),
        message: commit.message.trimEnd(),
        // parents past the boundary of a shallow clone are not in the object store
        parents: shallow.has(oid) ? [] : commit.parent,
        timestamp: commit.committer.timestamp
      }
    } catch (error) {
      throw this.createError('readCommit', error)
    }
  }

  private session(repo: RepositoryRef): RepositorySession {
    let session = this.sessions.get(repo)
    if (!session) {
      session = { cache: {}, commits: new Map() }
      this.sessions.set(repo, session)
    }
    return session
  }

  /**
   * Commit ids listed in `shallow`, read once per session. Empty for a full
   * clone.
   */
  private shallowBoundary(repo: RepositoryRef, session: RepositorySession): Promise<ReadonlySet<string>> {
    if (!session.shallow) {
      session.shallow = readShallowFile(repo.commondir)
    }
    return session.shallow
  }

  /**
   * Reads what a ref file holds without following it to an object.
   * Returns null when the ref does not exist (an unborn branch).
   */
  private async readRefTarget(repo: RepositoryRef, ref: string): Promise<string | null> {
    try {
      return await git.resolveRef({ fs, gitdir: repo.commondir, ref, depth: 1 })
    } catch (error) {
      if (error instanceof Errors.NotFoundError) return null
      throw this.createError('readRefTarget', error)
    }
  }

  private createError(operation: string, originalError: unknown): GitError {
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new GitError(`[IsomorphicGitBackend] ${operation} failed: ${message}`, operation, originalError)
  }
}

async function readShallowFile(commondir: string): Promise<ReadonlySet<string>> {
  let content: string
  try {
    content = await fs.promises.readFile(path.join(commondir, 'shallow'), 'utf8')
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return new Set()
    throw error
  }
  return new Set(
    content
      .split('\n')
      .map((line) => line.trim())
      .filter(isCommitId)
  )
}
