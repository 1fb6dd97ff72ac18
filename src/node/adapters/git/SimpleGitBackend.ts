/**
 * Simple-Git Backend
 *
 * Backend implementation using the simple-git library, which drives the
 * native git CLI. Handy for very large repositories where `git log` beats
 * reading objects in JavaScript. Requires `git` on the PATH.
 */

import type { Branch } from '@shared/types'
import fs from 'fs'
import simpleGit, { type SimpleGit } from 'simple-git'
import { GitError, RepoOpenError } from '../../shared/errors'
import type { GitBackend } from './interface'
import type { CommitNode, HeadState, OpenRepositoryOptions, RepositoryRef, WalkOptions } from './types'
import { formatAuthor, locateGitDir, readHead, toBranchName, toBranchRef } from './utils'

const FIELD = '\x00'
const RECORD = '\x1e'
const LOG_FORMAT = ['%H', '%P', '%an', '%ae', '%ct', '%B'].join('%x00') + '%x1e'

export class SimpleGitBackend implements GitBackend {
  readonly name = 'simple-git'

  private createGit(repo: Pick<RepositoryRef, 'path' | 'signal'>): SimpleGit {
    return repo.signal ? simpleGit({ baseDir: repo.path, abort: repo.signal }) : simpleGit(repo.path)
  }

  async openRepository(
    repoName: string,
    path: string,
    options: OpenRepositoryOptions = {}
  ): Promise<RepositoryRef> {
    const { gitdir, commondir } = await locateGitDir(repoName, path)
    const repo: RepositoryRef = { repoName, path, gitdir, commondir, signal: options.signal }

    // git must agree that this directory is the repository root
    let reported: string
    try {
      reported = (await this.createGit(repo).revparse(['--absolute-git-dir'])).trim()
    } catch (error) {
      throw new RepoOpenError(`git cannot open ${repoName} at ${path}`, repoName, path, 'unreadable', error)
    }
    const [expected, actual] = await Promise.all([
      fs.promises.realpath(gitdir),
      fs.promises.realpath(reported).catch(() => reported)
    ])
    if (expected !== actual) {
      throw new RepoOpenError(
        `Cannot open ${repoName} at ${path}: git resolved ${reported}`,
        repoName,
        path,
        'not-a-repository'
      )
    }
    return repo
  }

  async listLocalBranches(repo: RepositoryRef): Promise<Branch[]> {
    try {
      const output = await this.createGit(repo).raw(['for-each-ref', '--format=%(refname)', 'refs/heads'])
      const branches: Branch[] = []
      for (const line of output.split('\n')) {
        const branchName = toBranchName(line.trim())
        if (branchName) branches.push({ repoName: repo.repoName, branchName })
      }
      return branches
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

    // for-each-ref skips broken refs, so a corrupt branch reads as unborn here
    const tip = await this.lookupRef(repo, head.ref)
    return tip ? { kind: 'branch', branchName } : { kind: 'unborn', branchName }
  }

  async resolveBranchTip(repo: RepositoryRef, branchName: string): Promise<string> {
    const tip = await this.lookupRef(repo, toBranchRef(branchName))
    if (!tip) {
      throw new GitError(`Branch ${branchName} does not exist`, 'resolveBranchTip')
    }
    return tip
  }

  async *walkAncestryFrom(
    repo: RepositoryRef,
    tipId: string,
    options: WalkOptions = {}
  ): AsyncGenerator<CommitNode> {
    const args = ['log', '--topo-order', `--format=${LOG_FORMAT}`]
    if (options.maxCommits !== undefined) {
      args.push(`--max-count=${options.maxCommits}`)
    }
    args.push(tipId, '--')

    let output: string
    try {
      output = await this.createGit(repo).raw(args)
    } catch (error) {
      throw this.createError('walkAncestryFrom', error)
    }

    for (const record of output.split(RECORD)) {
      repo.signal?.throwIfAborted()
      const node = parseLogRecord(record)
      if (node) yield node
    }
  }

  /**
   * Exact lookup of a full ref. for-each-ref patterns match whole path
   * components, so `refs/heads/feat` would also list `refs/heads/feat/x`.
   */
  private async lookupRef(repo: RepositoryRef, ref: string): Promise<string | null> {
    let output: string
    try {
      output = await this.createGit(repo).raw([
        'for-each-ref',
        '--format=%(refname)\t%(objectname)',
        ref
      ])
    } catch (error) {
      throw this.createError('lookupRef', error)
    }

    for (const line of output.trim().split('\n')) {
      const [refName, sha] = line.split('\t')
      if (refName === ref && sha) return sha
    }
    return null
  }

  private createError(operation: string, originalError: unknown): GitError {
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new GitError(`[SimpleGitBackend] ${operation} failed: ${message}`, operation, originalError)
  }
}

export function parseLogRecord(record: string): CommitNode | null {
  const trimmed = record.replace(/^\n+/, '')
  if (!trimmed) return null

  const [id, parents, authorName, authorEmail, committedAt, ...body] = trimmed.split(FIELD)
  if (!id || parents === undefined || authorName === undefined) return null

  return {
    id,
    author: formatAuthor(authorName, authorEmail ?? ''),
    message: body.join(FIELD).trimEnd(),
    parents: parents ? parents.split(' ') : [],
    timestamp: Number.parseInt(committedAt ?? '0', 10) || 0
  }
}
