/**
 * Git Backend Utilities
 *
 * Filesystem-level helpers shared by the on-disk backends: locating the git
 * directory of a repository path and parsing HEAD.
 */

import fs from 'fs'
import path from 'path'
import { GitError, RepoOpenError, type RepoOpenFailure } from '../../shared/errors'

const COMMIT_ID = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/
const HEADS_PREFIX = 'refs/heads/'

export type LocatedGitDir = {
  /** Directory holding HEAD */
  gitdir: string
  /** Directory holding objects and refs; differs from gitdir in a linked worktree */
  commondir: string
}

/**
 * Raw content of a HEAD file.
 */
export type ParsedHead = { kind: 'symbolic'; ref: string } | { kind: 'detached'; commitId: string }

export function isCommitId(value: string): boolean {
  return COMMIT_ID.test(value)
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}

/**
 * Strips `refs/heads/` from a full ref. Returns null for anything that is not
 * a local branch ref.
 */
export function toBranchName(ref: string): string | null {
  if (!ref.startsWith(HEADS_PREFIX)) return null
  const name = ref.slice(HEADS_PREFIX.length)
  return name.length > 0 ? name : null
}

export function toBranchRef(branchName: string): string {
  return `${HEADS_PREFIX}${branchName}`
}

async function statOrNull(target: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(target)
  } catch (error) {
    const code = errorCode(error)
    if (code === 'ENOENT' || code === 'ENOTDIR') return null
    throw error
  }
}

/**
 * A git directory holds a HEAD file plus `objects/` and `refs/`.
 */
export async function isGitDirectory(dir: string): Promise<boolean> {
  const [head, objects, refs] = await Promise.all([
    statOrNull(path.join(dir, 'HEAD')),
    statOrNull(path.join(dir, 'objects')),
    statOrNull(path.join(dir, 'refs'))
  ])
  return Boolean(head?.isFile() && objects?.isDirectory() && refs?.isDirectory())
}

/**
 * A linked worktree's git directory holds its own HEAD plus a `commondir`
 * file naming the directory that has the objects and refs.
 */
async function readCommonDir(dir: string): Promise<string | null> {
  const [head, pointer] = await Promise.all([
    statOrNull(path.join(dir, 'HEAD')),
    statOrNull(path.join(dir, 'commondir'))
  ])
  if (!head?.isFile() || !pointer?.isFile()) return null
  const target = (await fs.promises.readFile(path.join(dir, 'commondir'), 'utf8')).trim()
  if (!target) return null
  const commondir = path.resolve(dir, target)
  return (await isGitDirectory(commondir)) ? commondir : null
}

async function readGitdirPointer(file: string): Promise<string | null> {
  const content = await fs.promises.readFile(file, 'utf8')
  const match = /^gitdir:\s*(.+)$/m.exec(content)
  const target = match?.[1]?.trim()
  if (!target) return null
  return path.resolve(path.dirname(file), target)
}

function classify(error: unknown): RepoOpenFailure {
  const code = errorCode(error)
  if (code === 'ENOENT' || code === 'ENOTDIR') return 'missing'
  return 'unreadable'
}

/**
 * Finds the git directory for `repoPath`, which must itself be the repository
 * root: a working copy with a `.git` directory or `gitdir:` file (a submodule
 * or linked worktree), or a bare repository.
 *
 * @throws RepoOpenError
 */
export async function locateGitDir(repoName: string, repoPath: string): Promise<LocatedGitDir> {
  const fail = (reason: RepoOpenFailure, detail: string, cause?: unknown): RepoOpenError =>
    new RepoOpenError(`Cannot open ${repoName} at ${repoPath}: ${detail}`, repoName, repoPath, reason, cause)

  let stat: fs.Stats
  try {
    stat = await fs.promises.stat(repoPath)
  } catch (error) {
    const reason = classify(error)
    throw fail(reason, reason === 'missing' ? 'path does not exist' : 'path is not readable', error)
  }
  if (!stat.isDirectory()) {
    throw fail('not-a-repository', 'not a directory')
  }

  try {
    const dotGit = path.resolve(repoPath, '.git')
    const dotGitStat = await statOrNull(dotGit)

    if (dotGitStat?.isDirectory()) {
      if (await isGitDirectory(dotGit)) return { gitdir: dotGit, commondir: dotGit }
      throw fail('not-a-repository', '.git is not a git directory')
    }

    if (dotGitStat?.isFile()) {
      const target = await readGitdirPointer(dotGit)
      if (target) {
        if (await isGitDirectory(target)) return { gitdir: target, commondir: target }
        const commondir = await readCommonDir(target)
        if (commondir) return { gitdir: target, commondir }
      }
      throw fail('not-a-repository', '.git does not point at a git directory')
    }

    const resolved = path.resolve(repoPath)
    if (await isGitDirectory(resolved)) return { gitdir: resolved, commondir: resolved }
  } catch (error) {
    if (error instanceof RepoOpenError) throw error
    throw fail('unreadable', 'repository is not readable', error)
  }

  throw fail('not-a-repository', 'not a git repository')
}

/**
 * Reads and parses `gitdir/HEAD`.
 *
 * @throws GitError when HEAD is missing, unreadable or malformed
 */
export async function readHead(gitdir: string): Promise<ParsedHead> {
  let content: string
  try {
    content = (await fs.promises.readFile(path.join(gitdir, 'HEAD'), 'utf8')).trim()
  } catch (error) {
    throw new GitError(`Cannot read HEAD: ${errorCode(error) ?? 'unknown error'}`, 'readHead', error)
  }

  if (content.startsWith('ref:')) {
    const ref = content.slice('ref:'.length).trim()
    if (ref.length > 0) return { kind: 'symbolic', ref }
  } else if (isCommitId(content)) {
    return { kind: 'detached', commitId: content }
  }

  throw new GitError(`Malformed HEAD: ${JSON.stringify(content)}`, 'readHead')
}

/**
 * Formats an author signature the way git prints it.
 */
export function formatAuthor(name: string, email: string): string {
  return email ? `${name} <${email}>` : name
}
