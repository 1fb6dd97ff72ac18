import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { GitError, RepoOpenError } from '../../../shared/errors'
import { formatAuthor, isCommitId, locateGitDir, readHead, toBranchName, toBranchRef } from '../utils'
import {
  cleanupTestRepo,
  cloneAsBare,
  createCommit,
  createTempDir,
  createTestRepo,
  detachHead,
  linkWorktree,
  writeGitFile
} from './test-utils'

describe('locateGitDir', () => {
  let baseDir: string

  beforeEach(async () => {
    baseDir = await createTempDir()
  })

  afterEach(async () => {
    await cleanupTestRepo(baseDir)
  })

  it('finds the .git directory of a working copy', async () => {
    const repoPath = await createTestRepo(path.join(baseDir, 'app'))

    const located = await locateGitDir('app', repoPath)

    expect(located).toEqual({ gitdir: path.join(repoPath, '.git'), commondir: path.join(repoPath, '.git') })
  })

  it('treats a directory holding HEAD, objects and refs as a bare repository', async () => {
    const repoPath = await createTestRepo(path.join(baseDir, 'app'))
    await createCommit(repoPath, { 'a.txt': 'a' }, 'initial')
    const barePath = await cloneAsBare(repoPath, path.join(baseDir, 'app.git'))

    const located = await locateGitDir('app.git', barePath)

    expect(located).toEqual({ gitdir: barePath, commondir: barePath })
  })

  it('follows a gitdir pointer file', async () => {
    const realRepo = await createTestRepo(path.join(baseDir, 'real'))
    const linked = path.join(baseDir, 'linked')
    await fs.promises.mkdir(linked)
    await fs.promises.writeFile(path.join(linked, '.git'), `gitdir: ${path.join(realRepo, '.git')}\n`)

    const located = await locateGitDir('linked', linked)

    expect(located).toEqual({ gitdir: path.join(realRepo, '.git'), commondir: path.join(realRepo, '.git') })
  })

  it('reads HEAD from a linked worktree and objects from its common dir', async () => {
    const realRepo = await createTestRepo(path.join(baseDir, 'real'))
    await createCommit(realRepo, { 'a.txt': 'a' }, 'initial')
    const worktree = path.join(baseDir, 'wt')
    const worktreeGitDir = await linkWorktree(realRepo, worktree, 'wt', 'main')

    const located = await locateGitDir('wt', worktree)

    expect(located).toEqual({ gitdir: worktreeGitDir, commondir: path.join(realRepo, '.git') })
  })

  it('rejects a worktree whose common dir is gone', async () => {
    const realRepo = await createTestRepo(path.join(baseDir, 'real'))
    const worktree = path.join(baseDir, 'wt')
    const worktreeGitDir = await linkWorktree(realRepo, worktree, 'wt', 'main')
    await fs.promises.writeFile(path.join(worktreeGitDir, 'commondir'), '../../../nowhere\n')

    await expect(locateGitDir('wt', worktree)).rejects.toMatchObject({ reason: 'not-a-repository' })
  })

  it('reports a missing path', async () => {
    const missing = path.join(baseDir, 'nope')

    const error = await locateGitDir('nope', missing).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RepoOpenError)
    expect(error).toMatchObject({ repoName: 'nope', path: missing, reason: 'missing' })
  })

  it('rejects a plain directory', async () => {
    const plain = path.join(baseDir, 'plain')
    await fs.promises.mkdir(plain)

    await expect(locateGitDir('plain', plain)).rejects.toMatchObject({ reason: 'not-a-repository' })
  })

  it('rejects a regular file', async () => {
    const file = path.join(baseDir, 'file.txt')
    await fs.promises.writeFile(file, 'x')

    await expect(locateGitDir('file.txt', file)).rejects.toMatchObject({ reason: 'not-a-repository' })
  })

  it('rejects a subdirectory of a repository', async () => {
    const repoPath = await createTestRepo(path.join(baseDir, 'app'))
    const nested = path.join(repoPath, 'src')
    await fs.promises.mkdir(nested)

    await expect(locateGitDir('app/src', nested)).rejects.toMatchObject({ reason: 'not-a-repository' })
  })

  it('rejects a .git directory missing objects', async () => {
    const broken = path.join(baseDir, 'broken')
    await fs.promises.mkdir(path.join(broken, '.git', 'refs'), { recursive: true })
    await fs.promises.writeFile(path.join(broken, '.git', 'HEAD'), 'ref: refs/heads/main\n')

    await expect(locateGitDir('broken', broken)).rejects.toMatchObject({ reason: 'not-a-repository' })
  })
})

describe('readHead', () => {
  let repoPath: string

  beforeEach(async () => {
    repoPath = await createTestRepo()
  })

  afterEach(async () => {
    await cleanupTestRepo(repoPath)
  })

  it('parses a symbolic HEAD', async () => {
    expect(await readHead(path.join(repoPath, '.git'))).toEqual({
      kind: 'symbolic',
      ref: 'refs/heads/main'
    })
  })

  it('parses a detached HEAD', async () => {
    const sha = await createCommit(repoPath, { 'a.txt': 'a' }, 'initial')
    await detachHead(repoPath, sha)

    expect(await readHead(path.join(repoPath, '.git'))).toEqual({ kind: 'detached', commitId: sha })
  })

  it('throws GitError for garbage content', async () => {
    await writeGitFile(repoPath, 'HEAD', 'not a ref\n')

    await expect(readHead(path.join(repoPath, '.git'))).rejects.toBeInstanceOf(GitError)
  })

  it('throws GitError when HEAD is missing', async () => {
    await fs.promises.rm(path.join(repoPath, '.git', 'HEAD'))

    await expect(readHead(path.join(repoPath, '.git'))).rejects.toBeInstanceOf(GitError)
  })
})

describe('ref helpers', () => {
  it('converts between branch names and refs', () => {
    expect(toBranchRef('feat/x')).toBe('refs/heads/feat/x')
    expect(toBranchName('refs/heads/feat/x')).toBe('feat/x')
    expect(toBranchName('refs/remotes/origin/main')).toBeNull()
    expect(toBranchName('refs/heads/')).toBeNull()
  })

  it('recognises object ids', () => {
    expect(isCommitId('a'.repeat(40))).toBe(true)
    expect(isCommitId('b'.repeat(64))).toBe(true)
    expect(isCommitId('A'.repeat(40))).toBe(false)
    expect(isCommitId('abc123')).toBe(false)
  })

  it('formats authors like git', () => {
    expect(formatAuthor('Ada', 'ada@example.com')).toBe('Ada <ada@example.com>')
    expect(formatAuthor('Ada', '')).toBe('Ada')
  })
})
