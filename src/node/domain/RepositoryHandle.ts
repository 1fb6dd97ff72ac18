/**
 * RepositoryHandle - maps a watched repository name to an opened repository.
 *
 * Handles are short-lived: every engine call opens its repositories again and
 * nothing is cached between calls.
 */

import path from 'path'
import type { GitBackend, RepositoryRef } from '../adapters/git'
import { getGitBackend } from '../adapters/git'
import { RepoOpenError } from '../shared/errors'

export type OpenResult =
  | { success: true; repo: RepositoryRef }
  | { success: false; error: RepoOpenError }

export class RepositoryHandle {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static pathOf(basePath: string, repoName: string): string {
    return path.join(basePath, repoName)
  }

  public static async open(
    backend: GitBackend,
    basePath: string,
    repoName: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<OpenResult> {
    const repoPath = RepositoryHandle.pathOf(basePath, repoName)
    try {
      const repo = await backend.openRepository(repoName, repoPath, { signal: options.signal })
      return { success: true, repo }
    } catch (error) {
      if (error instanceof RepoOpenError) {
        return { success: false, error }
      }
      // Aborts belong to the caller's deadline, not to the repository
      if (options.signal?.aborted) throw error
      return {
        success: false,
        error: new RepoOpenError(
          `Cannot open ${repoName} at ${repoPath}`,
          repoName,
          repoPath,
          'unreadable',
          error
        )
      }
    }
  }

  /**
   * Yes/no check used before a name is added to the watched set.
   */
  public static async isValidRepository(
    basePath: string,
    repoName: string,
    backend: GitBackend = getGitBackend()
  ): Promise<boolean> {
    if (repoName.trim() === '') return false
    const result = await RepositoryHandle.open(backend, basePath, repoName)
    return result.success
  }
}
