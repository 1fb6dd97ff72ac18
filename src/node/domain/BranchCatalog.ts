/**
 * BranchCatalog - local branches and the current branch of one repository.
 */

import type { Branch } from '@shared/types'
import { NO_CURRENT_BRANCH } from '@shared/types'
import type { GitBackend, RepositoryRef } from '../adapters/git'
import { BranchResolutionError, describeError, HeadResolutionError } from '../shared/errors'

export class BranchCatalog {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Local branches in the order the repository yields them. Not sorted.
   *
   * @throws BranchResolutionError when the branch references cannot be read
   */
  public static async listLocalBranches(backend: GitBackend, repo: RepositoryRef): Promise<Branch[]> {
    try {
      return await backend.listLocalBranches(repo)
    } catch (error) {
      if (repo.signal?.aborted) throw error
      throw new BranchResolutionError(
        `Cannot list branches of ${repo.repoName}: ${describeError(error)}`,
        repo.repoName,
        undefined,
        error
      )
    }
  }

  /**
   * Short name of the branch HEAD points at, or `NO_CURRENT_BRANCH` when HEAD
   * is unborn or detached.
   *
   * @throws HeadResolutionError when HEAD cannot be resolved at all
   */
  public static async currentBranchName(backend: GitBackend, repo: RepositoryRef): Promise<string> {
    try {
      const head = await backend.currentHead(repo)
      return head.kind === 'branch' ? head.branchName : NO_CURRENT_BRANCH
    } catch (error) {
      if (repo.signal?.aborted) throw error
      throw new HeadResolutionError(
        `Cannot resolve HEAD of ${repo.repoName}: ${describeError(error)}`,
        repo.repoName,
        error
      )
    }
  }

  /**
   * Branches whose name contains `pattern` (case-sensitive).
   */
  public static filterByName(branches: Branch[], pattern: string): Branch[] {
    return branches.filter((branch) => branch.branchName.includes(pattern))
  }
}
