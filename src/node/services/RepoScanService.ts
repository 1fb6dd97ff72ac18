/**
 * RepoScanService - discovers repositories directly under a base directory.
 *
 * Used by the registration workflow to rebuild the watched set. Only
 * immediate subdirectories are considered; each is checked with the same
 * validity check `watch add` uses.
 */

import { log } from '@shared/logger'
import fs from 'fs'
import path from 'path'
import type { GitBackend } from '../adapters/git'
import { getGitBackend } from '../adapters/git'
import { RepositoryHandle } from '../domain/RepositoryHandle'
import { DEFAULT_CONCURRENCY } from '../shared/constants'
import { describeError, ValidationError } from '../shared/errors'
import { mapWithConcurrency } from '../utils/concurrency'

export type ScanResult = {
  /** Valid repositories, sorted by name */
  found: string[]
  /** Subdirectories that are not repositories, sorted by name */
  skipped: string[]
}

/**
 * Splits a comma-separated name list, trimming entries and dropping empties.
 */
export function parseRepoNames(input: string): string[] {
  return input
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
}

/**
 * Partitions candidate names into valid repositories and the rest, keeping
 * input order.
 */
export async function partitionValidRepos(
  basePath: string,
  names: string[],
  backend: GitBackend = getGitBackend()
): Promise<{ valid: string[]; invalid: string[] }> {
  const checks = await mapWithConcurrency(names, DEFAULT_CONCURRENCY, (name) =>
    RepositoryHandle.isValidRepository(basePath, name, backend)
  )
  return {
    valid: names.filter((_, index) => checks[index]),
    invalid: names.filter((_, index) => !checks[index])
  }
}

/**
 * @throws ValidationError when the base directory cannot be read
 */
export async function scanBaseDir(
  basePath: string,
  backend: GitBackend = getGitBackend()
): Promise<ScanResult> {
  let entries: fs.Dirent[]
  try {
    entries = await fs.promises.readdir(basePath, { withFileTypes: true })
  } catch (error) {
    throw new ValidationError(`Cannot read base directory ${basePath}: ${describeError(error)}`, 'basePath')
  }

  const directories: string[] = []
  for (const entry of entries) {
    if (entry.isDirectory() || (entry.isSymbolicLink() && (await isLinkedDirectory(basePath, entry.name)))) {
      directories.push(entry.name)
    }
  }
  directories.sort((a, b) => a.localeCompare(b))

  const { valid, invalid } = await partitionValidRepos(basePath, directories, backend)
  log.debug(`[RepoScanService] ${basePath}: ${valid.length} repos, ${invalid.length} skipped`)

  return { found: valid, skipped: invalid }
}

/**
 * Whether a symlink resolves to a directory. Dangling links are not.
 */
async function isLinkedDirectory(basePath: string, name: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(path.join(basePath, name))).isDirectory()
  } catch (error) {
    log.debug(`[RepoScanService] Ignoring ${name}: ${describeError(error)}`)
    return false
  }
}
