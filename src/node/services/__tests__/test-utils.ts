/**
 * Test utilities for the search services.
 *
 * Provides an in-memory repository layout under `/repos` and helpers for
 * building watched sets against it.
 */

import type { WatchedRepositorySet } from '@shared/types'
import type { MemoryRepository } from '../../adapters/git'
import { InMemoryGitBackend } from '../../adapters/git'

export const BASE_PATH = '/repos'

/**
 * - api: main -> c3 -> c2 -> c1, fix/login -> c2
 * - web: main and feature/dark both at w2 -> w1
 * - empty: no branches, unborn HEAD
 * - detached: HEAD detached at c1
 * - corrupt-head: unreadable HEAD
 * - broken-refs: branch listing fails
 * - dangling: main points at a missing commit
 */
export const FIXTURES: Record<string, MemoryRepository> = {
  api: {
    commits: [
      { id: 'c1', message: 'initial commit', timestamp: 1 },
      { id: 'c2', message: 'fix: login bug', parents: ['c1'], timestamp: 2 },
      { id: 'c3', message: 'feat: search', parents: ['c2'], timestamp: 3, author: 'Ada <ada@example.com>' }
    ],
    branches: { main: 'c3', 'fix/login': 'c2' }
  },
  web: {
    commits: [
      { id: 'w1', message: 'initial web', timestamp: 1 },
      { id: 'w2', message: 'fix: css', parents: ['w1'], timestamp: 2 }
    ],
    branches: { main: 'w2', 'feature/dark': 'w2' }
  },
  empty: {},
  detached: {
    commits: [{ id: 'c1', message: 'initial commit' }],
    branches: { main: 'c1' },
    head: { kind: 'detached', commitId: 'c1' }
  },
  'corrupt-head': { branches: { main: 'c1' }, head: { kind: 'corrupt' } },
  'broken-refs': { brokenBranchList: true },
  dangling: { branches: { main: 'nope' } }
}

/**
 * Backend holding every fixture above plus `extra`, keyed by `/repos/<name>`.
 */
export function createBackend(extra: Record<string, MemoryRepository> = {}): InMemoryGitBackend {
  const backend = new InMemoryGitBackend()
  for (const [name, fixture] of Object.entries({ ...FIXTURES, ...extra })) {
    backend.setRepository(`${BASE_PATH}/${name}`, fixture)
  }
  return backend
}

export function watched(...repoNames: string[]): WatchedRepositorySet {
  return { basePath: BASE_PATH, repoNames }
}
