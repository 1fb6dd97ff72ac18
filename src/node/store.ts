import type { WatchedRepositorySet } from '@shared/types'
import Conf from 'conf'
import { DEFAULT_BASE_PATH } from './shared/constants'

interface StoreSchema {
  basePath: string
  repos: string[]
}

export type ConfigStoreOptions = {
  /** Directory holding the config file; defaults to the platform config dir */
  cwd?: string
}

export type RemoveReposResult = {
  repos: string[]
  /** Requested names that were not watched */
  missing: string[]
}

/**
 * Persists the base path and the watched repository names.
 * Names are kept unique here; the engine never checks.
 */
export class ConfigStore {
  private store: Conf<StoreSchema>

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<StoreSchema>({
      projectName: 'grepo',
      projectSuffix: '',
      configName: 'config',
      cwd: options.cwd,
      clearInvalidConfig: true,
      schema: {
        basePath: { type: 'string' },
        repos: { type: 'array', items: { type: 'string' } }
      },
      defaults: {
        basePath: DEFAULT_BASE_PATH,
        repos: []
      }
    })
  }

  getPath(): string {
    return this.store.path
  }

  getBasePath(): string {
    return this.store.get('basePath', DEFAULT_BASE_PATH)
  }

  /**
   * @returns the previous base path
   */
  setBasePath(basePath: string): string {
    const previous = this.getBasePath()
    this.store.set('basePath', basePath)
    return previous
  }

  getRepos(): string[] {
    return this.store.get('repos', [])
  }

  getWatchedSet(): WatchedRepositorySet {
    return { basePath: this.getBasePath(), repoNames: this.getRepos() }
  }

  /**
   * Appends names not already watched. With `reset`, the list is replaced.
   */
  addRepos(names: string[], options: { reset?: boolean } = {}): string[] {
    const repos = options.reset ? [] : this.getRepos()
    for (const name of names) {
      if (!repos.includes(name)) repos.push(name)
    }
    this.setRepos(repos)
    return repos
  }

  removeRepos(names: string[]): RemoveReposResult {
    const current = this.getRepos()
    const missing = names.filter((name) => !current.includes(name))
    const repos = current.filter((name) => !names.includes(name))
    this.setRepos(repos)
    return { repos, missing }
  }

  replaceRepos(names: string[]): string[] {
    this.setRepos([])
    return this.addRepos(names)
  }

  private setRepos(repos: string[]): void {
    this.store.set('repos', repos)
  }
}
