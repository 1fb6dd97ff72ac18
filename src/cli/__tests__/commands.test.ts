import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { GitBackend } from '../../node/adapters/git'
import { IsomorphicGitBackend } from '../../node/adapters/git'
import { createTestRepo } from '../../node/adapters/git/__tests__/test-utils'
import { SearchAggregator } from '../../node/services/SearchAggregator'
import { createBackend } from '../../node/services/__tests__/test-utils'
import { ConfigStore } from '../../node/store'
import { resolveCommand, runCli, USAGE, type CliDependencies } from '../commands'

const RULE = '-'.repeat(26)

describe('resolveCommand', () => {
  const commands = ['base-dir', 'show-config', 'config-path', 'watch', 'branch', 'commit', 'scan-base-dir']

  it('accepts exact names, aliases and unique prefixes', () => {
    expect(resolveCommand('watch', commands)).toBe('watch')
    expect(resolveCommand('sbd', commands, { sbd: 'scan-base-dir' })).toBe('scan-base-dir')
    expect(resolveCommand('sh', commands)).toBe('show-config')
  })

  it('rejects ambiguous, unknown and missing input', () => {
    expect(resolveCommand('co', commands)).toBeNull()
    expect(resolveCommand('deploy', commands)).toBeNull()
    expect(resolveCommand(undefined, commands)).toBeNull()
  })
})

describe('runCli', () => {
  let configDir: string
  let output: string[]
  let deps: CliDependencies

  const setup = (backend: GitBackend, confirmed = true): CliDependencies => ({
    store: new ConfigStore({ cwd: configDir }),
    aggregator: new SearchAggregator({ backend }),
    backend,
    out: (text) => output.push(text),
    confirm: vi.fn(async () => confirmed)
  })

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    configDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grepo-cli-'))
    output = []
    deps = setup(createBackend())
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.promises.rm(configDir, { recursive: true, force: true })
  })

  it('prints usage without a command', async () => {
    expect(await runCli([], deps)).toBe(0)
    expect(output).toEqual([USAGE])
  })

  it('fails on an unknown command or subcommand', async () => {
    expect(await runCli(['deploy'], deps)).toBe(1)
    expect(await runCli(['branch'], deps)).toBe(1)
    expect(output).toEqual([USAGE, USAGE])
  })

  describe('settings', () => {
    it('shows and updates the base path', async () => {
      await runCli(['base-dir'], deps)
      await runCli(['base-dir', '/srv/code'], deps)

      expect(output).toEqual(['/repos', 'Updated base path from /repos to /srv/code'])
    })

    it('shows the saved configuration', async () => {
      deps.store.addRepos(['api'])

      await runCli(['show-config'], deps)

      expect(output).toEqual([JSON.stringify({ basePath: '/repos', repos: ['api'] }, null, 2)])
    })

    it('shows where the configuration lives', async () => {
      await runCli(['config-path'], deps)

      expect(output).toEqual([path.join(configDir, 'config.json')])
    })
  })

  describe('watch', () => {
    it('adds only valid repositories', async () => {
      expect(await runCli(['w', 'add', 'api, missing,web'], deps)).toBe(0)

      expect(output).toEqual(['Skipping missing: Not a valid repo', 'Updated repos: now [api, web]'])
      expect(deps.store.getRepos()).toEqual(['api', 'web'])
    })

    it('replaces the list when reset is true', async () => {
      deps.store.addRepos(['api'])

      await runCli(['watch', 'add', 'web', 'true'], deps)

      expect(output).toEqual(['Updated repos: now [web]'])
    })

    it('rejects a malformed reset flag', async () => {
      expect(await runCli(['watch', 'add', 'web', 'yes'], deps)).toBe(1)
      expect(output).toEqual([USAGE])
      expect(deps.store.getRepos()).toEqual([])
    })

    it('removes repositories by prefix subcommand', async () => {
      deps.store.addRepos(['api', 'web'])

      await runCli(['watch', 'rem', 'web,ghost'], deps)

      expect(output).toEqual(['Repo ghost is not found', 'Updated repos: now [api]'])
    })

    it('lists watched repositories', async () => {
      deps.store.addRepos(['api', 'web'])

      await runCli(['watch', 'list'], deps)

      expect(output).toEqual([`Watched Repos:\n${RULE}\napi\nweb\n`])
    })
  })

  describe('branch', () => {
    beforeEach(() => {
      deps.store.addRepos(['api', 'web', 'missing'])
    })

    it('searches branch names', async () => {
      expect(await runCli(['b', 'search', 'fix'], deps)).toBe(0)

      expect(output).toEqual(["Search pattern 'fix' found in repos:\nRepo  Branch\n====  =========\napi   fix/login"])
    })

    it('lists branches per repository', async () => {
      await runCli(['branch', 'list'], deps)

      expect(output).toEqual([
        `Repo: api\n${RULE}\nmain\nfix/login\n\nRepo: web\n${RULE}\nmain\nfeature/dark\n`
      ])
    })

    it('shows current branches including failures', async () => {
      await runCli(['branch', 'curr'], deps)

      expect(output).toEqual([
        `Repo: api\n${RULE}\nmain\n\n` +
          `Repo: web\n${RULE}\nmain\n\n` +
          `Repo: missing\n${RULE}\n(error: Cannot open missing at /repos/missing: path does not exist)\n`
      ])
    })

    it('requires a pattern', async () => {
      expect(await runCli(['branch', 'search'], deps)).toBe(1)
      expect(output).toEqual([USAGE])
    })
  })

  describe('commit', () => {
    beforeEach(() => {
      deps.store.addRepos(['api', 'web'])
    })

    it('groups matches with --group', async () => {
      expect(await runCli(['c', 'search', 'fix', '--group'], deps)).toBe(0)

      expect(output).toEqual([
        "Search pattern 'fix' found in commits:\n" +
          'Repo  Commit  Branches            Author                        Message\n' +
          '====  ======  ==================  ============================  ==============\n' +
          'api   c2      main, fix/login     Test User <test@example.com>  fix: login bug\n' +
          'web   w2      main, feature/dark  Test User <test@example.com>  fix: css'
      ])
    })

    it('reports no matches', async () => {
      await runCli(['commit', 'search', 'Ada'], deps)

      expect(output).toEqual(["Search pattern 'Ada' not found in any commit"])
    })

    it('fails when a branch cannot be walked', async () => {
      deps.store.addRepos(['dangling'])

      expect(await runCli(['commit', 'search', 'fix'], deps)).toBe(1)
      expect(output).toEqual([])
      expect(console.error).toHaveBeenCalledWith(
        '\x1b[31m[ERROR]\x1b[0m',
        'Commit search for "fix" failed: Cannot walk dangling/main: [InMemoryGitBackend] readCommit failed: no object nope'
      )
    })

    it('rejects unknown options', async () => {
      expect(await runCli(['commit', 'search', 'fix', '--verbose'], deps)).toBe(1)
      expect(output).toEqual([USAGE])
    })
  })

  describe('scan-base-dir', () => {
    let basePath: string

    beforeEach(async () => {
      basePath = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grepo-base-'))
      await createTestRepo(path.join(basePath, 'api'))
      await fs.promises.mkdir(path.join(basePath, 'notes'))
    })

    afterEach(async () => {
      await fs.promises.rm(basePath, { recursive: true, force: true })
    })

    it('replaces the watched set after confirmation', async () => {
      deps = setup(new IsomorphicGitBackend())
      deps.store.setBasePath(basePath)
      deps.store.addRepos(['old'])

      expect(await runCli(['sbd'], deps)).toBe(0)

      expect(output).toEqual([
        'Found repo: api',
        'Skipping notes: Not a valid repo',
        `Watched repos:\n${RULE}\napi\n`
      ])
      expect(deps.store.getRepos()).toEqual(['api'])
    })

    it('leaves the watched set alone when declined', async () => {
      deps = setup(new IsomorphicGitBackend(), false)
      deps.store.setBasePath(basePath)
      deps.store.addRepos(['old'])

      await runCli(['scan-base-dir'], deps)

      expect(output).toEqual(['Aborted, watched repos unchanged'])
      expect(deps.store.getRepos()).toEqual(['old'])
    })
  })
})
