import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, describe, expect, it } from 'vitest'
import { loadConfiguration, loadEnvFile, readBackendType } from '../config'
import { ValidationError } from '../shared/errors'

describe('loadConfiguration', () => {
  it('falls back to defaults', () => {
    expect(loadConfiguration({})).toEqual({
      backend: 'isomorphic-git',
      concurrency: 4,
      repoTimeoutMs: 30000,
      configDir: undefined,
      logLevel: 'info'
    })
  })

  it('reads every variable', () => {
    expect(
      loadConfiguration({
        GREPO_GIT_BACKEND: 'simple-git',
        GREPO_CONCURRENCY: '8',
        GREPO_REPO_TIMEOUT_MS: '0',
        GREPO_CONFIG_DIR: ' /tmp/grepo ',
        LOG_LEVEL: 'debug'
      })
    ).toEqual({
      backend: 'simple-git',
      concurrency: 8,
      repoTimeoutMs: 0,
      configDir: '/tmp/grepo',
      logLevel: 'debug'
    })
  })

  it('treats blank values as unset', () => {
    expect(loadConfiguration({ GREPO_CONCURRENCY: '  ', GREPO_GIT_BACKEND: '' })).toMatchObject({
      backend: 'isomorphic-git',
      concurrency: 4
    })
  })

  it('rejects an unknown backend', () => {
    expect(() => loadConfiguration({ GREPO_GIT_BACKEND: 'libgit2' })).toThrow(
      'GREPO_GIT_BACKEND must be one of isomorphic-git, simple-git, got "libgit2"'
    )
  })

  it('reads the backend type on its own', () => {
    expect(readBackendType({})).toBe('isomorphic-git')
    expect(readBackendType({ GREPO_GIT_BACKEND: ' simple-git\n' })).toBe('simple-git')
  })

  it('rejects concurrency below one', () => {
    expect(() => loadConfiguration({ GREPO_CONCURRENCY: '0' })).toThrow(
      'GREPO_CONCURRENCY must be an integer >= 1, got "0"'
    )
  })

  it('rejects a non-integer timeout', () => {
    let error: unknown
    try {
      loadConfiguration({ GREPO_REPO_TIMEOUT_MS: '1.5' })
    } catch (e) {
      error = e
    }

    expect(error).toBeInstanceOf(ValidationError)
    expect(error).toMatchObject({ field: 'GREPO_REPO_TIMEOUT_MS' })
  })

  it('rejects an unknown log level', () => {
    expect(() => loadConfiguration({ LOG_LEVEL: 'verbose' })).toThrow(ValidationError)
  })
})

describe('loadEnvFile', () => {
  const key = 'GREPO_TEST_ONLY_VALUE'
  let dir: string | undefined

  afterEach(async () => {
    delete process.env[key]
    if (dir) await fs.promises.rm(dir, { recursive: true, force: true })
  })

  it('loads variables from a file without overriding existing ones', async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'grepo-env-'))
    const file = path.join(dir, '.env')
    await fs.promises.writeFile(file, `${key}=from-file\n`)

    loadEnvFile(file)
    expect(process.env[key]).toBe('from-file')

    process.env[key] = 'from-shell'
    loadEnvFile(file)
    expect(process.env[key]).toBe('from-shell')
  })
})
