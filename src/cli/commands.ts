/**
 * Command dispatch for the grepo CLI.
 *
 * Usage:
 *   grepo base-dir [path]                         - Show/set base directory of repos
 *   grepo show-config                             - Show saved settings
 *   grepo config-path                             - Show location of the config file
 *   grepo watch add <a,b,...> [reset]             - Add repos to watch (reset=true replaces the list)
 *   grepo watch remove <a,b,...>                  - Stop watching repos
 *   grepo watch list                              - List watched repos
 *   grepo branch search <pattern>                 - Find branches by name in all watched repos
 *   grepo branch list                             - List branches of all watched repos
 *   grepo branch curr                             - Show the current branch of all watched repos
 *   grepo commit search <pattern> [--author] [--group]
 *                                                 - Find commits by message (and author)
 *   grepo scan-base-dir                           - Replace watched repos with those found in the base directory
 *
 * Commands accept unique prefixes and the aliases w, b, c and sbd.
 */

import { log } from '@shared/logger'
import type { GitBackend } from '../node/adapters/git'
import type { EngineOptions, SearchAggregator } from '../node/services/SearchAggregator'
import { parseRepoNames, partitionValidRepos, scanBaseDir } from '../node/services/RepoScanService'
import { describeError, ValidationError } from '../node/shared/errors'
import type { ConfigStore } from '../node/store'
import {
  formatBranchListing,
  formatBranchSearch,
  formatCommitMatches,
  formatCommitOccurrences,
  formatCurrentBranches,
  formatSection
} from './print'

export type CliDependencies = {
  store: ConfigStore
  aggregator: SearchAggregator
  backend: GitBackend
  /** Writes one block of command output */
  out: (text: string) => void
  confirm: (question: string) => Promise<boolean>
  engineOptions?: EngineOptions
}

const COMMANDS = ['base-dir', 'show-config', 'config-path', 'watch', 'branch', 'commit', 'scan-base-dir']
const ALIASES: Record<string, string> = { w: 'watch', b: 'branch', c: 'commit', sbd: 'scan-base-dir' }
const SUBCOMMANDS: Record<string, string[]> = {
  watch: ['add', 'remove', 'list'],
  branch: ['search', 'list', 'curr'],
  commit: ['search']
}

export const USAGE = `Usage: grepo <command>

Commands:
  base-dir [path]                     Show/set base directory of repos
  show-config                         Show saved settings
  config-path                         Show location of the config file
  watch (w) add <a,b,...> [reset]     Add repos to watch
  watch remove <a,b,...>              Stop watching repos
  watch list                          List watched repos
  branch (b) search <pattern>         Find branches by name
  branch list                         List branches of all watched repos
  branch curr                         Current branch of all watched repos
  commit (c) search <pattern> [--author] [--group]
                                      Find commits by message (and author)
  scan-base-dir (sbd)                 Rebuild watched repos from the base directory`

/**
 * Resolves an exact name, an alias or a unique prefix.
 */
export function resolveCommand(
  input: string | undefined,
  candidates: string[],
  aliases: Record<string, string> = {}
): string | null {
  if (!input) return null
  if (candidates.includes(input)) return input
  const aliased = aliases[input]
  if (aliased) return aliased
  const matches = candidates.filter((candidate) => candidate.startsWith(input))
  return matches.length === 1 ? (matches[0] ?? null) : null
}

function requireArg(value: string | undefined, name: string): string {
  if (!value || value.trim() === '') {
    throw new ValidationError(`Missing argument <${name}>`, name)
  }
  return value
}

function parseFlag(value: string | undefined): boolean {
  if (value === undefined) return false
  if (value === 'true') return true
  if (value === 'false') return false
  throw new ValidationError(`Expected true or false, got "${value}"`, 'reset')
}

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const [first, ...rest] = argv
  const command = resolveCommand(first, COMMANDS, ALIASES)
  if (!command) {
    deps.out(USAGE)
    return first ? 1 : 0
  }

  try {
    if (command in SUBCOMMANDS) {
      const [sub, ...args] = rest
      const subcommand = resolveCommand(sub, SUBCOMMANDS[command] ?? [])
      if (!subcommand) {
        deps.out(USAGE)
        return 1
      }
      return await runSubcommand(`${command} ${subcommand}`, args, deps)
    }
    return await runTopLevel(command, rest, deps)
  } catch (error) {
    if (error instanceof ValidationError) {
      log.error(error.message)
      deps.out(USAGE)
      return 1
    }
    log.error(`grepo ${command} failed: ${describeError(error)}`)
    return 1
  }
}

async function runTopLevel(command: string, args: string[], deps: CliDependencies): Promise<number> {
  const { store, out } = deps

  switch (command) {
    case 'base-dir': {
      const [newPath] = args
      if (!newPath) {
        out(store.getBasePath())
        return 0
      }
      const previous = store.setBasePath(newPath)
      out(`Updated base path from ${previous} to ${store.getBasePath()}`)
      return 0
    }

    case 'show-config':
      out(JSON.stringify({ basePath: store.getBasePath(), repos: store.getRepos() }, null, 2))
      return 0

    case 'config-path':
      out(store.getPath())
      return 0

    case 'scan-base-dir': {
      const basePath = store.getBasePath()
      const proceed = await deps.confirm(
        `This will reset your current watched repos with directories found in the base path (${basePath}). Are you sure?`
      )
      if (!proceed) {
        out('Aborted, watched repos unchanged')
        return 0
      }
      const { found, skipped } = await scanBaseDir(basePath, deps.backend)
      for (const name of found) out(`Found repo: ${name}`)
      for (const name of skipped) out(`Skipping ${name}: Not a valid repo`)
      const repos = store.replaceRepos(found)
      out(formatSection('Watched repos:', repos))
      return 0
    }
  }

  out(USAGE)
  return 1
}

async function runSubcommand(command: string, args: string[], deps: CliDependencies): Promise<number> {
  const { store, aggregator, out, engineOptions } = deps

  switch (command) {
    case 'watch add': {
      const names = parseRepoNames(requireArg(args[0], 'names'))
      const reset = parseFlag(args[1])
      const { valid, invalid } = await partitionValidRepos(store.getBasePath(), names, deps.backend)
      for (const name of invalid) out(`Skipping ${name}: Not a valid repo`)
      const repos = store.addRepos(valid, { reset })
      out(`Updated repos: now [${repos.join(', ')}]`)
      return 0
    }

    case 'watch remove': {
      const names = parseRepoNames(requireArg(args[0], 'names'))
      const { repos, missing } = store.removeRepos(names)
      for (const name of missing) out(`Repo ${name} is not found`)
      out(`Updated repos: now [${repos.join(', ')}]`)
      return 0
    }

    case 'watch list':
      out(formatSection('Watched Repos:', store.getRepos()))
      return 0

    case 'branch search': {
      const pattern = requireArg(args[0], 'pattern')
      const branches = await aggregator.branchSearch(store.getWatchedSet(), pattern, engineOptions)
      out(formatBranchSearch(pattern, branches))
      return 0
    }

    case 'branch list': {
      const branches = await aggregator.listBranches(store.getWatchedSet(), engineOptions)
      out(formatBranchListing(branches))
      return 0
    }

    case 'branch curr': {
      const outcomes = await aggregator.currentBranches(store.getWatchedSet(), engineOptions)
      out(formatCurrentBranches(outcomes))
      return 0
    }

    case 'commit search': {
      const positional = args.filter((arg) => !arg.startsWith('--'))
      const flags = new Set(args.filter((arg) => arg.startsWith('--')))
      const unknown = [...flags].filter((flag) => flag !== '--author' && flag !== '--group')
      if (unknown.length > 0) {
        throw new ValidationError(`Unknown option ${unknown.join(', ')}`, 'options')
      }
      const pattern = requireArg(positional[0], 'pattern')

      const result = await aggregator.commitSearch(
        store.getWatchedSet(),
        pattern,
        flags.has('--author'),
        engineOptions
      )
      if (!result.success) {
        log.error(result.error.message)
        return 1
      }
      out(
        flags.has('--group')
          ? formatCommitOccurrences(pattern, aggregator.groupMatchesByCommit(result.matches))
          : formatCommitMatches(pattern, result.matches)
      )
      return 0
    }
  }

  out(USAGE)
  return 1
}
