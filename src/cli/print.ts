import { isOpened } from '@shared/types'
import type { Branch, BranchMap, CommitOccurrence, RepoOutcome, SearchMatch } from '@shared/types'
import type { AppError } from '../node/shared/errors'

const RULE = '-'.repeat(26)

export function formatSection(title: string, lines: string[]): string {
  return `${title}\n${RULE}\n${lines.join('\n')}\n`
}

/**
 * Left-aligned columns separated by two spaces, with a rule under the header.
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  )
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join('  ')
      .trimEnd()

  return [
    render(headers),
    render(widths.map((width) => '='.repeat(width))),
    ...rows.map(render)
  ].join('\n')
}

export function shortId(id: string): string {
  return id.slice(0, 7)
}

export function firstLine(message: string): string {
  return message.split('\n')[0] ?? ''
}

export function formatBranchListing(branches: BranchMap): string {
  return Array.from(branches, ([repoName, list]) =>
    formatSection(`Repo: ${repoName}`, list.map((branch) => branch.branchName))
  ).join('\n')
}

export function formatBranchSearch(pattern: string, branches: BranchMap): string {
  const rows: string[][] = []
  for (const list of branches.values()) {
    rows.push(...list.map((branch: Branch) => [branch.repoName, branch.branchName]))
  }
  if (rows.length === 0) return `Search pattern '${pattern}' not found in any repo`
  return `Search pattern '${pattern}' found in repos:\n${formatTable(['Repo', 'Branch'], rows)}`
}

export function formatCurrentBranches(outcomes: RepoOutcome<string, AppError>[]): string {
  return outcomes
    .map((outcome) =>
      formatSection(`Repo: ${outcome.repoName}`, [
        isOpened(outcome) ? outcome.value : `(error: ${outcome.error.message})`
      ])
    )
    .join('\n')
}

export function formatCommitMatches(pattern: string, matches: SearchMatch[]): string {
  if (matches.length === 0) return `Search pattern '${pattern}' not found in any commit`
  const rows = matches.map((match) => [
    match.repoName,
    match.branchName,
    shortId(match.commit.id),
    match.commit.author,
    firstLine(match.commit.message)
  ])
  return `Search pattern '${pattern}' found in commits:\n${formatTable(
    ['Repo', 'Branch', 'Commit', 'Author', 'Message'],
    rows
  )}`
}

export function formatCommitOccurrences(pattern: string, occurrences: CommitOccurrence[]): string {
  if (occurrences.length === 0) return `Search pattern '${pattern}' not found in any commit`
  const rows = occurrences.map((occurrence) => [
    occurrence.repoName,
    shortId(occurrence.commit.id),
    occurrence.branchNames.join(', '),
    occurrence.commit.author,
    firstLine(occurrence.commit.message)
  ])
  return `Search pattern '${pattern}' found in commits:\n${formatTable(
    ['Repo', 'Commit', 'Branches', 'Author', 'Message'],
    rows
  )}`
}
