/**
 * Custom error classes for the search engine.
 * Provides typed errors for different failure scenarios.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown by a git backend when an underlying read fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

export type RepoOpenFailure = 'missing' | 'not-a-repository' | 'unreadable'

/**
 * Error raised when `basePath/repoName` cannot be opened as a repository.
 */
export class RepoOpenError extends AppError {
  constructor(
    message: string,
    public readonly repoName: string,
    public readonly path: string,
    public readonly reason: RepoOpenFailure,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'RepoOpenError'
  }
}

/**
 * Error raised when branch references cannot be listed, or a branch cannot be
 * resolved to a tip and walked.
 */
export class BranchResolutionError extends AppError {
  constructor(
    message: string,
    public readonly repoName: string,
    public readonly branchName?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'BranchResolutionError'
  }
}

/**
 * Error raised when HEAD exists but cannot be resolved to a usable reference.
 * An unborn or detached HEAD is a valid state and never raises this.
 */
export class HeadResolutionError extends AppError {
  constructor(
    message: string,
    public readonly repoName: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'HeadResolutionError'
  }
}

/**
 * Fatal commit search failure for the whole call.
 */
export class SearchError extends AppError {
  constructor(
    message: string,
    public readonly pattern: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'SearchError'
  }
}

/**
 * Error raised when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message)
    this.name = 'TimeoutError'
  }
}

/**
 * Error raised when the caller aborts an engine call.
 */
export class OperationCancelledError extends AppError {
  constructor(message = 'Operation cancelled', cause?: unknown) {
    super(message, cause)
    this.name = 'OperationCancelledError'
  }
}

/**
 * Error thrown when a validation check fails.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
