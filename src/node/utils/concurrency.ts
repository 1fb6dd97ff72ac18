/**
 * Bounded parallelism for per-repository work.
 */

import { log } from '@shared/logger'
import { AppError, OperationCancelledError, TimeoutError } from '../shared/errors'

/**
 * Runs `executor` over `items` with at most `limit` calls in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  executor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      const item = items[index]
      if (item === undefined) continue
      results[index] = await executor(item, index)
    }
  }

  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length))
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}

export type DeadlineOptions = {
  /** 0 or undefined means no deadline */
  timeoutMs?: number
  /** Parent signal; aborting it cancels the task */
  signal?: AbortSignal
  /** Used in the timeout message */
  label?: string
}

/**
 * Runs `task` with its own abort signal that fires when the deadline passes or
 * the parent signal aborts. Settles as soon as that happens, even if the task
 * ignores the signal.
 *
 * @throws TimeoutError when the deadline passes first
 * @throws OperationCancelledError when the parent signal aborts first
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions = {}
): Promise<T> {
  const { timeoutMs, signal: parent, label = 'operation' } = options
  if (parent?.aborted) {
    throw new OperationCancelledError()
  }

  const controller = new AbortController()
  const onParentAbort = (): void => controller.abort(new OperationCancelledError())
  parent?.addEventListener('abort', onParentAbort, { once: true })

  const timer =
    timeoutMs && timeoutMs > 0
      ? setTimeout(
          () => controller.abort(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs)),
          timeoutMs
        )
      : undefined

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), {
      once: true
    })
  })

  const running = task(controller.signal)
  try {
    return await Promise.race([running, aborted])
  } catch (error) {
    if (controller.signal.aborted) {
      running.catch((late: unknown) => log.debug(`[withDeadline] ${label} settled after abort:`, late))
      throw abortReason(controller.signal)
    }
    throw error
  } finally {
    if (timer) clearTimeout(timer)
    parent?.removeEventListener('abort', onParentAbort)
  }
}

function abortReason(signal: AbortSignal): AppError {
  const reason: unknown = signal.reason
  return reason instanceof AppError ? reason : new OperationCancelledError()
}
