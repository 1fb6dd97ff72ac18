/**
 * RevisionWalker - reverse topological walk of a commit graph.
 *
 * Starting at a tip, every reachable ancestor is yielded exactly once and
 * always before its parents, regardless of timestamps. Among commits whose
 * children have all been yielded, the newer committer timestamp goes first
 * (ties broken by id), which gives the familiar newest-first log order for
 * linear history.
 *
 * The walk reads commit headers breadth-first before yielding, since a commit
 * can only be released once every child that reaches it is known. Consumers
 * still pull results lazily and can stop early.
 */

import type { CommitNode } from '../adapters/git/types'

export type ReadCommit = (id: string) => Promise<CommitNode>

export type RevisionWalkOptions = {
  signal?: AbortSignal
  /** Stop reading history after this many commits */
  maxCommits?: number
}

/**
 * Max-heap of ready commits ordered by timestamp, newest first.
 */
class ReadyQueue {
  private readonly items: CommitNode[] = []

  get size(): number {
    return this.items.length
  }

  push(node: CommitNode): void {
    const items = this.items
    items.push(node)
    let index = items.length - 1
    while (index > 0) {
      const parentIndex = (index - 1) >> 1
      const parent = items[parentIndex]
      if (!parent || !ReadyQueue.before(node, parent)) break
      items[index] = parent
      items[parentIndex] = node
      index = parentIndex
    }
  }

  pop(): CommitNode | undefined {
    const items = this.items
    const top = items[0]
    const last = items.pop()
    if (top === undefined || last === undefined || items.length === 0) return top

    items[0] = last
    let index = 0
    for (;;) {
      const left = index * 2 + 1
      const right = left + 1
      let best = index
      const leftNode = items[left]
      const rightNode = items[right]
      const bestNode = items[best]
      if (leftNode && bestNode && ReadyQueue.before(leftNode, bestNode)) best = left
      const current = items[best]
      if (rightNode && current && ReadyQueue.before(rightNode, current)) best = right
      if (best === index) break
      const swap = items[best]
      if (!swap) break
      items[best] = last
      items[index] = swap
      index = best
    }
    return top
  }

  private static before(a: CommitNode, b: CommitNode): boolean {
    if (a.timestamp !== b.timestamp) return a.timestamp > b.timestamp
    return a.id < b.id
  }
}

export async function* walkTopological(
  tipId: string,
  readCommit: ReadCommit,
  options: RevisionWalkOptions = {}
): AsyncGenerator<CommitNode> {
  const { signal, maxCommits } = options

  const nodes = new Map<string, CommitNode>()
  // Number of loaded children that still have to be yielded before a commit is ready
  const pendingChildren = new Map<string, number>()
  const queue: string[] = [tipId]
  const seen = new Set<string>(queue)

  for (let head = 0; head < queue.length; head++) {
    if (maxCommits !== undefined && nodes.size >= maxCommits) break
    signal?.throwIfAborted()

    const id = queue[head]
    if (id === undefined) continue
    const node = await readCommit(id)
    nodes.set(id, node)

    for (const parent of node.parents) {
      pendingChildren.set(parent, (pendingChildren.get(parent) ?? 0) + 1)
      if (!seen.has(parent)) {
        seen.add(parent)
        queue.push(parent)
      }
    }
  }

  const tip = nodes.get(tipId)
  if (!tip) return

  const ready = new ReadyQueue()
  ready.push(tip)

  while (ready.size > 0) {
    signal?.throwIfAborted()
    const node = ready.pop()
    if (!node) break
    yield node

    for (const parent of node.parents) {
      const remaining = (pendingChildren.get(parent) ?? 1) - 1
      pendingChildren.set(parent, remaining)
      if (remaining === 0) {
        const parentNode = nodes.get(parent)
        if (parentNode) ready.push(parentNode)
      }
    }
  }
}
