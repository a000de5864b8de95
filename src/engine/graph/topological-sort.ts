import type { Result } from '../../shared/result/index.ts';
import { ok, err } from '../../shared/result/index.ts';

/** Directed edge: `from` must be ordered before `to` */
export interface GraphEdge<T> {
  from: T;
  to: T;
}

export interface CycleError<T> {
  message: string;
  /** Nodes forming the cycle, first node repeated at the end */
  cyclePath: T[];
}

export interface TopologicalResult<T> {
  order: T[];
  /** Longest path from any root (zero in-degree node) to each node */
  depths: Map<T, number>;
  /** Maximum depth across all nodes */
  maxDepth: number;
}

function buildAdjacency<T>(nodes: readonly T[], edges: readonly GraphEdge<T>[]): Map<T, T[]> {
  const adjacency = new Map<T, T[]>();
  for (const id of nodes) {
    adjacency.set(id, []);
  }
  for (const edge of edges) {
    adjacency.get(edge.from)?.push(edge.to);
  }
  return adjacency;
}

/**
 * Topological sort using Kahn's algorithm.
 * Returns nodes ordered so every node comes after its predecessors,
 * or an error with the cycle path if a cycle exists.
 * Ties are broken by the order of `nodes`, so the result is deterministic.
 */
export function topologicalSort<T>(
  nodes: readonly T[],
  edges: readonly GraphEdge<T>[],
): Result<T[], CycleError<T>> {
  const adjacency = buildAdjacency(nodes, edges);
  const inDegree = new Map<T, number>();
  for (const id of nodes) {
    inDegree.set(id, 0);
  }
  for (const edge of edges) {
    inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
  }

  // Seed queue with nodes that have zero in-degree
  const queue: T[] = nodes.filter((id) => inDegree.get(id) === 0);
  const sorted: T[] = [];

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    sorted.push(node);
    for (const neighbor of adjacency.get(node) ?? []) {
      const deg = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, deg);
      if (deg === 0) {
        queue.push(neighbor);
      }
    }
  }

  // If not all nodes were processed, a cycle exists
  if (sorted.length !== nodes.length) {
    const cyclePath = findCycle(nodes, edges, sorted);
    return err({
      message: `Cycle detected: ${cyclePath.join(' → ')}`,
      cyclePath,
    });
  }

  return ok(sorted);
}

/**
 * Topological sort with depth tracking.
 *
 * Returns the same order as `topologicalSort`, plus a depth map where
 * depth = longest path from any root to each node. Roots have depth 0.
 */
export function topologicalSortWithDepths<T>(
  nodes: readonly T[],
  edges: readonly GraphEdge<T>[],
): Result<TopologicalResult<T>, CycleError<T>> {
  const sortResult = topologicalSort(nodes, edges);
  if (!sortResult.ok) return sortResult;

  const order = sortResult.value;

  // Reverse adjacency: for each node, which nodes feed into it
  const predecessors = new Map<T, T[]>();
  for (const id of nodes) {
    predecessors.set(id, []);
  }
  for (const edge of edges) {
    predecessors.get(edge.to)?.push(edge.from);
  }

  // Predecessors are always processed first in topological order
  const depths = new Map<T, number>();
  let maxDepth = 0;

  for (const id of order) {
    let depth = 0;
    for (const pred of predecessors.get(id) ?? []) {
      const predDepth = depths.get(pred);
      if (predDepth !== undefined && predDepth + 1 > depth) {
        depth = predDepth + 1;
      }
    }
    depths.set(id, depth);
    if (depth > maxDepth) maxDepth = depth;
  }

  return ok({ order, depths, maxDepth });
}

/**
 * Find one cycle among the unprocessed nodes using DFS.
 */
function findCycle<T>(
  nodes: readonly T[],
  edges: readonly GraphEdge<T>[],
  processed: readonly T[],
): T[] {
  const processedSet = new Set(processed);
  const remaining = nodes.filter((id) => !processedSet.has(id));
  const remainingSet = new Set(remaining);

  // Adjacency restricted to remaining nodes
  const adjacency = buildAdjacency(
    remaining,
    edges.filter((e) => remainingSet.has(e.from) && remainingSet.has(e.to)),
  );

  const visited = new Set<T>();
  const onStack = new Set<T>();
  const parent = new Map<T, T>();

  for (const start of remaining) {
    if (visited.has(start)) continue;
    const cycle = dfs(start, adjacency, visited, onStack, parent);
    if (cycle) return cycle;
  }

  // Unreachable when Kahn's algorithm left nodes behind
  return remaining;
}

function dfs<T>(
  node: T,
  adjacency: Map<T, T[]>,
  visited: Set<T>,
  onStack: Set<T>,
  parent: Map<T, T>,
): T[] | null {
  visited.add(node);
  onStack.add(node);

  for (const neighbor of adjacency.get(node) ?? []) {
    if (!visited.has(neighbor)) {
      parent.set(neighbor, node);
      const cycle = dfs(neighbor, adjacency, visited, onStack, parent);
      if (cycle) return cycle;
    } else if (onStack.has(neighbor)) {
      // Found cycle; walk parents back to the repeated node
      const path: T[] = [neighbor];
      let current: T | undefined = node;
      while (current !== undefined && current !== neighbor) {
        path.push(current);
        current = parent.get(current);
      }
      path.push(neighbor);
      path.reverse();
      return path;
    }
  }

  onStack.delete(node);
  return null;
}
