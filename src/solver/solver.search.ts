import type { MoveGraph } from './solver.graph';

/** Predecessor sentinel for nodes the search never reached. */
export const NO_PREDECESSOR = -1;

/** Result of a single-source search. Both arrays are indexed by node id. */
export interface ShortestPathTree {
  /** Edge count from the source, or -1 when unreached. */
  distances: Int32Array;
  /** Previous node on a shortest path, or {@link NO_PREDECESSOR}. */
  predecessors: Int32Array;
}

/**
 * Single-source shortest paths over a unit-weight graph.
 *
 * With every edge weighing 1, Dijkstra's algorithm reduces to breadth-first search:
 * the FIFO queue already pops nodes in non-decreasing distance order, so each node
 * is settled on first discovery.
 *
 * @param graph - Graph built by `buildMoveGraph`.
 * @param source - Flat id of the start node.
 * @param target - Optional flat id; the search stops once it is settled.
 */
export function shortestPathTree(
  graph: MoveGraph,
  source: number,
  target?: number
): ShortestPathTree {
  const nodeCount = graph.offsets.length - 1;
  const distances = new Int32Array(nodeCount).fill(-1);
  const predecessors = new Int32Array(nodeCount).fill(NO_PREDECESSOR);
  const queue = new Int32Array(nodeCount);
  let head = 0;
  let tail = 0;

  distances[source] = 0;
  queue[tail++] = source;

  while (head < tail) {
    const node = queue[head++];
    if (node === target) break;
    const nextDistance = distances[node] + 1;
    for (let edge = graph.offsets[node]; edge < graph.offsets[node + 1]; edge++) {
      const neighbour = graph.targets[edge];
      if (distances[neighbour] !== -1) continue;
      distances[neighbour] = nextDistance;
      predecessors[neighbour] = node;
      queue[tail++] = neighbour;
    }
  }

  return { distances, predecessors };
}
