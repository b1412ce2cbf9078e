/**
 * @fileoverview Possible ancestors and descendants under partial orientation.
 *
 * `w` is a possible ancestor of `v` when a path `w → … → v` exists on which
 * every edge is possibly directed towards `v` (no arrowhead at the near end,
 * an arrowhead or circle at the far end). Both results include the start
 * node. A visited set makes the traversal terminate on graphs whose partial
 * orientation admits cycles.
 *
 * @packageDocumentation
 */

import { hasArrowheadAt, isPossiblyDirectedEdge } from '../graphs/edge_marks.js';
import { assertNode, assertNodes, type MixedEdgeGraph, type NodeId } from '../graphs/mixed_edge_graph.js';
import { logDebug } from '../telemetry/logger.js';

export type ReachDirection = 'backward' | 'forward';

/**
 * Breadth-first closure over possibly-directed edges. No validation, no
 * logging; callers check their seeds.
 */
export function reachPossiblyDirected(
  graph: MixedEdgeGraph,
  seeds: Iterable<NodeId>,
  direction: ReachDirection
): Set<NodeId> {
  const reached = new Set<NodeId>(seeds);
  const queue = [...reached];

  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    if (current === undefined) continue;
    for (const [next, edges] of graph.adjacency.get(current) ?? []) {
      if (reached.has(next)) continue;
      // backward: next → current; forward: current → next
      const follows = edges.some((edge) =>
        direction === 'backward' ? isPossiblyDirectedEdge(edge, next) : isPossiblyDirectedEdge(edge, current)
      );
      if (!follows) continue;
      reached.add(next);
      queue.push(next);
    }
  }

  return reached;
}

/**
 * Backward closure over edges with no arrowhead at the node being added:
 * possibly directed edges plus undirected (selection) ones. This is the
 * possibly anterior set the moralization criterion restricts to.
 */
export function reachPossiblyAnterior(graph: MixedEdgeGraph, seeds: Iterable<NodeId>): Set<NodeId> {
  const reached = new Set<NodeId>(seeds);
  const queue = [...reached];

  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    if (current === undefined) continue;
    for (const [next, edges] of graph.adjacency.get(current) ?? []) {
      if (reached.has(next)) continue;
      if (!edges.some((edge) => !hasArrowheadAt(edge, next))) continue;
      reached.add(next);
      queue.push(next);
    }
  }

  return reached;
}

/**
 * Possible ancestors of `v`, including `v`.
 *
 * @throws UnknownNodeError when `v` is absent
 */
export function possibleAncestors(graph: MixedEdgeGraph, v: NodeId): Set<NodeId> {
  assertNode(graph, v);
  logDebug('possibleAncestors', { node: v });
  return reachPossiblyDirected(graph, [v], 'backward');
}

/**
 * Possible descendants of `v`, including `v`.
 *
 * @throws UnknownNodeError when `v` is absent
 */
export function possibleDescendants(graph: MixedEdgeGraph, v: NodeId): Set<NodeId> {
  assertNode(graph, v);
  logDebug('possibleDescendants', { node: v });
  return reachPossiblyDirected(graph, [v], 'forward');
}

/**
 * Union of the possible ancestors of every node in `nodes`.
 */
export function possibleAncestorsOfSet(graph: MixedEdgeGraph, nodes: Iterable<NodeId>): Set<NodeId> {
  const seeds = [...nodes];
  assertNodes(graph, seeds);
  logDebug('possibleAncestorsOfSet', { size: seeds.length });
  return reachPossiblyDirected(graph, seeds, 'backward');
}

/**
 * Union of the possible descendants of every node in `nodes`.
 */
export function possibleDescendantsOfSet(graph: MixedEdgeGraph, nodes: Iterable<NodeId>): Set<NodeId> {
  const seeds = [...nodes];
  assertNodes(graph, seeds);
  logDebug('possibleDescendantsOfSet', { size: seeds.length });
  return reachPossiblyDirected(graph, seeds, 'forward');
}

export function isPossibleAncestor(graph: MixedEdgeGraph, w: NodeId, v: NodeId): boolean {
  assertNode(graph, w);
  assertNode(graph, v);
  logDebug('isPossibleAncestor', { ancestor: w, node: v });
  return reachPossiblyDirected(graph, [v], 'backward').has(w);
}
