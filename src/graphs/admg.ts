/**
 * @fileoverview Acyclic directed mixed graph (ADMG) view.
 *
 * Directed edges are causal relations, bidirected edges stand for latent
 * confounders, undirected edges for selection. Only definite directed edges
 * count for parents, children, ancestors and descendants: nodes joined by a
 * bidirected edge alone are spouses, not parents.
 */

import { InvalidQueryError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import {
  assertNode,
  getEdges,
  neighbors,
  type MixedEdgeGraph,
  type NodeId,
} from './mixed_edge_graph.js';

/**
 * Nodes with a directed edge into `v`.
 */
export function parents(graph: MixedEdgeGraph, v: NodeId): NodeId[] {
  return neighbors(graph, v, ['directed'])
    .filter((neighbor) => neighbor.edge.target === v)
    .map((neighbor) => neighbor.node);
}

/**
 * Nodes with a directed edge out of `v`.
 */
export function children(graph: MixedEdgeGraph, v: NodeId): NodeId[] {
  return neighbors(graph, v, ['directed'])
    .filter((neighbor) => neighbor.edge.source === v)
    .map((neighbor) => neighbor.node);
}

export function spouses(graph: MixedEdgeGraph, v: NodeId): NodeId[] {
  return neighbors(graph, v, ['bidirected']).map((neighbor) => neighbor.node);
}

function directedClosure(graph: MixedEdgeGraph, v: NodeId, step: (node: NodeId) => NodeId[]): Set<NodeId> {
  assertNode(graph, v);
  const reached = new Set<NodeId>();
  const queue = [v];
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    if (current === undefined) continue;
    for (const next of step(current)) {
      if (next === v || reached.has(next)) continue;
      reached.add(next);
      queue.push(next);
    }
  }
  return reached;
}

/**
 * Nodes with a directed path into `v`, excluding `v`.
 */
export function ancestors(graph: MixedEdgeGraph, v: NodeId): Set<NodeId> {
  return directedClosure(graph, v, (node) => parents(graph, node));
}

/**
 * Nodes reachable from `v` along directed edges, excluding `v`.
 */
export function descendants(graph: MixedEdgeGraph, v: NodeId): Set<NodeId> {
  return directedClosure(graph, v, (node) => children(graph, node));
}

/**
 * Connected components of the bidirected subgraph (districts). Every node
 * belongs to exactly one component; components and their members follow
 * node declaration order.
 */
export function cComponents(graph: MixedEdgeGraph): NodeId[][] {
  logDebug('cComponents', { nodes: graph.nodeOrder.length });
  const seen = new Set<NodeId>();
  const components: NodeId[][] = [];

  for (const root of graph.nodeOrder) {
    if (seen.has(root)) continue;
    seen.add(root);
    const members = new Set<NodeId>([root]);
    const queue = [root];
    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      if (current === undefined) continue;
      for (const spouse of spouses(graph, current)) {
        if (seen.has(spouse)) continue;
        seen.add(spouse);
        members.add(spouse);
        queue.push(spouse);
      }
    }
    components.push(graph.nodeOrder.filter((node) => members.has(node)));
  }

  return components;
}

/**
 * Whether the directed edges form no cycle (Kahn's algorithm).
 */
export function isAcyclic(graph: MixedEdgeGraph): boolean {
  const inDegree = new Map<NodeId, number>();
  for (const node of graph.nodeOrder) inDegree.set(node, 0);
  for (const edge of getEdges(graph, 'directed')) {
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
  }

  const queue = graph.nodeOrder.filter((node) => inDegree.get(node) === 0);
  let removed = 0;
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    if (current === undefined) continue;
    removed += 1;
    for (const child of children(graph, current)) {
      const remaining = (inDegree.get(child) ?? 0) - 1;
      inDegree.set(child, remaining);
      if (remaining === 0) queue.push(child);
    }
  }

  return removed === graph.nodeOrder.length;
}

/**
 * @throws InvalidQueryError when the graph has a circle edge or a directed cycle
 */
export function assertAdmg(graph: MixedEdgeGraph): void {
  const circles = getEdges(graph, 'circle');
  if (circles.length > 0) {
    throw new InvalidQueryError('An ADMG cannot contain circle edges', { circleEdges: circles.length });
  }
  if (!isAcyclic(graph)) {
    throw new InvalidQueryError('Directed edges contain a cycle; the graph is not an ADMG');
  }
}
