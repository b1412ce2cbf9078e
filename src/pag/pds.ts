/**
 * @fileoverview Possible-D-Separating Sets
 *
 * `pds(graph, x, y)` collects every node w ≠ x, y joined to y by a path on
 * which each internal node is a collider and a possible ancestor of y. The
 * path never passes through x. Discovery rules use the result to bound the
 * conditioning sets they try when separating x from y.
 *
 * `pdsPath` narrows this to paths whose nodes (other than y) all lie in a
 * caller-supplied set and that are uncovered.
 *
 * @packageDocumentation
 */

import { resolveOracleConfig, type OracleOptions } from '../config/oracle_config.js';
import { InvalidQueryError } from '../core/errors.js';
import { hasArrowheadAt } from '../graphs/edge_marks.js';
import {
  assertNode,
  assertNodes,
  otherEndpoint,
  type MixedEdge,
  type MixedEdgeGraph,
  type NodeId,
} from '../graphs/mixed_edge_graph.js';
import { isCoveredOnEdges } from '../separation/path_predicates.js';
import { logDebug } from '../telemetry/logger.js';
import { reachPossiblyDirected } from './ancestral_reachability.js';

function assertPair(graph: MixedEdgeGraph, x: NodeId, y: NodeId): void {
  assertNode(graph, x);
  assertNode(graph, y);
  if (x === y) {
    throw new InvalidQueryError(`PDS needs two distinct nodes, got '${x}' twice`, { x, y });
  }
}

function incidentEdges(graph: MixedEdgeGraph, node: NodeId): MixedEdge[] {
  const result: MixedEdge[] = [];
  for (const edges of graph.adjacency.get(node)?.values() ?? []) result.push(...edges);
  return result;
}

/**
 * Possible-d-separating set of `y` relative to `x`.
 *
 * A collider walk can always be shortened to a collider path, so a
 * breadth-first search over nodes entered through an arrowhead finds every
 * member, and its depth is the shortest such path.
 *
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError when `x` and `y` coincide
 */
export function pds(
  graph: MixedEdgeGraph,
  x: NodeId,
  y: NodeId,
  options: OracleOptions = {}
): Set<NodeId> {
  assertPair(graph, x, y);
  const { maxPathLength } = resolveOracleConfig(options);
  logDebug('pds', { x, y, maxPathLength });

  const ancestorsOfY = reachPossiblyDirected(graph, [y], 'backward');
  const result = new Set<NodeId>();
  const expanded = new Set<NodeId>();
  const queue: Array<{ node: NodeId; depth: number }> = [{ node: y, depth: 0 }];

  for (let head = 0; head < queue.length; head += 1) {
    const entry = queue[head];
    if (!entry) continue;
    const { node, depth } = entry;
    if (maxPathLength !== null && depth >= maxPathLength) continue;

    for (const edge of incidentEdges(graph, node)) {
      // y is the endpoint; every other node here continues as a collider
      if (node !== y && !hasArrowheadAt(edge, node)) continue;
      const next = otherEndpoint(edge, node);
      if (next === x || next === y) continue;
      result.add(next);
      if (hasArrowheadAt(edge, next) && ancestorsOfY.has(next) && !expanded.has(next)) {
        expanded.add(next);
        queue.push({ node: next, depth: depth + 1 });
      }
    }
  }

  return result;
}

interface PdsFrame {
  nodes: NodeId[];
  edges: MixedEdge[];
}

/**
 * Members of `pdsSet` joined to `y` by an uncovered path that stays inside
 * `pdsSet` and whose internal nodes are colliders and possible ancestors
 * of `y`. Enumerates simple paths, so the cost grows with `pdsSet` and is
 * bounded by `maxPathLength`.
 *
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError when `x` and `y` coincide
 */
export function pdsPath(
  graph: MixedEdgeGraph,
  x: NodeId,
  y: NodeId,
  pdsSet: Iterable<NodeId>,
  options: OracleOptions = {}
): Set<NodeId> {
  assertPair(graph, x, y);
  const allowed = new Set(pdsSet);
  assertNodes(graph, allowed);
  allowed.delete(x);
  allowed.delete(y);
  const { maxPathLength } = resolveOracleConfig(options);
  logDebug('pdsPath', { x, y, allowed: allowed.size, maxPathLength });

  const ancestorsOfY = reachPossiblyDirected(graph, [y], 'backward');
  const result = new Set<NodeId>();
  const stack: PdsFrame[] = [{ nodes: [y], edges: [] }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    if (maxPathLength !== null && frame.edges.length >= maxPathLength) continue;
    const last = frame.nodes[frame.nodes.length - 1];
    if (last === undefined) continue;
    const prev = frame.nodes[frame.nodes.length - 2];
    const lastEdge = frame.edges[frame.edges.length - 1];

    const extensions: PdsFrame[] = [];
    for (const edge of incidentEdges(graph, last)) {
      const next = otherEndpoint(edge, last);
      if (!allowed.has(next) || frame.nodes.includes(next)) continue;
      if (prev !== undefined && lastEdge) {
        if (!ancestorsOfY.has(last)) continue;
        if (!hasArrowheadAt(lastEdge, last) || !hasArrowheadAt(edge, last)) continue;
        if (isCoveredOnEdges(graph, prev, next, lastEdge, edge)) continue;
      }
      result.add(next);
      extensions.push({ nodes: [...frame.nodes, next], edges: [...frame.edges, edge] });
    }
    for (let i = extensions.length - 1; i >= 0; i -= 1) {
      const extension = extensions[i];
      if (extension) stack.push(extension);
    }
  }

  return result;
}
