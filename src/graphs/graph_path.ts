/**
 * @fileoverview Path value type.
 *
 * A path is an immutable sequence of distinct nodes plus the edge used
 * between each consecutive pair. Keeping the edges makes collider and
 * covering checks unambiguous when two nodes are joined by more than one
 * edge. Paths never reference the graph they came from.
 */

import { InvalidQueryError } from '../core/errors.js';
import {
  assertNode,
  edgesBetween,
  formatEdge,
  type MixedEdge,
  type MixedEdgeGraph,
  type NodeId,
} from './mixed_edge_graph.js';

export interface GraphPath {
  readonly nodes: readonly NodeId[];
  /** `edges[i]` joins `nodes[i]` and `nodes[i + 1]` */
  readonly edges: readonly MixedEdge[];
}

/**
 * Build a path over `graph`. When `edges` is omitted, each consecutive pair
 * must be joined by exactly one edge.
 *
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError for repeated nodes, non-adjacent steps, ambiguous
 *   steps or edges that do not join their step
 */
export function createPath(
  graph: MixedEdgeGraph,
  nodes: readonly NodeId[],
  edges?: readonly MixedEdge[]
): GraphPath {
  if (nodes.length === 0) {
    throw new InvalidQueryError('A path needs at least one node');
  }
  for (const node of nodes) assertNode(graph, node);
  if (new Set(nodes).size !== nodes.length) {
    throw new InvalidQueryError('Path nodes must be distinct', { nodes: [...nodes] });
  }
  if (edges !== undefined && edges.length !== nodes.length - 1) {
    throw new InvalidQueryError(`A path over ${nodes.length} nodes needs ${nodes.length - 1} edges`, {
      nodes: [...nodes],
      edgeCount: edges.length,
    });
  }

  const resolved: MixedEdge[] = [];
  for (let i = 0; i + 1 < nodes.length; i += 1) {
    const u = nodes[i];
    const v = nodes[i + 1];
    if (u === undefined || v === undefined) continue;
    const available = edgesBetween(graph, u, v);
    const given = edges?.[i];
    if (given !== undefined) {
      if (!available.includes(given)) {
        throw new InvalidQueryError(`Edge ${formatEdge(given)} does not join '${u}' and '${v}' in this graph`);
      }
      resolved.push(given);
      continue;
    }
    const [only] = available;
    if (!only) {
      throw new InvalidQueryError(`'${u}' and '${v}' are not adjacent`, { u, v });
    }
    if (available.length > 1) {
      throw new InvalidQueryError(`'${u}' and '${v}' are joined by ${available.length} edges; pass edges explicitly`, {
        u,
        v,
      });
    }
    resolved.push(only);
  }

  return { nodes: [...nodes], edges: resolved };
}

export function pathLength(path: GraphPath): number {
  return path.edges.length;
}

export function pathEndpoints(path: GraphPath): [NodeId, NodeId] {
  const first = path.nodes[0];
  const last = path.nodes[path.nodes.length - 1];
  if (first === undefined || last === undefined) {
    throw new InvalidQueryError('Empty path has no endpoints');
  }
  return [first, last];
}

export function formatPath(path: GraphPath): string {
  return path.edges.length === 0 ? (path.nodes[0] ?? '') : path.edges.map(formatEdge).join(', ');
}
