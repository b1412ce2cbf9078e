/**
 * @fileoverview Discriminating Path Search
 *
 * For a triple ⟨a, b, c⟩ (a-b and b-c adjacent), a discriminating path is
 * p = ⟨v₀, …, a, b, c⟩ such that:
 * - p has at least three edges
 * - v₀ is not adjacent to c
 * - every node strictly between v₀ and b is a collider on p and a parent of c
 *   (a possibly-directed edge into c, or a definite `→` with
 *   `definiteParents`)
 * - p is uncovered
 *
 * When such a path exists, the collider status of b on ⟨a, b, c⟩ can be read
 * off whether b was in the set that separated v₀ from c (FCI rule R4).
 *
 * The search grows the path backwards from a with an explicit stack, one
 * simple path per frame, in neighbour insertion order; the first path found
 * is returned. No path is a normal result.
 *
 * @see Zhang, J. (2008) "On the completeness of orientation rules for causal
 *   discovery in the presence of latent confounders and selection bias"
 *
 * @packageDocumentation
 */

import { resolveOracleConfig, type OracleOptions } from '../config/oracle_config.js';
import { InvalidQueryError } from '../core/errors.js';
import { hasArrowheadAt, isDefiniteDirectedEdge, isPossiblyDirectedEdge } from '../graphs/edge_marks.js';
import type { GraphPath } from '../graphs/graph_path.js';
import {
  adjacent,
  assertNode,
  edgesBetween,
  otherEndpoint,
  type MixedEdge,
  type MixedEdgeGraph,
  type NodeId,
} from '../graphs/mixed_edge_graph.js';
import { isCoveredOnEdges } from '../separation/path_predicates.js';
import { logDebug } from '../telemetry/logger.js';

/** Partial path, head first: `nodes[0]` is the next node to extend from. */
interface SearchFrame {
  nodes: NodeId[];
  edges: MixedEdge[];
}

/**
 * Find a discriminating path for ⟨a, b, c⟩.
 *
 * @returns the path ⟨v₀, …, a, b, c⟩, or null when none exists
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError unless a, b, c are distinct and a-b, b-c adjacent
 */
export function discriminatingPath(
  graph: MixedEdgeGraph,
  a: NodeId,
  b: NodeId,
  c: NodeId,
  options: OracleOptions = {}
): GraphPath | null {
  assertNode(graph, a);
  assertNode(graph, b);
  assertNode(graph, c);
  if (a === b || b === c || a === c) {
    throw new InvalidQueryError(`Triple (${a}, ${b}, ${c}) must name three distinct nodes`, { a, b, c });
  }
  const edgesAB = edgesBetween(graph, a, b);
  const edgesBC = edgesBetween(graph, b, c);
  if (edgesAB.length === 0 || edgesBC.length === 0) {
    throw new InvalidQueryError(`Triple (${a}, ${b}, ${c}) needs edges ${a}-${b} and ${b}-${c}`, { a, b, c });
  }

  const { maxPathLength, definiteParents } = resolveOracleConfig(options);
  logDebug('discriminatingPath', { a, b, c, maxPathLength, definiteParents });

  const isParentOfC = (node: NodeId): boolean =>
    edgesBetween(graph, node, c).some((edge) =>
      definiteParents ? isDefiniteDirectedEdge(edge, node) : isPossiblyDirectedEdge(edge, node)
    );

  if (!isParentOfC(a)) return null;
  if (maxPathLength !== null && maxPathLength < 3) return null;

  const stack: SearchFrame[] = [];
  // a must be a collider, so the a-b edge needs an arrowhead at a
  for (let i = edgesAB.length - 1; i >= 0; i -= 1) {
    const edgeAB = edgesAB[i];
    if (!edgeAB || !hasArrowheadAt(edgeAB, a)) continue;
    for (let j = edgesBC.length - 1; j >= 0; j -= 1) {
      const edgeBC = edgesBC[j];
      if (!edgeBC || isCoveredOnEdges(graph, a, c, edgeAB, edgeBC)) continue;
      stack.push({ nodes: [a, b, c], edges: [edgeAB, edgeBC] });
    }
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const [head, next] = frame.nodes;
    const [headEdge] = frame.edges;
    if (head === undefined || next === undefined || !headEdge) continue;
    if (maxPathLength !== null && frame.edges.length + 1 > maxPathLength) continue;

    const extensions: SearchFrame[] = [];
    for (const edges of graph.adjacency.get(head)?.values() ?? []) {
      for (const edge of edges) {
        const candidate = otherEndpoint(edge, head);
        if (frame.nodes.includes(candidate)) continue;
        // head is a collider: arrowhead at head on both of its path edges
        if (!hasArrowheadAt(edge, head)) continue;
        if (isCoveredOnEdges(graph, candidate, next, edge, headEdge)) continue;

        const extended = { nodes: [candidate, ...frame.nodes], edges: [edge, ...frame.edges] };
        if (!adjacent(graph, candidate, c)) {
          return extended;
        }
        if (hasArrowheadAt(edge, candidate) && isParentOfC(candidate)) {
          extensions.push(extended);
        }
      }
    }
    for (let i = extensions.length - 1; i >= 0; i -= 1) {
      const extension = extensions[i];
      if (extension) stack.push(extension);
    }
  }

  return null;
}
