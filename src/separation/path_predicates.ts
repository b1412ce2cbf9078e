/**
 * @fileoverview Path Predicates
 *
 * Stateless checks over a graph and a triple or path:
 * - collider / definite non-collider status of a middle node
 * - whether a path is open (m-connecting) given a conditioning set
 * - possibly-directed edges and paths
 * - covered triples and uncovered paths
 *
 * Triple-level predicates consider every edge joining each pair; path-level
 * predicates use exactly the edges the path carries.
 *
 * @packageDocumentation
 */

import { InvalidQueryError } from '../core/errors.js';
import {
  hasArrowheadAt,
  isColliderOnEdges,
  isDefiniteNoncolliderOnEdges,
  isPossiblyDirectedEdge,
} from '../graphs/edge_marks.js';
import type { GraphPath } from '../graphs/graph_path.js';
import {
  assertNode,
  assertNodes,
  edgesBetween,
  endpointMark,
  type MixedEdge,
  type MixedEdgeGraph,
  type NodeId,
} from '../graphs/mixed_edge_graph.js';
import { reachPossiblyDirected } from '../pag/ancestral_reachability.js';

// ============================================================================
// TRIPLES
// ============================================================================

interface TripleEdges {
  ab: readonly MixedEdge[];
  bc: readonly MixedEdge[];
}

function tripleEdges(graph: MixedEdgeGraph, a: NodeId, b: NodeId, c: NodeId): TripleEdges {
  assertNode(graph, a);
  assertNode(graph, b);
  assertNode(graph, c);
  if (a === b || b === c || a === c) {
    throw new InvalidQueryError(`Triple (${a}, ${b}, ${c}) must name three distinct nodes`, { a, b, c });
  }
  const ab = edgesBetween(graph, a, b);
  const bc = edgesBetween(graph, b, c);
  if (ab.length === 0 || bc.length === 0) {
    throw new InvalidQueryError(`Triple (${a}, ${b}, ${c}) needs edges ${a}-${b} and ${b}-${c}`, { a, b, c });
  }
  return { ab, bc };
}

/**
 * `a *→ b ←* c`: both marks at `b` are arrowheads.
 *
 * @throws InvalidQueryError unless `a`-`b` and `b`-`c` are adjacent
 */
export function isCollider(graph: MixedEdgeGraph, a: NodeId, b: NodeId, c: NodeId): boolean {
  const { ab, bc } = tripleEdges(graph, a, b, c);
  return ab.some((edge) => hasArrowheadAt(edge, b)) && bc.some((edge) => hasArrowheadAt(edge, b));
}

/**
 * At least one mark at `b` is a tail, whichever edges a path takes.
 */
export function isDefiniteNoncollider(graph: MixedEdgeGraph, a: NodeId, b: NodeId, c: NodeId): boolean {
  const { ab, bc } = tripleEdges(graph, a, b, c);
  return ab.every((edge) => endpointMark(edge, b) === 'tail') || bc.every((edge) => endpointMark(edge, b) === 'tail');
}

/**
 * Covering check for the path edges `edgeAB` (a-b) and `edgeBC` (b-c): `a`
 * and `c` are adjacent and the a-c edge repeats the mark at `a` of `edgeAB`
 * and the mark at `c` of `edgeBC`.
 */
export function isCoveredOnEdges(
  graph: MixedEdgeGraph,
  a: NodeId,
  c: NodeId,
  edgeAB: MixedEdge,
  edgeBC: MixedEdge
): boolean {
  const markA = endpointMark(edgeAB, a);
  const markC = endpointMark(edgeBC, c);
  return edgesBetween(graph, a, c).some(
    (edge) => endpointMark(edge, a) === markA && endpointMark(edge, c) === markC
  );
}

/**
 * @throws InvalidQueryError unless `a`-`b` and `b`-`c` are adjacent
 */
export function isCoveredTriple(graph: MixedEdgeGraph, a: NodeId, b: NodeId, c: NodeId): boolean {
  const { ab, bc } = tripleEdges(graph, a, b, c);
  return ab.some((edgeAB) => bc.some((edgeBC) => isCoveredOnEdges(graph, a, c, edgeAB, edgeBC)));
}

// ============================================================================
// EDGES
// ============================================================================

/**
 * Some edge `u *-* v` is compatible with the orientation `u → v`.
 */
export function isPossiblyDirected(graph: MixedEdgeGraph, u: NodeId, v: NodeId): boolean {
  return edgesBetween(graph, u, v).some((edge) => isPossiblyDirectedEdge(edge, u));
}

// ============================================================================
// PATHS
// ============================================================================

interface InternalStep {
  node: NodeId;
  prev: NodeId;
  next: NodeId;
  edgeIn: MixedEdge;
  edgeOut: MixedEdge;
}

function internalSteps(path: GraphPath): InternalStep[] {
  const steps: InternalStep[] = [];
  for (let i = 1; i + 1 < path.nodes.length; i += 1) {
    const node = path.nodes[i];
    const prev = path.nodes[i - 1];
    const next = path.nodes[i + 1];
    const edgeIn = path.edges[i - 1];
    const edgeOut = path.edges[i];
    if (node === undefined || prev === undefined || next === undefined || !edgeIn || !edgeOut) continue;
    steps.push({ node, edgeIn, edgeOut, prev, next });
  }
  return steps;
}

/**
 * Whether the internal node at `node` leaves the path open given `z`, where
 * `ancestorsOfZ` holds the possible ancestors of `z` (a collider is open iff
 * it is in `z` or has a possible descendant in `z`).
 */
export function isOpenAt(
  edgeIn: MixedEdge,
  node: NodeId,
  edgeOut: MixedEdge,
  z: ReadonlySet<NodeId>,
  ancestorsOfZ: ReadonlySet<NodeId>
): boolean {
  if (isColliderOnEdges(edgeIn, node, edgeOut)) {
    return ancestorsOfZ.has(node);
  }
  return !z.has(node);
}

/**
 * Whether `path` is open (m-connecting) given `z`: every non-collider is
 * outside `z` and every collider is in `z` or has a possible descendant in `z`.
 */
export function isLegalPath(graph: MixedEdgeGraph, path: GraphPath, z: Iterable<NodeId>): boolean {
  const conditioning = new Set(z);
  assertNodes(graph, conditioning);
  const ancestorsOfZ = reachPossiblyDirected(graph, conditioning, 'backward');
  return internalSteps(path).every(({ edgeIn, node, edgeOut }) =>
    isOpenAt(edgeIn, node, edgeOut, conditioning, ancestorsOfZ)
  );
}

/**
 * No three consecutive nodes of `path` form a covered triple.
 */
export function isUncoveredPath(graph: MixedEdgeGraph, path: GraphPath): boolean {
  return internalSteps(path).every(
    ({ prev, next, edgeIn, edgeOut }) => !isCoveredOnEdges(graph, prev, next, edgeIn, edgeOut)
  );
}

/**
 * Every edge of `path` is possibly directed from its earlier to its later node.
 */
export function isPossiblyDirectedPath(path: GraphPath): boolean {
  return path.edges.every((edge, i) => {
    const from = path.nodes[i];
    return from !== undefined && isPossiblyDirectedEdge(edge, from);
  });
}

/**
 * Every internal node of `path` is a collider on it.
 */
export function isColliderPath(path: GraphPath): boolean {
  return internalSteps(path).every(({ edgeIn, node, edgeOut }) => isColliderOnEdges(edgeIn, node, edgeOut));
}

/**
 * Every internal node of `path` is a definite non-collider on it.
 */
export function isDefiniteNoncolliderPath(path: GraphPath): boolean {
  return internalSteps(path).every(({ edgeIn, node, edgeOut }) =>
    isDefiniteNoncolliderOnEdges(edgeIn, node, edgeOut)
  );
}
