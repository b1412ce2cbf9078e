/**
 * @fileoverview Mixed-Edge Graph Storage
 *
 * A node set plus edges of four kinds: directed (`u → v`), bidirected
 * (`u ↔ v`, latent confounding), undirected (`u — v`, selection) and circle
 * edges carrying two independent endpoint marks (`o→`, `o-o`, `o—`).
 *
 * Every edge records the mark at each of its ends, so all query code reads
 * marks uniformly and branches on `kind` only where the kind itself matters.
 * Graphs are immutable once built; queries never mutate them.
 *
 * Edge multiplicity between an unordered node pair:
 * - at most one edge of each of directed / bidirected / undirected
 * - a directed edge in one direction only
 * - a circle edge excludes every other edge
 *
 * Neighbour iteration follows edge insertion order, which makes every search
 * built on top of this module deterministic.
 *
 * @packageDocumentation
 */

import { InvalidQueryError, UnknownNodeError } from '../core/errors.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

/** Opaque node label; identity is string equality. */
export type NodeId = string;

export type EdgeKind = 'directed' | 'bidirected' | 'undirected' | 'circle';

export const EDGE_KINDS: readonly EdgeKind[] = ['directed', 'bidirected', 'undirected', 'circle'];

/** Mark at one end of an edge. */
export type EndpointMark = 'arrow' | 'tail' | 'circle';

export interface MixedEdge {
  readonly kind: EdgeKind;
  readonly source: NodeId;
  readonly target: NodeId;
  /** Mark at the `source` end */
  readonly sourceMark: EndpointMark;
  /** Mark at the `target` end */
  readonly targetMark: EndpointMark;
}

/**
 * Edge description accepted by the factory. Only circle edges name their
 * marks; the other kinds have fixed marks.
 */
export type EdgeInput =
  | { kind: 'directed' | 'bidirected' | 'undirected'; source: NodeId; target: NodeId }
  | {
      kind: 'circle';
      source: NodeId;
      target: NodeId;
      sourceMark: EndpointMark;
      targetMark: EndpointMark;
    };

/**
 * One incident edge seen from a node.
 */
export interface Neighbor {
  readonly node: NodeId;
  readonly kind: EdgeKind;
  /** Mark at the querying node's end */
  readonly markAtSelf: EndpointMark;
  /** Mark at the neighbour's end */
  readonly markAtNeighbor: EndpointMark;
  readonly edge: MixedEdge;
}

export interface MixedEdgeGraph {
  /** Nodes in declaration order */
  readonly nodeOrder: readonly NodeId[];
  /** Edges in insertion order */
  readonly edgeList: readonly MixedEdge[];
  /** node -> neighbour -> edges joining them */
  readonly adjacency: ReadonlyMap<NodeId, ReadonlyMap<NodeId, readonly MixedEdge[]>>;
}

export interface MixedEdgeGraphInput {
  nodes: Iterable<NodeId>;
  edges?: Iterable<EdgeInput>;
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Build an immutable graph, validating the storage invariants.
 *
 * @throws UnknownNodeError when an edge names an undeclared node
 * @throws InvalidQueryError on self-loops, conflicting edges or circle edges
 *   without a circle mark
 */
export function createMixedEdgeGraph(input: MixedEdgeGraphInput): MixedEdgeGraph {
  const nodeOrder: NodeId[] = [];
  const rank = new Map<NodeId, number>();
  for (const node of input.nodes) {
    if (rank.has(node)) continue;
    rank.set(node, nodeOrder.length);
    nodeOrder.push(node);
  }

  const adjacency = new Map<NodeId, Map<NodeId, MixedEdge[]>>();
  for (const node of nodeOrder) adjacency.set(node, new Map());

  const edgeList: MixedEdge[] = [];
  for (const raw of input.edges ?? []) {
    const edge = normalizeEdge(raw, rank);
    const existing = adjacency.get(edge.source)?.get(edge.target) ?? [];
    assertCompatible(edge, existing);
    link(adjacency, edge.source, edge.target, edge);
    link(adjacency, edge.target, edge.source, edge);
    edgeList.push(edge);
  }

  return { nodeOrder, edgeList, adjacency };
}

function link(
  adjacency: Map<NodeId, Map<NodeId, MixedEdge[]>>,
  from: NodeId,
  to: NodeId,
  edge: MixedEdge
): void {
  const row = adjacency.get(from);
  if (!row) throw new UnknownNodeError(from);
  const bucket = row.get(to);
  if (bucket) {
    bucket.push(edge);
  } else {
    row.set(to, [edge]);
  }
}

function normalizeEdge(raw: EdgeInput, rank: ReadonlyMap<NodeId, number>): MixedEdge {
  const sourceRank = rank.get(raw.source);
  const targetRank = rank.get(raw.target);
  if (sourceRank === undefined) throw new UnknownNodeError(raw.source, { edge: raw });
  if (targetRank === undefined) throw new UnknownNodeError(raw.target, { edge: raw });
  if (raw.source === raw.target) {
    throw new InvalidQueryError(`Self-loop on '${raw.source}' is not allowed`, { edge: raw });
  }

  // Symmetric kinds are stored with the earlier-declared node as source.
  const [first, second] = sourceRank < targetRank ? [raw.source, raw.target] : [raw.target, raw.source];

  switch (raw.kind) {
    case 'directed':
      return { kind: 'directed', source: raw.source, target: raw.target, sourceMark: 'tail', targetMark: 'arrow' };
    case 'bidirected':
      return { kind: 'bidirected', source: first, target: second, sourceMark: 'arrow', targetMark: 'arrow' };
    case 'undirected':
      return { kind: 'undirected', source: first, target: second, sourceMark: 'tail', targetMark: 'tail' };
    case 'circle':
      if (raw.sourceMark !== 'circle' && raw.targetMark !== 'circle') {
        throw new InvalidQueryError(
          `Circle edge '${raw.source}'-'${raw.target}' must carry at least one circle mark`,
          { edge: raw }
        );
      }
      return {
        kind: 'circle',
        source: raw.source,
        target: raw.target,
        sourceMark: raw.sourceMark,
        targetMark: raw.targetMark,
      };
  }
}

function assertCompatible(edge: MixedEdge, existing: readonly MixedEdge[]): void {
  for (const other of existing) {
    if (edge.kind === 'circle' || other.kind === 'circle') {
      throw new InvalidQueryError(
        `Circle edge between '${edge.source}' and '${edge.target}' cannot coexist with another edge`,
        { edge, conflictsWith: other }
      );
    }
    if (edge.kind === other.kind) {
      throw new InvalidQueryError(
        `Duplicate ${edge.kind} edge between '${edge.source}' and '${edge.target}'`,
        { edge, conflictsWith: other }
      );
    }
  }
}

// ============================================================================
// NODE QUERIES
// ============================================================================

export function hasNode(graph: MixedEdgeGraph, node: NodeId): boolean {
  return graph.adjacency.has(node);
}

/**
 * @throws UnknownNodeError when the node is absent
 */
export function assertNode(graph: MixedEdgeGraph, node: NodeId): void {
  if (!graph.adjacency.has(node)) {
    throw new UnknownNodeError(node);
  }
}

export function assertNodes(graph: MixedEdgeGraph, nodes: Iterable<NodeId>): void {
  for (const node of nodes) assertNode(graph, node);
}

export function getNodes(graph: MixedEdgeGraph): NodeId[] {
  return [...graph.nodeOrder];
}

// ============================================================================
// EDGE QUERIES
// ============================================================================

export function getEdges(graph: MixedEdgeGraph, kind?: EdgeKind): MixedEdge[] {
  return kind === undefined ? [...graph.edgeList] : graph.edgeList.filter((edge) => edge.kind === kind);
}

export function edgesByKind(graph: MixedEdgeGraph): Record<EdgeKind, MixedEdge[]> {
  const result: Record<EdgeKind, MixedEdge[]> = { directed: [], bidirected: [], undirected: [], circle: [] };
  for (const edge of graph.edgeList) result[edge.kind].push(edge);
  return result;
}

export function edgesBetween(graph: MixedEdgeGraph, u: NodeId, v: NodeId): readonly MixedEdge[] {
  assertNode(graph, u);
  assertNode(graph, v);
  return graph.adjacency.get(u)?.get(v) ?? [];
}

export function adjacent(graph: MixedEdgeGraph, u: NodeId, v: NodeId): boolean {
  return edgesBetween(graph, u, v).length > 0;
}

/**
 * Whether an edge of `kind` joins `u` and `v`. Directed edges must point
 * from `u` to `v`; the other kinds match in either orientation.
 */
export function hasEdge(graph: MixedEdgeGraph, u: NodeId, v: NodeId, kind: EdgeKind): boolean {
  return edgesBetween(graph, u, v).some((edge) => {
    if (edge.kind !== kind) return false;
    return kind !== 'directed' || edge.source === u;
  });
}

/**
 * Incident edges of `v`, optionally restricted to some kinds.
 */
export function neighbors(
  graph: MixedEdgeGraph,
  v: NodeId,
  kinds?: Iterable<EdgeKind>
): Neighbor[] {
  assertNode(graph, v);
  const allowed = kinds === undefined ? null : new Set(kinds);
  const result: Neighbor[] = [];
  for (const [node, edges] of graph.adjacency.get(v) ?? []) {
    for (const edge of edges) {
      if (allowed && !allowed.has(edge.kind)) continue;
      result.push({
        node,
        kind: edge.kind,
        markAtSelf: endpointMark(edge, v),
        markAtNeighbor: endpointMark(edge, node),
        edge,
      });
    }
  }
  return result;
}

export function adjacentNodes(graph: MixedEdgeGraph, v: NodeId): NodeId[] {
  assertNode(graph, v);
  return [...(graph.adjacency.get(v)?.keys() ?? [])];
}

export function degree(graph: MixedEdgeGraph, v: NodeId): number {
  assertNode(graph, v);
  let count = 0;
  for (const edges of graph.adjacency.get(v)?.values() ?? []) count += edges.length;
  return count;
}

/**
 * Mark at `node`'s end of `edge`.
 */
export function endpointMark(edge: MixedEdge, node: NodeId): EndpointMark {
  if (edge.source === node) return edge.sourceMark;
  if (edge.target === node) return edge.targetMark;
  throw new InvalidQueryError(`Node '${node}' is not an endpoint of edge '${edge.source}'-'${edge.target}'`, {
    edge,
    node,
  });
}

export function otherEndpoint(edge: MixedEdge, node: NodeId): NodeId {
  if (edge.source === node) return edge.target;
  if (edge.target === node) return edge.source;
  throw new InvalidQueryError(`Node '${node}' is not an endpoint of edge '${edge.source}'-'${edge.target}'`, {
    edge,
    node,
  });
}

/**
 * Marks at `v` on every edge joining `u` and `v`.
 */
export function marksAt(graph: MixedEdgeGraph, u: NodeId, v: NodeId): EndpointMark[] {
  return edgesBetween(graph, u, v).map((edge) => endpointMark(edge, v));
}

/**
 * Mark at `v` on the edge `u *-* v`.
 *
 * @throws InvalidQueryError when no edge joins the pair, or more than one does
 */
export function markAt(graph: MixedEdgeGraph, u: NodeId, v: NodeId): EndpointMark {
  const edges = edgesBetween(graph, u, v);
  const [edge] = edges;
  if (!edge) {
    throw new InvalidQueryError(`No edge between '${u}' and '${v}'`, { u, v });
  }
  if (edges.length > 1) {
    throw new InvalidQueryError(`'${u}' and '${v}' are joined by ${edges.length} edges; use marksAt`, {
      u,
      v,
      kinds: edges.map((e) => e.kind),
    });
  }
  return endpointMark(edge, v);
}

// ============================================================================
// DERIVED GRAPHS
// ============================================================================

/**
 * A new graph with the two endpoint marks of every edge swapped.
 */
export function transposeGraph(graph: MixedEdgeGraph): MixedEdgeGraph {
  const edges = graph.edgeList.map((edge): EdgeInput => {
    switch (edge.kind) {
      case 'directed':
        return { kind: 'directed', source: edge.target, target: edge.source };
      case 'bidirected':
      case 'undirected':
        return { kind: edge.kind, source: edge.source, target: edge.target };
      case 'circle':
        return {
          kind: 'circle',
          source: edge.source,
          target: edge.target,
          sourceMark: edge.targetMark,
          targetMark: edge.sourceMark,
        };
    }
  });
  return createMixedEdgeGraph({ nodes: graph.nodeOrder, edges });
}

/**
 * Readable form of an edge, e.g. `A o-> B`.
 */
export function formatEdge(edge: MixedEdge): string {
  const left: Record<EndpointMark, string> = { arrow: '<', tail: '-', circle: 'o' };
  const right: Record<EndpointMark, string> = { arrow: '>', tail: '-', circle: 'o' };
  return `${edge.source} ${left[edge.sourceMark]}-${right[edge.targetMark]} ${edge.target}`;
}
