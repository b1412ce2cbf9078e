/**
 * @fileoverview M-Separation Oracle
 *
 * Decides whether node sets X and Y are m-separated given Z in a mixed-edge
 * graph. A path is open when every non-collider on it lies outside Z and
 * every collider is a possible ancestor of Z. Two decision procedures are
 * offered:
 *
 * - `moralization` (default): restrict to the anterior set of X ∪ Y ∪ Z
 *   (possibly-directed edges plus undirected selection edges), join every
 *   pair of nodes connected by a collider path, and test plain separation by
 *   a breadth-first search from X that never enters Z. This is exact on
 *   graphs without circle edges whose directed edges are acyclic and where no
 *   arrowhead meets an endpoint of an undirected edge (ADMGs and ancestral
 *   graphs). On any other graph the query is answered by path search.
 * - `legal_path`: depth-first enumeration of simple paths from X to Y,
 *   pruned as soon as an internal node blocks. Exponential in the worst case;
 *   meant for small graphs and for cross-checking.
 *
 * Colliders are nodes with arrowheads on both sides; a circle mark never
 * makes a collider.
 *
 * @see Richardson, T. (2003) "Markov properties for acyclic directed mixed graphs"
 * @see Richardson, T. & Spirtes, P. (2002) "Ancestral graph Markov models", Thm 3.18
 *
 * @packageDocumentation
 */

import { resolveOracleConfig, type OracleOptions } from '../config/oracle_config.js';
import { InvalidQueryError } from '../core/errors.js';
import { isAcyclic } from '../graphs/admg.js';
import { hasArrowheadAt } from '../graphs/edge_marks.js';
import type { GraphPath } from '../graphs/graph_path.js';
import {
  assertNode,
  assertNodes,
  getEdges,
  otherEndpoint,
  type MixedEdge,
  type MixedEdgeGraph,
  type NodeId,
} from '../graphs/mixed_edge_graph.js';
import { reachPossiblyAnterior, reachPossiblyDirected } from '../pag/ancestral_reachability.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import { isLegalPath, isOpenAt } from './path_predicates.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export interface SeparationQuery {
  x: ReadonlySet<NodeId>;
  y: ReadonlySet<NodeId>;
  z: ReadonlySet<NodeId>;
}

// ============================================================================
// VALIDATION
// ============================================================================

function overlap(a: ReadonlySet<NodeId>, b: ReadonlySet<NodeId>): NodeId[] {
  return [...a].filter((node) => b.has(node));
}

/**
 * Normalise and check the arguments of a separation query.
 *
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError when X, Y and Z are not pairwise disjoint
 */
export function validateSeparationQuery(
  graph: MixedEdgeGraph,
  x: Iterable<NodeId>,
  y: Iterable<NodeId>,
  z: Iterable<NodeId>
): SeparationQuery {
  const query = { x: new Set(x), y: new Set(y), z: new Set(z) };
  assertNodes(graph, query.x);
  assertNodes(graph, query.y);
  assertNodes(graph, query.z);

  const pairs: Array<[string, ReadonlySet<NodeId>, string, ReadonlySet<NodeId>]> = [
    ['X', query.x, 'Y', query.y],
    ['X', query.x, 'Z', query.z],
    ['Y', query.y, 'Z', query.z],
  ];
  for (const [leftName, left, rightName, right] of pairs) {
    const shared = overlap(left, right);
    if (shared.length > 0) {
      throw new InvalidQueryError(`${leftName} and ${rightName} must be disjoint`, { shared });
    }
  }
  return query;
}

// ============================================================================
// MORALIZATION STRATEGY
// ============================================================================

/**
 * Nodes of `allowed` joined to `start` by a collider path lying in `allowed`:
 * the neighbours of `start` in the augmented (moral) graph.
 */
export function colliderConnected(
  graph: MixedEdgeGraph,
  start: NodeId,
  allowed: ReadonlySet<NodeId>
): Set<NodeId> {
  const result = new Set<NodeId>();
  // nodes entered through an arrowhead, which may continue as colliders
  const expanded = new Set<NodeId>();
  const stack: NodeId[] = [];

  const enter = (edge: MixedEdge, to: NodeId): void => {
    if (to !== start) result.add(to);
    if (hasArrowheadAt(edge, to) && !expanded.has(to)) {
      expanded.add(to);
      stack.push(to);
    }
  };

  for (const edges of graph.adjacency.get(start)?.values() ?? []) {
    for (const edge of edges) {
      const to = otherEndpoint(edge, start);
      if (allowed.has(to)) enter(edge, to);
    }
  }

  while (stack.length > 0) {
    const collider = stack.pop();
    if (collider === undefined) break;
    if (collider === start) continue;
    for (const edges of graph.adjacency.get(collider)?.values() ?? []) {
      for (const edge of edges) {
        const to = otherEndpoint(edge, collider);
        if (!allowed.has(to) || !hasArrowheadAt(edge, collider)) continue;
        enter(edge, to);
      }
    }
  }

  return result;
}

/**
 * Whether the moralization procedure decides m-separation exactly on `graph`.
 *
 * Outside this class a node can sit on an open path without being anterior
 * to X ∪ Y ∪ Z (v and w in `X ↔ v — w ↔ Y`), and a node anterior to Z only
 * through an undirected edge would pass as an open collider
 * (`A → B ← C`, `B — D`, Z = {D}).
 */
export function supportsMoralization(graph: MixedEdgeGraph): boolean {
  if (getEdges(graph, 'circle').length > 0) return false;
  for (const edge of getEdges(graph, 'undirected')) {
    for (const end of [edge.source, edge.target]) {
      for (const edges of graph.adjacency.get(end)?.values() ?? []) {
        if (edges.some((incident) => hasArrowheadAt(incident, end))) return false;
      }
    }
  }
  return isAcyclic(graph);
}

function separatedByMoralization(graph: MixedEdgeGraph, query: SeparationQuery): boolean {
  const { x, y, z } = query;
  const ancestral = reachPossiblyAnterior(graph, [...x, ...y, ...z]);

  const visited = new Set<NodeId>(x);
  const queue = [...x];
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    if (current === undefined) continue;
    for (const next of colliderConnected(graph, current, ancestral)) {
      if (visited.has(next) || z.has(next)) continue;
      if (y.has(next)) return false;
      visited.add(next);
      queue.push(next);
    }
  }
  return true;
}

// ============================================================================
// LEGAL-PATH STRATEGY
// ============================================================================

interface PathFrame {
  nodes: NodeId[];
  edges: MixedEdge[];
}

/**
 * First open path from `source` to a node of `targets`, never passing
 * through another node of `sources`.
 */
function searchOpenPath(
  graph: MixedEdgeGraph,
  source: NodeId,
  sources: ReadonlySet<NodeId>,
  targets: ReadonlySet<NodeId>,
  z: ReadonlySet<NodeId>,
  ancestorsOfZ: ReadonlySet<NodeId>
): GraphPath | null {
  const stack: PathFrame[] = [{ nodes: [source], edges: [] }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const last = frame.nodes[frame.nodes.length - 1];
    if (last === undefined) continue;
    const lastEdge = frame.edges[frame.edges.length - 1];

    const extensions: PathFrame[] = [];
    for (const [next, edges] of graph.adjacency.get(last) ?? []) {
      if (sources.has(next) || frame.nodes.includes(next)) continue;
      for (const edge of edges) {
        if (lastEdge && !isOpenAt(lastEdge, last, edge, z, ancestorsOfZ)) continue;
        const candidate = { nodes: [...frame.nodes, next], edges: [...frame.edges, edge] };
        if (targets.has(next)) {
          if (isLegalPath(graph, candidate, z)) return candidate;
          continue;
        }
        extensions.push(candidate);
      }
    }
    // reversed so the first neighbour is explored first
    for (let i = extensions.length - 1; i >= 0; i -= 1) {
      const extension = extensions[i];
      if (extension) stack.push(extension);
    }
  }

  return null;
}

function separatedByLegalPaths(graph: MixedEdgeGraph, query: SeparationQuery): boolean {
  const { x, y, z } = query;
  const ancestorsOfZ = reachPossiblyDirected(graph, z, 'backward');
  for (const source of x) {
    if (searchOpenPath(graph, source, x, y, z, ancestorsOfZ)) return false;
  }
  return true;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Tests whether X and Y are m-separated given Z.
 *
 * An empty X or Y is separated from anything.
 *
 * @example
 * ```typescript
 * // A → B ← C
 * mSeparated(graph, ['A'], ['C'], []);    // true: B is an unconditioned collider
 * mSeparated(graph, ['A'], ['C'], ['B']); // false: conditioning on B opens the path
 * ```
 *
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError when X, Y and Z overlap
 */
export function mSeparated(
  graph: MixedEdgeGraph,
  x: Iterable<NodeId>,
  y: Iterable<NodeId>,
  z: Iterable<NodeId> = [],
  options: OracleOptions = {}
): boolean {
  const query = validateSeparationQuery(graph, x, y, z);
  const { separationStrategy } = resolveOracleConfig(options);
  logDebug('mSeparated', {
    strategy: separationStrategy,
    x: query.x.size,
    y: query.y.size,
    z: query.z.size,
  });

  if (query.x.size === 0 || query.y.size === 0) return true;

  if (separationStrategy === 'legal_path') {
    return separatedByLegalPaths(graph, query);
  }
  if (!supportsMoralization(graph)) {
    logInfo('mSeparated: moralization is not exact for this graph, searching paths', {
      nodes: graph.nodeOrder.length,
      edges: graph.edgeList.length,
    });
    return separatedByLegalPaths(graph, query);
  }
  return separatedByMoralization(graph, query);
}

/**
 * An open (m-connecting) path between `x` and `y` given `z`, or null when
 * they are m-separated. The first path in neighbour order is returned.
 *
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError when `x`, `y` and `z` overlap
 */
export function findMConnectingPath(
  graph: MixedEdgeGraph,
  x: NodeId,
  y: NodeId,
  z: Iterable<NodeId> = []
): GraphPath | null {
  assertNode(graph, x);
  assertNode(graph, y);
  const query = validateSeparationQuery(graph, [x], [y], z);
  logDebug('findMConnectingPath', { x, y, z: query.z.size });
  const ancestorsOfZ = reachPossiblyDirected(graph, query.z, 'backward');
  return searchOpenPath(graph, x, query.x, query.y, query.z, ancestorsOfZ);
}
