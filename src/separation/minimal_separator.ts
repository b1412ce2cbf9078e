/**
 * @fileoverview Minimal m-separator search.
 *
 * The search starts from the anterior set of {x, y} minus x and y: nodes
 * reaching x or y over possibly-directed or undirected edges. On ADMGs and
 * ancestral graphs that set separates x from y whenever any set does.
 * Elements are then dropped one at a time, in node declaration order, until
 * no single element can go; the result has no element whose removal keeps x
 * and y separated.
 */

import type { OracleOptions } from '../config/oracle_config.js';
import { InvalidQueryError } from '../core/errors.js';
import { adjacent, assertNode, type MixedEdgeGraph, type NodeId } from '../graphs/mixed_edge_graph.js';
import { reachPossiblyAnterior } from '../pag/ancestral_reachability.js';
import { logDebug } from '../telemetry/logger.js';
import { mSeparated } from './m_separation.js';

/**
 * @returns a minimal separating set, or null when the anterior set of {x, y}
 *   does not separate them
 * @throws UnknownNodeError for nodes absent from the graph
 * @throws InvalidQueryError when x and y coincide
 */
export function findMinimalMSeparator(
  graph: MixedEdgeGraph,
  x: NodeId,
  y: NodeId,
  options: OracleOptions = {}
): NodeId[] | null {
  assertNode(graph, x);
  assertNode(graph, y);
  if (x === y) {
    throw new InvalidQueryError(`Cannot separate '${x}' from itself`, { x, y });
  }
  logDebug('findMinimalMSeparator', { x, y });

  // adjacent nodes are never separated
  if (adjacent(graph, x, y)) return null;

  const anterior = reachPossiblyAnterior(graph, [x, y]);
  let candidate = graph.nodeOrder.filter((node) => node !== x && node !== y && anterior.has(node));
  if (!mSeparated(graph, [x], [y], candidate, options)) return null;

  let changed = true;
  while (changed) {
    changed = false;
    for (const node of [...candidate]) {
      const reduced = candidate.filter((member) => member !== node);
      if (mSeparated(graph, [x], [y], reduced, options)) {
        candidate = reduced;
        changed = true;
      }
    }
  }
  return candidate;
}
