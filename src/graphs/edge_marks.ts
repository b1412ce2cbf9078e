import { endpointMark, otherEndpoint, type MixedEdge, type NodeId } from './mixed_edge_graph.js';

/**
 * Whether `edge`, read from `from` towards its other end, is compatible with
 * some orientation `from → to`: an arrowhead or circle at the far end and no
 * arrowhead at `from`.
 */
export function isPossiblyDirectedEdge(edge: MixedEdge, from: NodeId): boolean {
  const to = otherEndpoint(edge, from);
  const farMark = endpointMark(edge, to);
  return endpointMark(edge, from) !== 'arrow' && (farMark === 'arrow' || farMark === 'circle');
}

/**
 * Definite `from → to`: tail at `from`, arrowhead at the far end.
 */
export function isDefiniteDirectedEdge(edge: MixedEdge, from: NodeId): boolean {
  const to = otherEndpoint(edge, from);
  return endpointMark(edge, from) === 'tail' && endpointMark(edge, to) === 'arrow';
}

export function hasArrowheadAt(edge: MixedEdge, node: NodeId): boolean {
  return endpointMark(edge, node) === 'arrow';
}

/**
 * `node` is a collider between two path edges iff both carry an arrowhead at it.
 */
export function isColliderOnEdges(edgeIn: MixedEdge, node: NodeId, edgeOut: MixedEdge): boolean {
  return hasArrowheadAt(edgeIn, node) && hasArrowheadAt(edgeOut, node);
}

/**
 * At least one of the two path edges has a tail at `node`.
 */
export function isDefiniteNoncolliderOnEdges(edgeIn: MixedEdge, node: NodeId, edgeOut: MixedEdge): boolean {
  return endpointMark(edgeIn, node) === 'tail' || endpointMark(edgeOut, node) === 'tail';
}
