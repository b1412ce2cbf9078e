/**
 * @fileoverview Error taxonomy for graph queries.
 *
 * Every public operation checks its preconditions before traversing and
 * throws one of the two concrete kinds below. Absence of a structure (no
 * discriminating path, an empty PDS) is a normal result, never an error.
 *
 * @packageDocumentation
 */

export type GraphQueryErrorKind = 'unknown_node' | 'invalid_query';

/**
 * Base class for every error raised by the query engine.
 */
export class GraphQueryError extends Error {
  constructor(
    public readonly kind: GraphQueryErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'GraphQueryError';
  }
}

/**
 * A referenced node is absent from the graph.
 */
export class UnknownNodeError extends GraphQueryError {
  constructor(public readonly nodeId: string, details: Record<string, unknown> = {}) {
    super('unknown_node', `Node '${nodeId}' does not exist in graph`, { nodeId, ...details });
    this.name = 'UnknownNodeError';
  }
}

/**
 * Arguments violate a precondition (overlapping sets, missing adjacency,
 * malformed graph input, bad configuration).
 */
export class InvalidQueryError extends GraphQueryError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('invalid_query', message, details);
    this.name = 'InvalidQueryError';
  }
}

export function isGraphQueryError(value: unknown): value is GraphQueryError {
  return value instanceof GraphQueryError;
}
