/**
 * @fileoverview Plain-data graph description and its validation.
 *
 * Lets callers hand over a JSON-shaped graph (from a file, a test fixture or
 * another tool's export) and get a validated MixedEdgeGraph back.
 */

import { z } from 'zod';
import { InvalidQueryError } from '../core/errors.js';
import { createMixedEdgeGraph, type MixedEdgeGraph } from './mixed_edge_graph.js';

export const EndpointMarkSchema = z.enum(['arrow', 'tail', 'circle']);

const FixedEdgeSchema = z.object({
  kind: z.enum(['directed', 'bidirected', 'undirected']),
  source: z.string().min(1),
  target: z.string().min(1),
});

const CircleEdgeSchema = z.object({
  kind: z.literal('circle'),
  source: z.string().min(1),
  target: z.string().min(1),
  sourceMark: EndpointMarkSchema,
  targetMark: EndpointMarkSchema,
});

export const EdgeSpecSchema = z.union([FixedEdgeSchema, CircleEdgeSchema]);

export const GraphSpecSchema = z.object({
  nodes: z.array(z.string().min(1)),
  edges: z.array(EdgeSpecSchema).default([]),
});

export type GraphSpec = z.infer<typeof GraphSpecSchema>;

/**
 * Validate a plain graph description and build the graph.
 *
 * @throws InvalidQueryError when the value does not match GraphSpecSchema or
 *   violates a storage invariant
 * @throws UnknownNodeError when an edge names an undeclared node
 */
export function parseGraphSpec(value: unknown): MixedEdgeGraph {
  const parsed = GraphSpecSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidQueryError('Invalid graph description', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return createMixedEdgeGraph(parsed.data);
}

/**
 * Inverse of parseGraphSpec, for handing a graph to an exporter.
 */
export function toGraphSpec(graph: MixedEdgeGraph): GraphSpec {
  return {
    nodes: [...graph.nodeOrder],
    edges: graph.edgeList.map((edge) =>
      edge.kind === 'circle'
        ? {
            kind: 'circle' as const,
            source: edge.source,
            target: edge.target,
            sourceMark: edge.sourceMark,
            targetMark: edge.targetMark,
          }
        : { kind: edge.kind, source: edge.source, target: edge.target }
    ),
  };
}
