import { afterEach, describe, expect, it, vi } from 'vitest';
import type { SeparationStrategy } from '../../config/oracle_config.js';
import { InvalidQueryError, UnknownNodeError } from '../../core/errors.js';
import { formatPath } from '../../graphs/graph_path.js';
import type { MixedEdgeGraph, NodeId } from '../../graphs/mixed_edge_graph.js';
import { graphOf } from '../../test/graph_fixtures.js';
import { findMConnectingPath, mSeparated, supportsMoralization } from '../m_separation.js';

const STRATEGIES: SeparationStrategy[] = ['moralization', 'legal_path'];

/** Every query X={x}, Y={y}, |Z| <= 2 on which the two strategies differ. */
function strategyDisagreements(graph: MixedEdgeGraph): string[] {
  const nodes = graph.nodeOrder;
  const disagreements: string[] = [];
  for (const x of nodes) {
    for (const y of nodes) {
      if (x >= y) continue;
      const rest = nodes.filter((node) => node !== x && node !== y);
      const conditioningSets: NodeId[][] = [[]];
      rest.forEach((first, i) => {
        conditioningSets.push([first]);
        for (const second of rest.slice(i + 1)) conditioningSets.push([first, second]);
      });
      for (const z of conditioningSets) {
        const moral = mSeparated(graph, [x], [y], z, { separationStrategy: 'moralization' });
        const legal = mSeparated(graph, [x], [y], z, { separationStrategy: 'legal_path' });
        if (moral !== legal) disagreements.push(`${x} ⊥ ${y} | {${z.join(',')}}`);
      }
    }
  }
  return disagreements;
}

describe.each(STRATEGIES)('mSeparated (%s)', (separationStrategy) => {
  const options = { separationStrategy };

  it('follows collider blocking on a directed chain', () => {
    // A → B ← C → D
    const graph = graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'C --> B', 'C --> D']);
    expect(mSeparated(graph, ['A'], ['C'], [], options)).toBe(true);
    expect(mSeparated(graph, ['A'], ['C'], ['B'], options)).toBe(false);
    expect(mSeparated(graph, ['A'], ['D'], [], options)).toBe(true);
    expect(mSeparated(graph, ['A'], ['D'], ['B'], options)).toBe(false);
    expect(mSeparated(graph, ['A'], ['D'], ['B', 'C'], options)).toBe(true);
  });

  it('opens a collider when a descendant is conditioned on', () => {
    const graph = graphOf(['A', 'B', 'C', 'E'], ['A --> B', 'C --> B', 'B --> E']);
    expect(mSeparated(graph, ['A'], ['C'], [], options)).toBe(true);
    expect(mSeparated(graph, ['A'], ['C'], ['E'], options)).toBe(false);
  });

  it('treats bidirected edges as arrowheads at both ends', () => {
    const graph = graphOf(['A', 'B', 'C'], ['A <-> B', 'B <-> C']);
    expect(mSeparated(graph, ['A'], ['C'], [], options)).toBe(true);
    expect(mSeparated(graph, ['A'], ['C'], ['B'], options)).toBe(false);
  });

  it('needs every collider on the path conditioned', () => {
    const graph = graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'B <-> C', 'D --> C']);
    expect(mSeparated(graph, ['A'], ['D'], ['B', 'C'], options)).toBe(false);
    expect(mSeparated(graph, ['A'], ['D'], ['B'], options)).toBe(true);
  });

  it('never blocks at an undirected edge endpoint unless conditioned', () => {
    const graph = graphOf(['A', 'B', 'C'], ['A --- B', 'B --- C']);
    expect(mSeparated(graph, ['A'], ['C'], [], options)).toBe(false);
    expect(mSeparated(graph, ['A'], ['C'], ['B'], options)).toBe(true);
  });

  it('keeps a collider closed when its only route to Z has a tail at Z', () => {
    for (const glyph of ['B --- D', 'B o-- D']) {
      const graph = graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'C --> B', glyph]);
      expect(mSeparated(graph, ['A'], ['C'], ['D'], options)).toBe(true);
      expect(mSeparated(graph, ['A'], ['D'], [], options)).toBe(false);
    }
  });

  it('finds open paths through nodes that are not anterior to X or Y', () => {
    const graph = graphOf(['X', 'V', 'W', 'Y'], ['X <-> V', 'V --- W', 'W <-> Y']);
    expect(mSeparated(graph, ['X'], ['Y'], [], options)).toBe(false);
    expect(mSeparated(graph, ['X'], ['Y'], ['W'], options)).toBe(true);
  });

  it('is always false for adjacent nodes', () => {
    const graph = graphOf(['A', 'B', 'C'], ['A <-> B', 'B --> C']);
    expect(mSeparated(graph, ['A'], ['B'], ['C'], options)).toBe(false);
  });

  it('is symmetric in X and Y', () => {
    const graph = graphOf(['A', 'B', 'C', 'D', 'E'], ['A --> B', 'C <-> B', 'C --> D', 'B --> E']);
    for (const z of [[], ['B'], ['E'], ['B', 'C']]) {
      expect(mSeparated(graph, ['D'], ['A'], z, options)).toBe(mSeparated(graph, ['A'], ['D'], z, options));
    }
  });

  it('handles sets on either side', () => {
    const graph = graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'C --> B', 'C --> D']);
    expect(mSeparated(graph, ['A', 'D'], ['C'], [], options)).toBe(false);
    expect(mSeparated(graph, ['A'], ['C', 'D'], [], options)).toBe(true);
  });
});

describe('mSeparated', () => {
  const graph = graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'C --> B', 'C --> D']);

  it('treats an empty side as separated', () => {
    expect(mSeparated(graph, [], ['C'], ['B'])).toBe(true);
    expect(mSeparated(graph, ['A'], [])).toBe(true);
  });

  it('rejects overlapping sets', () => {
    expect(() => mSeparated(graph, ['A'], ['A'])).toThrow('X and Y must be disjoint');
    expect(() => mSeparated(graph, ['A'], ['C'], ['A'])).toThrow('X and Z must be disjoint');
    expect(() => mSeparated(graph, ['A'], ['C'], ['C'])).toThrow(InvalidQueryError);
  });

  it('rejects unknown nodes', () => {
    expect(() => mSeparated(graph, ['A'], ['C'], ['Q'])).toThrow(UnknownNodeError);
  });

  it('picks the strategy from the environment when no option is given', () => {
    process.env.MIXGRAPH_SEPARATION_STRATEGY = 'legal_path';
    expect(mSeparated(graph, ['A'], ['D'], ['B'])).toBe(false);
    process.env.MIXGRAPH_SEPARATION_STRATEGY = 'sideways';
    expect(() => mSeparated(graph, ['A'], ['D'], ['B'])).toThrow(InvalidQueryError);
  });

  it('agrees across strategies on an ADMG', () => {
    const admg = graphOf(
      ['A', 'B', 'C', 'D', 'E', 'F'],
      ['A --> B', 'B --> C', 'C --> D', 'A <-> C', 'E --> D', 'B <-> E', 'F --> E']
    );
    expect(strategyDisagreements(admg)).toEqual([]);
  });

  it('agrees across strategies on an ancestral graph with selection edges', () => {
    const graph = graphOf(
      ['S', 'T', 'U', 'A', 'B', 'C', 'D', 'E'],
      ['S --- T', 'T --- U', 'T --> A', 'U --> B', 'A --> C', 'B --> C', 'A <-> D', 'C <-> D', 'D --> E']
    );
    expect(supportsMoralization(graph)).toBe(true);
    expect(strategyDisagreements(graph)).toEqual([]);
  });

  it('agrees across strategies on a graph with undirected and circle-marked edges', () => {
    // colliders at B and F whose edges towards D and E carry tails or circles
    const graph = graphOf(
      ['A', 'B', 'C', 'D', 'E', 'F'],
      ['A --> B', 'C --> B', 'B --- D', 'B o-- E', 'C o-> F', 'A <-> F', 'F o-o E', 'D <-> E']
    );
    expect(strategyDisagreements(graph)).toEqual([]);
  });
});

describe('supportsMoralization', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('accepts ADMGs and purely undirected graphs', () => {
    expect(supportsMoralization(graphOf(['A', 'B', 'C'], ['A --> B', 'A <-> B', 'B --> C']))).toBe(true);
    expect(supportsMoralization(graphOf(['A', 'B', 'C'], ['A --- B', 'B --- C']))).toBe(true);
  });

  it('rejects circle edges, directed cycles and arrowheads at undirected endpoints', () => {
    expect(supportsMoralization(graphOf(['A', 'B'], ['A o-> B']))).toBe(false);
    expect(supportsMoralization(graphOf(['A', 'B', 'C'], ['A --> B', 'B --> C', 'C --> A']))).toBe(false);
    expect(supportsMoralization(graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'C --> B', 'B --- D']))).toBe(false);
  });

  it('notes when a query falls back to path search', () => {
    const originalLevel = process.env.MIXGRAPH_LOG_LEVEL;
    process.env.MIXGRAPH_LOG_LEVEL = 'info';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    try {
      const graph = graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'C --> B', 'B --- D']);
      expect(mSeparated(graph, ['A'], ['C'], ['D'])).toBe(true);
      expect(spy).toHaveBeenCalledWith('mSeparated: moralization is not exact for this graph, searching paths', {
        nodes: 4,
        edges: 3,
      });
    } finally {
      if (typeof originalLevel === 'string') process.env.MIXGRAPH_LOG_LEVEL = originalLevel;
      else delete process.env.MIXGRAPH_LOG_LEVEL;
    }
  });
});

describe('findMConnectingPath', () => {
  const graph = graphOf(['A', 'B', 'C', 'D'], ['A --> B', 'C --> B', 'C --> D']);

  it('returns the first open path', () => {
    const path = findMConnectingPath(graph, 'A', 'D', ['B']);
    expect(path?.nodes).toEqual(['A', 'B', 'C', 'D']);
    expect(path ? formatPath(path) : null).toBe('A --> B, C --> B, C --> D');
  });

  it('returns null when separated', () => {
    expect(findMConnectingPath(graph, 'A', 'D')).toBeNull();
  });
});
