import { describe, expect, it } from 'vitest';
import { InvalidQueryError } from '../../core/errors.js';
import { createPath } from '../../graphs/graph_path.js';
import { graphOf } from '../../test/graph_fixtures.js';
import {
  isCollider,
  isColliderPath,
  isCoveredTriple,
  isDefiniteNoncollider,
  isDefiniteNoncolliderPath,
  isLegalPath,
  isPossiblyDirected,
  isPossiblyDirectedPath,
  isUncoveredPath,
} from '../path_predicates.js';

describe('triple predicates', () => {
  const graph = graphOf(
    ['A', 'B', 'C', 'D', 'E'],
    ['A --> B', 'C <-> B', 'B --> D', 'A o-> E', 'E o-o C']
  );

  it('identifies colliders by arrowheads at the middle node', () => {
    expect(isCollider(graph, 'A', 'B', 'C')).toBe(true);
    expect(isCollider(graph, 'A', 'B', 'D')).toBe(false);
    expect(isCollider(graph, 'A', 'E', 'C')).toBe(false);
  });

  it('requires a tail for a definite non-collider', () => {
    expect(isDefiniteNoncollider(graph, 'A', 'B', 'D')).toBe(true);
    expect(isDefiniteNoncollider(graph, 'A', 'B', 'C')).toBe(false);
    // circle and arrow at E: neither status is settled
    expect(isDefiniteNoncollider(graph, 'A', 'E', 'C')).toBe(false);
    expect(isCollider(graph, 'A', 'E', 'C')).toBe(false);
  });

  it('validates the triple', () => {
    expect(() => isCollider(graph, 'A', 'B', 'A')).toThrow(InvalidQueryError);
    expect(() => isCollider(graph, 'A', 'C', 'B')).toThrow('Triple (A, C, B) needs edges A-C and C-B');
  });

  it('covers a triple only when the a-c edge repeats the end marks', () => {
    const shielded = graphOf(['A', 'B', 'C'], ['A --> B', 'B --> C', 'A --> C']);
    expect(isCoveredTriple(shielded, 'A', 'B', 'C')).toBe(true);
    const mismatched = graphOf(['A', 'B', 'C'], ['A --> B', 'B --> C', 'A <-> C']);
    expect(isCoveredTriple(mismatched, 'A', 'B', 'C')).toBe(false);
    const open = graphOf(['A', 'B', 'C'], ['A --> B', 'B --> C']);
    expect(isCoveredTriple(open, 'A', 'B', 'C')).toBe(false);
  });
});

describe('isPossiblyDirected', () => {
  const graph = graphOf(
    ['A', 'B', 'C', 'D', 'E', 'F', 'G'],
    ['A --> B', 'B o-> C', 'C o-o D', 'D <-> E', 'E --- F', 'F --o G']
  );

  it.each([
    ['A', 'B'],
    ['B', 'C'],
    ['C', 'D'],
    ['D', 'C'],
    ['F', 'G'],
  ])('%s *-> %s can be oriented forwards', (u, v) => {
    expect(isPossiblyDirected(graph, u, v)).toBe(true);
  });

  it.each([
    ['B', 'A'],
    ['C', 'B'],
    ['D', 'E'],
    ['E', 'F'],
    ['G', 'F'],
    ['A', 'C'],
  ])('%s *-> %s cannot', (u, v) => {
    expect(isPossiblyDirected(graph, u, v)).toBe(false);
  });
});

describe('path predicates', () => {
  const graph = graphOf(['A', 'B', 'C', 'D', 'E'], ['A --> B', 'C --> B', 'C --> D', 'B --> E']);

  it('closes a path at an unconditioned collider', () => {
    const path = createPath(graph, ['A', 'B', 'C', 'D']);
    expect(isLegalPath(graph, path, [])).toBe(false);
    expect(isLegalPath(graph, path, ['B'])).toBe(true);
    expect(isLegalPath(graph, path, ['E'])).toBe(true);
    expect(isLegalPath(graph, path, ['B', 'C'])).toBe(false);
  });

  it('treats single edges as open', () => {
    expect(isLegalPath(graph, createPath(graph, ['A', 'B']), ['C'])).toBe(true);
  });

  it('classifies whole paths', () => {
    const chain = createPath(graph, ['A', 'B', 'E']);
    expect(isPossiblyDirectedPath(chain)).toBe(true);
    expect(isDefiniteNoncolliderPath(chain)).toBe(true);
    expect(isColliderPath(chain)).toBe(false);

    const vee = createPath(graph, ['A', 'B', 'C']);
    expect(isColliderPath(vee)).toBe(true);
    expect(isPossiblyDirectedPath(vee)).toBe(false);
    expect(isUncoveredPath(graph, vee)).toBe(true);
  });

  it('detects covered steps on a path', () => {
    const shielded = graphOf(['A', 'B', 'C'], ['A --> B', 'B --> C', 'A --> C']);
    expect(isUncoveredPath(shielded, createPath(shielded, ['A', 'B', 'C']))).toBe(false);
  });
});
