import { describe, expect, it } from 'vitest';

import { distance } from '../model/hitTest';
import { relaxConstraints, solveConstraint } from '../model/solver';
import { createParticle } from '../model/topology';
import type { Constraint } from '../model/types';

describe('solveConstraint', () => {
  it('moves a stretched pair symmetrically onto the rest length', () => {
    const particles = [createParticle({ x: 0, y: 0 }), createParticle({ x: 10, y: 0 })];
    const constraint: Constraint = { a: 0, b: 1, restLength: 5 };

    expect(solveConstraint(particles, constraint)).toBe(true);

    expect(particles[0].position).toEqual({ x: 2.5, y: 0 });
    expect(particles[1].position).toEqual({ x: 7.5, y: 0 });
    expect(distance(particles[0].position, particles[1].position)).toBe(5);
  });

  it('pushes a compressed pair apart toward the rest length', () => {
    const particles = [createParticle({ x: 0, y: 0 }), createParticle({ x: 2, y: 0 })];
    const before = distance(particles[0].position, particles[1].position);

    solveConstraint(particles, { a: 0, b: 1, restLength: 5 });
    const after = distance(particles[0].position, particles[1].position);

    expect(particles[0].position.x).toBeCloseTo(-1.5, 10);
    expect(particles[1].position.x).toBeCloseTo(3.5, 10);
    expect(after).toBeGreaterThan(before);
    expect(after).toBeLessThanOrEqual(5 + 1e-9);
  });

  it('skips coincident particles without producing NaN', () => {
    const particles = [createParticle({ x: 3, y: 3 }), createParticle({ x: 3, y: 3 })];

    expect(solveConstraint(particles, { a: 0, b: 1, restLength: 5 })).toBe(false);

    expect(particles[0].position).toEqual({ x: 3, y: 3 });
    expect(particles[1].position).toEqual({ x: 3, y: 3 });
  });

  it('applies only the free half of the correction next to a pinned particle', () => {
    const particles = [createParticle({ x: 0, y: 0 }, true), createParticle({ x: 10, y: 0 })];

    solveConstraint(particles, { a: 0, b: 1, restLength: 5 });

    expect(particles[0].position).toEqual({ x: 0, y: 0 });
    expect(particles[1].position).toEqual({ x: 7.5, y: 0 });
  });

  it('does nothing when both endpoints are pinned', () => {
    const particles = [createParticle({ x: 0, y: 0 }, true), createParticle({ x: 30, y: 0 }, true)];

    solveConstraint(particles, { a: 0, b: 1, restLength: 5 });

    expect(particles[0].position).toEqual({ x: 0, y: 0 });
    expect(particles[1].position).toEqual({ x: 30, y: 0 });
  });
});

describe('relaxConstraints', () => {
  const chain = () => [
    createParticle({ x: 0, y: 0 }),
    createParticle({ x: 10, y: 0 }),
    createParticle({ x: 20, y: 0 })
  ];

  it('sees earlier corrections within the same pass', () => {
    const forward = chain();
    const reversed = chain();
    const ab: Constraint = { a: 0, b: 1, restLength: 5 };
    const bc: Constraint = { a: 1, b: 2, restLength: 5 };

    relaxConstraints(forward, [ab, bc], 1);
    relaxConstraints(reversed, [bc, ab], 1);

    expect(forward[0].position.x).toBeCloseTo(2.5, 10);
    expect(forward[1].position.x).toBeCloseTo(11.25, 10);
    expect(forward[2].position.x).toBeCloseTo(16.25, 10);
    expect(reversed[0].position.x).toBeCloseTo(3.75, 10);
    expect(reversed[1].position.x).toBeCloseTo(8.75, 10);
    expect(reversed[2].position.x).toBeCloseTo(17.5, 10);
  });

  it('runs the requested number of passes and counts degenerate skips', () => {
    const particles = [createParticle({ x: 1, y: 1 }), createParticle({ x: 1, y: 1 })];

    const result = relaxConstraints(particles, [{ a: 0, b: 1, restLength: 2 }], 4);

    expect(result).toEqual({ passes: 4, degenerateSkips: 4 });
  });

  it('converges a chain toward its rest lengths over repeated passes', () => {
    const particles = chain();
    const constraints: Constraint[] = [
      { a: 0, b: 1, restLength: 5 },
      { a: 1, b: 2, restLength: 5 }
    ];

    relaxConstraints(particles, constraints, 50);

    expect(distance(particles[0].position, particles[1].position)).toBeCloseTo(5, 4);
    expect(distance(particles[1].position, particles[2].position)).toBeCloseTo(5, 4);
  });
});
