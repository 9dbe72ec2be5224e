import type { Constraint, Particle } from './types';

export type RelaxResult = {
  passes: number;
  degenerateSkips: number;
};

/**
 * Moves both endpoints halfway toward the rest length, in place. Returns false
 * when the endpoints coincide and the constraint has no direction to correct
 * along.
 */
export function solveConstraint(particles: Particle[], constraint: Constraint): boolean {
  const p1 = particles[constraint.a];
  const p2 = particles[constraint.b];
  if (!p1 || !p2) {
    return true;
  }

  const dx = p2.position.x - p1.position.x;
  const dy = p2.position.y - p1.position.y;
  const dist = Math.hypot(dx, dy);

  if (dist === 0) {
    return false;
  }

  const difference = (dist - constraint.restLength) / dist;
  const offsetX = dx * 0.5 * difference;
  const offsetY = dy * 0.5 * difference;

  if (!p1.pinned) {
    p1.position.x += offsetX;
    p1.position.y += offsetY;
  }
  if (!p2.pinned) {
    p2.position.x -= offsetX;
    p2.position.y -= offsetY;
  }
  return true;
}

/**
 * Gauss-Seidel relaxation: each pass walks the constraints in construction
 * order and every correction is visible to the constraints after it.
 */
export function relaxConstraints(
  particles: Particle[],
  constraints: Constraint[],
  iterations: number
): RelaxResult {
  let degenerateSkips = 0;
  let passes = 0;

  for (let iteration = 0; iteration < iterations; iteration += 1) {
    for (const constraint of constraints) {
      if (!solveConstraint(particles, constraint)) {
        degenerateSkips += 1;
      }
    }
    passes += 1;
  }

  return { passes, degenerateSkips };
}
