import { distance } from './hitTest';
import { integrateParticles } from './integrator';
import { relaxConstraints } from './solver';
import type { Cloth, ClothDiagnostics, StepParams } from './types';

export type StepResult = {
  degenerateSkips: number;
};

export const EMPTY_DIAGNOSTICS: ClothDiagnostics = {
  tick: 0,
  maxStretch: 0,
  degenerateSkips: 0,
  nonFiniteParticles: 0
};

/** One tick: integrate every particle once, then run all relaxation passes. */
export function stepCloth(cloth: Cloth, params: StepParams): StepResult {
  integrateParticles(cloth.particles, params);
  const relaxed = relaxConstraints(cloth.particles, cloth.constraints, params.iterations);
  return { degenerateSkips: relaxed.degenerateSkips };
}

export function countNonFiniteParticles(cloth: Cloth): number {
  let count = 0;
  for (const particle of cloth.particles) {
    if (!Number.isFinite(particle.position.x) || !Number.isFinite(particle.position.y)) {
      count += 1;
    }
  }
  return count;
}

export function measureMaxStretch(cloth: Cloth): number {
  let maxStretch = 0;
  for (const constraint of cloth.constraints) {
    if (constraint.restLength <= 0) {
      continue;
    }
    const a = cloth.particles[constraint.a].position;
    const b = cloth.particles[constraint.b].position;
    const stretch = Math.abs(distance(a, b) - constraint.restLength) / constraint.restLength;
    // NaN never compares greater; non-finite state is reported separately.
    if (stretch > maxStretch) {
      maxStretch = stretch;
    }
  }
  return maxStretch;
}

export function measureCloth(cloth: Cloth, tick: number, step: StepResult): ClothDiagnostics {
  return {
    tick,
    maxStretch: measureMaxStretch(cloth),
    degenerateSkips: step.degenerateSkips,
    nonFiniteParticles: countNonFiniteParticles(cloth)
  };
}
