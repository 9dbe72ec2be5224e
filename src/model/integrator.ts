import type { Particle, StepParams } from './types';

export type IntegrationParams = Pick<StepParams, 'gravity' | 'damping' | 'timeStep'>;

// Velocity is implied by position - previousPosition, so any external write to
// `position` between ticks shows up as velocity here.
export function integrateParticle(particle: Particle, params: IntegrationParams): void {
  if (particle.pinned) {
    return;
  }

  const { position, previousPosition } = particle;
  const vx = (position.x - previousPosition.x) * params.damping;
  const vy = (position.y - previousPosition.y) * params.damping;

  previousPosition.x = position.x;
  previousPosition.y = position.y;

  position.x += vx;
  position.y += vy + params.gravity * params.timeStep * params.timeStep;
}

export function integrateParticles(particles: Particle[], params: IntegrationParams): void {
  for (const particle of particles) {
    integrateParticle(particle, params);
  }
}
