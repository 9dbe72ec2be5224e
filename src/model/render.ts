import type { Cloth, DragState } from './types';

export const BACKGROUND_COLOR = '#fff';
export const CONSTRAINT_COLOR = '#404040';
export const PARTICLE_COLOR = '#f00';
export const PARTICLE_RADIUS = 3;
const CONSTRAINT_WIDTH = 1;
const SELECTED_AURA_COLOR = 'rgba(30, 144, 255, 0.45)';

export function renderCloth(
  ctx: CanvasRenderingContext2D,
  width: number,
  height: number,
  cloth: Cloth,
  drag: DragState
): void {
  ctx.clearRect(0, 0, width, height);
  ctx.fillStyle = BACKGROUND_COLOR;
  ctx.fillRect(0, 0, width, height);

  ctx.strokeStyle = CONSTRAINT_COLOR;
  ctx.lineWidth = CONSTRAINT_WIDTH;
  for (const constraint of cloth.constraints) {
    const a = cloth.particles[constraint.a]?.position;
    const b = cloth.particles[constraint.b]?.position;
    if (!a || !b) {
      continue;
    }
    ctx.beginPath();
    ctx.moveTo(a.x, a.y);
    ctx.lineTo(b.x, b.y);
    ctx.stroke();
  }

  ctx.fillStyle = PARTICLE_COLOR;
  for (const particle of cloth.particles) {
    ctx.beginPath();
    ctx.arc(particle.position.x, particle.position.y, PARTICLE_RADIUS, 0, Math.PI * 2);
    ctx.fill();
  }

  if (drag.activeIndex !== null) {
    const selected = cloth.particles[drag.activeIndex];
    if (selected) {
      ctx.beginPath();
      ctx.arc(selected.position.x, selected.position.y, PARTICLE_RADIUS + 6, 0, Math.PI * 2);
      ctx.strokeStyle = SELECTED_AURA_COLOR;
      ctx.lineWidth = 3;
      ctx.stroke();
    }
  }
}
