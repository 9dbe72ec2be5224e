import type { ClothConfig, StepParams } from './types';

export const CANVAS_WIDTH = 800;
export const CANVAS_HEIGHT = 600;

const MAX_GRID_DIMENSION = 200;
const MAX_ITERATIONS = 100;

export const DEFAULT_CLOTH_CONFIG: ClothConfig = {
  rows: 20,
  cols: 30,
  spacing: 20,
  origin: { x: 100, y: 50 },
  // px/s^2, roughly 9.8 m/s^2 at 100 px per metre
  gravity: 980,
  damping: 0.99,
  iterations: 5,
  timeStep: 0.016,
  grabRadius: 20
};

export function clampInteger(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return min;
  }
  return Math.max(min, Math.min(max, Math.round(value)));
}

export function clampPositive(value: number, fallback: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

/**
 * Merges `opts` into `base` field by field. Out-of-range integers are clamped;
 * any other invalid value leaves the base value in place.
 */
export function resolveClothConfig(
  opts: Partial<ClothConfig> = {},
  base: ClothConfig = DEFAULT_CLOTH_CONFIG
): ClothConfig {
  const next: ClothConfig = { ...base, origin: { ...base.origin } };

  if (typeof opts.rows === 'number') {
    next.rows = clampInteger(opts.rows, 1, MAX_GRID_DIMENSION);
  }
  if (typeof opts.cols === 'number') {
    next.cols = clampInteger(opts.cols, 1, MAX_GRID_DIMENSION);
  }
  if (typeof opts.spacing === 'number') {
    next.spacing = clampPositive(opts.spacing, base.spacing);
  }
  if (opts.origin && Number.isFinite(opts.origin.x) && Number.isFinite(opts.origin.y)) {
    next.origin = { x: opts.origin.x, y: opts.origin.y };
  }
  if (typeof opts.gravity === 'number' && Number.isFinite(opts.gravity)) {
    next.gravity = opts.gravity;
  }
  if (typeof opts.damping === 'number' && Number.isFinite(opts.damping)) {
    if (opts.damping > 0 && opts.damping <= 1) {
      next.damping = opts.damping;
    }
  }
  if (typeof opts.iterations === 'number') {
    next.iterations = clampInteger(opts.iterations, 1, MAX_ITERATIONS);
  }
  if (typeof opts.timeStep === 'number') {
    next.timeStep = clampPositive(opts.timeStep, base.timeStep);
  }
  if (typeof opts.grabRadius === 'number') {
    next.grabRadius = clampPositive(opts.grabRadius, base.grabRadius);
  }

  return next;
}

export function topologyChanged(a: ClothConfig, b: ClothConfig): boolean {
  return (
    a.rows !== b.rows ||
    a.cols !== b.cols ||
    a.spacing !== b.spacing ||
    a.origin.x !== b.origin.x ||
    a.origin.y !== b.origin.y
  );
}

export function toStepParams(config: ClothConfig): StepParams {
  return {
    gravity: config.gravity,
    damping: config.damping,
    iterations: config.iterations,
    timeStep: config.timeStep
  };
}
