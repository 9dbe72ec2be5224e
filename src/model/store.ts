import { resolveClothConfig, toStepParams, topologyChanged } from './config';
import { findNearestParticle } from './hitTest';
import { EMPTY_DIAGNOSTICS, measureCloth, stepCloth } from './simulation';
import { buildCloth } from './topology';
import type {
  ClothConfig,
  ClothDiagnostics,
  ClothStore,
  ClothStoreState,
  Result,
  Vec2
} from './types';

export function createClothStore(overrides: Partial<ClothConfig> = {}): ClothStore {
  const config = resolveClothConfig(overrides);
  const listeners = new Set<() => void>();

  const state: ClothStoreState = {
    cloth: buildCloth(config),
    config,
    drag: {
      activeIndex: null,
      pointer: null
    },
    running: false,
    tickCount: 0,
    diagnostics: { ...EMPTY_DIAGNOSTICS }
  };

  const emit = (): void => {
    for (const listener of listeners) {
      listener();
    }
  };

  const clearDrag = (): boolean => {
    const hadSelection = state.drag.activeIndex !== null || state.drag.pointer !== null;
    state.drag.activeIndex = null;
    state.drag.pointer = null;
    return hadSelection;
  };

  const rebuild = (): void => {
    state.cloth = buildCloth(state.config);
    state.tickCount = 0;
    state.diagnostics = { ...EMPTY_DIAGNOSTICS };
    clearDrag();
  };

  const applyPosition = (index: number, point: Vec2): Result => {
    const particle = state.cloth.particles[index];
    if (!Number.isInteger(index) || !particle) {
      return { ok: false, reason: 'Unknown particle.' };
    }
    if (particle.pinned) {
      return { ok: false, reason: 'Pinned particles cannot be repositioned.' };
    }
    particle.position.x = point.x;
    particle.position.y = point.y;
    return { ok: true };
  };

  return {
    getState(): ClothStoreState {
      return state;
    },

    subscribe(listener: () => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    step(): Result {
      const result = stepCloth(state.cloth, toStepParams(state.config));
      state.tickCount += 1;
      state.diagnostics = measureCloth(state.cloth, state.tickCount, result);
      emit();
      return { ok: true };
    },

    findNearest(point, maxRadius = state.config.grabRadius): number | null {
      return findNearestParticle(state.cloth.particles, point, maxRadius);
    },

    setPosition(index, point): Result {
      const result = applyPosition(index, point);
      if (result.ok) {
        emit();
      }
      return result;
    },

    release(): void {
      if (clearDrag()) {
        emit();
      }
    },

    beginDrag(point): Result {
      const index = findNearestParticle(state.cloth.particles, point, state.config.grabRadius);
      if (index === null) {
        if (clearDrag()) {
          emit();
        }
        return { ok: false, reason: 'No free particle near pointer.' };
      }
      state.drag.activeIndex = index;
      state.drag.pointer = { x: point.x, y: point.y };
      emit();
      return { ok: true };
    },

    updateDrag(point): Result {
      const activeIndex = state.drag.activeIndex;
      if (activeIndex === null) {
        return { ok: false, reason: 'No active drag.' };
      }
      const result = applyPosition(activeIndex, point);
      if (!result.ok) {
        return result;
      }
      state.drag.pointer = { x: point.x, y: point.y };
      emit();
      return result;
    },

    endDrag(): void {
      if (clearDrag()) {
        emit();
      }
    },

    setRunning(running: boolean): void {
      if (state.running === running) {
        return;
      }
      state.running = running;
      emit();
    },

    setConfig(opts): void {
      const nextConfig = resolveClothConfig(opts, state.config);
      const rebuildNeeded = topologyChanged(state.config, nextConfig);
      state.config = nextConfig;
      if (rebuildNeeded) {
        rebuild();
      }
      emit();
    },

    reset(): void {
      rebuild();
      emit();
    },

    getDiagnostics(): ClothDiagnostics {
      return { ...state.diagnostics };
    }
  };
}
