import type { ClothDriver, ClothStore, Result } from './types';

/**
 * Adapts timer and pointer callbacks to store operations so the cloth can be
 * driven by any host: the React shell, a test, or a headless loop.
 */
export function createClothDriver(store: ClothStore): ClothDriver {
  return {
    onTick(): Result {
      if (!store.getState().running) {
        return { ok: false, reason: 'Simulation is paused.' };
      }
      return store.step();
    },

    onPointerDown(point): Result {
      return store.beginDrag(point);
    },

    onPointerDrag(point): Result {
      if (store.getState().drag.activeIndex === null) {
        return { ok: false, reason: 'No particle selected.' };
      }
      return store.updateDrag(point);
    },

    onPointerUp(): void {
      store.endDrag();
    }
  };
}
