import { useEffect, useMemo, useState } from 'react';

import { ClothCanvas } from './canvas/ClothCanvas';
import { createClothDriver } from './model/driver';
import { createClothStore } from './model/store';
import type { ClothStore } from './model/types';
import { Toolbar } from './ui/Toolbar';

type AppProps = {
  store?: ClothStore;
};

function useStoreVersion(store: ClothStore): number {
  const [version, setVersion] = useState(0);

  useEffect(() => {
    return store.subscribe(() => {
      setVersion((previous) => previous + 1);
    });
  }, [store]);

  return version;
}

export default function App({ store }: AppProps): JSX.Element {
  const [localStore] = useState<ClothStore>(() => store ?? createClothStore());
  const clothStore = store ?? localStore;
  const driver = useMemo(() => createClothDriver(clothStore), [clothStore]);
  const version = useStoreVersion(clothStore);
  const state = clothStore.getState();
  const tickIntervalMs = Math.max(1, Math.round(state.config.timeStep * 1000));

  useEffect(() => {
    if (!state.running) {
      return;
    }

    // Fixed cadence: every tick advances exactly config.timeStep.
    const timerId = setInterval(() => {
      driver.onTick();
    }, tickIntervalMs);

    return () => {
      clearInterval(timerId);
    };
  }, [driver, state.running, tickIntervalMs]);

  return (
    <div className="app-shell">
      <Toolbar
        running={state.running}
        onSetRunning={(running) => {
          clothStore.setRunning(running);
        }}
        onStep={() => {
          clothStore.step();
        }}
        onReset={() => {
          clothStore.reset();
        }}
      />

      <div className="canvas-wrap">
        <ClothCanvas
          driver={driver}
          cloth={state.cloth}
          drag={state.drag}
          renderNonce={version}
        />
      </div>

      <div className="statusbar" data-testid="statusbar">
        <span>
          Particles: <strong data-testid="particle-count">{state.cloth.particles.length}</strong>
        </span>
        <span>
          Constraints: <strong data-testid="constraint-count">{state.cloth.constraints.length}</strong>
        </span>
        <span>
          Ticks: <strong data-testid="tick-count">{state.tickCount}</strong>
        </span>
        <span>
          Selected:{' '}
          <strong data-testid="selected-particle">
            {state.drag.activeIndex === null ? 'none' : state.drag.activeIndex}
          </strong>
        </span>
        <span>
          Simulation: <strong data-testid="sim-mode">{state.running ? 'play' : 'stop'}</strong>
        </span>
      </div>

      <pre data-testid="diagnostics-debug" className="scene-debug">
        {JSON.stringify(state.diagnostics)}
      </pre>
    </div>
  );
}
