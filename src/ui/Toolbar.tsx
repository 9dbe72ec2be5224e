type ToolbarProps = {
  running: boolean;
  onSetRunning: (running: boolean) => void;
  onStep: () => void;
  onReset: () => void;
};

export function Toolbar({ running, onSetRunning, onStep, onReset }: ToolbarProps): JSX.Element {
  return (
    <div className="toolbar">
      <div className="toolbar-left">
        <button
          type="button"
          data-testid="sim-step"
          disabled={running}
          onClick={onStep}
        >
          Step
        </button>
        <button type="button" data-testid="sim-reset" onClick={onReset}>
          Reset
        </button>
      </div>
      <div className="toolbar-right">
        <button
          type="button"
          data-testid="sim-play"
          aria-pressed={running}
          className={running ? 'active' : ''}
          onClick={() => onSetRunning(true)}
        >
          <span aria-hidden="true">▶</span> Play
        </button>
        <button
          type="button"
          data-testid="sim-stop"
          aria-pressed={!running}
          className={!running ? 'active' : ''}
          onClick={() => onSetRunning(false)}
        >
          <span aria-hidden="true">■</span> Stop
        </button>
      </div>
    </div>
  );
}
