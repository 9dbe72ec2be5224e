export type Vec2 = {
  x: number;
  y: number;
};

export type Particle = {
  position: Vec2;
  previousPosition: Vec2;
  pinned: boolean;
};

export type Constraint = {
  a: number;
  b: number;
  restLength: number;
};

export type Cloth = {
  rows: number;
  cols: number;
  particles: Particle[];
  constraints: Constraint[];
};

export type ClothConfig = {
  rows: number;
  cols: number;
  spacing: number;
  origin: Vec2;
  gravity: number;
  damping: number;
  iterations: number;
  timeStep: number;
  grabRadius: number;
};

export type StepParams = Pick<ClothConfig, 'gravity' | 'damping' | 'iterations' | 'timeStep'>;

export type ClothDiagnostics = {
  tick: number;
  maxStretch: number;
  degenerateSkips: number;
  nonFiniteParticles: number;
};

export type DragState = {
  activeIndex: number | null;
  pointer: Vec2 | null;
};

export type Result = {
  ok: boolean;
  reason?: string;
};

export type ClothStoreState = {
  cloth: Cloth;
  config: ClothConfig;
  drag: DragState;
  running: boolean;
  tickCount: number;
  diagnostics: ClothDiagnostics;
};

export interface ClothStore {
  getState(): ClothStoreState;
  subscribe(listener: () => void): () => void;
  step(): Result;
  findNearest(point: Vec2, maxRadius?: number): number | null;
  setPosition(index: number, point: Vec2): Result;
  release(): void;
  beginDrag(point: Vec2): Result;
  updateDrag(point: Vec2): Result;
  endDrag(): void;
  setRunning(running: boolean): void;
  setConfig(opts: Partial<ClothConfig>): void;
  reset(): void;
  getDiagnostics(): ClothDiagnostics;
}

export interface ClothDriver {
  onTick(): Result;
  onPointerDown(point: Vec2): Result;
  onPointerDrag(point: Vec2): Result;
  onPointerUp(): void;
}
