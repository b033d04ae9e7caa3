import type { Cell, CellKey, GridModel, StrategyKey } from '../types.js';

export interface StrategyAppearance {
  label: string;
  // CSS hex colour, e.g. '#3296ff'
  color: string;
}

export type StrategyAppearanceMap = Record<StrategyKey, StrategyAppearance>;

export interface VisualizerStatus {
  strategy: StrategyKey;
  strategyLabel: string;
  searching: boolean;
  lastPathLength: number | null;
  lastElapsedMs: number | null;
  // last completed run never reached the end cell
  noPathFound: boolean;
}

export interface FrameState {
  grid: GridModel;
  visited: ReadonlySet<CellKey>;
  path: ReadonlySet<CellKey>;
  highlight: string;
  start: Cell;
  end: Cell;
  status: VisualizerStatus;
}

export interface Renderer {
  drawFrame(frame: FrameState): void;
}

export interface Clock {
  /** Resolves at the next frame boundary for `targetFps`. */
  tick(targetFps: number): Promise<void>;
}

export type InputEvent =
  | { type: 'quit' }
  | { type: 'select'; strategy: StrategyKey }
  | { type: 'regenerate' }
  | { type: 'run' };

export interface InputSource {
  /** Drains the events received since the previous poll. */
  poll(): InputEvent[];
}

export interface SearchRunSummary {
  runId: string;
  strategy: StrategyKey;
  found: boolean;
  steps: number;
  pathLength: number | null;
  elapsedMs: number;
  path: ReadonlyArray<Cell>;
}
