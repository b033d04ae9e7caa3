export type CellState = 'open' | 'wall';

export interface Cell {
  x: number;
  y: number;
}

export type CellKey = `${number},${number}`;

export interface GridModel {
  readonly width: number;
  readonly height: number;
  // row-major, frozen once the grid is built
  readonly cells: ReadonlyArray<CellState>;
  readonly start: Cell;
  readonly end: Cell;
}

export type StrategyKey = 'bfs' | 'dfs' | 'dijkstra' | 'astar';

export const strategyKeys: ReadonlyArray<StrategyKey> = ['bfs', 'dfs', 'dijkstra', 'astar'] as const;

export class InvalidGridDimensionsError extends Error {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number, detail?: string) {
    super(`Invalid grid dimensions ${width}x${height}${detail ? `: ${detail}` : ''}`);
    this.name = 'InvalidGridDimensionsError';
    this.width = width;
    this.height = height;
  }
}
