import type { Cell, StrategyKey } from '../types.js';
import { manhattanDistance } from '../utils/grid.js';
import { FifoFrontier, LifoFrontier, MinHeapFrontier } from './frontier.js';
import type { Frontier } from './frontier.js';

export interface SearchStrategy {
  // weighted strategies relax distances; the others visit each cell once
  weighted: boolean;
  createFrontier(): Frontier;
  priority(cost: number, cell: Cell, end: Cell): number;
}

const uniform = () => 0;

export const searchStrategies: Record<StrategyKey, SearchStrategy> = {
  bfs: {
    weighted: false,
    createFrontier: () => new FifoFrontier(),
    priority: uniform
  },
  dfs: {
    weighted: false,
    createFrontier: () => new LifoFrontier(),
    priority: uniform
  },
  dijkstra: {
    weighted: true,
    createFrontier: () => new MinHeapFrontier(),
    priority: (cost) => cost
  },
  astar: {
    weighted: true,
    createFrontier: () => new MinHeapFrontier(),
    priority: (cost, cell, end) => cost + manhattanDistance(cell, end)
  }
};

export function getStrategy(key: StrategyKey): SearchStrategy {
  const strategy = searchStrategies[key];
  if (!strategy) throw new Error(`Unknown search strategy ${String(key)}`);
  return strategy;
}
