import { describe, expect, it } from 'vitest';

import { FifoFrontier, LifoFrontier, MinHeapFrontier } from './frontier.js';
import { getStrategy, searchStrategies } from './strategies.js';

describe('searchStrategies', () => {
  it('pairs each strategy with its frontier', () => {
    expect(getStrategy('bfs').createFrontier()).toBeInstanceOf(FifoFrontier);
    expect(getStrategy('dfs').createFrontier()).toBeInstanceOf(LifoFrontier);
    expect(getStrategy('dijkstra').createFrontier()).toBeInstanceOf(MinHeapFrontier);
    expect(getStrategy('astar').createFrontier()).toBeInstanceOf(MinHeapFrontier);
  });

  it('relaxes distances only for the heap strategies', () => {
    expect(searchStrategies.bfs.weighted).toBe(false);
    expect(searchStrategies.dfs.weighted).toBe(false);
    expect(searchStrategies.dijkstra.weighted).toBe(true);
    expect(searchStrategies.astar.weighted).toBe(true);
  });

  it('adds the manhattan estimate to the cost for A*', () => {
    const end = { x: 4, y: 4 };
    expect(getStrategy('dijkstra').priority(3, { x: 1, y: 0 }, end)).toBe(3);
    expect(getStrategy('astar').priority(3, { x: 1, y: 0 }, end)).toBe(10);
  });

  it('carries no display labels', () => {
    expect(Object.keys(searchStrategies.astar).sort()).toEqual(['createFrontier', 'priority', 'weighted']);
  });
});
