import type { Cell, CellState, GridModel } from '../types.js';
import { assertGridDimensions, cellIndex, createGrid, isWithinBounds } from '../utils/grid.js';
import type { RandomSource } from './random.js';

export interface GenerateMazeOptions {
  random?: RandomSource;
}

// Carving moves two cells at a time so walls stay between passages.
const carveSteps: ReadonlyArray<Cell> = [
  { x: -2, y: 0 },
  { x: 2, y: 0 },
  { x: 0, y: -2 },
  { x: 0, y: 2 }
];

/**
 * Randomized iterative backtracker. Every open cell of the result is
 * reachable from the top-left corner and the passages form a tree.
 */
export function generateMaze(width: number, height: number, options: GenerateMazeOptions = {}): GridModel {
  assertGridDimensions(width, height);
  const random = options.random ?? Math.random;
  const bounds = { width, height };

  const cells = new Array<CellState>(width * height).fill('wall');
  const origin: Cell = { x: 0, y: 0 };
  cells[cellIndex(bounds, origin)] = 'open';
  const stack: Cell[] = [origin];

  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    const candidates = carveSteps
      .map((step) => ({ x: current.x + step.x, y: current.y + step.y }))
      .filter((next) => isWithinBounds(bounds, next) && cells[cellIndex(bounds, next)] === 'wall');

    if (candidates.length === 0) {
      stack.pop();
      continue;
    }

    const next = candidates[Math.floor(random() * candidates.length)];
    const between = { x: (current.x + next.x) / 2, y: (current.y + next.y) / 2 };
    cells[cellIndex(bounds, next)] = 'open';
    cells[cellIndex(bounds, between)] = 'open';
    stack.push(next);
  }

  return createGrid({
    width,
    height,
    cells,
    start: origin,
    end: { x: width - 1, y: height - 1 }
  });
}
