import type { Cell, CellKey, GridModel, StrategyKey } from '../types.js';
import { cellKey, getOpenNeighbors, sameCell } from '../utils/grid.js';
import { reconstructPath } from './path.js';
import { getStrategy } from './strategies.js';
import type { DistanceTable, SearchOutcome, SearchResult, VisitationRecord, VisitationSnapshot } from './types.js';

/**
 * Lazily explores `grid` one expansion at a time. Each yielded snapshot
 * reflects the record after expanding one cell; the generator returns once
 * `end` is popped from the frontier or the frontier runs dry.
 *
 * Heap entries are never removed eagerly: an entry whose cost is above the
 * cell's recorded distance is skipped when it surfaces.
 */
export function* searchSteps(
  grid: GridModel,
  strategyKey: StrategyKey,
  start: Cell = grid.start,
  end: Cell = grid.end
): Generator<VisitationSnapshot, SearchOutcome, void> {
  const strategy = getStrategy(strategyKey);
  const frontier = strategy.createFrontier();
  const startKey = cellKey(start);

  const record: VisitationRecord = new Map([[startKey, null]]);
  const visited = new Set<CellKey>([startKey]);
  const distances: DistanceTable = new Map([[startKey, 0]]);
  const visitOrder: Cell[] = [start];

  const discover = (cell: Cell, key: CellKey, from: Cell, cost: number) => {
    if (!visited.has(key)) {
      visited.add(key);
      visitOrder.push(cell);
    }
    record.set(key, from);
    distances.set(key, cost);
    frontier.push({ cell, cost }, strategy.priority(cost, cell, end));
  };

  frontier.push({ cell: start, cost: 0 }, strategy.priority(0, start, end));
  let steps = 0;
  let found = false;

  while (!frontier.isEmpty()) {
    const entry = frontier.popNext();
    if (!entry) break;
    const current = entry.cell;

    if (sameCell(current, end)) {
      found = true;
      break;
    }

    if (strategy.weighted && entry.cost > (distances.get(cellKey(current)) ?? Number.POSITIVE_INFINITY)) {
      continue;
    }

    const discovered: Cell[] = [];
    for (const neighbor of getOpenNeighbors(grid, current)) {
      const key = cellKey(neighbor);
      const cost = entry.cost + 1;
      if (strategy.weighted) {
        const known = distances.get(key);
        if (known !== undefined && cost >= known) continue;
      } else if (visited.has(key)) {
        continue;
      }
      discover(neighbor, key, current, cost);
      discovered.push(neighbor);
    }

    steps++;
    yield { step: steps, current, discovered, visited, visitedCount: visited.size };
  }

  return {
    strategy: strategyKey,
    start,
    end,
    found,
    steps,
    record,
    distances: strategy.weighted ? distances : undefined,
    visitOrder
  };
}

/** Runs a search to completion and reconstructs its path. */
export function runSearch(
  grid: GridModel,
  strategyKey: StrategyKey,
  start: Cell = grid.start,
  end: Cell = grid.end
): SearchResult {
  const steps = searchSteps(grid, strategyKey, start, end);
  let next = steps.next();
  while (!next.done) {
    next = steps.next();
  }

  const outcome = next.value;
  return { ...outcome, path: reconstructPath(outcome.record, outcome.end) };
}
