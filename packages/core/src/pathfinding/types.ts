import type { Cell, CellKey, StrategyKey } from '../types.js';

// predecessor per discovered cell; `null` marks the start
export type VisitationRecord = Map<CellKey, Cell | null>;

export type DistanceTable = Map<CellKey, number>;

export interface VisitationSnapshot {
  step: number;
  current: Cell;
  // cells first discovered or relaxed while expanding `current`
  discovered: Cell[];
  // live view of the record's keys, valid until the next step is requested
  visited: ReadonlySet<CellKey>;
  visitedCount: number;
}

export interface SearchOutcome {
  strategy: StrategyKey;
  start: Cell;
  end: Cell;
  found: boolean;
  steps: number;
  record: VisitationRecord;
  distances?: DistanceTable;
  visitOrder: Cell[];
}

export interface SearchResult extends SearchOutcome {
  path: ReadonlyArray<Cell>;
}
