import type { Cell, CellKey } from '../types.js';
import { cellKey } from '../utils/grid.js';

/**
 * Walks predecessors back from `end`. The start cell (predecessor `null`) is
 * not part of the path, so its length is the number of steps taken. An end
 * that was never discovered gives an empty path.
 */
export function reconstructPath(record: ReadonlyMap<CellKey, Cell | null>, end: Cell): ReadonlyArray<Cell> {
  const path: Cell[] = [];
  let cursor: Cell | null | undefined = end;
  while (cursor) {
    const predecessor: Cell | null | undefined = record.get(cellKey(cursor));
    if (!predecessor) break;
    path.push(cursor);
    cursor = predecessor;
  }
  return Object.freeze(path.reverse());
}

export function pathKeys(path: ReadonlyArray<Cell>): Set<CellKey> {
  return new Set(path.map(cellKey));
}
