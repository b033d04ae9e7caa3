import { InvalidGridDimensionsError } from '../types.js';
import type { Cell, CellKey, CellState, GridModel } from '../types.js';

type GridBounds = Pick<GridModel, 'width' | 'height'>;

export const WALL_SYMBOL = '#';
export const OPEN_SYMBOL = '.';

// Neighbour iteration order; BFS/DFS tie-breaks depend on it.
export const axisDirections: ReadonlyArray<Cell> = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 }
] as const;

export const cellKey = (cell: Cell): CellKey => `${cell.x},${cell.y}`;

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isWithinBounds(grid: GridBounds, cell: Cell): boolean {
  return cell.x >= 0 && cell.x < grid.width && cell.y >= 0 && cell.y < grid.height;
}

export function cellIndex(grid: GridBounds, cell: Cell): number {
  return cell.y * grid.width + cell.x;
}

export function getCellState(grid: GridModel, cell: Cell): CellState | undefined {
  if (!isWithinBounds(grid, cell)) {
    return undefined;
  }

  return grid.cells[cellIndex(grid, cell)];
}

export function isOpen(grid: GridModel, cell: Cell): boolean {
  return getCellState(grid, cell) === 'open';
}

/**
 * Axis-aligned unit-step neighbours that are inside the grid and open,
 * in `(+x, -x, +y, -y)` order.
 */
export function getOpenNeighbors(grid: GridModel, cell: Cell): Cell[] {
  return axisDirections
    .map((direction) => ({ x: cell.x + direction.x, y: cell.y + direction.y }))
    .filter((neighbor) => isOpen(grid, neighbor));
}

export function manhattanDistance(a: Cell, b: Cell): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function assertGridDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidGridDimensionsError(width, height, 'width and height must be positive integers');
  }
}

export interface CreateGridOptions {
  width: number;
  height: number;
  cells: ReadonlyArray<CellState>;
  start?: Cell;
  end?: Cell;
}

/**
 * Builds an immutable grid. Start defaults to the top-left corner and end to
 * the bottom-right corner.
 */
export function createGrid(options: CreateGridOptions): GridModel {
  const { width, height, cells } = options;
  assertGridDimensions(width, height);
  if (cells.length !== width * height) {
    throw new InvalidGridDimensionsError(width, height, `expected ${width * height} cells, got ${cells.length}`);
  }

  const bounds = { width, height };
  const start = options.start ?? { x: 0, y: 0 };
  const end = options.end ?? { x: width - 1, y: height - 1 };
  for (const [label, cell] of [['start', start], ['end', end]] as const) {
    if (!isWithinBounds(bounds, cell)) {
      throw new Error(`Grid ${label} out of bounds at ${cellKey(cell)}`);
    }
  }

  return Object.freeze({
    width,
    height,
    cells: Object.freeze([...cells]),
    start: Object.freeze({ ...start }),
    end: Object.freeze({ ...end })
  });
}

export function gridFromRows(rows: ReadonlyArray<string>, options: { start?: Cell; end?: Cell } = {}): GridModel {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  assertGridDimensions(width, height);

  const cells: CellState[] = [];
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new InvalidGridDimensionsError(width, height, `row ${y} has ${row.length} cells`);
    }
    for (const symbol of row) {
      if (symbol === WALL_SYMBOL) cells.push('wall');
      else if (symbol === OPEN_SYMBOL) cells.push('open');
      else throw new Error(`Unknown cell symbol '${symbol}' in row ${y}`);
    }
  });

  return createGrid({ width, height, cells, ...options });
}

export function gridToRows(grid: GridModel): string[] {
  const rows: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let row = '';
    for (let x = 0; x < grid.width; x++) {
      row += grid.cells[cellIndex(grid, { x, y })] === 'wall' ? WALL_SYMBOL : OPEN_SYMBOL;
    }
    rows.push(row);
  }
  return rows;
}
