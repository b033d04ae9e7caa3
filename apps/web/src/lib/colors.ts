import type { Cell, FrameState } from '@mazetrace/core';
import { cellKey, isOpen, sameCell } from '@mazetrace/core';
import type { PaletteData } from '@mazetrace/data';

export function toPixiColor(hex: string): number {
  return Number.parseInt(hex.slice(1), 16);
}

/**
 * Colour of one cell: end and start win over the path, which wins over
 * visited cells, which win over the wall/open base.
 */
export function cellColor(frame: FrameState, palette: PaletteData, cell: Cell): string {
  if (sameCell(cell, frame.end)) return palette.end;
  if (sameCell(cell, frame.start)) return palette.start;
  const key = cellKey(cell);
  if (frame.path.has(key)) return palette.path;
  if (frame.visited.has(key)) return frame.highlight;
  return isOpen(frame.grid, cell) ? palette.open : palette.wall;
}
