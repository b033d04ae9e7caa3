import type { VisualizerStatus } from '@mazetrace/core';

export const CONTROLS_LINE = 'Controls: [Space] run  [R] regenerate maze  [Esc] quit';

export function formatStatusLines(status: VisualizerStatus, stopped = false): string[] {
  const lines = [`Algorithm: ${status.strategyLabel}  (press 1-4 to change)`, CONTROLS_LINE];
  if (stopped) {
    lines.push('Status: Stopped');
  } else {
    lines.push(status.searching ? 'Status: Searching...' : 'Status: Idle');
  }
  if (status.lastPathLength !== null) {
    lines.push(`Last path length: ${status.lastPathLength}`);
  }
  if (status.lastElapsedMs !== null) {
    lines.push(`Time taken: ${(status.lastElapsedMs / 1000).toFixed(4)} seconds`);
  }
  if (status.noPathFound) {
    lines.push('Last run: no path found');
  }
  return lines;
}
