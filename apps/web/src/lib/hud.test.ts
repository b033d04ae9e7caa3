import { describe, expect, it } from 'vitest';

import type { VisualizerStatus } from '@mazetrace/core';

import { CONTROLS_LINE, formatStatusLines } from './hud.js';

const idle: VisualizerStatus = {
  strategy: 'astar',
  strategyLabel: 'A*',
  searching: false,
  lastPathLength: null,
  lastElapsedMs: null,
  noPathFound: false
};

describe('formatStatusLines', () => {
  it('shows the selected algorithm, controls and idle status', () => {
    expect(formatStatusLines(idle)).toEqual([
      'Algorithm: A*  (press 1-4 to change)',
      CONTROLS_LINE,
      'Status: Idle'
    ]);
  });

  it('reports the searching state', () => {
    expect(formatStatusLines({ ...idle, searching: true })[2]).toBe('Status: Searching...');
  });

  it('adds last path length and time in seconds', () => {
    const lines = formatStatusLines({ ...idle, lastPathLength: 88, lastElapsedMs: 1234.5 });
    expect(lines.slice(3)).toEqual(['Last path length: 88', 'Time taken: 1.2345 seconds']);
  });

  it('flags a run that found no path', () => {
    const lines = formatStatusLines({ ...idle, noPathFound: true });
    expect(lines[lines.length - 1]).toBe('Last run: no path found');
  });

  it('shows the stopped state after quitting', () => {
    expect(formatStatusLines(idle, true)[2]).toBe('Status: Stopped');
  });
});
