import { ZodError } from 'zod';
import { describe, expect, it } from 'vitest';

import { applySettingsOverrides, defaultSettings, loadVisualizerSettings, validatedDefaultSettings } from './index.js';

describe('visualizer settings', () => {
  it('validates the default settings', () => {
    const settings = loadVisualizerSettings(defaultSettings);
    expect(settings.maze).toEqual({ width: 45, height: 45 });
    expect(settings.fps).toBe(60);
    expect(settings.strategies.astar.label).toBe('A*');
  });

  it('exports prevalidated defaults', () => {
    expect(validatedDefaultSettings.palette.path).toBe('#ffa500');
    expect(validatedDefaultSettings.initialStrategy).toBe('bfs');
  });

  it('rejects even maze dimensions', () => {
    expect(() =>
      loadVisualizerSettings({ ...defaultSettings, maze: { width: 44, height: 45 } })
    ).toThrow('maze dimensions must be odd');
  });

  it('rejects malformed colours', () => {
    expect(() =>
      loadVisualizerSettings({ ...defaultSettings, palette: { ...defaultSettings.palette, wall: 'black' } })
    ).toThrow(ZodError);
  });

  it('applies textual overrides', () => {
    const settings = applySettingsOverrides(defaultSettings, {
      width: '21',
      height: '15',
      fps: '30',
      seed: 'demo',
      strategy: 'dfs'
    });
    expect(settings.maze).toEqual({ width: 21, height: 15, seed: 'demo' });
    expect(settings.fps).toBe(30);
    expect(settings.cellSize).toBe(15);
    expect(settings.initialStrategy).toBe('dfs');
  });

  it('keeps the base values when no overrides are given', () => {
    expect(applySettingsOverrides(defaultSettings, {})).toEqual({
      ...defaultSettings,
      maze: { width: 45, height: 45, seed: undefined }
    });
  });

  it('refuses overrides that break validation', () => {
    expect(() => applySettingsOverrides(defaultSettings, { width: '0' })).toThrow(ZodError);
    expect(() => applySettingsOverrides(defaultSettings, { fps: 'fast' })).toThrow(ZodError);
    expect(() => applySettingsOverrides(defaultSettings, { strategy: 'greedy' })).toThrow(ZodError);
  });
});
