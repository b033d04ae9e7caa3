import { z } from 'zod';

export type StrategyId = 'bfs' | 'dfs' | 'dijkstra' | 'astar';

export interface StrategyAppearanceData {
  label: string;
  color: string;
}

export interface PaletteData {
  open: string;
  wall: string;
  path: string;
  start: string;
  end: string;
  overlayBackground: string;
  overlayText: string;
}

export interface MazeSettings {
  width: number;
  height: number;
  seed?: string;
}

export interface VisualizerSettings {
  maze: MazeSettings;
  cellSize: number;
  fps: number;
  initialStrategy: StrategyId;
  palette: PaletteData;
  strategies: Record<StrategyId, StrategyAppearanceData>;
}

const hexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'expected a #rrggbb colour');

// Odd sizes keep the bottom-right corner on a carved cell.
const mazeDimensionSchema = z
  .number()
  .int()
  .positive()
  .max(401)
  .refine((value) => value % 2 === 1, 'maze dimensions must be odd');

const strategyIdSchema = z.enum(['bfs', 'dfs', 'dijkstra', 'astar']);

const strategyAppearanceSchema = z.object({
  label: z.string().min(1),
  color: hexColorSchema
});

const paletteSchema = z.object({
  open: hexColorSchema,
  wall: hexColorSchema,
  path: hexColorSchema,
  start: hexColorSchema,
  end: hexColorSchema,
  overlayBackground: hexColorSchema,
  overlayText: hexColorSchema
});

const mazeSettingsSchema = z.object({
  width: mazeDimensionSchema,
  height: mazeDimensionSchema,
  seed: z.string().min(1).optional()
});

const visualizerSettingsSchema = z.object({
  maze: mazeSettingsSchema,
  cellSize: z.number().int().min(2).max(64),
  fps: z.number().int().min(1).max(240),
  initialStrategy: strategyIdSchema,
  palette: paletteSchema,
  strategies: z.object({
    bfs: strategyAppearanceSchema,
    dfs: strategyAppearanceSchema,
    dijkstra: strategyAppearanceSchema,
    astar: strategyAppearanceSchema
  })
});

export function loadVisualizerSettings(raw: unknown): VisualizerSettings {
  const result = visualizerSettingsSchema.parse(raw);
  return result;
}

export const defaultSettings: VisualizerSettings = {
  maze: { width: 45, height: 45 },
  cellSize: 15,
  fps: 60,
  initialStrategy: 'bfs',
  palette: {
    open: '#ffffff',
    wall: '#000000',
    path: '#ffa500',
    start: '#32ff64',
    end: '#ff3232',
    overlayBackground: '#f5f5f5',
    overlayText: '#000000'
  },
  strategies: {
    bfs: { label: 'BFS', color: '#3296ff' },
    dfs: { label: 'DFS', color: '#ff3232' },
    dijkstra: { label: 'Dijkstra', color: '#32ff64' },
    astar: { label: 'A*', color: '#ffff64' }
  }
};

export const validatedDefaultSettings = loadVisualizerSettings(defaultSettings);

// Query strings and environment variables arrive as text.
const settingsOverridesSchema = z.object({
  width: z.coerce.number().optional(),
  height: z.coerce.number().optional(),
  fps: z.coerce.number().optional(),
  cellSize: z.coerce.number().optional(),
  seed: z.string().min(1).optional(),
  strategy: strategyIdSchema.optional()
});

/**
 * Applies textual overrides on top of `base` and validates the merged
 * settings. Throws a `ZodError` when the result is invalid.
 */
export function applySettingsOverrides(
  base: VisualizerSettings,
  raw: Record<string, string | undefined>
): VisualizerSettings {
  const overrides = settingsOverridesSchema.parse(raw);
  return loadVisualizerSettings({
    ...base,
    maze: {
      width: overrides.width ?? base.maze.width,
      height: overrides.height ?? base.maze.height,
      seed: overrides.seed ?? base.maze.seed
    },
    fps: overrides.fps ?? base.fps,
    cellSize: overrides.cellSize ?? base.cellSize,
    initialStrategy: overrides.strategy ?? base.initialStrategy
  });
}
