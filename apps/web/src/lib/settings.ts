import { applySettingsOverrides, validatedDefaultSettings } from '@mazetrace/data';
import type { VisualizerSettings } from '@mazetrace/data';
import type { Logger } from 'pino';

const overrideKeys = ['width', 'height', 'fps', 'cellSize', 'seed', 'strategy'] as const;

/**
 * Reads `?width=&height=&fps=&cellSize=&seed=&strategy=` overrides. Invalid
 * values fall back to the defaults.
 */
export function resolveSettings(search: string, logger: Pick<Logger, 'warn'>): VisualizerSettings {
  const params = new URLSearchParams(search);
  const raw: Record<string, string | undefined> = {};
  for (const key of overrideKeys) {
    raw[key] = params.get(key) ?? undefined;
  }

  try {
    return applySettingsOverrides(validatedDefaultSettings, raw);
  } catch (error) {
    logger.warn({ err: error, search }, 'ignoring invalid settings overrides');
    return validatedDefaultSettings;
  }
}
