import type { Clock } from './types.js';

export interface FrameClockOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Clock that waits out whatever is left of the current frame, so work done
 * between ticks counts towards the frame budget.
 */
export function createFrameClock(options: FrameClockOptions = {}): Clock {
  const now = options.now ?? (() => performance.now());
  const sleep = options.sleep ?? defaultSleep;
  let lastTick: number | null = null;

  return {
    async tick(targetFps: number) {
      if (!(targetFps > 0)) {
        throw new Error(`Target frame rate must be positive, got ${targetFps}`);
      }
      const frameMs = 1000 / targetFps;
      const wait = lastTick === null ? 0 : Math.max(0, frameMs - (now() - lastTick));
      if (wait > 0) {
        await sleep(wait);
      }
      lastTick = now();
    }
  };
}
