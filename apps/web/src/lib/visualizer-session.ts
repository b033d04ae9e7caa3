import { MazeVisualizer } from '@mazetrace/core';
import type { MazeVisualizerOptions } from '@mazetrace/core';

export interface VisualizerSessionHandlers {
  onStopped(): void;
  onError(error: unknown): void;
}

export interface VisualizerSession {
  visualizer: MazeVisualizer;
  // settles once the idle loop has exited and the handlers have run
  finished: Promise<void>;
  dispose(): void;
}

/**
 * Starts the idle loop of a new visualizer. After `dispose()` the loop is
 * stopped and `onStopped` no longer fires, so a remounted owner keeps its
 * state.
 */
export function startVisualizerSession(
  options: MazeVisualizerOptions,
  handlers: VisualizerSessionHandlers
): VisualizerSession {
  const visualizer = new MazeVisualizer(options);
  let active = true;

  const finished = visualizer.run().then(
    () => {
      if (active) handlers.onStopped();
    },
    (error: unknown) => handlers.onError(error)
  );

  return {
    visualizer,
    finished,
    dispose: () => {
      active = false;
      visualizer.stop();
    }
  };
}
