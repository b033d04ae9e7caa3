import type { InputEvent, InputSource, StrategyKey } from '@mazetrace/core';

const strategyByDigit: Record<string, StrategyKey> = {
  '1': 'bfs',
  '2': 'dfs',
  '3': 'dijkstra',
  '4': 'astar'
};

export function keyToInputEvent(key: string): InputEvent | null {
  const strategy = strategyByDigit[key];
  if (strategy) return { type: 'select', strategy };
  switch (key) {
    case 'Escape':
      return { type: 'quit' };
    case 'r':
    case 'R':
      return { type: 'regenerate' };
    case ' ':
    case 'Enter':
      return { type: 'run' };
    default:
      return null;
  }
}

interface KeyTarget {
  addEventListener(type: 'keydown', listener: (event: KeyboardEvent) => void): void;
  removeEventListener(type: 'keydown', listener: (event: KeyboardEvent) => void): void;
}

/** Queues key presses until the visualizer polls for them. */
export class KeyboardInput implements InputSource {
  #queue: InputEvent[] = [];

  handleKey(key: string): boolean {
    const event = keyToInputEvent(key);
    if (!event) return false;
    this.#queue.push(event);
    return true;
  }

  poll(): InputEvent[] {
    return this.#queue.splice(0);
  }

  attach(target: KeyTarget): () => void {
    const listener = (event: KeyboardEvent) => {
      if (event.repeat) return;
      if (this.handleKey(event.key)) event.preventDefault();
    };
    target.addEventListener('keydown', listener);
    return () => target.removeEventListener('keydown', listener);
  }
}
