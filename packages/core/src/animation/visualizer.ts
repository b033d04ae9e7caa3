import { nanoid } from 'nanoid';
import { pino } from 'pino';
import type { Logger } from 'pino';

import { generateMaze } from '../maze/maze-generator.js';
import type { RandomSource } from '../maze/random.js';
import { pathKeys, reconstructPath } from '../pathfinding/path.js';
import { searchSteps } from '../pathfinding/search-engine.js';
import type { CellKey, GridModel, StrategyKey } from '../types.js';
import type {
  Clock,
  FrameState,
  InputEvent,
  InputSource,
  Renderer,
  SearchRunSummary,
  StrategyAppearanceMap,
  VisualizerStatus
} from './types.js';

export type VisualizerLogger = Pick<Logger, 'info' | 'debug' | 'warn'>;

export interface MazeVisualizerOptions {
  width: number;
  height: number;
  fps: number;
  strategies: StrategyAppearanceMap;
  renderer: Renderer;
  clock: Clock;
  input?: InputSource;
  initialStrategy?: StrategyKey;
  random?: RandomSource;
  now?: () => number;
  logger?: VisualizerLogger;
}

interface ActiveRun {
  id: string;
  cancelled: boolean;
}

const NO_CELLS: ReadonlySet<CellKey> = new Set();

/**
 * Owns the maze, the selected strategy and the displayed result, and plays
 * a search back one expansion per frame.
 */
export class MazeVisualizer {
  #grid: GridModel;
  #strategy: StrategyKey;
  #path: ReadonlySet<CellKey> = NO_CELLS;
  #lastPathLength: number | null = null;
  #lastElapsedMs: number | null = null;
  #noPathFound = false;
  #activeRun: ActiveRun | null = null;
  #stopped = false;
  #deferred: InputEvent[] = [];

  readonly #width: number;
  readonly #height: number;
  readonly #fps: number;
  readonly #strategies: StrategyAppearanceMap;
  readonly #renderer: Renderer;
  readonly #clock: Clock;
  readonly #input: InputSource | undefined;
  readonly #random: RandomSource;
  readonly #now: () => number;
  readonly #logger: VisualizerLogger;

  constructor(options: MazeVisualizerOptions) {
    this.#width = options.width;
    this.#height = options.height;
    this.#fps = options.fps;
    this.#strategies = options.strategies;
    this.#renderer = options.renderer;
    this.#clock = options.clock;
    this.#input = options.input;
    this.#random = options.random ?? Math.random;
    this.#now = options.now ?? (() => performance.now());
    this.#logger = options.logger ?? pino({ level: 'silent' });
    this.#strategy = options.initialStrategy ?? 'bfs';
    this.#grid = generateMaze(this.#width, this.#height, { random: this.#random });
  }

  get grid(): GridModel {
    return this.#grid;
  }

  get strategy(): StrategyKey {
    return this.#strategy;
  }

  get path(): ReadonlySet<CellKey> {
    return this.#path;
  }

  get stopped(): boolean {
    return this.#stopped;
  }

  get status(): VisualizerStatus {
    return {
      strategy: this.#strategy,
      strategyLabel: this.#strategies[this.#strategy].label,
      searching: this.#activeRun !== null,
      lastPathLength: this.#lastPathLength,
      lastElapsedMs: this.#lastElapsedMs,
      noPathFound: this.#noPathFound
    };
  }

  regenerate(): void {
    const grid = generateMaze(this.#width, this.#height, { random: this.#random });
    this.#cancelActiveRun('regenerate');
    this.#grid = grid;
    this.#path = NO_CELLS;
    this.#lastPathLength = null;
    this.#lastElapsedMs = null;
    this.#noPathFound = false;
    this.#logger.debug({ width: grid.width, height: grid.height }, 'maze regenerated');
  }

  selectStrategy(strategy: StrategyKey): void {
    this.#cancelActiveRun('strategy changed');
    this.#strategy = strategy;
    this.#path = NO_CELLS;
  }

  /** External quit signal; unwinds any run at its next step. */
  stop(): void {
    this.#stopped = true;
    this.#cancelActiveRun('quit');
  }

  async dispatch(event: InputEvent): Promise<void> {
    switch (event.type) {
      case 'quit':
        this.stop();
        return;
      case 'select':
        this.selectStrategy(event.strategy);
        return;
      case 'regenerate':
        this.regenerate();
        return;
      case 'run':
        await this.runSearch();
        return;
    }
  }

  /**
   * Animates one search with the selected strategy. Resolves to `null` when
   * the run was cancelled before it finished.
   */
  async runSearch(): Promise<SearchRunSummary | null> {
    this.#cancelActiveRun('superseded');
    const run: ActiveRun = { id: `${this.#strategy}-${nanoid(8)}`, cancelled: false };
    this.#activeRun = run;

    const grid = this.#grid;
    const strategy = this.#strategy;
    const highlight = this.#strategies[strategy].color;
    this.#path = NO_CELLS;
    this.#logger.info({ runId: run.id, strategy }, 'search started');

    const startedAt = this.#now();
    const steps = searchSteps(grid, strategy);
    try {
      let next = steps.next();
      while (!next.done) {
        this.#renderer.drawFrame(this.#frame(next.value.visited, highlight));
        await this.#clock.tick(this.#fps);
        this.#collectInput();
        if (run.cancelled) {
          this.#logger.info({ runId: run.id, step: next.value.step }, 'search cancelled');
          return null;
        }
        next = steps.next();
      }

      const outcome = next.value;
      const path = reconstructPath(outcome.record, outcome.end);
      const elapsedMs = this.#now() - startedAt;

      this.#activeRun = null;
      this.#path = pathKeys(path);
      this.#noPathFound = !outcome.found;
      this.#lastPathLength = outcome.found ? path.length : null;
      this.#lastElapsedMs = outcome.found ? elapsedMs : null;
      this.#renderer.drawFrame(this.#frame(NO_CELLS, highlight));

      if (outcome.found) {
        this.#logger.info(
          { runId: run.id, strategy, steps: outcome.steps, pathLength: path.length, elapsedMs },
          'search completed'
        );
      } else {
        this.#logger.warn({ runId: run.id, strategy, steps: outcome.steps }, 'no path found');
      }

      return {
        runId: run.id,
        strategy,
        found: outcome.found,
        steps: outcome.steps,
        pathLength: this.#lastPathLength,
        elapsedMs,
        path
      };
    } finally {
      if (this.#activeRun === run) {
        this.#activeRun = null;
      }
    }
  }

  drawIdleFrame(): void {
    this.#renderer.drawFrame(this.#frame(NO_CELLS, this.#strategies[this.#strategy].color));
  }

  /**
   * Idle loop: draw, handle input, wait a frame. Returns once a quit event
   * arrives or `stop()` is called.
   */
  async run(): Promise<void> {
    while (!this.#stopped) {
      this.drawIdleFrame();
      const events = [...this.#deferred.splice(0), ...(this.#input?.poll() ?? [])];
      for (const event of events) {
        await this.dispatch(event);
        if (this.#stopped) break;
      }
      if (this.#stopped) break;
      await this.#clock.tick(this.#fps);
    }
  }

  // Only quit is honoured mid-run; everything else waits for the idle loop.
  #collectInput(): void {
    if (!this.#input) return;
    for (const event of this.#input.poll()) {
      if (event.type === 'quit') {
        this.stop();
      } else {
        this.#deferred.push(event);
      }
    }
  }

  #cancelActiveRun(reason: string): void {
    if (!this.#activeRun) return;
    this.#activeRun.cancelled = true;
    this.#logger.debug({ runId: this.#activeRun.id, reason }, 'cancelling search');
    this.#activeRun = null;
  }

  #frame(visited: ReadonlySet<CellKey>, highlight: string): FrameState {
    return {
      grid: this.#grid,
      visited,
      path: this.#path,
      highlight,
      start: this.#grid.start,
      end: this.#grid.end,
      status: this.status
    };
  }
}
