import Fastify from 'fastify';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import {
  InvalidGridDimensionsError,
  cellKey,
  generateMaze,
  gridFromRows,
  gridToRows,
  isWithinBounds,
  runSearch,
  seededRandom,
  strategyKeys
} from '@mazetrace/core';
import type { Cell, GridModel, StrategyKey } from '@mazetrace/core';

const MAX_DIMENSION = 401;

const dimensionSchema = z.number().int().positive().max(MAX_DIMENSION);

const cellSchema = z.object({
  x: z.number().int(),
  y: z.number().int()
});

const generatedMazeSchema = z.object({
  width: dimensionSchema,
  height: dimensionSchema,
  seed: z.string().min(1).optional()
});

const mazeInputSchema = z.union([
  z.object({ rows: z.array(z.string().max(MAX_DIMENSION).regex(/^[#.]+$/)).min(1).max(MAX_DIMENSION) }),
  generatedMazeSchema
]);

const searchRequestSchema = z.object({
  strategy: z.enum(['bfs', 'dfs', 'dijkstra', 'astar']),
  maze: mazeInputSchema,
  start: cellSchema.optional(),
  end: cellSchema.optional()
});

export type MazeRequest = z.infer<typeof generatedMazeSchema>;
export type SearchRequest = z.infer<typeof searchRequestSchema>;

class OutOfBoundsError extends Error {}

function buildMaze(request: MazeRequest): { grid: GridModel; seed: string } {
  const seed = request.seed ?? nanoid(10);
  return { grid: generateMaze(request.width, request.height, { random: seededRandom(seed) }), seed };
}

function resolveGrid(request: SearchRequest): GridModel {
  const maze = request.maze;
  const grid = 'rows' in maze ? gridFromRows(maze.rows) : buildMaze(maze).grid;
  for (const [label, cell] of [['start', request.start], ['end', request.end]] as const) {
    if (cell && !isWithinBounds(grid, cell)) {
      throw new OutOfBoundsError(`${label} ${cellKey(cell)} lies outside the ${grid.width}x${grid.height} grid`);
    }
  }
  return grid;
}

const toPair = (cell: Cell): [number, number] => [cell.x, cell.y];

export interface CreateServerOptions {
  logger?: boolean;
}

export function createServer(options: CreateServerOptions = {}) {
  const app = Fastify({
    logger: options.logger ?? true
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof InvalidGridDimensionsError) {
      return reply.status(400).send({ error: 'invalid_grid_dimensions', message: error.message });
    }
    if (error instanceof OutOfBoundsError) {
      return reply.status(400).send({ error: 'out_of_bounds', message: error.message });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: 'invalid_request', message: error.message });
    }
    request.log.error(error);
    return reply.status(500).send({ error: 'internal_error' });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/strategies', async () => ({ strategies: strategyKeys }));

  app.post('/mazes', async (request, reply) => {
    const parsed = generatedMazeSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'invalid_request', issues: parsed.error.issues });
    }

    const { grid, seed } = buildMaze(parsed.data);
    request.log.info({ width: grid.width, height: grid.height, seed }, 'maze generated');
    return {
      width: grid.width,
      height: grid.height,
      seed,
      start: grid.start,
      end: grid.end,
      rows: gridToRows(grid)
    };
  });

  app.post('/searches', async (request, reply) => {
    const parsed = searchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'invalid_request', issues: parsed.error.issues });
    }

    const grid = resolveGrid(parsed.data);
    const strategy: StrategyKey = parsed.data.strategy;
    const result = runSearch(grid, strategy, parsed.data.start ?? grid.start, parsed.data.end ?? grid.end);
    request.log.info(
      { strategy, found: result.found, steps: result.steps, pathLength: result.path.length },
      'search completed'
    );

    return {
      strategy,
      found: result.found,
      steps: result.steps,
      visitedCount: result.visitOrder.length,
      visitOrder: result.visitOrder.map(toPair),
      path: result.path.map(toPair),
      pathLength: result.found ? result.path.length : null
    };
  });

  return app;
}

export async function startServer(port = Number(process.env.PORT) || 4000) {
  const app = createServer();
  try {
    await app.listen({ port, host: '0.0.0.0' });
    return app;
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
