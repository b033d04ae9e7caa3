import { afterEach, describe, expect, it } from 'vitest';

import { createServer } from './index.js';

const corridor = ['.....', '####.', '####.', '####.', '####.'];

describe('service server', () => {
  const disposables: Array<() => Promise<void>> = [];

  afterEach(async () => {
    await Promise.all(disposables.map((dispose) => dispose()));
    disposables.length = 0;
  });

  const serve = () => {
    const app = createServer({ logger: false });
    disposables.push(() => app.close());
    return app;
  };

  it('returns a healthy status', async () => {
    const app = serve();

    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('lists the search strategies', async () => {
    const app = serve();

    const res = await app.inject({ method: 'GET', url: '/strategies' });
    expect(res.json()).toEqual({ strategies: ['bfs', 'dfs', 'dijkstra', 'astar'] });
  });

  it('generates reproducible mazes for a seed', async () => {
    const app = serve();

    const first = await app.inject({ method: 'POST', url: '/mazes', payload: { width: 3, height: 3, seed: 'fixed' } });
    const second = await app.inject({ method: 'POST', url: '/mazes', payload: { width: 3, height: 3, seed: 'fixed' } });
    expect(first.statusCode).toBe(200);

    const body = first.json();
    expect(body).toMatchObject({ width: 3, height: 3, seed: 'fixed', start: { x: 0, y: 0 }, end: { x: 2, y: 2 } });
    expect(body.rows).toHaveLength(3);
    expect(body.rows.join('').split('').filter((symbol: string) => symbol === '.')).toHaveLength(7);
    expect(second.json().rows).toEqual(body.rows);
  });

  it('assigns a seed when none is given', async () => {
    const app = serve();

    const res = await app.inject({ method: 'POST', url: '/mazes', payload: { width: 5, height: 5 } });
    expect(res.statusCode).toBe(200);
    expect(res.json().seed).toMatch(/^[\w-]{10}$/);
  });

  it('rejects invalid maze requests', async () => {
    const app = serve();

    const res = await app.inject({ method: 'POST', url: '/mazes', payload: { width: 0, height: 5 } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('invalid_request');
  });

  it('runs a search on supplied rows', async () => {
    const app = serve();

    const res = await app.inject({
      method: 'POST',
      url: '/searches',
      payload: { strategy: 'bfs', maze: { rows: corridor } }
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      strategy: 'bfs',
      found: true,
      steps: 8,
      visitedCount: 9,
      visitOrder: [
        [0, 0],
        [1, 0],
        [2, 0],
        [3, 0],
        [4, 0],
        [4, 1],
        [4, 2],
        [4, 3],
        [4, 4]
      ],
      path: [
        [1, 0],
        [2, 0],
        [3, 0],
        [4, 0],
        [4, 1],
        [4, 2],
        [4, 3],
        [4, 4]
      ],
      pathLength: 8
    });
  });

  it('reports an unreachable end as a result, not an error', async () => {
    const app = serve();

    const res = await app.inject({
      method: 'POST',
      url: '/searches',
      payload: { strategy: 'dijkstra', maze: { rows: ['..#', '..#', '##.'] } }
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ found: false, steps: 4, visitedCount: 4, path: [], pathLength: null });
  });

  it('searches a generated maze', async () => {
    const app = serve();

    const res = await app.inject({
      method: 'POST',
      url: '/searches',
      payload: { strategy: 'astar', maze: { width: 11, height: 11, seed: 'service' } }
    });
    const body = res.json();
    expect(body.found).toBe(true);
    expect(body.path[body.path.length - 1]).toEqual([10, 10]);
    expect(body.pathLength).toBe(body.path.length);
  });

  it('honours custom start and end cells', async () => {
    const app = serve();

    const res = await app.inject({
      method: 'POST',
      url: '/searches',
      payload: { strategy: 'dfs', maze: { rows: corridor }, start: { x: 4, y: 4 }, end: { x: 2, y: 0 } }
    });
    expect(res.json()).toMatchObject({
      found: true,
      path: [
        [4, 3],
        [4, 2],
        [4, 1],
        [4, 0],
        [3, 0],
        [2, 0]
      ],
      pathLength: 6
    });
  });

  it('maps grid errors to client errors', async () => {
    const app = serve();

    const ragged = await app.inject({
      method: 'POST',
      url: '/searches',
      payload: { strategy: 'bfs', maze: { rows: ['...', '..'] } }
    });
    expect(ragged.statusCode).toBe(400);
    expect(ragged.json().error).toBe('invalid_grid_dimensions');

    const outside = await app.inject({
      method: 'POST',
      url: '/searches',
      payload: { strategy: 'bfs', maze: { rows: corridor }, start: { x: 5, y: 5 } }
    });
    expect(outside.statusCode).toBe(400);
    expect(outside.json()).toEqual({ error: 'out_of_bounds', message: 'start 5,5 lies outside the 5x5 grid' });

    const unknown = await app.inject({
      method: 'POST',
      url: '/searches',
      payload: { strategy: 'greedy', maze: { rows: corridor } }
    });
    expect(unknown.statusCode).toBe(400);
    expect(unknown.json().error).toBe('invalid_request');
  });
});
