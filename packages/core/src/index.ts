export * from './types.js';
export * from './utils/grid.js';
export * from './maze/maze-generator.js';
export * from './maze/random.js';
export * from './pathfinding/types.js';
export * from './pathfinding/frontier.js';
export * from './pathfinding/strategies.js';
export * from './pathfinding/path.js';
export * from './pathfinding/search-engine.js';
export * from './animation/types.js';
export * from './animation/frame-clock.js';
export * from './animation/visualizer.js';
