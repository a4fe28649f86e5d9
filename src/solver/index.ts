/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './transitions.js';
export * from './dominance-table.js';
export * from './bfs.js';
export * from './solver.js';
