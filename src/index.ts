/**
 * Litter Sweep Planner
 *
 * Finds the minimum number of grid moves needed to collect every piece of
 * litter under a rechargeable energy budget.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/grid.js';
export * from './state/state-key.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/grid-input.js';
export * from './io/solution-formatter.js';
