/**
 * Constants for the litter sweep planner
 */

import { CellKind, Direction, SolverOptions, TerrainSymbol } from './types.js';

// Returned when the collectibles cannot all be gathered
export const UNREACHABLE = -1;

export const SYMBOL_KINDS: Record<TerrainSymbol, CellKind> = {
  'S': 'START',
  '.': 'EMPTY',
  'X': 'OBSTACLE',
  'R': 'RECHARGE',
  'L': 'COLLECTIBLE',
};

// Expansion order: down, up, right, left
export const DIRECTIONS: readonly { direction: Direction; dRow: number; dCol: number }[] = [
  { direction: 'DOWN', dRow: 1, dCol: 0 },
  { direction: 'UP', dRow: -1, dCol: 0 },
  { direction: 'RIGHT', dRow: 0, dCol: 1 },
  { direction: 'LEFT', dRow: 0, dCol: -1 },
];

// Default solver options (no caps: the search is exhaustive)
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  maxIterations: Infinity,
  maxFrontier: Infinity,
};
