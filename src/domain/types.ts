/**
 * Core type definitions for the litter sweep planner
 */

// Terrain symbol as written in a grid row
export type TerrainSymbol = 'S' | '.' | 'X' | 'R' | 'L';

// Cell classification
export type Cell =
  | { kind: 'EMPTY' }
  | { kind: 'START' }
  | { kind: 'OBSTACLE' }
  | { kind: 'RECHARGE' }
  | { kind: 'COLLECTIBLE'; index: number };

export type CellKind = Cell['kind'];

// Position on the grid, zero-based
export interface Coord {
  row: number;
  col: number;
}

// Orthogonal move
export type Direction = 'DOWN' | 'UP' | 'RIGHT' | 'LEFT';

// Position plus collection progress
export interface SearchState {
  row: number;
  col: number;
  mask: bigint;
}

// Candidate successor produced by the transition function
export interface Transition {
  direction: Direction;
  state: SearchState;
  energy: number;
}

export type SearchStatus = 'FOUND' | 'EXHAUSTED' | 'ABORTED';

// Search statistics
export interface SearchStats {
  nodesExplored: number;
  statesRecorded: number;
  arrivalsAccepted: number;
  peakFrontier: number;
  timeTaken: number;
}

// Solver options
export interface SolverOptions {
  maxIterations: number;
  maxFrontier: number;
  onExpand?: (node: ExpandedNode) => void;
}

// What the onExpand hook sees for each popped frontier entry
export interface ExpandedNode {
  state: SearchState;
  energy: number;
  moves: number;
}

// Complete search result
export interface Solution {
  status: SearchStatus;
  moves: number;
  directions: Direction[];
  path: Coord[];
  collectibleCount: number;
  maxEnergy: number;
  stats: SearchStats;
  abortedBy?: 'maxIterations' | 'maxFrontier';
}

// Grid overview for the analyze command
export interface GridSummary {
  rows: number;
  cols: number;
  start: Coord;
  collectibles: number;
  recharges: number;
  obstacles: number;
  stateSpace: number;
  isolatedCollectibles: Coord[];
}

export function coordKey(c: Coord): string {
  return `${c.row},${c.col}`;
}
