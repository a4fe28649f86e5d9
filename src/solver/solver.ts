/**
 * Main solver interface
 */

import { Solution, SolverOptions } from '../domain/types.js';
import { UNREACHABLE } from '../domain/constants.js';
import { ConfigurationError, SearchAbortedError } from '../domain/errors.js';
import { Grid, createGrid } from '../state/grid.js';
import { breadthFirstSweep } from './bfs.js';

export function assertValidEnergy(maxEnergy: number): void {
  if (!Number.isSafeInteger(maxEnergy) || maxEnergy < 0) {
    throw new ConfigurationError(
      'INVALID_ENERGY',
      `Maximum energy must be a non-negative integer, got ${maxEnergy}`
    );
  }
}

/**
 * Planner bound to one parsed grid, for repeated queries at different energies
 */
export class SweepPlanner {
  readonly grid: Grid;

  constructor(gridRows: readonly string[]) {
    this.grid = createGrid(gridRows);
  }

  /**
   * Full search result, including the move sequence and statistics.
   * A grid with nothing to collect is solved in zero moves whatever the energy.
   */
  plan(maxEnergy: number, options: Partial<SolverOptions> = {}): Solution {
    if (this.grid.collectibleCount > 0) {
      assertValidEnergy(maxEnergy);
    }
    return breadthFirstSweep(this.grid, maxEnergy, options);
  }

  /**
   * Minimal move count, or -1 when the collectibles cannot all be gathered
   */
  minMoves(maxEnergy: number, options: Partial<SolverOptions> = {}): number {
    const solution = this.plan(maxEnergy, options);
    if (solution.status === 'ABORTED' && solution.abortedBy !== undefined) {
      const limit = solution.abortedBy === 'maxIterations' ? options.maxIterations : options.maxFrontier;
      throw new SearchAbortedError(solution.abortedBy, limit ?? Infinity);
    }
    return solution.moves;
  }

  /**
   * Smallest energy in [0, upTo] that makes the grid solvable, or null.
   * More energy never hurts, so the first solvable value is the minimum.
   */
  minimumEnergy(upTo: number): number | null {
    assertValidEnergy(upTo);
    for (let energy = 0; energy <= upTo; energy++) {
      if (this.minMoves(energy) !== UNREACHABLE) {
        return energy;
      }
    }
    return null;
  }
}

/**
 * Minimal number of moves to collect every 'L' in the grid, or -1 if impossible
 */
export function solve(
  gridRows: readonly string[],
  maxEnergy: number,
  options: Partial<SolverOptions> = {}
): number {
  return new SweepPlanner(gridRows).minMoves(maxEnergy, options);
}

/**
 * Like {@link solve}, returning the full search result
 */
export function solveDetailed(
  gridRows: readonly string[],
  maxEnergy: number,
  options: Partial<SolverOptions> = {}
): Solution {
  return new SweepPlanner(gridRows).plan(maxEnergy, options);
}
