/**
 * Best-energy table used to prune dominated arrivals
 */

import { SearchState } from '../domain/types.js';
import { Grid } from '../state/grid.js';
import { stateKey } from '../state/state-key.js';

// Recorded energy for a state that has never been reached
const UNSEEN = -1;

/**
 * Maps each (row, col, mask) to the highest energy it has been reached with.
 *
 * An arrival with lower or equal energy than the recorded one can reach
 * nothing the recorded arrival cannot, so it is rejected. Every accepted
 * record strictly raises a value bounded by the maximum energy, which bounds
 * the search.
 */
export class DominanceTable {
  private grid: Grid;
  private best = new Map<bigint, number>();
  private accepted = 0;

  constructor(grid: Grid) {
    this.grid = grid;
  }

  /**
   * Record the arrival and return true if it beats the best energy seen for this state
   */
  consider(state: SearchState, energy: number): boolean {
    const key = stateKey(this.grid, state);
    const recorded = this.best.get(key) ?? UNSEEN;

    if (energy <= recorded) {
      return false;
    }

    this.best.set(key, energy);
    this.accepted++;
    return true;
  }

  /** Number of distinct states recorded */
  get size(): number {
    return this.best.size;
  }

  /** Number of accepted arrivals, including improvements of known states */
  get arrivalsAccepted(): number {
    return this.accepted;
  }
}
