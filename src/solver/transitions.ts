/**
 * Generate the successor states reachable in one move
 */

import { SearchState, Transition } from '../domain/types.js';
import { DIRECTIONS } from '../domain/constants.js';
import { Grid, getCell } from '../state/grid.js';
import { withCollected } from '../state/state-key.js';

/**
 * Generate up to four transitions from a state, in DOWN, UP, RIGHT, LEFT order.
 *
 * Energy is decremented before the recharge override, so a move that would
 * take energy below zero is rejected even when it ends on a recharge cell.
 */
export function generateTransitions(
  grid: Grid,
  state: SearchState,
  energy: number,
  maxEnergy: number
): Transition[] {
  const transitions: Transition[] = [];

  for (const { direction, dRow, dCol } of DIRECTIONS) {
    const row = state.row + dRow;
    const col = state.col + dCol;

    const cell = getCell(grid, { row, col });
    if (cell === null || cell.kind === 'OBSTACLE') {
      continue;
    }

    let newEnergy = energy - 1;
    if (newEnergy < 0) {
      continue;
    }

    if (cell.kind === 'RECHARGE') {
      newEnergy = maxEnergy;
    }

    const mask = cell.kind === 'COLLECTIBLE'
      ? withCollected(state.mask, cell.index)
      : state.mask;

    transitions.push({
      direction,
      state: { row, col, mask },
      energy: newEnergy,
    });
  }

  return transitions;
}
