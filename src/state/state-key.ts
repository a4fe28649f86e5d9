/**
 * Collection masks and state keys for duplicate detection during search
 */

import { SearchState } from '../domain/types.js';
import { Grid } from './grid.js';

/**
 * Mask with one bit set per collectible.
 * Masks are bigints so any number of collectibles fits.
 */
export function fullMask(collectibleCount: number): bigint {
  return (1n << BigInt(collectibleCount)) - 1n;
}

export function withCollected(mask: bigint, index: number): bigint {
  return mask | (1n << BigInt(index));
}

export function hasCollected(mask: bigint, index: number): boolean {
  return (mask & (1n << BigInt(index))) !== 0n;
}

export function countCollected(mask: bigint): number {
  let count = 0;
  let rest = mask;
  while (rest !== 0n) {
    rest &= rest - 1n;
    count++;
  }
  return count;
}

/**
 * Encode a state as a unique integer: cell index in the high part, mask in the low part
 */
export function stateKey(grid: Grid, state: SearchState): bigint {
  const cellIndex = BigInt(state.row * grid.cols + state.col);
  return (cellIndex << BigInt(grid.collectibleCount)) | state.mask;
}
