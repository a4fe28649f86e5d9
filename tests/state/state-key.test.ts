/**
 * Tests for collection masks and state keys
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { fullMask, withCollected, hasCollected, countCollected, stateKey } from '../../src/state/state-key.js';
import { createGrid } from '../../src/state/grid.js';

describe('Collection Masks', () => {
  it('should build the full mask', () => {
    assert.strictEqual(fullMask(0), 0n);
    assert.strictEqual(fullMask(3), 7n);
    assert.strictEqual(fullMask(31), 2147483647n);
    assert.strictEqual(fullMask(64), 18446744073709551615n);
  });

  it('should set bits idempotently', () => {
    assert.strictEqual(withCollected(0n, 2), 4n);
    assert.strictEqual(withCollected(4n, 2), 4n);
    assert.strictEqual(withCollected(4n, 0), 5n);
    assert.strictEqual(withCollected(0n, 40), 1099511627776n);
  });

  it('should test and count bits', () => {
    assert.strictEqual(hasCollected(5n, 0), true);
    assert.strictEqual(hasCollected(5n, 1), false);
    assert.strictEqual(hasCollected(1n << 35n, 35), true);
    assert.strictEqual(countCollected(0b1011n), 3);
    assert.strictEqual(countCollected(0n), 0);
    assert.strictEqual(countCollected(fullMask(40)), 40);
  });
});

describe('State Keys', () => {
  const grid = createGrid(['L.S', 'RXL']);

  it('should place the mask below the cell index', () => {
    assert.strictEqual(stateKey(grid, { row: 0, col: 0, mask: 0n }), 0n);
    assert.strictEqual(stateKey(grid, { row: 1, col: 2, mask: 3n }), 23n);
  });

  it('should give every state a distinct key', () => {
    const keys = new Set<bigint>();
    for (let row = 0; row < grid.rows; row++) {
      for (let col = 0; col < grid.cols; col++) {
        for (let mask = 0n; mask <= fullMask(grid.collectibleCount); mask++) {
          keys.add(stateKey(grid, { row, col, mask }));
        }
      }
    }
    assert.strictEqual(keys.size, 24);
  });

  it('should stay exact beyond 53 bits', () => {
    const wide = createGrid(['S' + 'L'.repeat(60)]);
    const last = { row: 0, col: 60, mask: fullMask(60) };
    const sibling = { row: 0, col: 60, mask: fullMask(60) - 1n };

    assert.notStrictEqual(stateKey(wide, last), stateKey(wide, sibling));
    assert.strictEqual(stateKey(wide, last), (60n << 60n) | fullMask(60));
  });
});
