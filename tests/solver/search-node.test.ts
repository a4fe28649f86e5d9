/**
 * Tests for frontier nodes and the FIFO queue
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { FifoQueue, createSearchNode, extractPath } from '../../src/solver/search-node.js';

describe('FIFO Queue', () => {
  it('should pop in insertion order', () => {
    const queue = new FifoQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);

    assert.strictEqual(queue.size(), 3);
    assert.strictEqual(queue.pop(), 1);
    assert.strictEqual(queue.pop(), 2);
    assert.strictEqual(queue.size(), 1);
  });

  it('should return undefined when empty', () => {
    const queue = new FifoQueue<string>();

    assert.strictEqual(queue.isEmpty(), true);
    assert.strictEqual(queue.pop(), undefined);
    assert.strictEqual(queue.size(), 0);
  });

  it('should keep order across many interleaved operations', () => {
    const queue = new FifoQueue<number>();
    const popped: number[] = [];

    for (let i = 0; i < 5000; i++) {
      queue.push(i);
      if (i % 2 === 1) {
        const value = queue.pop();
        if (value !== undefined) popped.push(value);
      }
    }
    while (!queue.isEmpty()) {
      const value = queue.pop();
      if (value !== undefined) popped.push(value);
    }

    assert.strictEqual(popped.length, 5000);
    assert.ok(popped.every((value, i) => value === i));
  });
});

describe('Search Nodes', () => {
  it('should count moves from the root', () => {
    const root = createSearchNode({ row: 0, col: 2, mask: 0n }, 5, null, null);
    const child = createSearchNode({ row: 1, col: 2, mask: 2n }, 4, root, 'DOWN');

    assert.strictEqual(root.moves, 0);
    assert.strictEqual(child.moves, 1);
  });

  it('should extract directions and visited cells', () => {
    const root = createSearchNode({ row: 0, col: 2, mask: 0n }, 5, null, null);
    const a = createSearchNode({ row: 1, col: 2, mask: 2n }, 4, root, 'DOWN');
    const b = createSearchNode({ row: 0, col: 2, mask: 2n }, 3, a, 'UP');

    assert.deepStrictEqual(extractPath(b), {
      directions: ['DOWN', 'UP'],
      path: [{ row: 0, col: 2 }, { row: 1, col: 2 }, { row: 0, col: 2 }],
    });
  });
});
