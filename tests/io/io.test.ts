/**
 * Tests for grid input parsing and solution formatting
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseGridArgument, parseEnergy } from '../../src/io/grid-input.js';
import {
  formatSolution,
  formatDirections,
  formatCompactSummary,
  formatSolutionJSON,
  formatGridSummary,
} from '../../src/io/solution-formatter.js';
import { solveDetailed } from '../../src/solver/solver.js';
import { createGrid, summarizeGrid } from '../../src/state/grid.js';
import { ConfigurationError } from '../../src/domain/errors.js';

describe('Grid Input', () => {
  it('should split rows on commas, slashes and newlines', () => {
    assert.deepStrictEqual(parseGridArgument('L.S,RXL'), ['L.S', 'RXL']);
    assert.deepStrictEqual(parseGridArgument('L.S/RXL'), ['L.S', 'RXL']);
    assert.deepStrictEqual(parseGridArgument('L.S\nRXL\n'), ['L.S', 'RXL']);
    assert.deepStrictEqual(parseGridArgument(' L.S , RXL '), ['L.S', 'RXL']);
  });

  it('should reject an argument with no rows', () => {
    assert.throws(
      () => parseGridArgument(',,'),
      (err: unknown) => err instanceof ConfigurationError && err.reason === 'EMPTY_GRID'
    );
  });

  it('should parse energy values', () => {
    assert.strictEqual(parseEnergy('5'), 5);
    assert.strictEqual(parseEnergy('0'), 0);
    assert.strictEqual(parseEnergy(' 12 '), 12);
  });

  it('should reject negative or fractional energy', () => {
    for (const text of ['-1', '2.5', 'abc', '']) {
      assert.throws(
        () => parseEnergy(text),
        (err: unknown) => err instanceof ConfigurationError && err.reason === 'INVALID_ENERGY',
        text
      );
    }
  });
});

describe('Solution Formatting', () => {
  const solution = solveDetailed(['L.S', 'RXL'], 5);

  it('should abbreviate directions', () => {
    assert.strictEqual(formatDirections(['DOWN', 'UP', 'LEFT', 'LEFT']), 'D U L L');
  });

  it('should format a found solution', () => {
    const lines = formatSolution(solution).split('\n');

    assert.strictEqual(lines[0], '=== SWEEP SOLUTION ===');
    assert.ok(lines.includes('Minimum moves: 4'));
    assert.ok(lines.includes('Moves: D U L L'));
    assert.ok(lines.includes('Nodes Explored: 9'));
    assert.ok(lines.includes('Arrivals Accepted: 11'));
  });

  it('should format an unreachable result', () => {
    const lines = formatSolution(solveDetailed(['SXL'], 3)).split('\n');

    assert.ok(lines.includes('Minimum moves: -1 (not every collectible can be reached)'));
  });

  it('should format an aborted search', () => {
    const lines = formatSolution(solveDetailed(['L.S', 'RXL'], 5, { maxIterations: 1 })).split('\n');

    assert.ok(lines.includes('Search aborted by maxIterations; result unknown'));
  });

  it('should format a compact summary', () => {
    assert.strictEqual(formatCompactSummary(solution), '✓ SOLVED | 4 moves | 2 collectibles | 9 nodes');
  });

  it('should format valid JSON', () => {
    const parsed: unknown = JSON.parse(formatSolutionJSON(solution));

    assert.deepStrictEqual(parsed, {
      status: 'FOUND',
      moves: 4,
      directions: ['DOWN', 'UP', 'LEFT', 'LEFT'],
      path: [
        { row: 0, col: 2 },
        { row: 1, col: 2 },
        { row: 0, col: 2 },
        { row: 0, col: 1 },
        { row: 0, col: 0 },
      ],
      collectibleCount: 2,
      maxEnergy: 5,
      stats: solution.stats,
    });
  });

  it('should format a grid summary', () => {
    const lines = formatGridSummary(summarizeGrid(createGrid(['SXL', 'X..']))).split('\n');

    assert.ok(lines.includes('Size: 2 x 3'));
    assert.ok(lines.includes('State space: 12'));
    assert.ok(lines.includes('  - (0, 2)'));
  });
});
