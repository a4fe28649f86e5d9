/**
 * Format solutions for human-readable output
 */

import { Direction, GridSummary, Solution } from '../domain/types.js';

const DIRECTION_LETTERS: Record<Direction, string> = {
  DOWN: 'D',
  UP: 'U',
  RIGHT: 'R',
  LEFT: 'L',
};

/**
 * Format a complete solution for console output
 */
export function formatSolution(solution: Solution): string {
  const lines: string[] = [];

  lines.push('=== SWEEP SOLUTION ===');
  lines.push('');
  lines.push(`Collectibles: ${solution.collectibleCount}`);
  lines.push(`Max energy: ${solution.maxEnergy}`);
  lines.push('');

  switch (solution.status) {
    case 'FOUND':
      lines.push(`Minimum moves: ${solution.moves}`);
      if (solution.directions.length > 0) {
        lines.push(`Moves: ${formatDirections(solution.directions)}`);
      }
      break;
    case 'EXHAUSTED':
      lines.push('Minimum moves: -1 (not every collectible can be reached)');
      break;
    case 'ABORTED':
      lines.push(`Search aborted by ${solution.abortedBy ?? 'a limit'}; result unknown`);
      break;
  }
  lines.push('');

  lines.push('=== SEARCH STATISTICS ===');
  lines.push(`Nodes Explored: ${solution.stats.nodesExplored}`);
  lines.push(`States Recorded: ${solution.stats.statesRecorded}`);
  lines.push(`Arrivals Accepted: ${solution.stats.arrivalsAccepted}`);
  lines.push(`Peak Frontier: ${solution.stats.peakFrontier}`);
  lines.push(`Time Taken: ${solution.stats.timeTaken}ms`);

  return lines.join('\n');
}

/**
 * Compact move string, e.g. "D U L L"
 */
export function formatDirections(directions: Direction[]): string {
  return directions.map(d => DIRECTION_LETTERS[d]).join(' ');
}

/**
 * Format a one-line solution summary
 */
export function formatCompactSummary(solution: Solution): string {
  const status = solution.status === 'FOUND' ? '✓ SOLVED' : solution.status === 'EXHAUSTED' ? '✗ UNREACHABLE' : '⚠ ABORTED';
  return `${status} | ${solution.moves} moves | ${solution.collectibleCount} collectibles | ${solution.stats.nodesExplored} nodes`;
}

/**
 * Format solution as JSON
 */
export function formatSolutionJSON(solution: Solution): string {
  return JSON.stringify({
    status: solution.status,
    moves: solution.moves,
    directions: solution.directions,
    path: solution.path,
    collectibleCount: solution.collectibleCount,
    maxEnergy: solution.maxEnergy,
    stats: solution.stats,
    abortedBy: solution.abortedBy,
  }, null, 2);
}

/**
 * Format a grid summary for the analyze command
 */
export function formatGridSummary(summary: GridSummary): string {
  const lines: string[] = [];

  lines.push('=== GRID ANALYSIS ===');
  lines.push('');
  lines.push(`Size: ${summary.rows} x ${summary.cols}`);
  lines.push(`Start: (${summary.start.row}, ${summary.start.col})`);
  lines.push(`Collectibles: ${summary.collectibles}`);
  lines.push(`Recharge cells: ${summary.recharges}`);
  lines.push(`Obstacles: ${summary.obstacles}`);
  lines.push(`State space: ${summary.stateSpace}`);

  if (summary.isolatedCollectibles.length > 0) {
    lines.push('');
    lines.push('⚠️  Collectibles walled off from the start:');
    for (const c of summary.isolatedCollectibles) {
      lines.push(`  - (${c.row}, ${c.col})`);
    }
  }

  return lines.join('\n');
}
