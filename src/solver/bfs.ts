/**
 * Breadth-first sweep over (position, energy, collection mask) states
 */

import { SearchStatus, SolverOptions, Solution, SearchStats } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS, UNREACHABLE } from '../domain/constants.js';
import { Grid, getCollectibleIndex } from '../state/grid.js';
import { fullMask, withCollected } from '../state/state-key.js';
import { DominanceTable } from './dominance-table.js';
import { FifoQueue, SearchNode, createSearchNode, extractPath } from './search-node.js';
import { generateTransitions } from './transitions.js';

/**
 * Find the fewest moves that collect every collectible.
 *
 * Every child is exactly one move deeper than its parent and the frontier is
 * FIFO, so nodes leave the queue in non-decreasing move order and the first
 * popped node holding the full mask is optimal. The dominance table only
 * decides which children are queued.
 */
export function breadthFirstSweep(
  grid: Grid,
  maxEnergy: number,
  options: Partial<SolverOptions> = {}
): Solution {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  const startTime = Date.now();

  const table = new DominanceTable(grid);
  const frontier = new FifoQueue<SearchNode>();
  const stats: SearchStats = {
    nodesExplored: 0,
    statesRecorded: 0,
    arrivalsAccepted: 0,
    peakFrontier: 0,
    timeTaken: 0,
  };

  const finish = (status: SearchStatus, node: SearchNode | null): Solution => {
    stats.statesRecorded = table.size;
    stats.arrivalsAccepted = table.arrivalsAccepted;
    stats.timeTaken = Date.now() - startTime;
    const { directions, path } = node ? extractPath(node) : { directions: [], path: [] };

    return {
      status,
      moves: node ? node.moves : UNREACHABLE,
      directions,
      path,
      collectibleCount: grid.collectibleCount,
      maxEnergy,
      stats,
    };
  };

  const startIndex = getCollectibleIndex(grid, grid.start);
  const initialMask = startIndex === null ? 0n : withCollected(0n, startIndex);
  const root = createSearchNode(
    { row: grid.start.row, col: grid.start.col, mask: initialMask },
    maxEnergy,
    null,
    null
  );

  if (grid.collectibleCount === 0) {
    return finish('FOUND', root);
  }

  const goalMask = fullMask(grid.collectibleCount);

  table.consider(root.state, root.energy);
  frontier.push(root);
  stats.peakFrontier = 1;

  while (!frontier.isEmpty()) {
    if (stats.nodesExplored >= opts.maxIterations) {
      return { ...finish('ABORTED', null), abortedBy: 'maxIterations' };
    }

    const current = frontier.pop();
    if (current === undefined) break;
    stats.nodesExplored++;

    opts.onExpand?.({ state: current.state, energy: current.energy, moves: current.moves });

    if (current.state.mask === goalMask) {
      return finish('FOUND', current);
    }

    for (const transition of generateTransitions(grid, current.state, current.energy, maxEnergy)) {
      if (!table.consider(transition.state, transition.energy)) {
        continue;
      }

      if (frontier.size() >= opts.maxFrontier) {
        return { ...finish('ABORTED', null), abortedBy: 'maxFrontier' };
      }

      frontier.push(createSearchNode(transition.state, transition.energy, current, transition.direction));
      stats.peakFrontier = Math.max(stats.peakFrontier, frontier.size());
    }
  }

  return finish('EXHAUSTED', null);
}
