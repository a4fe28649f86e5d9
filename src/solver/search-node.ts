/**
 * Frontier entries and FIFO queue for breadth-first search
 */

import { Coord, Direction, SearchState } from '../domain/types.js';

export interface SearchNode {
  state: SearchState;
  energy: number;    // energy on arrival
  moves: number;     // moves from the start
  parent: SearchNode | null;
  direction: Direction | null;
}

/**
 * Create a frontier entry one move after its parent (or the root when parent is null)
 */
export function createSearchNode(
  state: SearchState,
  energy: number,
  parent: SearchNode | null,
  direction: Direction | null
): SearchNode {
  return {
    state,
    energy,
    moves: parent ? parent.moves + 1 : 0,
    parent,
    direction,
  };
}

/**
 * Extract the moves and visited cells from root to this node
 */
export function extractPath(node: SearchNode): { directions: Direction[]; path: Coord[] } {
  const directions: Direction[] = [];
  const path: Coord[] = [];
  let current: SearchNode | null = node;

  while (current !== null) {
    path.unshift({ row: current.state.row, col: current.state.col });
    if (current.direction !== null) {
      directions.unshift(current.direction);
    }
    current = current.parent;
  }

  return { directions, path };
}

/**
 * First-in-first-out queue for the BFS frontier
 */
export class FifoQueue<T> {
  private items: T[] = [];
  private head = 0;

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const result = this.items[this.head];
    this.head++;

    // Drop the consumed prefix once it dominates the backing array
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return result;
  }

  isEmpty(): boolean {
    return this.head >= this.items.length;
  }

  size(): number {
    return this.items.length - this.head;
  }
}
