/**
 * Grid model: parsing, validation and cell lookup
 */

import { Cell, Coord, GridSummary, TerrainSymbol, coordKey } from '../domain/types.js';
import { DIRECTIONS, SYMBOL_KINDS } from '../domain/constants.js';
import { ConfigurationError } from '../domain/errors.js';

export interface Grid {
  readonly rows: number;
  readonly cols: number;
  readonly cells: readonly (readonly Cell[])[];
  readonly start: Coord;
  readonly collectibles: readonly Coord[];
  readonly collectibleCount: number;
}

function isTerrainSymbol(symbol: string): symbol is TerrainSymbol {
  return Object.prototype.hasOwnProperty.call(SYMBOL_KINDS, symbol);
}

/**
 * Parse raw terrain rows into a validated, frozen grid.
 * Collectibles are indexed in row-major discovery order.
 */
export function createGrid(rows: readonly string[]): Grid {
  if (rows.length === 0) {
    throw new ConfigurationError('EMPTY_GRID', 'Grid has no rows');
  }

  const cols = rows[0].length;
  if (cols === 0) {
    throw new ConfigurationError('EMPTY_GRID', 'Grid rows are empty');
  }

  const cells: Cell[][] = [];
  const collectibles: Coord[] = [];
  let start: Coord | null = null;

  for (let row = 0; row < rows.length; row++) {
    const line = rows[row];
    if (line.length !== cols) {
      throw new ConfigurationError(
        'RAGGED_ROWS',
        `Row ${row} has ${line.length} columns, expected ${cols}`
      );
    }

    const cellRow: Cell[] = [];
    for (let col = 0; col < cols; col++) {
      const symbol = line[col];
      if (!isTerrainSymbol(symbol)) {
        throw new ConfigurationError(
          'UNKNOWN_SYMBOL',
          `Unknown symbol '${symbol}' at (${row}, ${col})`
        );
      }

      switch (SYMBOL_KINDS[symbol]) {
        case 'START':
          if (start !== null) {
            throw new ConfigurationError(
              'MULTIPLE_STARTS',
              `Second start cell at (${row}, ${col}); first at (${start.row}, ${start.col})`
            );
          }
          start = { row, col };
          cellRow.push(Object.freeze({ kind: 'START' }));
          break;
        case 'COLLECTIBLE':
          cellRow.push(Object.freeze({ kind: 'COLLECTIBLE', index: collectibles.length }));
          collectibles.push(Object.freeze({ row, col }));
          break;
        case 'OBSTACLE':
          cellRow.push(Object.freeze({ kind: 'OBSTACLE' }));
          break;
        case 'RECHARGE':
          cellRow.push(Object.freeze({ kind: 'RECHARGE' }));
          break;
        case 'EMPTY':
          cellRow.push(Object.freeze({ kind: 'EMPTY' }));
          break;
      }
    }
    cells.push(cellRow);
  }

  if (start === null) {
    throw new ConfigurationError('MISSING_START', "Grid has no start cell 'S'");
  }

  return Object.freeze({
    rows: rows.length,
    cols,
    cells: Object.freeze(cells.map(r => Object.freeze(r))),
    start: Object.freeze(start),
    collectibles: Object.freeze(collectibles),
    collectibleCount: collectibles.length,
  });
}

export function isInBounds(grid: Grid, coord: Coord): boolean {
  return coord.row >= 0 && coord.row < grid.rows && coord.col >= 0 && coord.col < grid.cols;
}

/**
 * Get the cell at a coordinate, or null outside the grid
 */
export function getCell(grid: Grid, coord: Coord): Cell | null {
  if (!isInBounds(grid, coord)) {
    return null;
  }
  return grid.cells[coord.row][coord.col];
}

export function getCollectibleIndex(grid: Grid, coord: Coord): number | null {
  const cell = getCell(grid, coord);
  return cell !== null && cell.kind === 'COLLECTIBLE' ? cell.index : null;
}

export function countCells(grid: Grid, kind: Cell['kind']): number {
  let count = 0;
  for (const row of grid.cells) {
    for (const cell of row) {
      if (cell.kind === kind) count++;
    }
  }
  return count;
}

/**
 * Cells reachable from the start when energy is ignored
 */
export function floodFromStart(grid: Grid): Set<string> {
  const seen = new Set<string>([coordKey(grid.start)]);
  const stack: Coord[] = [grid.start];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    for (const { dRow, dCol } of DIRECTIONS) {
      const next = { row: current.row + dRow, col: current.col + dCol };
      const cell = getCell(grid, next);
      if (cell === null || cell.kind === 'OBSTACLE') continue;

      const key = coordKey(next);
      if (!seen.has(key)) {
        seen.add(key);
        stack.push(next);
      }
    }
  }

  return seen;
}

/**
 * Summarize a grid without searching it
 */
export function summarizeGrid(grid: Grid): GridSummary {
  const reachable = floodFromStart(grid);

  return {
    rows: grid.rows,
    cols: grid.cols,
    start: { ...grid.start },
    collectibles: grid.collectibleCount,
    recharges: countCells(grid, 'RECHARGE'),
    obstacles: countCells(grid, 'OBSTACLE'),
    stateSpace: grid.rows * grid.cols * 2 ** grid.collectibleCount,
    isolatedCollectibles: grid.collectibles
      .filter(c => !reachable.has(coordKey(c)))
      .map(c => ({ ...c })),
  };
}
