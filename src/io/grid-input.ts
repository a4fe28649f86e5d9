/**
 * Parse grid and energy values given on the command line
 */

import { ConfigurationError } from '../domain/errors.js';

/**
 * Split a grid argument into rows.
 * Rows may be separated by commas, slashes or newlines:
 * ```
 * L.S,RXL
 * L.S/RXL
 * ```
 */
export function parseGridArgument(text: string): string[] {
  const rows = text
    .split(/[,/\n]/)
    .map(row => row.trim())
    .filter(row => row.length > 0);

  if (rows.length === 0) {
    throw new ConfigurationError('EMPTY_GRID', 'Grid argument contains no rows');
  }

  return rows;
}

/**
 * Parse a non-negative integer energy value
 */
export function parseEnergy(text: string): number {
  if (!/^\d+$/.test(text.trim())) {
    throw new ConfigurationError(
      'INVALID_ENERGY',
      `Energy must be a non-negative integer, got '${text}'`
    );
  }
  return parseInt(text.trim(), 10);
}
