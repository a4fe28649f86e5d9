/**
 * Error types raised before or instead of a search result
 */

export type ConfigurationErrorReason =
  | 'EMPTY_GRID'
  | 'RAGGED_ROWS'
  | 'UNKNOWN_SYMBOL'
  | 'MISSING_START'
  | 'MULTIPLE_STARTS'
  | 'INVALID_ENERGY'
  | 'INVALID_ARGUMENT';

/**
 * Thrown when a grid or energy value cannot be searched: ragged rows, a
 * missing or duplicated start cell, an unknown symbol, and so on.
 *
 * @example
 * ```ts
 * try {
 *   solve(['S.', 'L'], 3);
 * } catch (err) {
 *   if (err instanceof ConfigurationError && err.reason === 'RAGGED_ROWS') {
 *     console.error(err.message);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
  readonly reason: ConfigurationErrorReason;

  constructor(reason: ConfigurationErrorReason, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.reason = reason;
  }
}

/**
 * Thrown by {@link solve} when a caller-imposed cap stops the search before
 * it could either find a plan or prove that none exists.
 */
export class SearchAbortedError extends Error {
  readonly limit: 'maxIterations' | 'maxFrontier';
  readonly value: number;

  constructor(limit: 'maxIterations' | 'maxFrontier', value: number) {
    super(`Search aborted: ${limit} limit of ${value} reached before the search completed.`);
    this.name = 'SearchAbortedError';
    this.limit = limit;
    this.value = value;
  }
}
