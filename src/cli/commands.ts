/**
 * Command-line argument parsing and command handlers
 */

import { ExpandedNode, SolverOptions } from '../domain/types.js';
import { ConfigurationError, SearchAbortedError } from '../domain/errors.js';
import { SweepPlanner } from '../solver/solver.js';
import { summarizeGrid } from '../state/grid.js';
import { parseEnergy, parseGridArgument } from '../io/grid-input.js';
import {
  formatSolution,
  formatCompactSummary,
  formatSolutionJSON,
  formatGridSummary,
} from '../io/solution-formatter.js';

export interface CLIOptions {
  command: 'solve' | 'analyze' | 'min-energy' | 'help';
  grid?: string;
  energy?: string;
  outputFormat: 'text' | 'json' | 'compact';
  maxIterations?: number;
  maxFrontier?: number;
  upTo: number;
  trace: boolean;
}

function parseCount(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new ConfigurationError('INVALID_ARGUMENT', `${flag} expects a non-negative integer`);
  }
  return parseInt(value, 10);
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    outputFormat: 'text',
    upTo: 100,
    trace: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case 'solve':
      case 'analyze':
      case 'min-energy':
        options.command = arg;
        break;

      case '-g':
      case '--grid':
        options.grid = args[++i];
        break;

      case '-e':
      case '--energy':
        options.energy = args[++i];
        break;

      case '-f':
      case '--format': {
        const format = args[++i];
        if (format !== 'text' && format !== 'json' && format !== 'compact') {
          throw new ConfigurationError('INVALID_ARGUMENT', `Unknown output format '${format}'`);
        }
        options.outputFormat = format;
        break;
      }

      case '--max-iterations':
        options.maxIterations = parseCount(arg, args[++i]);
        break;

      case '--max-frontier':
        options.maxFrontier = parseCount(arg, args[++i]);
        break;

      case '--up-to':
        options.upTo = parseCount(arg, args[++i]);
        break;

      case '--trace':
        options.trace = true;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;
    }
  }

  return options;
}

export function printHelp(): void {
  console.log(`
Litter Sweep Planner
====================

Finds the fewest moves needed to collect every piece of litter on a grid
when each move costs one unit of energy.

USAGE:
  litter-sweep <command> [options]

COMMANDS:
  solve        Compute the minimum number of moves
  analyze      Describe a grid without searching it
  min-energy   Find the smallest energy that makes the grid solvable
  help         Show this help message

OPTIONS:
  -g, --grid <rows>        Grid rows separated by ',' or '/'
  -e, --energy <n>         Maximum energy (required for solve)
  -f, --format <type>      Output format: text (default), json or compact
  --max-iterations <n>     Stop after expanding n states
  --max-frontier <n>       Stop when more than n states are queued
  --up-to <n>              Highest energy tried by min-energy (default: 100)
  --trace                  Print every expanded state to stderr
  -h, --help               Show help

SYMBOLS:
  S start   . floor   X obstacle   R recharge   L litter

EXAMPLES:
  litter-sweep solve --grid "L.S,RXL" --energy 5
  litter-sweep min-energy --grid "S...,.L.L,X..R" --up-to 20
`);
}

function traceLine(node: ExpandedNode): void {
  const { row, col, mask } = node.state;
  console.error(`[${row},${col}] mask: ${mask}, energy: ${node.energy}, moves: ${node.moves}`);
}

function requireGrid(options: CLIOptions): SweepPlanner {
  if (options.grid === undefined) {
    throw new ConfigurationError('INVALID_ARGUMENT', 'Missing --grid');
  }
  return new SweepPlanner(parseGridArgument(options.grid));
}

function runSolve(options: CLIOptions): number {
  const planner = requireGrid(options);

  if (options.energy === undefined) {
    throw new ConfigurationError('INVALID_ARGUMENT', 'Missing --energy');
  }
  const maxEnergy = parseEnergy(options.energy);

  const solverOptions: Partial<SolverOptions> = {};
  if (options.maxIterations !== undefined) solverOptions.maxIterations = options.maxIterations;
  if (options.maxFrontier !== undefined) solverOptions.maxFrontier = options.maxFrontier;
  if (options.trace) solverOptions.onExpand = traceLine;

  const solution = planner.plan(maxEnergy, solverOptions);

  switch (options.outputFormat) {
    case 'json':
      console.log(formatSolutionJSON(solution));
      break;
    case 'compact':
      console.log(formatCompactSummary(solution));
      break;
    case 'text':
      console.log(formatSolution(solution));
      break;
  }

  return solution.status === 'ABORTED' ? 2 : 0;
}

function runAnalyze(options: CLIOptions): number {
  const planner = requireGrid(options);
  const summary = summarizeGrid(planner.grid);

  if (options.outputFormat === 'json') {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(formatGridSummary(summary));
  }
  return 0;
}

function runMinEnergy(options: CLIOptions): number {
  const planner = requireGrid(options);
  const energy = planner.minimumEnergy(options.upTo);

  if (energy === null) {
    console.log(`No energy up to ${options.upTo} collects every piece of litter`);
  } else {
    console.log(`Minimum energy: ${energy}`);
  }
  return 0;
}

/**
 * Run a parsed command and return the process exit code
 */
export function runCommand(options: CLIOptions): number {
  try {
    switch (options.command) {
      case 'solve':
        return runSolve(options);
      case 'analyze':
        return runAnalyze(options);
      case 'min-energy':
        return runMinEnergy(options);
      case 'help':
        printHelp();
        return 0;
    }
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof SearchAbortedError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
