import {ReadonlyGrid} from '../game/grid';
import {Sudoku} from '../game/sudoku';
import {ensureExhaustiveSwitch} from '../game/utils';
import {OutputFormat} from './prefs';

/** The line printed between consecutive solutions in grid format. */
export const SOLUTION_SEPARATOR = '-'.repeat(9);

/** Renders a grid as 9 lines of 9 characters, with spaces for blanks. */
export function renderGrid(grid: ReadonlyGrid): string[] {
  return grid.toString().split('\n');
}

/**
 * Renders a puzzle's solutions as lines of output.  In grid format the
 * solutions are separated by a line of dashes, and in flat format each is one
 * line; both produce nothing when there are no solutions.  JSON format always
 * produces a single line holding the puzzle's record.
 */
export function renderSolutions(
  sudoku: Sudoku,
  format: OutputFormat,
): string[] {
  switch (format) {
    case 'grid':
      return sudoku.solutions.flatMap((grid, i) =>
        i ? [SOLUTION_SEPARATOR, ...renderGrid(grid)] : renderGrid(grid),
      );
    case 'flat':
      return sudoku.solutions.map(grid => grid.toFlatString());
    case 'json':
      return [JSON.stringify(sudoku.toRecord())];
    default:
      return ensureExhaustiveSwitch(format);
  }
}
