import {Grid, ReadonlyGrid} from './grid';
import {GridString} from './types';

/**
 * Describes a Sudoku puzzle together with every completion of it.
 */
export class Sudoku {
  constructor(
    readonly clues: ReadonlyGrid,
    readonly solutions: readonly ReadonlyGrid[],
  ) {}

  /** Converts this puzzle into a plain object suitable for JSON. */
  toRecord(): SudokuRecord {
    return {
      clues: this.clues.toFlatString(),
      solutions: this.solutions.map(s => s.toFlatString()),
    };
  }

  /** Converts a record made by `toRecord` back into a Sudoku. */
  static fromRecord(record: SudokuRecord): Sudoku {
    return new Sudoku(
      Grid.fromFlatString(record.clues),
      record.solutions.map(s => Grid.fromFlatString(s)),
    );
  }
}

/** The plain-object form of a Sudoku. */
export declare interface SudokuRecord {
  /** The clues in GridString form. */
  clues: GridString;
  /** The solutions, each in GridString form. */
  solutions: GridString[];
}
