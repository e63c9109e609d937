import {checkIntRange, checkNumeral} from './ints';
import {Loc} from './loc';
import {GridString} from './types';
import {
  ALL_UNITS,
  Unit,
  unitLoc,
  unitLocs,
  unitName,
  unitsCovering,
} from './unit';
import {checkState} from './utils';

/**
 * A 9x9 grid of optional numerals in the range 1..=9: a Sudoku grid.
 *
 * Cells are write-once: a location that holds a numeral can't be reassigned.
 */
export class Grid {
  // The cells of the grid are either 0, meaning blank, or 1..=9, the numeral.
  private readonly array: Uint8Array;

  /** Duplicates a grid, or constructs an empty grid if no grid is supplied. */
  constructor(grid?: ReadonlyGrid) {
    this.array = grid ? new Uint8Array(grid.bytes) : new Uint8Array(81);
  }

  /**
   * Builds a grid from 9 rows of 9 values each, with 0 meaning blank.
   *
   * @throws Error if the rows aren't 9x9 or a value is outside 0..=9.
   */
  static fromRows(rows: ReadonlyArray<readonly number[]>): Grid {
    checkState(rows.length === 9, () => `Expected 9 rows, got ${rows.length}`);
    const grid = new Grid();
    rows.forEach((row, r) => {
      checkState(
        row.length === 9,
        () => `Expected 9 values in row ${r + 1}, got ${row.length}`,
      );
      row.forEach((num, c) => {
        grid.array[r * 9 + c] = checkIntRange(num, 0, 10);
      });
    });
    return grid;
  }

  /**
   * Parses the output of `toFlatString`.  Accepts `.` or `0` for blanks.
   *
   * @throws Error if the string isn't 81 blanks and numerals.
   */
  static fromFlatString(flat: string): Grid {
    checkState(
      /^[.0-9]{81}$/.test(flat),
      () => `Not a flat grid string: ${flat}`,
    );
    const grid = new Grid();
    for (let i = 0; i < 81; ++i) {
      const ch = flat.charAt(i);
      grid.array[i] = ch === '.' ? 0 : Number(ch);
    }
    return grid;
  }

  /**
   * Returns this grid's numeral at the given location, or 0 if the location is
   * blank.
   */
  get(loc: Loc): number {
    return this.array[loc.index];
  }

  /**
   * Assigns the given numeral to the given location.
   *
   * @throws Error if the location already holds a numeral, or if `num` is not
   *     a numeral.
   */
  set(loc: Loc, num: number): void {
    checkNumeral(num);
    const existing = this.array[loc.index];
    checkState(
      existing === 0,
      () => `Can't set ${loc} to ${num}: it already holds ${existing}`,
    );
    this.array[loc.index] = num;
  }

  /** Makes an independent copy of this grid. */
  clone(): Grid {
    return new Grid(this);
  }

  /** Returns a read/write view of one unit of this grid. */
  view(unit: Unit): UnitView {
    return new UnitView(this, unit);
  }

  /** Returns views of the row, column, and box containing a location. */
  unitsCovering(loc: Loc): [UnitView, UnitView, UnitView] {
    const [row, col, box] = unitsCovering(loc);
    return [this.view(row), this.view(col), this.view(box)];
  }

  /** Returns a read-only view of the array backing the grid. */
  get bytes(): Readonly<Uint8Array> {
    return this.array;
  }

  /** Returns the number of locations with an assigned numeral. */
  fillCount(): number {
    return this.array.reduce((count, num) => count + Number(!!num), 0);
  }

  /** Tells whether every location has a numeral. */
  isComplete(): boolean {
    return this.fillCount() === 81;
  }

  /**
   * Tells whether no row, column, or box repeats a numeral.  Blank locations
   * are ignored, so an incomplete grid can be valid.
   *
   * @throws Error if the backing array is malformed.
   */
  isValid(): boolean {
    checkState(
      this.array.length === 81,
      () => `Grid has ${this.array.length} cells`,
    );
    for (const num of this.array) checkIntRange(num, 0, 10);
    return ALL_UNITS.every(unit => this.view(unit).isValid());
  }

  /**
   * Returns 9 lines of 9 characters, with a space for each blank location,
   * separated by newlines.
   */
  toString(): string {
    const lines: string[] = [];
    for (let r = 0; r < 9; ++r) {
      let line = '';
      for (let c = 0; c < 9; ++c) {
        line += this.array[r * 9 + c] || ' ';
      }
      lines.push(line);
    }
    return lines.join('\n');
  }

  /** Returns an 81-character representation of this grid, with dots for blanks. */
  toFlatString(): GridString {
    return this.array.reduce(
      (flat, num) => flat + (num || '.'),
      '',
    ) as GridString;
  }
}

/** A Grid that you can't modify. */
export type ReadonlyGrid = Omit<Grid, 'set'>;

/**
 * A lens onto the 9 cells of one unit of a grid.  It owns no cells: reads and
 * writes go straight to the grid.
 */
export class UnitView implements Iterable<number> {
  constructor(
    private readonly grid: Grid,
    readonly unit: Unit,
  ) {}

  /** The grid location at the given 1-based position. */
  loc(index: number): Loc {
    return unitLoc(this.unit, index);
  }

  /** The numeral at the given 1-based position, or 0 for a blank. */
  get(index: number): number {
    return this.grid.get(this.loc(index));
  }

  /**
   * Assigns a numeral at the given 1-based position.
   *
   * @throws Error if the position already holds a numeral.
   */
  set(index: number, num: number): void {
    this.grid.set(this.loc(index), num);
  }

  *[Symbol.iterator](): Iterator<number> {
    for (const loc of unitLocs(this.unit)) {
      yield this.grid.get(loc);
    }
  }

  /** Tells whether no numeral appears more than once in this unit. */
  isValid(): boolean {
    const seen = new Set<number>();
    for (const num of this) {
      if (!num) continue;
      if (seen.has(num)) return false;
      seen.add(num);
    }
    return true;
  }

  /** The unit's values with spaces for blanks, prefixed by its name. */
  toString(): string {
    let values = '';
    for (const num of this) values += num || ' ';
    return `${unitName(this.unit)}(${values})`;
  }
}
