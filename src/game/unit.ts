import {checkUnitIndex} from './ints';
import {NUMERALS} from './iota';
import {Loc} from './loc';
import {ensureExhaustiveSwitch} from './utils';

/** The three ways of grouping nine cells of a Sudoku grid. */
export enum UnitKind {
  ROW = 'R',
  COLUMN = 'C',
  BOX = 'B',
}

/**
 * A row, column, or box of a Sudoku grid.  Units are numbered 1..=9 within
 * each kind, and so are the cells within a unit; boxes count left to right, top
 * to bottom.
 */
export interface Unit {
  readonly kind: UnitKind;
  readonly index: number;
}

function makeUnits(kind: UnitKind): readonly Unit[] {
  return NUMERALS.map(index => ({kind, index}));
}

/** The 9 rows, top to bottom. */
export const ROWS = makeUnits(UnitKind.ROW);
/** The 9 columns, left to right. */
export const COLUMNS = makeUnits(UnitKind.COLUMN);
/** The 9 boxes, in row-major order. */
export const BOXES = makeUnits(UnitKind.BOX);

/** All 27 units: the rows, then the columns, then the boxes. */
export const ALL_UNITS: readonly Unit[] = [...ROWS, ...COLUMNS, ...BOXES];

/** Returns the row with the given 1-based index. */
export function rowUnit(index: number): Unit {
  return ROWS[checkUnitIndex(index) - 1];
}

/** Returns the column with the given 1-based index. */
export function columnUnit(index: number): Unit {
  return COLUMNS[checkUnitIndex(index) - 1];
}

/** Returns the box with the given 1-based index. */
export function boxUnit(index: number): Unit {
  return BOXES[checkUnitIndex(index) - 1];
}

/**
 * Maps a position within a unit to the grid location it covers.
 *
 * @param unit The unit.
 * @param index The 1-based position within the unit, 1..=9.
 * @throws Error if `index` is out of range.
 */
export function unitLoc(unit: Unit, index: number): Loc {
  const i = checkUnitIndex(index) - 1;
  const kind = unit.kind;
  switch (kind) {
    case UnitKind.ROW:
      return Loc.of(unit.index - 1, i);
    case UnitKind.COLUMN:
      return Loc.of(i, unit.index - 1);
    case UnitKind.BOX: {
      const b = unit.index - 1;
      const boxRow = Math.floor(b / 3);
      const boxCol = b % 3;
      return Loc.of(boxRow * 3 + Math.floor(i / 3), boxCol * 3 + (i % 3));
    }
    default:
      return ensureExhaustiveSwitch(kind);
  }
}

const UNIT_LOCS = new Map<Unit, readonly Loc[]>(
  ALL_UNITS.map(unit => [unit, NUMERALS.map(i => unitLoc(unit, i))]),
);

/** Returns the 9 locations of a unit, in position order. */
export function unitLocs(unit: Unit): readonly Loc[] {
  return UNIT_LOCS.get(unit) ?? NUMERALS.map(i => unitLoc(unit, i));
}

/**
 * Returns the row, column, and box that contain the given location, in that
 * order.
 */
export function unitsCovering(loc: Loc): readonly [Unit, Unit, Unit] {
  return [ROWS[loc.row], COLUMNS[loc.col], BOXES[loc.box]];
}

/** A short name for a unit, such as `R3` for the third row. */
export function unitName(unit: Unit): string {
  return `${unit.kind}${unit.index}`;
}
