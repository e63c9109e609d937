import {MINIMAL_CLUES, UNIQUE_SOLUTION} from './fake-data';
import {Grid} from './grid';
import {Loc} from './loc';
import {boxUnit, columnUnit, rowUnit, Unit} from './unit';

describe('Grid', () => {
  it('starts out blank', () => {
    const grid = new Grid();
    expect(grid.fillCount()).toBe(0);
    expect(grid.get(Loc.of(40))).toBe(0);
    expect(grid.isValid()).toBe(true);
    expect(grid.isComplete()).toBe(false);
  });

  it('refuses to overwrite a filled location', () => {
    const grid = new Grid();
    grid.set(Loc.of(2, 3), 5);
    expect(() => grid.set(Loc.of(2, 3), 6)).toThrow(
      "Can't set (3, 4) to 6: it already holds 5",
    );
    expect(grid.get(Loc.of(2, 3))).toBe(5);
  });

  it('refuses values that are not numerals', () => {
    const grid = new Grid();
    expect(() => grid.set(Loc.of(0), 0)).toThrow('0 out of range 1..10');
    expect(() => grid.set(Loc.of(0), 10)).toThrow('10 out of range 1..10');
  });

  it('clones independently', () => {
    const grid = Grid.fromFlatString(MINIMAL_CLUES);
    const clone = grid.clone();
    clone.set(Loc.of(0), 9);
    expect(grid.get(Loc.of(0))).toBe(0);
    expect(clone.get(Loc.of(0))).toBe(9);
    expect(grid.toFlatString()).toBe(MINIMAL_CLUES);
  });

  it('counts filled locations', () => {
    expect(Grid.fromFlatString(MINIMAL_CLUES).fillCount()).toBe(21);
    const solved = Grid.fromFlatString(UNIQUE_SOLUTION);
    expect(solved.fillCount()).toBe(81);
    expect(solved.isComplete()).toBe(true);
    expect(solved.isValid()).toBe(true);
  });

  it.each<[string, Unit, Loc]>([
    ['row', rowUnit(2), Loc.of(1, 8)],
    ['column', columnUnit(2), Loc.of(8, 1)],
    ['box', boxUnit(1), Loc.of(2, 2)],
  ])('is invalid when a %s repeats a numeral', (_kind, unit, loc) => {
    const grid = new Grid();
    grid.set(Loc.of(1, 1), 7);
    grid.set(loc, 7);
    expect(grid.view(unit).isValid()).toBe(false);
    expect(grid.isValid()).toBe(false);
  });

  it('builds from rows', () => {
    const rows = Array.from({length: 9}, (_, r) =>
      Array.from({length: 9}, (_, c) => (r === c ? r + 1 : 0)),
    );
    const grid = Grid.fromRows(rows);
    expect(grid.get(Loc.of(4, 4))).toBe(5);
    expect(grid.fillCount()).toBe(9);
  });

  it('rejects malformed rows', () => {
    expect(() => Grid.fromRows([[1, 2, 3]])).toThrow('Expected 9 rows, got 1');
    const rows = Array.from({length: 9}, () => Array<number>(9).fill(0));
    rows[3] = [0, 0, 0, 0, 0, 0, 0, 0, 10];
    expect(() => Grid.fromRows(rows)).toThrow('10 out of range 0..10');
    rows[3] = [0];
    expect(() => Grid.fromRows(rows)).toThrow(
      'Expected 9 values in row 4, got 1',
    );
  });

  it('round-trips flat strings', () => {
    expect(Grid.fromFlatString(MINIMAL_CLUES).toFlatString()).toBe(
      MINIMAL_CLUES,
    );
    expect(() => Grid.fromFlatString('123')).toThrow('Not a flat grid string');
  });

  it('renders blanks as spaces', () => {
    const grid = new Grid();
    grid.set(Loc.of(0, 0), 1);
    grid.set(Loc.of(8, 8), 9);
    const lines = grid.toString().split('\n');
    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe('1        ');
    expect(lines[4]).toBe('         ');
    expect(lines[8]).toBe('        9');
  });

  it('compares by contents', () => {
    const a = Grid.fromFlatString(UNIQUE_SOLUTION);
    const b = Grid.fromFlatString(UNIQUE_SOLUTION);
    expect(a).not.toBe(b);
    expect(a.bytes).toEqual(b.bytes);
    expect(a.bytes).not.toEqual(Grid.fromFlatString(MINIMAL_CLUES).bytes);
  });
});

describe('UnitView', () => {
  it('reads and writes through to the grid', () => {
    const grid = new Grid();
    const box = grid.view(boxUnit(5));
    box.set(9, 4);
    expect(grid.get(Loc.of(5, 5))).toBe(4);
    expect(box.get(9)).toBe(4);
    expect([...box]).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 4]);
    expect(String(box)).toBe('B5(        4)');
  });

  it('enforces write-once through the grid', () => {
    const grid = Grid.fromFlatString(UNIQUE_SOLUTION);
    expect(() => grid.view(rowUnit(1)).set(1, 3)).toThrow(
      "Can't set (1, 1) to 3: it already holds 3",
    );
  });

  it('returns the row, column, and box through a location', () => {
    const grid = Grid.fromFlatString(UNIQUE_SOLUTION);
    const [row, col, box] = grid.unitsCovering(Loc.of(0, 0));
    expect([...row]).toEqual([3, 9, 4, 1, 6, 2, 7, 8, 5]);
    expect([...col]).toEqual([3, 5, 2, 4, 7, 6, 1, 8, 9]);
    expect([...box]).toEqual([3, 9, 4, 5, 6, 7, 2, 1, 8]);
  });
});
