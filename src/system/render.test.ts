import {
  MINIMAL_CLUES,
  MULTI_CLUES,
  MULTI_SOLUTIONS,
  UNIQUE_SOLUTION,
} from '../game/fake-data';
import {Grid} from '../game/grid';
import {Sudoku} from '../game/sudoku';
import {renderGrid, renderSolutions, SOLUTION_SEPARATOR} from './render';

describe('render module', () => {
  const multi = new Sudoku(
    Grid.fromFlatString(MULTI_CLUES),
    MULTI_SOLUTIONS.slice(0, 2).map(s => Grid.fromFlatString(s)),
  );
  const none = new Sudoku(Grid.fromFlatString(MULTI_CLUES), []);

  it('renders a grid as 9 lines with spaces for blanks', () => {
    expect(renderGrid(Grid.fromFlatString(MINIMAL_CLUES))).toEqual([
      '  4    3 ',
      '2        ',
      ' 1   7 89',
      '     6 43',
      '  2      ',
      '17  3    ',
      ' 9   8   ',
      '   2  3 4',
      '7  9     ',
    ]);
  });

  it('separates solutions with a line of dashes', () => {
    const lines = renderSolutions(multi, 'grid');
    expect(SOLUTION_SEPARATOR).toBe('---------');
    expect(lines).toHaveLength(19);
    expect(lines[8]).toBe('943257816');
    expect(lines[9]).toBe(SOLUTION_SEPARATOR);
    expect(lines.slice(10)).toEqual(
      renderGrid(Grid.fromFlatString(MULTI_SOLUTIONS[1])),
    );
  });

  it('renders a single solution without a separator', () => {
    const sudoku = new Sudoku(Grid.fromFlatString(MINIMAL_CLUES), [
      Grid.fromFlatString(UNIQUE_SOLUTION),
    ]);
    expect(renderSolutions(sudoku, 'grid')).toEqual([
      '394162785',
      '567834192',
      '218579643',
      '431986527',
      '759321468',
      '682745931',
      '125698374',
      '876413259',
      '943257816',
    ]);
  });

  it('renders flat solutions one per line', () => {
    expect(renderSolutions(multi, 'flat')).toEqual(MULTI_SOLUTIONS.slice(0, 2));
  });

  it('renders JSON as one line', () => {
    expect(renderSolutions(multi, 'json')).toEqual([
      JSON.stringify({
        clues: MULTI_CLUES,
        solutions: MULTI_SOLUTIONS.slice(0, 2),
      }),
    ]);
  });

  it('renders nothing for no solutions', () => {
    expect(renderSolutions(none, 'grid')).toEqual([]);
    expect(renderSolutions(none, 'flat')).toEqual([]);
    expect(renderSolutions(none, 'json')).toEqual([
      `{"clues":"${MULTI_CLUES}","solutions":[]}`,
    ]);
  });
});
