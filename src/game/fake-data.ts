// Puzzles shared by tests, as flat grid strings.

/** A puzzle with one solution that takes some branching to find. */
export const UNIQUE_CLUES =
  '..4.6........3..92.1.5......3......7.5..21.6.6......3......8.74.76.1..5.....5.8..';
export const UNIQUE_SOLUTION =
  '394162785567834192218579643431986527759321468682745931125698374876413259943257816';

/**
 * A 21-clue puzzle with one solution, from which no clue can be removed
 * without admitting more solutions.  Deduction alone solves it.
 */
export const MINIMAL_CLUES =
  '..4....3.2.........1...7.89.....6.43..2......17..3.....9...8......2..3.47..9.....';
export const MINIMAL_SOLUTION =
  '984165732237894516615327489859716243342589671176432958493658127568271394721943865';

/**
 * UNIQUE_SOLUTION with two interchangeable rectangles blanked out, plus a few
 * forced cells: four solutions, listed in the order the search finds them.
 */
export const MULTI_CLUES =
  '39.1627.5567..419221.5796.3431.86..77593..46868274.931125698.74876413..994325781.';
export const MULTI_SOLUTIONS = [
  '394162785567834192218579643431986257759321468682745931125698374876413529943257816',
  '394162785567834192218579643431986527759321468682745931125698374876413259943257816',
  '398162745567834192214579683431986257759321468682745931125698374876413529943257816',
  '398162745567834192214579683431986527759321468682745931125698374876413259943257816',
];

/** UNIQUE_CLUES with a second 4 added to the first row. */
export const DUPLICATE_CLUES =
  '4.4.6........3..92.1.5......3......7.5..21.6.6......3......8.74.76.1..5.....5.8..';

/** UNIQUE_SOLUTION with only the center cell, a 2, left blank. */
export const ONE_BLANK_CLUES =
  '3941627855678341922185796434319865277593.1468682745931125698374876413259943257816';
