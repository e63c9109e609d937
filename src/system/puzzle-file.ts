import {readFile} from 'node:fs/promises';
import {Grid} from '../game/grid';

/**
 * Thrown when puzzle text can't be read as a Sudoku grid.  Carries either the
 * 1-based number of the offending line, or the number of lines found when there
 * weren't 9.
 */
export class FormatError extends Error {
  override name = 'FormatError';

  constructor(
    message: string,
    readonly lineNumber: number | null,
    readonly lineCount: number | null,
  ) {
    super(message);
  }
}

// Characters that stand for a blank location.
const BLANKS = '0- ';

/**
 * Parses one line of a puzzle into 9 values, 0 for blanks.  Characters other
 * than blanks and numerals are skipped.  Returns null if the line doesn't have
 * exactly 9 blanks and numerals.
 */
function parseLine(line: string): number[] | null {
  const values: number[] = [];
  for (const ch of line) {
    if (BLANKS.includes(ch)) {
      values.push(0);
    } else if (ch >= '1' && ch <= '9') {
      values.push(Number(ch));
    }
  }
  return values.length === 9 ? values : null;
}

/**
 * Parses a puzzle from its non-blank lines, already trimmed.
 *
 * @throws FormatError if a line doesn't have 9 recognized characters, or there
 *     aren't 9 lines.
 */
export function parsePuzzleLines(lines: readonly string[]): Grid {
  const rows = lines.map((line, i) => {
    const values = parseLine(line);
    if (!values) {
      const lineNumber = i + 1;
      throw new FormatError(
        `Could not interpret line ${lineNumber}: ${line}`,
        lineNumber,
        null,
      );
    }
    return values;
  });
  if (rows.length !== 9) {
    throw new FormatError(
      `Found ${rows.length} rows, expected 9`,
      null,
      rows.length,
    );
  }
  return Grid.fromRows(rows);
}

/**
 * Parses the text of a puzzle file.  Lines may end in `\n`, `\r\n` or `\r`.
 * Each line is trimmed, and lines left empty are ignored.
 *
 * @throws FormatError if the text isn't a puzzle.
 */
export function parsePuzzle(text: string): Grid {
  return parsePuzzleLines(
    text
      .split(/\r\n|\r|\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0),
  );
}

/**
 * Reads and parses a puzzle file.
 *
 * @throws FormatError if the file isn't a puzzle, or whatever the file system
 *     throws if it can't be read.
 */
export async function readPuzzleFile(path: string): Promise<Grid> {
  return parsePuzzle(await readFile(path, 'utf8'));
}
