import {parseArgs, types} from 'node:util';
import {Grid} from './game/grid';
import {Sudoku} from './game/sudoku';
import {describeContradiction} from './solver/result';
import {solveWithStats} from './solver/search';
import {EventType, logEvent} from './system/logging';
import {
  getOutputFormat,
  parseLogLevel,
  parseOutputFormat,
  setLogLevel,
  setOutputFormat,
} from './system/prefs';
import {FormatError, readPuzzleFile} from './system/puzzle-file';
import {renderSolutions} from './system/render';

export const USAGE =
  'Usage: sudoku-enum [--format=grid|flat|json] ' +
  '[--log-level=quiet|info|debug] [--count] <puzzle-file>';

/** Where the command line writes its output. */
export declare interface CliIo {
  /** Writes a line to standard output. */
  out(line: string): void;
  /** Writes a line to standard error. */
  err(line: string): void;
}

const processIo: CliIo = {
  out(line) {
    process.stdout.write(`${line}\n`);
  },
  err(line) {
    process.stderr.write(`${line}\n`);
  },
};

const OPTIONS = {
  format: {type: 'string'},
  'log-level': {type: 'string'},
  count: {type: 'boolean'},
  help: {type: 'boolean', short: 'h'},
} as const;

function parseCliArgs(args: readonly string[]) {
  return parseArgs({
    args: [...args],
    options: OPTIONS,
    allowPositionals: true,
    strict: true,
  });
}

// Errors thrown by Node's own modules may come from another realm, where
// `instanceof Error` doesn't hold.
function errorMessage(e: unknown): string {
  return types.isNativeError(e) ? e.message : String(e);
}

/**
 * Runs the command line: reads the puzzle file named by the one positional
 * argument, and prints all of its solutions.  A puzzle with no solutions
 * prints nothing.
 *
 * @param args The arguments, not including the program name.
 * @param io Where to write output.
 * @returns The process exit code: 0 when the puzzle was solved (whether or not
 *     it has solutions), 1 when it couldn't be read, and 2 for bad usage.
 */
export async function main(
  args: readonly string[],
  io: CliIo = processIo,
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(args);
  } catch (e: unknown) {
    io.err(errorMessage(e));
    io.err(USAGE);
    return 2;
  }
  const {values, positionals} = parsed;
  if (values.help === true) {
    io.out(USAGE);
    return 0;
  }
  if (positionals.length !== 1) {
    io.err(USAGE);
    return 2;
  }
  const format =
    values.format === undefined ? null : parseOutputFormat(values.format);
  if (values.format !== undefined && !format) {
    io.err(`Unknown format: ${values.format}`);
    io.err(USAGE);
    return 2;
  }
  const requestedLevel = values['log-level'];
  const level =
    requestedLevel === undefined ? null : parseLogLevel(requestedLevel);
  if (requestedLevel !== undefined && !level) {
    io.err(`Unknown log level: ${requestedLevel}`);
    io.err(USAGE);
    return 2;
  }
  // Options override the configured preferences.
  if (format) setOutputFormat(format);
  if (level) setLogLevel(level);

  const [path] = positionals;
  logEvent(EventType.ACTION, {category: 'solve requested', detail: path});
  let clues: Grid;
  try {
    clues = await readPuzzleFile(path);
  } catch (e: unknown) {
    io.err(
      e instanceof FormatError
        ? `${path}: ${e.message}`
        : `${path}: can't read puzzle file: ${errorMessage(e)}`,
    );
    return 1;
  }

  const report = solveWithStats(clues);
  const {stats, contradiction} = report;
  logEvent(EventType.SYSTEM, {
    category: 'puzzle solved',
    detail:
      `${report.solutions.size} solution(s), ${stats.nodes} grid(s) examined, ` +
      `${stats.deadEnds} dead end(s)` +
      (contradiction ? `; ${describeContradiction(contradiction)}` : ''),
    elapsedMs: report.elapsedMs,
  });

  const sudoku = new Sudoku(clues, report.solutions.toArray());
  if (values.count === true) {
    io.out(String(sudoku.solutions.length));
  } else {
    for (const line of renderSolutions(sudoku, getOutputFormat())) io.out(line);
  }
  return 0;
}
