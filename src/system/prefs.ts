/**
 * How chatty the event log is: `quiet` logs only errors, `info` adds what the
 * system did, and `debug` adds what the person asked for.
 */
export type LogLevel = 'quiet' | 'info' | 'debug';

/**
 * How solutions are printed: as 9-line grids, as 81-character flat strings, or
 * as a JSON record of the puzzle and its solutions.
 */
export type OutputFormat = 'grid' | 'flat' | 'json';

/** Parses a log level, or returns null if it isn't one. */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch (value) {
    case 'quiet':
    case 'info':
    case 'debug':
      return value;
    default:
      return null;
  }
}

/** Parses an output format, or returns null if it isn't one. */
export function parseOutputFormat(
  value: string | undefined,
): OutputFormat | null {
  switch (value) {
    case 'grid':
    case 'flat':
    case 'json':
      return value;
    default:
      return null;
  }
}

let logLevel: LogLevel = parseLogLevel(process.env.SUDOKU_LOG_LEVEL) ?? 'info';

export function getLogLevel(): LogLevel {
  return logLevel;
}

export function setLogLevel(level: LogLevel) {
  logLevel = level;
}

let outputFormat: OutputFormat =
  parseOutputFormat(process.env.SUDOKU_FORMAT) ?? 'grid';

export function getOutputFormat(): OutputFormat {
  return outputFormat;
}

export function setOutputFormat(format: OutputFormat) {
  outputFormat = format;
}
