import {getLogLevel, LogLevel} from './prefs';

/**
 * All the kinds of events we log.
 */
export enum EventType {
  // The person did something.
  ACTION = 'sudoku_action',

  // The computer did something.
  SYSTEM = 'sudoku_system',

  // Something bad happened.
  ERROR = 'sudoku_error',
}

/**
 * Extra information we might include with an event.
 */
export declare interface EventParams {
  category?: string;
  detail?: string;
  elapsedMs?: number;
}

/** Where formatted events go. */
export type EventSink = (line: string) => void;

const stderrSink: EventSink = line => {
  process.stderr.write(`${line}\n`);
};

let sink: EventSink = stderrSink;

/**
 * Redirects logged events, and returns the previous destination so it can be
 * restored.  Events go to stderr unless redirected, keeping stdout for
 * solutions.
 */
export function setEventSink(newSink: EventSink): EventSink {
  const previous = sink;
  sink = newSink;
  return previous;
}

const MIN_LEVEL: Record<EventType, LogLevel> = {
  [EventType.ERROR]: 'quiet',
  [EventType.SYSTEM]: 'info',
  [EventType.ACTION]: 'debug',
};

const LEVEL_ORDER: readonly LogLevel[] = ['quiet', 'info', 'debug'];

function isEnabled(event: EventType): boolean {
  return (
    LEVEL_ORDER.indexOf(getLogLevel()) >= LEVEL_ORDER.indexOf(MIN_LEVEL[event])
  );
}

/**
 * Formats an event as a single line: the event type followed by whichever
 * params are present, as `key=value` pairs.  The detail is quoted.
 */
export function formatEvent(event: EventType, params: EventParams): string {
  const parts: string[] = [event];
  if (params.category !== undefined) parts.push(`category=${params.category}`);
  if (params.detail !== undefined) {
    parts.push(`detail=${JSON.stringify(params.detail)}`);
  }
  if (params.elapsedMs !== undefined) {
    parts.push(`elapsedMs=${params.elapsedMs}`);
  }
  return parts.join(' ');
}

/**
 * Logs something that happened, if the current log level calls for it.
 * @param event What happened.
 */
export function logEvent(event: EventType, params: EventParams = {}) {
  if (isEnabled(event)) sink(formatEvent(event, params));
}
