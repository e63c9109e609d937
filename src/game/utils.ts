/**
 * Gets the compiler to ensure that a value being switched on (or tested using
 * if statements) has had all possible values eliminated.  So if you change your
 * code to allow another value, your call to this function will stop compiling.
 * @param value The value being exhaustively switched on.
 */
export function ensureExhaustiveSwitch(value: never): never {
  throw new Error(value);
}

/**
 * Throws if a condition that the caller is responsible for upholding does not
 * hold.  Failures are programming errors, not puzzle conditions.
 *
 * @param condition The condition that must be true.
 * @param message Describes the violation.
 */
export function checkState(
  condition: boolean,
  message: string | (() => string),
): asserts condition {
  if (!condition) {
    throw new Error(typeof message === 'string' ? message : message());
  }
}
