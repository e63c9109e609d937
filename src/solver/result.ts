import {Loc} from '../game/loc';
import {Unit, unitName} from '../game/unit';
import {ensureExhaustiveSwitch} from '../game/utils';

/** The ways a grid can turn out to have no completion. */
export enum ContradictionKind {
  /** A blank location has no legal numeral. */
  NO_CANDIDATES = 'NO_CANDIDATES',
  /** A numeral missing from a unit has no legal location in it. */
  NO_HOME = 'NO_HOME',
  /** Two numerals missing from a unit can each only go in the same location. */
  CONTESTED_LOC = 'CONTESTED_LOC',
  /** Some unit repeats a numeral. */
  INVALID_GRID = 'INVALID_GRID',
  /** Every numeral tried at a branch location led to a contradiction. */
  NO_COMPLETION = 'NO_COMPLETION',
}

export type Contradiction =
  | {readonly kind: ContradictionKind.NO_CANDIDATES; readonly loc: Loc}
  | {
      readonly kind: ContradictionKind.NO_HOME;
      readonly unit: Unit;
      readonly num: number;
    }
  | {readonly kind: ContradictionKind.CONTESTED_LOC; readonly loc: Loc}
  | {readonly kind: ContradictionKind.INVALID_GRID}
  | {readonly kind: ContradictionKind.NO_COMPLETION; readonly loc: Loc};

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  readonly contradiction: Contradiction;
}

/**
 * The outcome of a deduction or search step: either a value, or the
 * contradiction that shows the grid it ran on can't be completed.
 */
export type Result<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return {ok: true, value};
}

export function failure(contradiction: Contradiction): Failure {
  return {ok: false, contradiction};
}

/** Renders a contradiction for logs and error messages. */
export function describeContradiction(contradiction: Contradiction): string {
  switch (contradiction.kind) {
    case ContradictionKind.NO_CANDIDATES:
      return `no numeral fits at ${contradiction.loc}`;
    case ContradictionKind.NO_HOME:
      return `${contradiction.num} has no place in ${unitName(
        contradiction.unit,
      )}`;
    case ContradictionKind.CONTESTED_LOC:
      return `two numerals need ${contradiction.loc}`;
    case ContradictionKind.INVALID_GRID:
      return 'a unit repeats a numeral';
    case ContradictionKind.NO_COMPLETION:
      return `every numeral at ${contradiction.loc} fails`;
    default:
      return ensureExhaustiveSwitch(contradiction);
  }
}
