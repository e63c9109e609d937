/*
 * Array- and generator-based functions to produce sequences of integers
 * counting from 0, or from 1 for the 1-based numbering Sudoku uses for numerals
 * and unit positions.
 */

import {checkInt} from './ints';

/**
 * A generator that produces `n` integers starting at `start`, which defaults
 * to 0.
 *
 * @param n How many integers to produce.
 * @throws Error if `n` or `start` is not an integer.
 */
export function* iotaGenerator(n: number, start = 0) {
  checkInt(n);
  checkInt(start);
  for (let i = 0; i < n; ++i) {
    yield start + i;
  }
}

/**
 * Returns an array of `n` integers starting at 0.
 *
 * @param n The exclusive upper bound.
 * @returns An array of `n` integers starting at 0.
 * @throws Error if `n` is not an integer.
 */
export function iota(n: number): number[] {
  return [...iotaGenerator(n)];
}

/**
 * The numerals 1..=9, in ascending order.  Also serves as the list of 1-based
 * positions within a unit.
 */
export const NUMERALS: readonly number[] = [...iotaGenerator(9, 1)];
