import {Grid} from '../game/grid';
import {NUMERALS} from '../game/iota';
import {ALL_UNITS, Unit} from '../game/unit';
import {candidates} from './candidates';
import {ContradictionKind, failure, Result, success} from './result';

/**
 * Fills in whatever can be deduced directly within one unit of a grid.
 *
 * Works in two stages.  The first walks the unit's positions in order: a blank
 * with exactly one candidate gets that numeral right away (a naked single),
 * and blanks with more are set aside along with their candidates.  The second
 * looks at each numeral still missing from the unit, and if exactly one of the
 * set-aside blanks could take it, puts it there (a hidden single).  The second
 * stage uses the candidates captured during the first; it does not recompute
 * them after each placement.
 *
 * @param grid The grid to fill, modified in place.
 * @param unit Which unit to work on.
 * @returns How many locations were filled, or the contradiction found.
 */
export function fillUnit(grid: Grid, unit: Unit): Result<number> {
  const view = grid.view(unit);
  const seen = new Set<number>();
  const deferred = new Map<number, readonly number[]>();
  let filled = 0;

  for (const index of NUMERALS) {
    const num = view.get(index);
    if (num) {
      seen.add(num);
      continue;
    }
    const loc = view.loc(index);
    const cands = candidates(grid, loc);
    if (cands.length === 0) {
      return failure({kind: ContradictionKind.NO_CANDIDATES, loc});
    }
    if (cands.length > 1) {
      deferred.set(index, cands);
      continue;
    }
    view.set(index, cands[0]);
    seen.add(cands[0]);
    ++filled;
  }

  for (const num of NUMERALS) {
    if (seen.has(num)) continue;
    const homes: number[] = [];
    for (const [index, cands] of deferred) {
      if (cands.includes(num)) homes.push(index);
    }
    if (homes.length === 0) {
      return failure({kind: ContradictionKind.NO_HOME, unit, num});
    }
    if (homes.length > 1) continue;
    const [index] = homes;
    if (view.get(index)) {
      // An earlier numeral already claimed this blank as its only home.
      return failure({
        kind: ContradictionKind.CONTESTED_LOC,
        loc: view.loc(index),
      });
    }
    view.set(index, num);
    ++filled;
  }

  return success(filled);
}

/**
 * Runs `fillUnit` over every row, then every column, then every box, and
 * repeats until a whole round fills nothing.  Makes no guesses.
 *
 * @param grid The grid to fill, modified in place.
 * @returns The total number of locations filled, or the first contradiction
 *     found.
 */
export function simpleFill(grid: Grid): Result<number> {
  let total = 0;
  for (;;) {
    let filled = 0;
    for (const unit of ALL_UNITS) {
      const result = fillUnit(grid, unit);
      if (!result.ok) return result;
      filled += result.value;
    }
    if (filled === 0) return success(total);
    total += filled;
  }
}
