import {ReadonlyGrid} from '../game/grid';
import {NUMERALS} from '../game/iota';
import {Loc} from '../game/loc';
import {unitLocs, unitsCovering} from '../game/unit';

/**
 * Returns the numerals that could legally go in a location: those not already
 * present in its row, column, or box, in ascending order.  Computed from the
 * grid's current contents every time.
 *
 * For a location that already holds a numeral the answer still excludes that
 * numeral, so it is only meaningful for blanks.
 */
export function candidates(grid: ReadonlyGrid, loc: Loc): number[] {
  const used = new Array<boolean>(10).fill(false);
  for (const unit of unitsCovering(loc)) {
    for (const other of unitLocs(unit)) {
      used[grid.get(other)] = true;
    }
  }
  return NUMERALS.filter(num => !used[num]);
}
