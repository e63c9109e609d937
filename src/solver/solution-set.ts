import {ReadonlyGrid} from '../game/grid';
import {GridString} from '../game/types';

/**
 * A set of completed grids, where two grids are the same if their contents
 * match.  Iterates in the order grids were first added.
 */
export class SolutionSet implements Iterable<ReadonlyGrid> {
  private readonly grids = new Map<GridString, ReadonlyGrid>();

  constructor(grids: Iterable<ReadonlyGrid> = []) {
    for (const grid of grids) this.add(grid);
  }

  /** The number of distinct grids in the set. */
  get size(): number {
    return this.grids.size;
  }

  /** Tells whether a grid with the same contents is in the set. */
  has(grid: ReadonlyGrid): boolean {
    return this.grids.has(grid.toFlatString());
  }

  /**
   * Adds a grid unless one with the same contents is already present, and
   * tells whether it was added.
   */
  add(grid: ReadonlyGrid): boolean {
    const key = grid.toFlatString();
    if (this.grids.has(key)) return false;
    this.grids.set(key, grid);
    return true;
  }

  /** Adds every grid of another set to this one. */
  addAll(other: SolutionSet): void {
    for (const grid of other) this.add(grid);
  }

  [Symbol.iterator](): Iterator<ReadonlyGrid> {
    return this.grids.values();
  }

  /** The grids, in the order they were added. */
  toArray(): ReadonlyGrid[] {
    return [...this.grids.values()];
  }
}
