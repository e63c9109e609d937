import {Grid, ReadonlyGrid} from '../game/grid';
import {Loc} from '../game/loc';
import {checkState} from '../game/utils';
import {candidates} from './candidates';
import {simpleFill} from './propagate';
import {
  Contradiction,
  ContradictionKind,
  failure,
  Result,
  success,
} from './result';
import {SolutionSet} from './solution-set';

/** A blank location chosen for trying each of its candidates in turn. */
export interface BranchCell {
  readonly loc: Loc;
  readonly candidates: readonly number[];
}

/** Counters describing how much work a search did. */
export interface SearchStats {
  /** How many grids the search examined, including the starting one. */
  nodes: number;
  /** How many candidate numerals were tried at branch locations. */
  branches: number;
  /** How many of those tries ended in a contradiction. */
  deadEnds: number;
  /** How many locations deduction filled, summed over every grid examined. */
  propagated: number;
  /** The deepest level of nested branching reached. */
  maxDepth: number;
}

/** What `solveWithStats` found, and what it took. */
export interface SolveReport {
  readonly solutions: SolutionSet;
  /** Why the puzzle has no solution, or null if it has some. */
  readonly contradiction: Contradiction | null;
  readonly stats: Readonly<SearchStats>;
  readonly elapsedMs: number;
}

/**
 * Picks the blank location to branch on.  Scans blanks in row-major order and
 * stops at the first one with exactly 2 candidates; failing that, takes the
 * first blank with the fewest.  A blank with no candidates at all is a
 * contradiction.
 *
 * @returns The chosen location and its candidates, or null if the grid has no
 *     blanks.
 */
function chooseBranchCell(grid: ReadonlyGrid): Result<BranchCell | null> {
  let best: BranchCell | null = null;
  for (const loc of Loc.ALL) {
    if (grid.get(loc)) continue;
    const cands = candidates(grid, loc);
    if (cands.length === 0) {
      return failure({kind: ContradictionKind.NO_CANDIDATES, loc});
    }
    if (cands.length === 2) return success({loc, candidates: cands});
    if (!best || cands.length < best.candidates.length) {
      best = {loc, candidates: cands};
    }
  }
  return success(best);
}

function newStats(): SearchStats {
  return {nodes: 0, branches: 0, deadEnds: 0, propagated: 0, maxDepth: 0};
}

function search(
  grid: Grid,
  stats: SearchStats,
  depth: number,
): Result<SolutionSet> {
  ++stats.nodes;
  stats.maxDepth = Math.max(stats.maxDepth, depth);

  const filled = simpleFill(grid);
  if (!filled.ok) return filled;
  stats.propagated += filled.value;
  if (!grid.isValid()) return failure({kind: ContradictionKind.INVALID_GRID});
  if (grid.isComplete()) return success(new SolutionSet([grid]));

  const branch = chooseBranchCell(grid);
  if (!branch.ok) return branch;
  const cell = branch.value;
  checkState(cell !== null, 'Incomplete grid has no blank location');

  const solutions = new SolutionSet();
  for (const num of cell.candidates) {
    const next = grid.clone();
    next.set(cell.loc, num);
    ++stats.branches;
    const result = search(next, stats, depth + 1);
    if (!result.ok) {
      ++stats.deadEnds;
      continue;
    }
    solutions.addAll(result.value);
  }
  if (solutions.size === 0) {
    return failure({kind: ContradictionKind.NO_COMPLETION, loc: cell.loc});
  }
  return success(solutions);
}

/**
 * Finds every completion of a grid by deduction plus exhaustive branching.
 * Fills in the given grid as it goes, and may hand it back as a member of the
 * solution set.
 *
 * @returns The completions, or the contradiction showing there are none.
 */
export function solveInPlace(grid: Grid): Result<SolutionSet> {
  return search(grid, newStats(), 0);
}

/**
 * Finds every completion of a puzzle.  The puzzle itself is left untouched,
 * and a puzzle with no completion, including one whose clues already repeat a
 * numeral, yields an empty set.
 */
export function solve(puzzle: ReadonlyGrid): SolutionSet {
  const result = solveInPlace(new Grid(puzzle));
  return result.ok ? result.value : new SolutionSet();
}

/** Like `solve`, but also reports on the search. */
export function solveWithStats(puzzle: ReadonlyGrid): SolveReport {
  const stats = newStats();
  const startMs = Date.now();
  const result = search(new Grid(puzzle), stats, 0);
  const elapsedMs = Date.now() - startMs;
  return result.ok
    ? {solutions: result.value, contradiction: null, stats, elapsedMs}
    : {
        solutions: new SolutionSet(),
        contradiction: result.contradiction,
        stats,
        elapsedMs,
      };
}

export const TEST_ONLY = {chooseBranchCell};
