import {
  BLANK,
  cloneGrid,
  locateBlank,
  type Grid,
  type Position,
  type ReadonlyGrid,
} from "./GridSystem";

export const countInversions = (grid: ReadonlyGrid) => {
  const tiles = grid.flat().filter((tile) => tile !== BLANK);
  let inversions = 0;
  for (let i = 0; i < tiles.length; i += 1) {
    for (let j = i + 1; j < tiles.length; j += 1) {
      if (tiles[i] > tiles[j]) inversions += 1;
    }
  }
  return inversions;
};

/**
 * Odd sizes: solvable iff the inversion count is even.
 * Even sizes: the blank's row counted from the bottom (bottom row = 1) is
 * added, and the sum must be odd.
 */
export const isSolvable = (
  grid: ReadonlyGrid,
  blank: Position = locateBlank(grid)
) => {
  const size = grid.length;
  const inversions = countInversions(grid);
  if (size % 2 === 1) {
    return inversions % 2 === 0;
  }
  const blankRowFromBottom = size - blank.row;
  return (inversions + blankRowFromBottom) % 2 === 1;
};

/** Swaps the first two non-blank cells in row-major order. */
export const repairParity = (grid: ReadonlyGrid): Grid => {
  const next = cloneGrid(grid);
  const cells: Position[] = [];
  for (let row = 0; row < next.length && cells.length < 2; row += 1) {
    for (let col = 0; col < next.length && cells.length < 2; col += 1) {
      if (next[row][col] !== BLANK) cells.push({ row, col });
    }
  }
  if (cells.length < 2) return next;

  const [a, b] = cells;
  const first = next[a.row][a.col];
  next[a.row][a.col] = next[b.row][b.col];
  next[b.row][b.col] = first;
  return next;
};

export type SolvabilityReport = {
  grid: Grid;
  repaired: boolean;
};

/** One check, at most one repair. The blank never moves during a repair. */
export const ensureSolvable = (
  grid: ReadonlyGrid,
  blank: Position
): SolvabilityReport => {
  if (isSolvable(grid, blank)) {
    return { grid: cloneGrid(grid), repaired: false };
  }
  return { grid: repairParity(grid), repaired: true };
};
