import { GridInvariantError } from "../errors";

export const BLANK = 0;

export type Grid = number[][];
export type ReadonlyGrid = ReadonlyArray<ReadonlyArray<number>>;

export type Position = { row: number; col: number };

export type Direction = "up" | "down" | "left" | "right";

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

const DIRECTION_OFFSETS: Record<Direction, Position> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

/** The neighbouring cell in `direction`; may fall outside the grid. */
export const step = (from: Position, direction: Direction): Position => ({
  row: from.row + DIRECTION_OFFSETS[direction].row,
  col: from.col + DIRECTION_OFFSETS[direction].col,
});

export const solvedGrid = (size: number): Grid =>
  Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (_, col) =>
      row === size - 1 && col === size - 1 ? BLANK : row * size + col + 1
    )
  );

export const cloneGrid = (grid: ReadonlyGrid): Grid =>
  grid.map((row) => [...row]);

export const inBounds = (grid: ReadonlyGrid, row: number, col: number) =>
  Number.isInteger(row) &&
  Number.isInteger(col) &&
  row >= 0 &&
  row < grid.length &&
  col >= 0 &&
  col < grid.length;

const assertInBounds = (grid: ReadonlyGrid, row: number, col: number) => {
  if (!inBounds(grid, row, col)) {
    throw new GridInvariantError(
      `Cell (${row}, ${col}) is outside a ${grid.length}x${grid.length} grid`
    );
  }
};

export const tileAt = (grid: ReadonlyGrid, row: number, col: number) => {
  assertInBounds(grid, row, col);
  return grid[row][col];
};

export const setTile = (grid: Grid, row: number, col: number, value: number) => {
  assertInBounds(grid, row, col);
  grid[row][col] = value;
};

export const swapTiles = (grid: Grid, a: Position, b: Position) => {
  const first = tileAt(grid, a.row, a.col);
  setTile(grid, a.row, a.col, tileAt(grid, b.row, b.col));
  setTile(grid, b.row, b.col, first);
};

/** Full scan. Only for construction and consistency checks, never per move. */
export const locateBlank = (grid: ReadonlyGrid): Position => {
  for (let row = 0; row < grid.length; row += 1) {
    for (let col = 0; col < grid[row].length; col += 1) {
      if (grid[row][col] === BLANK) {
        return { row, col };
      }
    }
  }
  throw new GridInvariantError("Grid has no blank cell");
};

export const isAdjacent = (a: Position, b: Position) => {
  const dRow = Math.abs(a.row - b.row);
  const dCol = Math.abs(a.col - b.col);
  return (dRow === 1 && dCol === 0) || (dRow === 0 && dCol === 1);
};

export const samePosition = (a: Position, b: Position) =>
  a.row === b.row && a.col === b.col;

export const tilesToGrid = (tiles: readonly number[], size: number): Grid => {
  if (tiles.length !== size * size) {
    throw new GridInvariantError(
      `Expected ${size * size} tiles for a ${size}x${size} grid, got ${tiles.length}`
    );
  }
  const grid: Grid = [];
  for (let row = 0; row < size; row += 1) {
    const start = row * size;
    grid.push(tiles.slice(start, start + size));
  }
  return grid;
};

/** Square, and a permutation of 0..N²-1 with exactly one blank. */
export const assertPermutation = (grid: ReadonlyGrid) => {
  const size = grid.length;
  if (size === 0) {
    throw new GridInvariantError("Grid is empty");
  }
  grid.forEach((row, index) => {
    if (row.length !== size) {
      throw new GridInvariantError(
        `Row ${index} has ${row.length} cells, expected ${size}`
      );
    }
  });

  const seen = new Set<number>();
  for (const value of grid.flat()) {
    if (!Number.isInteger(value) || value < 0 || value >= size * size) {
      throw new GridInvariantError(`Tile value ${value} is out of range`);
    }
    if (seen.has(value)) {
      throw new GridInvariantError(`Tile value ${value} appears more than once`);
    }
    seen.add(value);
  }
};
