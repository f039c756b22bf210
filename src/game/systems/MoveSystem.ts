import {
  BLANK,
  DIRECTIONS,
  inBounds,
  isAdjacent,
  step,
  swapTiles,
  type Direction,
  type Grid,
  type Position,
  type ReadonlyGrid,
} from "./GridSystem";

export const canMoveTile = (
  grid: ReadonlyGrid,
  blank: Position,
  row: number,
  col: number
) =>
  inBounds(grid, row, col) &&
  grid[row][col] !== BLANK &&
  isAdjacent(blank, { row, col });

export type MoveResult = {
  moved: boolean;
  blank: Position;
};

/** Slides the tile at (row, col) into the blank, in place. */
export const applyMove = (
  grid: Grid,
  blank: Position,
  row: number,
  col: number
): MoveResult => {
  if (!canMoveTile(grid, blank, row, col)) {
    return { moved: false, blank };
  }
  const target = { row, col };
  swapTiles(grid, blank, target);
  return { moved: true, blank: target };
};

export const movableTiles = (grid: ReadonlyGrid, blank: Position) =>
  DIRECTIONS.map((direction) => step(blank, direction)).filter((cell) =>
    inBounds(grid, cell.row, cell.col)
  );

/**
 * The tile that slides when the player pushes in `direction`: pushing "up"
 * moves the tile below the blank into it.
 */
export const tileForSlide = (blank: Position, direction: Direction): Position => {
  const opposite: Record<Direction, Direction> = {
    up: "down",
    down: "up",
    left: "right",
    right: "left",
  };
  return step(blank, opposite[direction]);
};
