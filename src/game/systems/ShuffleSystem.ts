import { shuffled, type Rng } from "../rng";
import {
  cloneGrid,
  DIRECTIONS,
  inBounds,
  step,
  swapTiles,
  type Grid,
  type Position,
  type ReadonlyGrid,
} from "./GridSystem";

export const defaultShuffleIterations = (size: number) => size * size * 10;

export type ShuffleOptions = {
  rng: Rng;
  iterations?: number;
};

export type ShuffleResult = {
  grid: Grid;
  blank: Position;
};

/**
 * Random walk of the blank. Every step is a legal move, so the result stays
 * reachable from the input arrangement.
 */
export const shuffleGrid = (
  grid: ReadonlyGrid,
  blank: Position,
  { rng, iterations = defaultShuffleIterations(grid.length) }: ShuffleOptions
): ShuffleResult => {
  const next = cloneGrid(grid);
  let current = { ...blank };

  for (let i = 0; i < iterations; i += 1) {
    for (const direction of shuffled(DIRECTIONS, rng)) {
      const target = step(current, direction);
      if (!inBounds(next, target.row, target.col)) continue;
      swapTiles(next, current, target);
      current = target;
      break;
    }
  }

  return { grid: next, blank: current };
};
