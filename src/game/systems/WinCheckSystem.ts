import { BLANK, type ReadonlyGrid } from "./GridSystem";

export const isSolved = (grid: ReadonlyGrid) => {
  const size = grid.length;
  let expected = 1;
  for (let row = 0; row < size; row += 1) {
    for (let col = 0; col < size; col += 1) {
      if (row === size - 1 && col === size - 1) {
        return grid[row][col] === BLANK;
      }
      if (grid[row][col] !== expected) return false;
      expected += 1;
    }
  }
  return true;
};
