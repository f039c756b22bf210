import { formatElapsed } from "@/game/clock";
import { BLANK, type ReadonlyGrid } from "@/game/systems/GridSystem";

const CELL_WIDTH = 3;

const border = (size: number) => `+${"----+".repeat(size)}`;

const renderCell = (value: number) =>
  value === BLANK ? "    |" : `${String(value).padStart(CELL_WIDTH)} |`;

export const renderBoard = (grid: ReadonlyGrid) => {
  const size = grid.length;
  const lines = [`Current Puzzle (${size}x${size}):`, border(size)];
  for (const row of grid) {
    lines.push(`|${row.map(renderCell).join("")}`);
    lines.push(border(size));
  }
  return lines.join("\n");
};

export type StatsView = {
  moves: number;
  elapsedSeconds: number;
  solvable: boolean;
};

export const renderStats = ({ moves, elapsedSeconds, solvable }: StatsView) =>
  `Stats:  Moves: ${moves}  Time: ${formatElapsed(elapsedSeconds)}  Solvable: ${solvable ? "Yes" : "No"}`;
