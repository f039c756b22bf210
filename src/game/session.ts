import { GridInvariantError, InvalidSizeError } from "./errors";
import { createRng, type Rng } from "./rng";
import {
  assertPermutation,
  cloneGrid,
  locateBlank,
  samePosition,
  solvedGrid,
  type Grid,
  type Position,
  type ReadonlyGrid,
} from "./systems/GridSystem";
import { applyMove, canMoveTile } from "./systems/MoveSystem";
import { shuffleGrid } from "./systems/ShuffleSystem";
import { ensureSolvable } from "./systems/SolvabilitySystem";
import { isSolved } from "./systems/WinCheckSystem";

export type SessionStatus = "playing" | "paused" | "won";

export type GameSession = {
  size: number;
  grid: Grid;
  blank: Position;
  moves: number;
  solvable: boolean;
  /** The single parity repair was applied while building this session. */
  repaired: boolean;
  status: SessionStatus;
};

export type SessionSnapshot = Readonly<{
  size: number;
  grid: ReadonlyGrid;
  blank: Readonly<Position>;
  moves: number;
  solvable: boolean;
  repaired: boolean;
  status: SessionStatus;
}>;

export type SessionOptions = {
  rng?: Rng;
  shuffleIterations?: number;
};

const assertValidSize = (size: number) => {
  if (!Number.isInteger(size) || size < 2) {
    throw new InvalidSizeError(size);
  }
};

const buildSession = (grid: ReadonlyGrid, blank: Position): GameSession => {
  const { grid: checked, repaired } = ensureSolvable(grid, blank);
  assertPermutation(checked);
  return {
    size: checked.length,
    grid: checked,
    blank: { ...blank },
    moves: 0,
    solvable: true,
    repaired,
    status: "playing",
  };
};

export const newSession = (
  size: number,
  { rng = createRng(), shuffleIterations }: SessionOptions = {}
): GameSession => {
  assertValidSize(size);
  const solved = solvedGrid(size);
  const walked = shuffleGrid(solved, locateBlank(solved), {
    rng,
    iterations: shuffleIterations,
  });
  // A walk can return to the start; one more step from there always leaves it.
  const { grid, blank } = isSolved(walked.grid)
    ? shuffleGrid(walked.grid, walked.blank, { rng, iterations: 1 })
    : walked;
  return buildSession(grid, blank);
};

/** Starts a session from an arrangement that did not come from the shuffler. */
export const sessionFromGrid = (grid: ReadonlyGrid): GameSession => {
  assertPermutation(grid);
  assertValidSize(grid.length);
  return buildSession(grid, locateBlank(grid));
};

export const canMove = (session: GameSession, row: number, col: number) =>
  canMoveTile(session.grid, session.blank, row, col);

export const isSessionSolved = (session: GameSession) => isSolved(session.grid);

export const move = (session: GameSession, row: number, col: number) => {
  if (session.status !== "playing") return false;

  const result = applyMove(session.grid, session.blank, row, col);
  if (!result.moved) return false;

  session.blank = result.blank;
  session.moves += 1;
  if (isSessionSolved(session)) {
    session.status = "won";
  }
  return true;
};

export const restart = (session: GameSession, options?: SessionOptions) =>
  newSession(session.size, options);

export const changeSize = (
  _session: GameSession,
  newSize: number,
  options?: SessionOptions
) => newSession(newSize, options);

export const pause = (session: GameSession) => {
  if (session.status !== "playing") return false;
  session.status = "paused";
  return true;
};

export const resume = (session: GameSession) => {
  if (session.status !== "paused") return false;
  session.status = "playing";
  return true;
};

export const snapshotSession = (session: GameSession): SessionSnapshot => ({
  size: session.size,
  grid: cloneGrid(session.grid),
  blank: { ...session.blank },
  moves: session.moves,
  solvable: session.solvable,
  repaired: session.repaired,
  status: session.status,
});

/** Throws when the tracked blank has drifted from the grid. */
export const assertSessionConsistent = (session: GameSession) => {
  assertPermutation(session.grid);
  const scanned = locateBlank(session.grid);
  if (!samePosition(scanned, session.blank)) {
    throw new GridInvariantError(
      `Tracked blank (${session.blank.row}, ${session.blank.col}) does not match grid blank (${scanned.row}, ${scanned.col})`
    );
  }
};
