export { GameState, gameState } from "./GameState";
export type { GameStateData, GameStateOptions } from "./GameState";
export { shallowEqual, useGameState } from "./useGameState";
export { SessionClock, formatElapsed } from "./clock";
export { DIFFICULTIES, DEFAULT_SIZE, difficultyLabel } from "./difficulty";
export type { Difficulty } from "./difficulty";
export { GridInvariantError, InvalidSizeError } from "./errors";
export { createRng, mulberry32, hashSeed } from "./rng";
export type { Rng } from "./rng";
export {
  assertSessionConsistent,
  canMove,
  changeSize,
  isSessionSolved,
  move,
  newSession,
  pause,
  restart,
  resume,
  sessionFromGrid,
  snapshotSession,
} from "./session";
export type { GameSession, SessionOptions, SessionSnapshot, SessionStatus } from "./session";
export { BLANK, solvedGrid, tileAt, setTile, locateBlank, isAdjacent } from "./systems/GridSystem";
export type { Grid, Position, ReadonlyGrid } from "./systems/GridSystem";
export { countInversions, isSolvable, repairParity, ensureSolvable } from "./systems/SolvabilitySystem";
export { isSolved } from "./systems/WinCheckSystem";
