import { createLogger, LogCategory, type Logger } from "@/lib/logging";
import { SessionClock } from "./clock";
import { DEFAULT_SIZE } from "./difficulty";
import { createRng, type Rng } from "./rng";
import {
  assertSessionConsistent,
  canMove,
  changeSize,
  move,
  newSession,
  pause,
  restart,
  resume,
  sessionFromGrid,
  snapshotSession,
  type GameSession,
  type SessionOptions,
  type SessionStatus,
} from "./session";
import type { Position, ReadonlyGrid } from "./systems/GridSystem";

export type GameStateData = {
  size: number;
  grid: ReadonlyGrid;
  blank: Readonly<Position>;
  moves: number;
  status: SessionStatus;
  solvable: boolean;
  repaired: boolean;
  elapsedSeconds: number;
  ui: {
    showWin: boolean;
  };
};

export type GameStateOptions = {
  rng?: Rng;
  initialSize?: number;
  shuffleIterations?: number;
  /** Re-scan the grid after every applied move and throw on drift. */
  checkInvariants?: boolean;
  logger?: Logger;
};

type Listener = (state: GameStateData) => void;

/**
 * Owns the live session. The engine mutates the session in place; listeners
 * only ever see snapshots, published after each change.
 */
export class GameState {
  private session: GameSession;
  private state: GameStateData;
  private listeners = new Set<Listener>();
  private readonly clock = new SessionClock(
    () => this.session.status === "playing"
  );
  private readonly sessionOptions: SessionOptions;
  private readonly checkInvariants: boolean;
  private readonly logger: Logger;

  constructor(options: GameStateOptions = {}) {
    this.sessionOptions = {
      rng: options.rng ?? createRng(),
      shuffleIterations: options.shuffleIterations,
    };
    this.checkInvariants = options.checkInvariants ?? false;
    this.logger = options.logger ?? createLogger(LogCategory.SESSION);
    this.session = newSession(
      options.initialSize ?? DEFAULT_SIZE,
      this.sessionOptions
    );
    this.state = this.toStateData(false);
  }

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    listener(this.state);
    return () => this.listeners.delete(listener);
  }

  /** Like `subscribe`, but only fires when the selected value changes. */
  subscribeTo<T>(select: (state: GameStateData) => T, listener: (value: T) => void) {
    let current = select(this.state);
    listener(current);
    return this.subscribe((state) => {
      const next = select(state);
      if (Object.is(next, current)) return;
      current = next;
      listener(next);
    });
  }

  getState() {
    return this.state;
  }

  startSession(size: number) {
    this.replaceSession(newSession(size, this.sessionOptions));
  }

  restart() {
    this.replaceSession(restart(this.session, this.sessionOptions));
  }

  changeSize(size: number) {
    this.replaceSession(changeSize(this.session, size, this.sessionOptions));
  }

  loadGrid(grid: ReadonlyGrid) {
    this.replaceSession(sessionFromGrid(grid));
  }

  canMove(row: number, col: number) {
    return this.session.status === "playing" && canMove(this.session, row, col);
  }

  move(row: number, col: number) {
    if (!move(this.session, row, col)) {
      this.logger.debug(`Rejected move at (${row}, ${col})`);
      return false;
    }
    if (this.checkInvariants) {
      assertSessionConsistent(this.session);
    }
    const won = this.session.status === "won";
    if (won) {
      this.logger.info(
        `Solved ${this.session.size}x${this.session.size} in ${this.session.moves} moves`
      );
    }
    this.publish(won || this.state.ui.showWin);
    return true;
  }

  pause() {
    if (!pause(this.session)) return false;
    this.publish(this.state.ui.showWin);
    return true;
  }

  resume() {
    if (!resume(this.session)) return false;
    this.publish(this.state.ui.showWin);
    return true;
  }

  togglePause() {
    return this.session.status === "paused" ? this.resume() : this.pause();
  }

  hideWin() {
    this.publish(false);
  }

  /** Advances the clock; publishes when the displayed tenth changes. */
  tick(dtSeconds: number) {
    const before = Math.floor(this.clock.elapsedSeconds * 10);
    this.clock.tick(dtSeconds);
    if (Math.floor(this.clock.elapsedSeconds * 10) !== before) {
      this.publish(this.state.ui.showWin);
    }
  }

  private replaceSession(session: GameSession) {
    this.session = session;
    this.clock.reset();
    if (session.repaired) {
      this.logger.warn(
        `Arrangement failed the parity check and was repaired (${session.size}x${session.size})`
      );
    }
    this.logger.info(`Started ${session.size}x${session.size} session`);
    this.publish(false);
  }

  private toStateData(showWin: boolean): GameStateData {
    return {
      ...snapshotSession(this.session),
      elapsedSeconds: this.clock.elapsedSeconds,
      ui: { showWin },
    };
  }

  private publish(showWin: boolean) {
    this.state = this.toStateData(showWin);
    this.listeners.forEach((listener) => listener(this.state));
  }
}

export const gameState = new GameState();
