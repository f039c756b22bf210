import type { GameState } from "@/game/GameState";
import { difficultyLabel } from "@/game/difficulty";
import { formatElapsed } from "@/game/clock";
import { createLogger, LogCategory, type Logger } from "@/lib/logging";
import { parseCommand } from "./parseCommand";
import { renderBoard, renderStats } from "./render";

export type ConsoleIO = {
  /** Resolves to null once input has ended. */
  prompt: (question: string) => Promise<string | null>;
  write: (text: string) => void;
};

export type ConsoleGameOptions = {
  gameState: GameState;
  io: ConsoleIO;
  /** Milliseconds; drives the session clock between prompts. */
  now?: () => number;
  logger?: Logger;
};

export type ConsoleOutcome = "solved" | "quit";

export const MOVE_PROMPT = "\nEnter your move (row, col) or 0 to quit: ";

export class ConsoleGame {
  private readonly gameState: GameState;
  private readonly io: ConsoleIO;
  private readonly now: () => number;
  private readonly logger: Logger;
  private lastTick = 0;

  constructor({ gameState, io, now = Date.now, logger }: ConsoleGameOptions) {
    this.gameState = gameState;
    this.io = io;
    this.now = now;
    this.logger = logger ?? createLogger(LogCategory.CONSOLE);
  }

  async run(): Promise<ConsoleOutcome> {
    this.lastTick = this.now();
    this.io.write(`${difficultyLabel(this.gameState.getState().size)} sliding puzzle\n`);
    this.showBoard();

    while (this.gameState.getState().status !== "won") {
      const line = await this.io.prompt(MOVE_PROMPT);
      this.advanceClock();
      const command = parseCommand(line ?? "");

      if (command.kind === "quit") {
        this.io.write("Thanks for playing!\n");
        return "quit";
      }

      if (command.kind === "invalid") {
        this.logger.debug(`Unreadable input: ${command.input}`);
        this.io.write("Invalid input. Please enter [row, col]\n");
        continue;
      }

      if (this.gameState.move(command.row, command.col)) {
        this.showBoard();
      } else {
        this.io.write(
          `Invalid move! Tile at (${command.row + 1}, ${command.col + 1}) cannot be moved.\n`
        );
      }
    }

    const { size, moves, elapsedSeconds } = this.gameState.getState();
    this.io.write("\nCongratulations!\n");
    this.io.write(`You solved the ${size}x${size} puzzle!\n`);
    this.io.write(`Moves: ${moves}\n`);
    this.io.write(`Time: ${formatElapsed(elapsedSeconds)}\n`);
    return "solved";
  }

  private advanceClock() {
    const current = this.now();
    this.gameState.tick((current - this.lastTick) / 1000);
    this.lastTick = current;
  }

  private showBoard() {
    const state = this.gameState.getState();
    this.io.write(`\n${renderBoard(state.grid)}\n`);
    this.io.write(`\n${renderStats(state)}\n`);
  }
}
