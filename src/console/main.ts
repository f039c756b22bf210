import "dotenv/config";
import { z } from "zod";
import { loadConfig } from "@/config";
import { GameState } from "@/game/GameState";
import { createRng } from "@/game/rng";
import { configureLogging, createLogger, LogCategory } from "@/lib/logging";
import { ConsoleGame } from "./ConsoleGame";
import { createReadlineIO } from "./io";

const logger = createLogger(LogCategory.CONSOLE);

async function main() {
  const config = loadConfig(process.env);
  configureLogging({
    globalLevel: config.logLevel,
    useColors: process.stderr.isTTY === true,
    // stdout belongs to the board
    sink: {
      debug: console.error,
      info: console.error,
      warn: console.error,
      error: console.error,
    },
  });

  const gameState = new GameState({
    rng: createRng(config.seed),
    initialSize: config.size,
    shuffleIterations: config.shuffleIterations,
    checkInvariants: config.checkInvariants,
  });
  const io = createReadlineIO(process.stdin, process.stdout);

  try {
    const outcome = await new ConsoleGame({ gameState, io }).run();
    logger.debug(`Console session ended: ${outcome}`);
  } finally {
    io.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof z.ZodError) {
    logger.error("Invalid configuration", error.flatten().fieldErrors);
  } else {
    logger.error("Console game failed", error);
  }
  process.exitCode = 1;
});
