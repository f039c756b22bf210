import { z } from "zod";
import { LogLevel, parseLogLevel } from "@/lib/logging";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const ConfigSchema = z.object({
  PUZZLE_SIZE: z.coerce.number().int().min(2).max(10).default(3),
  PUZZLE_SEED: z.string().min(1).optional(),
  PUZZLE_SHUFFLE_ITERATIONS: z.coerce.number().int().positive().optional(),
  PUZZLE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "none"]).default("info"),
  PUZZLE_CHECK_INVARIANTS: booleanFlag.default("false"),
});

export type AppConfig = {
  size: number;
  seed?: string;
  shuffleIterations?: number;
  logLevel: LogLevel;
  checkInvariants: boolean;
};

/** Throws a ZodError when a variable is present but malformed. */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): AppConfig => {
  const parsed = ConfigSchema.parse(env);
  return {
    size: parsed.PUZZLE_SIZE,
    seed: parsed.PUZZLE_SEED,
    shuffleIterations: parsed.PUZZLE_SHUFFLE_ITERATIONS,
    logLevel: parseLogLevel(parsed.PUZZLE_LOG_LEVEL),
    checkInvariants: parsed.PUZZLE_CHECK_INVARIANTS,
  };
};
