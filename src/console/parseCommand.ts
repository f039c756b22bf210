export type ConsoleCommand =
  | { kind: "move"; row: number; col: number }
  | { kind: "quit" }
  | { kind: "invalid"; input: string };

const QUIT_WORDS = new Set(["0", "q", "quit", "exit"]);

/**
 * Reads one line of console input. Coordinates are typed 1-indexed and
 * returned 0-indexed; brackets, parentheses and commas act as separators.
 */
export const parseCommand = (line: string): ConsoleCommand => {
  const trimmed = line.trim();
  if (trimmed === "" || QUIT_WORDS.has(trimmed.toLowerCase())) {
    return { kind: "quit" };
  }

  const tokens = trimmed
    .replace(/[[\](),;]/g, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0);

  if (tokens.length === 1 && tokens[0] === "0") {
    return { kind: "quit" };
  }

  if (tokens.length !== 2 || !tokens.every((token) => /^-?\d+$/.test(token))) {
    return { kind: "invalid", input: trimmed };
  }

  const [row, col] = tokens.map(Number);
  return { kind: "move", row: row - 1, col: col - 1 };
};
