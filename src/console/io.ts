import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { ConsoleIO } from "./ConsoleGame";

export type ReadlineIO = ConsoleIO & { close: () => void };

/**
 * Line-buffered console IO. Lines that arrive before anyone asks for them are
 * queued, so piped input is answered one prompt at a time; `prompt` resolves
 * null only once the queue is empty and the input has ended.
 */
export const createReadlineIO = (input: Readable, output: Writable): ReadlineIO => {
  const rl = createInterface({ input, terminal: false });
  const lines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      lines.push(line);
    }
  });

  rl.once("close", () => {
    closed = true;
    waiting.splice(0).forEach((resolve) => resolve(null));
  });

  return {
    prompt: (question) => {
      output.write(question);
      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    write: (text) => {
      output.write(text);
    },
    close: () => {
      rl.close();
    },
  };
};
