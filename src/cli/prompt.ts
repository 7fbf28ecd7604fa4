import readline from "node:readline/promises";
import { Writable } from "node:stream";
import type { Prompter } from "../photo/types.js";

/** `y`/`yes` → true, `n`/`no` → false, anything else → null. Case and padding are ignored. */
export function parseYesNo(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "y" || normalized === "yes") {
    return true;
  }
  if (normalized === "n" || normalized === "no") {
    return false;
  }
  return null;
}

export type ReadlinePrompter = Prompter & {
  close(): void;
};

/**
 * Prompter over stdin/stdout. Secrets are read with echo suppressed by muting the
 * output stream the readline interface writes to.
 */
export function createReadlinePrompter(
  io: { input?: NodeJS.ReadableStream; output?: NodeJS.WritableStream } = {},
): ReadlinePrompter {
  const input = io.input ?? process.stdin;
  const target = io.output ?? process.stdout;
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) {
        target.write(chunk, encoding);
      }
      callback();
    },
  });
  const rl = readline.createInterface({
    input,
    output,
    terminal: process.stdin.isTTY === true && input === process.stdin,
  });

  return {
    async text(question, defaultValue) {
      const answer = await rl.question(question);
      return answer.trim() === "" && defaultValue !== undefined ? defaultValue : answer;
    },

    async secret(question) {
      target.write(question);
      muted = true;
      try {
        return await rl.question("");
      } finally {
        muted = false;
        target.write("\n");
      }
    },

    async confirm(question) {
      for (;;) {
        const answer = parseYesNo(await rl.question(`${question} (y/n): `));
        if (answer !== null) {
          return answer;
        }
        target.write("Input yes or no\n");
      }
    },

    close() {
      rl.close();
    },
  };
}
