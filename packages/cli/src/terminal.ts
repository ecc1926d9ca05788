import { createInterface } from "node:readline";
import type { Confirm } from "@bucketprune/core/prune";
import type { Reporter } from "@bucketprune/core/retention";

/** Report lines to stdout, warnings and errors to stderr. */
export function createStreamReporter(
  stdout: NodeJS.WritableStream,
  stderr: NodeJS.WritableStream,
): Reporter {
  return {
    info: (line) => {
      stdout.write(`${line}\n`);
    },
    warn: (line) => {
      stderr.write(`${line}\n`);
    },
    error: (line) => {
      stderr.write(`${line}\n`);
    },
  };
}

/**
 * Prints the question and waits for one line of input. There is no
 * timeout; a closed input stream counts as an empty answer.
 */
export function createReadlinePrompt(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Confirm {
  return (question) =>
    new Promise<string>((resolve) => {
      const rl = createInterface({ input, terminal: false });
      let answer = "";
      rl.once("line", (line) => {
        answer = line;
        rl.close();
      });
      rl.once("close", () => resolve(answer));
      output.write(`\n${question}\n`);
    });
}
