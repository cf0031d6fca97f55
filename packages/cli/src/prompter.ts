import { createInterface } from "node:readline/promises";

/** Line-oriented input the menu reads from. null means input is closed. */
export interface Prompter {
  question(prompt: string): Promise<string | null>;
  close(): void;
}

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function createReadlinePrompter(options: ReadlinePrompterOptions = {}): Prompter {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const rl = createInterface({ input, output, terminal: input === process.stdin && process.stdin.isTTY === true });

  let closed = false;
  const closedSignal = new Promise<null>((resolve) => {
    rl.once("close", () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    async question(prompt) {
      if (closed) return null;
      const answer = rl.question(prompt).catch((err: unknown) => {
        // Pending questions are aborted when the interface closes
        if (err instanceof Error && err.name === "AbortError") return null;
        throw err;
      });
      return Promise.race([answer, closedSignal]);
    },
    close() {
      rl.close();
    },
  };
}
