import { createInterface } from "node:readline";

/** Line-at-a-time input. `ask` resolves null once input has closed. */
export interface Prompter {
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

/**
 * Lines that arrive while no question is pending (piped or pasted input)
 * are queued for the following asks.
 */
export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
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
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  return {
    ask(prompt: string): Promise<string | null> {
      const queued = lines.shift();
      if (queued !== undefined) {
        output.write(prompt);
        return Promise.resolve(queued);
      }
      if (closed) return Promise.resolve(null);

      rl.setPrompt(prompt);
      rl.prompt();
      return new Promise((resolve) => waiting.push(resolve));
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
