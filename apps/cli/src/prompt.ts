import { createInterface } from "node:readline";

export interface Prompter {
  /** Resolves to null once input is closed (Ctrl-D, end of a pipe) */
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string | null> {
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        const onClose = () => resolve(null);
        rl.once("close", onClose);
        rl.question(prompt, (answer) => {
          rl.off("close", onClose);
          resolve(answer);
        });
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
