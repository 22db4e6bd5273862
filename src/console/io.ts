import { createInterface } from "node:readline";

export interface ConsoleIO {
  /** Write `question` and read one line. Resolves to null at end of input. */
  prompt(question: string): Promise<string | null>;
  print(text?: string): void;
}

export interface ClosableConsoleIO extends ConsoleIO {
  close(): void;
}

export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ClosableConsoleIO {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async prompt(question) {
      output.write(question);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print(text = "") {
      output.write(`${text}\n`);
    },
    close() {
      rl.close();
    },
  };
}
