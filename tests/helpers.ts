import type { ConsoleIO } from "../src/console/io.js";
import type { Controller } from "../src/controller/types.js";

/** Console double fed from a fixed list of lines; `null` in the list means end of input. */
export class ScriptedIO implements ConsoleIO {
  readonly prompts: string[] = [];
  private lines: (string | null)[];
  private out: string[] = [];

  constructor(lines: (string | null)[]) {
    this.lines = [...lines];
  }

  async prompt(question: string): Promise<string | null> {
    this.prompts.push(question);
    this.out.push(question);
    return this.lines.length > 0 ? (this.lines.shift() ?? null) : null;
  }

  print(text = ""): void {
    this.out.push(`${text}\n`);
  }

  /** Everything written so far. */
  get output(): string {
    return this.out.join("");
  }

  /** Lines not read by the session. */
  get remaining(): number {
    return this.lines.length;
  }
}

export type ControllerCall = [method: keyof Controller, args: readonly string[] | undefined];

/** Controller that only records which capability was called and with what. */
export class RecordingController implements Controller {
  readonly calls: ControllerCall[] = [];

  parseSchedule(args: readonly string[]): void {
    this.calls.push(["parseSchedule", args]);
  }

  parseChanges(args: readonly string[]): void {
    this.calls.push(["parseChanges", args]);
  }

  showHelp(): void {
    this.calls.push(["showHelp", undefined]);
  }

  initializeBasicParsingProcessByArguments(args: readonly string[]): void {
    this.calls.push(["initializeBasicParsingProcessByArguments", args]);
  }

  writeLastResult(args?: readonly string[]): void {
    this.calls.push(["writeLastResult", args]);
  }

  showLastResult(): void {
    this.calls.push(["showLastResult", undefined]);
  }

  exit(): void {
    this.calls.push(["exit", undefined]);
  }
}
