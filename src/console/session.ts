import type { BoundCommand, CommandEntry } from "./command.js";
import { greet } from "./greeting.js";
import type { ConsoleIO } from "./io.js";
import { parseInput } from "./parser.js";
import type { CommandRegistry } from "./registry.js";

export type SessionState =
  | "awaiting-input"
  | "parsing"
  | "confirming"
  | "executing"
  | "ended";

export const PROMPT = "So, what you want to do now?\nEnter command code: ";
export const UNSUPPORTED =
  "Inputted command isn't supported, please enter 'help' to get list of supported ones.";

export interface SessionOptions {
  user: string;
  registry: CommandRegistry;
  io: ConsoleIO;
  /** Source of the current time for the greeting. */
  clock?: () => Date;
}

/**
 * Interactive loop: greet, then read, parse, confirm and execute commands
 * until a blank line, end of input, or {@link Session.end}.
 */
export class Session {
  private readonly user: string;
  private readonly registry: CommandRegistry;
  private readonly io: ConsoleIO;
  private readonly clock: () => Date;
  private _state: SessionState = "awaiting-input";

  constructor(opts: SessionOptions) {
    this.user = opts.user;
    this.registry = opts.registry;
    this.io = opts.io;
    this.clock = opts.clock ?? (() => new Date());
  }

  get state(): SessionState {
    return this._state;
  }

  /** Stop the loop once the command that is running returns. */
  end(): void {
    this._state = "ended";
  }

  async begin(): Promise<void> {
    this.io.print();
    this.io.print(greet(this.user, this.clock().getHours()));

    while (this._state !== "ended") {
      this._state = "awaiting-input";
      const line = await this.io.prompt(PROMPT);
      if (line == null || !line.trim()) {
        this.end();
        break;
      }
      await this.perform(line);
    }
  }

  private async perform(line: string): Promise<void> {
    this._state = "parsing";
    const info = parseInput(this.registry, line);
    if (!info.action) {
      this.io.print(UNSUPPORTED);
      this.io.print();
      return;
    }

    this._state = "confirming";
    if (!(await this.confirm(info.action))) return;

    this._state = "executing";
    await this.execute(info.action.command.bind(info.args));
  }

  private async confirm(entry: CommandEntry): Promise<boolean> {
    const answer = await this.io.prompt(
      `Selected command: ${entry.description}. \nAre you sure (Y/N)? `,
    );
    return answer?.toLowerCase() === "y";
  }

  private async execute(bound: BoundCommand): Promise<void> {
    this.io.print();
    this.io.print(`\t\tCommand ('${bound.name}') Output:`);
    try {
      await bound.execute();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.io.print(`\t\tExecution failed: ${message}`);
      this.io.print();
      return;
    }
    this.io.print("\t\tExecution complete.");
    this.io.print();
  }
}
