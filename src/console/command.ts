export type CommandAction = (args: readonly string[]) => void | Promise<void>;

export class Command {
  /** Display name, shown in the output markers. Not a dispatch key. */
  readonly name: string;
  readonly action: CommandAction;

  constructor(name: string, action: CommandAction) {
    this.name = name;
    this.action = action;
  }

  bind(args: readonly string[] = []): BoundCommand {
    return new BoundCommand(this, args);
  }
}

/** A command together with the arguments of one invocation. */
export class BoundCommand {
  readonly command: Command;
  readonly args: readonly string[];

  constructor(command: Command, args: readonly string[]) {
    this.command = command;
    this.args = Object.freeze([...args]);
  }

  get name(): string {
    return this.command.name;
  }

  async execute(): Promise<void> {
    await this.command.action(this.args);
  }
}

export interface CommandEntry {
  description: string;
  command: Command;
}

/** Result of parsing one input line. `action` is null for unknown commands. */
export interface CommandInfo {
  args: readonly string[];
  action: CommandEntry | null;
}
