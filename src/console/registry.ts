import type { Controller } from "../controller/types.js";
import { Command, type CommandEntry } from "./command.js";
import type { CommandDescriptions, CommandKeyword } from "./locale.js";

/** Keyword -> command lookup. Keywords are lower-cased on insert and on lookup. */
export class CommandRegistry {
  private entries = new Map<string, CommandEntry>();

  constructor(entries: Iterable<readonly [string, CommandEntry]>) {
    for (const [keyword, entry] of entries) {
      const key = keyword.toLowerCase();
      if (this.entries.has(key)) {
        throw new Error(`Command "${key}" is registered twice`);
      }
      this.entries.set(key, entry);
    }
  }

  get(keyword: string): CommandEntry | undefined {
    return this.entries.get(keyword.toLowerCase());
  }

  keywords(): string[] {
    return [...this.entries.keys()];
  }
}

export function createCommandRegistry(
  controller: Controller,
  descriptions: CommandDescriptions,
): CommandRegistry {
  const entry = (
    keyword: CommandKeyword,
    command: Command,
  ): [string, CommandEntry] => [
    keyword,
    { description: descriptions[keyword], command },
  ];

  return new CommandRegistry([
    // Valuable commands
    entry(
      "schedule",
      new Command("Schedule", (args) => controller.parseSchedule(args)),
    ),
    entry(
      "changes",
      new Command("Changes", (args) => controller.parseChanges(args)),
    ),
    // Functional commands
    entry("help", new Command("Help", () => controller.showHelp())),
    entry(
      "parse",
      new Command("Parse", (args) =>
        controller.initializeBasicParsingProcessByArguments(args),
      ),
    ),
    entry("write", new Command("Write", (args) => controller.writeLastResult(args))),
    entry("show", new Command("Show", () => controller.showLastResult())),
    entry("exit", new Command("Exit", () => controller.exit())),
  ]);
}
