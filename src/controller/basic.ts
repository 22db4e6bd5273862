import { readFile, writeFile } from "node:fs/promises";
import { UsageError } from "../common/types.js";
import type { ConsoleIO } from "../console/io.js";
import type { CommandDescriptions } from "../console/locale.js";
import {
  listChangedGroups,
  parseChangesDocument,
  parseScheduleDocument,
} from "../document/parse.js";
import type { Changes } from "../model/changes.js";
import type { WeekSchedule } from "../model/week-schedule.js";
import type { Controller } from "./types.js";

const USAGE = {
  schedule: "schedule <file>",
  changes: "changes <file> [group]",
  parse: "parse <schedule|changes> <file> [group]",
  write: "write [file]",
};

export type ParseResult = WeekSchedule | Changes;

export interface BasicControllerOptions {
  io: ConsoleIO;
  descriptions: CommandDescriptions;
  /** Where `write` puts the result when no path is given. */
  outputPath: string;
  onExit?: () => void;
}

export class BasicController implements Controller {
  private readonly io: ConsoleIO;
  private readonly descriptions: CommandDescriptions;
  private readonly outputPath: string;
  private readonly onExit: () => void;
  private result: ParseResult | null = null;

  constructor(opts: BasicControllerOptions) {
    this.io = opts.io;
    this.descriptions = opts.descriptions;
    this.outputPath = opts.outputPath;
    this.onExit = opts.onExit ?? (() => {});
  }

  get lastResult(): ParseResult | null {
    return this.result;
  }

  // --- Parsing ---

  async parseSchedule(args: readonly string[]): Promise<void> {
    const [path] = args;
    if (!path) throw new UsageError(`Usage: ${USAGE.schedule}`);

    const schedule = parseScheduleDocument(await readFile(path, "utf8"));
    this.result = schedule;
    this.io.print(
      `Schedule of group ${schedule.groupName ?? "(unnamed)"} read: ${schedule.daySchedules.length} day(s).`,
    );
  }

  async parseChanges(args: readonly string[]): Promise<void> {
    const [path, group] = args;
    if (!path) throw new UsageError(`Usage: ${USAGE.changes}`);

    const html = await readFile(path, "utf8");
    const changes = parseChangesDocument(html, group);
    this.result = changes;

    const kind = changes.absolute ? "absolute" : "partial";
    this.io.print(
      `Changes for ${group ?? "first group"} read: ${changes.changes.length} lesson(s), ${kind}.`,
    );
    if (!group) {
      const groups = listChangedGroups(html);
      if (groups.length > 1) {
        this.io.print(`Document also lists: ${groups.slice(1).join(", ")}.`);
      }
    }
  }

  /** `parse <schedule|changes> <file> [group]` */
  async initializeBasicParsingProcessByArguments(
    args: readonly string[],
  ): Promise<void> {
    const [kind, ...rest] = args;
    switch (kind?.toLowerCase()) {
      case "schedule":
        return this.parseSchedule(rest);
      case "changes":
        return this.parseChanges(rest);
      default:
        throw new UsageError(`Usage: ${USAGE.parse}`);
    }
  }

  // --- Results ---

  async writeLastResult(args: readonly string[] = []): Promise<void> {
    if (!this.result) throw new UsageError("Nothing to write yet");
    const path = args[0] ?? this.outputPath;
    await writeFile(path, `${this.result.toString()}\n`, "utf8");
    this.io.print(`Result written to ${path}.`);
  }

  showLastResult(): void {
    this.io.print(this.result ? this.result.toString() : "No result yet.");
  }

  // --- Session ---

  showHelp(): void {
    this.io.print("Supported commands:");
    for (const [keyword, description] of Object.entries(this.descriptions)) {
      this.io.print(`  ${keyword.padEnd(10)}${description}`);
    }
    this.io.print(`Usage: ${Object.values(USAGE).join("; ")}.`);
  }

  exit(): void {
    this.io.print("Bye!");
    this.onExit();
  }
}
