import { describe, it, expect } from "vitest";
import { Command } from "../src/console/command.js";
import { DESCRIPTIONS } from "../src/console/locale.js";
import { parseInput } from "../src/console/parser.js";
import {
  CommandRegistry,
  createCommandRegistry,
} from "../src/console/registry.js";
import { RecordingController } from "./helpers.js";

const KEYWORDS = ["schedule", "changes", "help", "parse", "write", "show", "exit"];

describe("createCommandRegistry", () => {
  it("registers the seven commands with localized descriptions", () => {
    const registry = createCommandRegistry(new RecordingController(), DESCRIPTIONS.en);
    expect(registry.keywords()).toEqual(KEYWORDS);
    expect(registry.get("help")?.description).toBe(
      "Show context help for this application",
    );
    expect(registry.get("exit")?.command.name).toBe("Exit");
  });

  it("binds each keyword to its controller capability", async () => {
    const controller = new RecordingController();
    const registry = createCommandRegistry(controller, DESCRIPTIONS.ru);
    for (const keyword of KEYWORDS) {
      await registry.get(keyword)?.command.bind(["a", "b"]).execute();
    }
    expect(controller.calls).toEqual([
      ["parseSchedule", ["a", "b"]],
      ["parseChanges", ["a", "b"]],
      ["showHelp", undefined],
      ["initializeBasicParsingProcessByArguments", ["a", "b"]],
      ["writeLastResult", ["a", "b"]],
      ["showLastResult", undefined],
      ["exit", undefined],
    ]);
  });
});

describe("CommandRegistry", () => {
  const noop = new Command("Noop", () => {});

  it("normalizes keywords on insert and on lookup", () => {
    const registry = new CommandRegistry([["NoOp", { description: "d", command: noop }]]);
    expect(registry.keywords()).toEqual(["noop"]);
    expect(registry.get("NOOP")?.command).toBe(noop);
    expect(registry.get("other")).toBeUndefined();
  });

  it("refuses duplicate keywords", () => {
    expect(
      () =>
        new CommandRegistry([
          ["noop", { description: "a", command: noop }],
          ["NOOP", { description: "b", command: noop }],
        ]),
    ).toThrow('Command "noop" is registered twice');
  });
});

describe("Command", () => {
  it("binds arguments into a separate value per invocation", async () => {
    const seen: (readonly string[])[] = [];
    const command = new Command("Echo", (args) => {
      seen.push(args);
    });
    const first = command.bind(["x"]);
    const second = command.bind();
    await second.execute();
    await first.execute();
    expect(seen).toEqual([[], ["x"]]);
    expect(first.name).toBe("Echo");
    expect(Object.isFrozen(first.args)).toBe(true);
  });

  it("copies the argument list it is bound with", () => {
    const args = ["x"];
    const bound = new Command("Echo", () => {}).bind(args);
    args.push("y");
    expect(bound.args).toEqual(["x"]);
  });
});

describe("parseInput", () => {
  const registry = createCommandRegistry(new RecordingController(), DESCRIPTIONS.en);

  it("resolves keywords in any letter case", () => {
    for (const keyword of KEYWORDS) {
      const canonical = parseInput(registry, keyword).action;
      expect(canonical).not.toBeNull();
      expect(parseInput(registry, keyword.toUpperCase()).action).toBe(canonical);
      const mixed = keyword[0].toUpperCase() + keyword.slice(1);
      expect(parseInput(registry, mixed).action).toBe(canonical);
    }
  });

  it("splits the rest of the line into arguments", () => {
    const info = parseInput(registry, "  schedule   path/to/file.html  ИВТ-41-22 ");
    expect(info.action?.command.name).toBe("Schedule");
    expect(info.args).toEqual(["path/to/file.html", "ИВТ-41-22"]);
  });

  it("yields no arguments for a bare keyword", () => {
    expect(parseInput(registry, "Help").args).toEqual([]);
  });

  it("yields no action for unknown keywords", () => {
    expect(parseInput(registry, "delete everything").action).toBeNull();
    expect(parseInput(registry, "").action).toBeNull();
    expect(parseInput(registry, "helpme").action).toBeNull();
  });
});
