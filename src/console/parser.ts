import type { CommandInfo } from "./command.js";
import type { CommandRegistry } from "./registry.js";

/** Split an input line into keyword and arguments and resolve the keyword. */
export function parseInput(registry: CommandRegistry, input: string): CommandInfo {
  const [keyword = "", ...args] = input.trim().split(/\s+/);
  return { args, action: registry.get(keyword) ?? null };
}
