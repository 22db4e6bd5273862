/**
 * Capabilities the console commands call into. The session never looks at
 * controller state; it only runs the bound command actions.
 */
export interface Controller {
  parseSchedule(args: readonly string[]): void | Promise<void>;
  parseChanges(args: readonly string[]): void | Promise<void>;
  showHelp(): void | Promise<void>;
  initializeBasicParsingProcessByArguments(
    args: readonly string[],
  ): void | Promise<void>;
  writeLastResult(args?: readonly string[]): void | Promise<void>;
  showLastResult(): void | Promise<void>;
  exit(): void | Promise<void>;
}
