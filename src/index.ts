export { Changes } from "./model/changes.js";
export type { ChangesJSON } from "./model/changes.js";
export { WeekSchedule } from "./model/week-schedule.js";
export type { WeekScheduleJSON } from "./model/week-schedule.js";
export { WEEKDAYS, parseWeekday } from "./model/weekday.js";
export type { Weekday, Lesson, DaySchedule } from "./model/types.js";
export { Command, BoundCommand } from "./console/command.js";
export type {
  CommandAction,
  CommandEntry,
  CommandInfo,
} from "./console/command.js";
export {
  CommandRegistry,
  createCommandRegistry,
} from "./console/registry.js";
export { parseInput } from "./console/parser.js";
export { Session, PROMPT, UNSUPPORTED } from "./console/session.js";
export type { SessionOptions, SessionState } from "./console/session.js";
export { greet } from "./console/greeting.js";
export { createConsoleIO } from "./console/io.js";
export type { ConsoleIO, ClosableConsoleIO } from "./console/io.js";
export {
  DESCRIPTIONS,
  resolveLocale,
  getDescriptions,
} from "./console/locale.js";
export type {
  CommandDescriptions,
  CommandKeyword,
  LocaleTag,
} from "./console/locale.js";
export { BasicController } from "./controller/basic.js";
export type {
  BasicControllerOptions,
  ParseResult,
} from "./controller/basic.js";
export type { Controller } from "./controller/types.js";
export {
  parseScheduleDocument,
  parseChangesDocument,
  listChangedGroups,
} from "./document/parse.js";
export { createSession } from "./app.js";
export type { AppOptions } from "./app.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { ParseError, ScheduleError, UsageError } from "./common/types.js";
export type { Time, Teacher } from "./common/types.js";
