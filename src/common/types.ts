/** Wall-clock time of a lesson boundary. */
export interface Time {
  hours: number;
  minutes: number;
}

/** Lesson teacher, with academic position ("доц.") and degree ("к.т.н.") split off. */
export interface Teacher {
  name: string;
  position?: string;
  degree?: string;
}

/** A source document or serialized model that cannot be read. */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

/** A week that would hold two entries for one weekday. */
export class ScheduleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleError";
  }
}

/** Bad command arguments, or a command with nothing to act on. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
