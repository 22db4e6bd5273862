import type { Lesson } from "./types.js";
import { changesSchema, decode, lessonToJSON } from "./schema.js";

export interface ChangesJSON {
  absolute: boolean;
  changes: Lesson[];
}

/**
 * Overrides for one group's day.
 *
 * When `absolute` is set, `changes` replaces the day's lessons wholesale;
 * otherwise it is laid over them lesson by lesson.
 */
export class Changes {
  readonly changes: Lesson[];
  absolute: boolean;

  constructor(changes: Lesson[] = [], absolute = false) {
    this.changes = changes;
    this.absolute = absolute;
  }

  toJSON(): ChangesJSON {
    return {
      absolute: this.absolute,
      changes: this.changes.map(lessonToJSON),
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }

  static fromJSON(value: unknown): Changes {
    const data = decode(changesSchema, value, "changes");
    return new Changes(data.changes, data.absolute);
  }
}
