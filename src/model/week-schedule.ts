import { ScheduleError } from "../common/types.js";
import type { DaySchedule, Lesson, Weekday } from "./types.js";
import { decode, lessonToJSON, weekScheduleSchema } from "./schema.js";

export interface WeekScheduleJSON {
  groupName: string | null;
  daySchedules: { day: Weekday; lessons: Lesson[] }[];
}

/** Whole-week schedule of one group. */
export class WeekSchedule {
  groupName?: string;
  /**
   * Days in canonical order. Append through {@link WeekSchedule.addDay},
   * which keeps one entry per weekday; pushing here directly does not.
   */
  readonly daySchedules: DaySchedule[] = [];

  constructor(groupName?: string, daySchedules: DaySchedule[] = []) {
    this.groupName = groupName;
    for (const day of daySchedules) this.addDay(day);
  }

  /** Append a day. A week holds at most one entry per weekday. */
  addDay(day: DaySchedule): void {
    if (this.getDay(day.day)) {
      throw new ScheduleError(
        `Duplicate ${day.day} in schedule of ${this.groupName ?? "unnamed group"}`,
      );
    }
    this.daySchedules.push(day);
  }

  getDay(weekday: Weekday): DaySchedule | undefined {
    return this.daySchedules.find((d) => d.day === weekday);
  }

  toJSON(): WeekScheduleJSON {
    return {
      groupName: this.groupName ?? null,
      daySchedules: this.daySchedules.map((d) => ({
        day: d.day,
        lessons: d.lessons.map(lessonToJSON),
      })),
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }

  static fromJSON(value: unknown): WeekSchedule {
    const data = decode(weekScheduleSchema, value, "schedule");
    return new WeekSchedule(data.groupName ?? undefined, data.daySchedules);
  }
}
