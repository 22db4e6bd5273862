import type { Time, Teacher } from "../common/types.js";
import type { Weekday } from "./weekday.js";

export type { Weekday };

/** One scheduled class occurrence. */
export interface Lesson {
  /** Slot number (пара). */
  number: number;
  start: Time;
  end: Time;
  subject: string;
  /** Lesson kind code ("лк", "пр", "лб", ...), empty if not given. */
  type: string;
  room: string;
  teacher: Teacher;
  subgroup?: number;
  /** Set on lessons inside {@link Changes} that are called off. */
  cancelled?: boolean;
}

export interface DaySchedule {
  day: Weekday;
  lessons: Lesson[];
}
