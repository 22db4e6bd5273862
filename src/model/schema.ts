import { z } from "zod";
import { ParseError } from "../common/types.js";
import type { Lesson } from "./types.js";
import { WEEKDAYS } from "./weekday.js";

const timeSchema = z.object({
  hours: z.number().int().min(0).max(23),
  minutes: z.number().int().min(0).max(59),
});

const teacherSchema = z.object({
  name: z.string(),
  position: z.string().optional(),
  degree: z.string().optional(),
});

export const lessonSchema = z.object({
  number: z.number().int().nonnegative(),
  start: timeSchema,
  end: timeSchema,
  subject: z.string(),
  type: z.string(),
  room: z.string(),
  teacher: teacherSchema,
  subgroup: z.number().int().positive().optional(),
  cancelled: z.boolean().optional(),
});

export const dayScheduleSchema = z.object({
  day: z.enum(WEEKDAYS),
  lessons: z.array(lessonSchema),
});

export const weekScheduleSchema = z.object({
  groupName: z.string().nullable(),
  daySchedules: z.array(dayScheduleSchema),
});

export const changesSchema = z.object({
  absolute: z.boolean(),
  changes: z.array(lessonSchema),
});

/**
 * Plain-object form of a lesson with a fixed key order, so that
 * `JSON.stringify` output does not depend on how the lesson was built.
 */
export function lessonToJSON(lesson: Lesson): Lesson {
  const teacher: Lesson["teacher"] = { name: lesson.teacher.name };
  if (lesson.teacher.position !== undefined) teacher.position = lesson.teacher.position;
  if (lesson.teacher.degree !== undefined) teacher.degree = lesson.teacher.degree;

  const json: Lesson = {
    number: lesson.number,
    start: { hours: lesson.start.hours, minutes: lesson.start.minutes },
    end: { hours: lesson.end.hours, minutes: lesson.end.minutes },
    subject: lesson.subject,
    type: lesson.type,
    room: lesson.room,
    teacher,
  };
  if (lesson.subgroup !== undefined) json.subgroup = lesson.subgroup;
  if (lesson.cancelled !== undefined) json.cancelled = lesson.cancelled;
  return json;
}

/** Validate a JSON string (or an already parsed value) against `schema`. */
export function decode<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string,
): z.infer<T> {
  let data = value;
  if (typeof value === "string") {
    try {
      data = JSON.parse(value);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ParseError(`Invalid ${what} JSON: ${reason}`);
    }
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".") || "(root)";
    throw new ParseError(`Invalid ${what} at ${path}: ${issue?.message ?? "unknown issue"}`);
  }
  return result.data;
}
