import {
  parseHtml,
  parseSlot,
  parseTeacher,
  text,
} from "../common/parse.js";
import { ParseError } from "../common/types.js";
import { Changes } from "../model/changes.js";
import type { DaySchedule, Lesson } from "../model/types.js";
import { WeekSchedule } from "../model/week-schedule.js";
import { parseWeekday } from "../model/weekday.js";

export function parseLessonRow(row: Element): Lesson | null {
  const slot = parseSlot(text(row.querySelector("td.time")));
  if (!slot) return null;

  const subject = text(row.querySelector("td.subject"));
  if (!subject) return null;

  const lesson: Lesson = {
    number: slot.number,
    start: slot.start,
    end: slot.end,
    subject,
    type: text(row.querySelector("td.type")),
    room: text(row.querySelector("td.room")),
    teacher: parseTeacher(text(row.querySelector("td.teacher"))),
  };

  const subgroup = parseInt(row.getAttribute("data-subgroup") ?? "");
  if (subgroup > 0) lesson.subgroup = subgroup;
  if (row.classList.contains("cancelled")) lesson.cancelled = true;
  return lesson;
}

// --- Week schedule ---

export function parseScheduleDocument(html: string): WeekSchedule {
  const doc = parseHtml(html);
  const table = doc.querySelector("table.schedule");
  if (!table) throw new ParseError("Schedule table not found");

  const groupName = table.getAttribute("data-group")?.trim() || undefined;
  const schedule = new WeekSchedule(groupName);
  let currentDay: DaySchedule | null = null;

  for (const row of table.querySelectorAll("tr")) {
    if (row.classList.contains("day")) {
      const dayName = text(row.querySelector("th, td"));
      const day = parseWeekday(dayName);
      if (!day) throw new ParseError(`Unknown weekday: "${dayName}"`);
      currentDay = { day, lessons: [] };
      schedule.addDay(currentDay);
      continue;
    }

    if (!currentDay || !row.classList.contains("lesson")) continue;

    const lesson = parseLessonRow(row);
    if (lesson) currentDay.lessons.push(lesson);
  }

  return schedule;
}

// --- Changes ---

function parseChangesTable(table: Element): Changes {
  const lessons: Lesson[] = [];
  for (const row of table.querySelectorAll("tr.lesson")) {
    const lesson = parseLessonRow(row);
    if (lesson) lessons.push(lesson);
  }
  const absolute = table.getAttribute("data-absolute")?.trim().toLowerCase() === "true";
  return new Changes(lessons, absolute);
}

/**
 * Parse the changes for one group out of a changes document.
 * Without `group`, the first table in the document is taken.
 */
export function parseChangesDocument(html: string, group?: string): Changes {
  const doc = parseHtml(html);
  const tables = [...doc.querySelectorAll("table.changes")];

  const wanted = group?.trim().toLowerCase();
  const table = wanted
    ? tables.find(
        (t) => (t.getAttribute("data-group") ?? "").trim().toLowerCase() === wanted,
      )
    : tables[0];

  if (!table) {
    throw new ParseError(
      group ? `No changes found for group "${group}"` : "Changes table not found",
    );
  }
  return parseChangesTable(table);
}

/** Group names that have a changes table in the document. */
export function listChangedGroups(html: string): string[] {
  const doc = parseHtml(html);
  return [...doc.querySelectorAll("table.changes")]
    .map((t) => (t.getAttribute("data-group") ?? "").trim())
    .filter(Boolean);
}
