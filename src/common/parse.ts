import { parseHTML } from "linkedom";
import { ParseError, type Time, type Teacher } from "./types.js";

/** Document of a schedule or changes page. */
export function parseHtml(html: string) {
  return parseHTML(html).document;
}

/** Trimmed text of a cell, empty when the cell is missing. */
export function text(cell: Element | null): string {
  return cell?.textContent?.trim() ?? "";
}

/** Parse "HH:MM" into {hours, minutes}; out-of-day values are a ParseError. */
export function parseTime(value: string): Time {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) throw new ParseError(`Invalid time: "${value}"`);

  const hours = parseInt(match[1]);
  const minutes = parseInt(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new ParseError(`Time out of range: "${value}"`);
  }
  return { hours, minutes };
}

/**
 * Parse "1 пара (08:20 - 09:40)" -> slot number with start/end.
 * A cell that does not start with a slot number (e.g. a bare
 * "08:20 - 09:40") yields null.
 */
export function parseSlot(
  value: string,
): { number: number; start: Time; end: Time } | null {
  const numberMatch = value.match(/^(\d+)(?![\d:])/);
  if (!numberMatch) return null;

  const timeMatch = value.match(/(\d{1,2}:\d{2})\s*-\s*(\d{1,2}:\d{2})/);
  return {
    number: parseInt(numberMatch[1]),
    start: parseTime(timeMatch?.[1] ?? "00:00"),
    end: parseTime(timeMatch?.[2] ?? "00:00"),
  };
}

const POSITIONS = /^(доц\.|проф\.|ст\.\s?преп\.|преп\.|асс\.)\s*/;
const DEGREES = /^([кд]\.[а-яё.-]+н\.)\s*/;

/** Split "доц. к.т.н. Иванов И.И." into position, degree and name. */
export function parseTeacher(value: string): Teacher {
  let rest = value.trim();
  if (!rest) return { name: "" };

  const teacher: Teacher = { name: "" };
  const position = rest.match(POSITIONS);
  if (position) {
    teacher.position = position[1];
    rest = rest.slice(position[0].length);
  }
  const degree = rest.match(DEGREES);
  if (degree) {
    teacher.degree = degree[1];
    rest = rest.slice(degree[0].length);
  }
  teacher.name = rest.trim();
  return teacher;
}
