import { ToolError } from "../errors.js";

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?([+-]\d{2}:\d{2})?)?$/;

// Date rolls 2024-02-30 over to March; reject fields that do not read back
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Parses `YYYY-MM-DD` or `YYYY-MM-DDTHH:MM[:SS[.fff]][±HH:MM]`. A trailing
 * `Z` is rewritten to `+00:00`; a timestamp without offset is read as UTC.
 */
export function parseIsoTimestamp(value: string): Date {
  const input = value.trim().replace(/Z$/i, "+00:00");
  const match = ISO_TIMESTAMP.exec(input);
  if (!match || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    throw new ToolError("validation", `Invalid date format: ${value}`);
  }

  let normalized = input;
  if (input.length === 10) {
    normalized = `${input}T00:00:00+00:00`;
  } else if (!match[4]) {
    normalized = `${input}+00:00`;
  }

  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    throw new ToolError("validation", `Invalid date format: ${value}`);
  }
  return date;
}
