import { LedgerError } from "./errors";

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function parseCalendarDate(value: string): Date | undefined {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== undefined;
}

function requireCalendarDate(value: string, field: string): Date {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new LedgerError(`${field} must be a YYYY-MM-DD date`, "INVALID_INPUT", {
      [field]: value,
    });
  }
  return date;
}

/** 00:00:00.000 UTC of the given calendar day. */
export function startOfDay(value: string, field = "startDate"): Date {
  return requireCalendarDate(value, field);
}

/** 23:59:59.999 UTC of the given calendar day. */
export function endOfDay(value: string, field = "endDate"): Date {
  const start = requireCalendarDate(value, field);
  return new Date(start.getTime() + 24 * 60 * 60 * 1000 - 1);
}
