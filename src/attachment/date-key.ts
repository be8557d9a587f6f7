import { z } from "zod";
import { InvalidDateError } from "../errors.js";

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  // Day 0 of the following month is the last day of this one. setUTCFullYear
  // keeps years 0-99 as written; Date.UTC would map them to 1900-1999.
  const lastDay = new Date(0);
  lastDay.setUTCFullYear(year, month, 0);
  return day <= lastDay.getUTCDate();
}

export const DateKeySchema = z
  .string()
  .regex(DATE_KEY_PATTERN, "Expected a date in YYYY-MM-DD format")
  .refine(isCalendarDate, "Not a valid calendar date")
  .brand<"DateKey">();

export type DateKey = z.infer<typeof DateKeySchema>;

export function parseDateKey(value: string): DateKey {
  const result = DateKeySchema.safeParse(value);
  if (!result.success) {
    throw new InvalidDateError(`Invalid date key: ${JSON.stringify(value)}`, {
      value,
    });
  }
  return result.data;
}

export function isDateKey(value: string): value is DateKey {
  return DateKeySchema.safeParse(value).success;
}

/** Local calendar date of `date` as a date key. */
export function dateKeyFromDate(date: Date): DateKey {
  const yyyy = String(date.getFullYear()).padStart(4, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return parseDateKey(`${yyyy}-${mm}-${dd}`);
}
