import { eachDayOfInterval, format, isValid, parseISO } from "date-fns";
import { ValidationError } from "./errors.ts";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function today(): string {
  return format(new Date(), "yyyy-MM-dd");
}

/**
 * Normalize a calendar date to YYYY-MM-DD. Date objects are read in local time.
 */
export function toDateString(input: string | Date): string {
  if (input instanceof Date) {
    if (!isValid(input)) throw new ValidationError("Invalid date");
    return format(input, "yyyy-MM-dd");
  }

  const value = input.trim();
  if (!DATE_PATTERN.test(value) || !isValid(parseISO(value))) {
    throw new ValidationError(`Invalid date "${input}" (expected YYYY-MM-DD)`);
  }
  return value;
}

export function eachDateBetween(start: string, end: string): string[] {
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map(
    (day) => format(day, "yyyy-MM-dd")
  );
}
