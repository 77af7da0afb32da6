import { format, isValid, parse } from "date-fns";

export const SOURCE_TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";
export const DEFAULT_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'";

export type DateFormatter = (date: Date) => string;

/** Throws a RangeError up front when date-fns rejects the pattern. */
export function createDateFormatter(pattern: string = DEFAULT_DATE_FORMAT): DateFormatter {
  try {
    format(new Date(0), pattern);
  } catch (err) {
    throw new RangeError(`invalid date format pattern: ${pattern}`, { cause: err });
  }
  return (date) => format(date, pattern);
}

export function tryParseSourceTimestamp(value: string): Date | null {
  const parsed = parse(value, SOURCE_TIMESTAMP_FORMAT, new Date(0));
  return isValid(parsed) ? parsed : null;
}

