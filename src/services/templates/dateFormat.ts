const EXTENDED_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,]\d{1,6})?)?)?(Z|[+-]\d{2}(?::?\d{2}(?::?\d{2})?)?)?)?$/;
const BASIC_DATE =
  /^(\d{4})(\d{2})(\d{2})(?:[T ](\d{2})(?:(\d{2})(?:(\d{2})(?:[.,]\d{1,6})?)?)?(Z|[+-]\d{2}(?::?\d{2}(?::?\d{2})?)?)?)?$/;

const pad = (value: number) => String(value).padStart(2, '0');

function daysInMonth(year: number, month: number) {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isValidTime(hours?: string, minutes?: string, seconds?: string) {
  if (hours !== undefined && Number(hours) > 23) return false;
  if (minutes !== undefined && Number(minutes) > 59) return false;
  if (seconds !== undefined && Number(seconds) > 59) return false;
  return true;
}

/**
 * Formats `YYYY-MM-DD`, `YYYYMMDD` or an ISO-8601 timestamp in either form as `MM/DD/YYYY`,
 * using the date as written.
 * Anything that does not parse comes back unchanged.
 */
export function formatDate(input: string): string {
  const match = EXTENDED_DATE.exec(input) ?? BASIC_DATE.exec(input);
  if (!match) return input;

  const [, yearText, monthText, dayText, hours, minutes, seconds] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);

  if (year < 1 || month < 1 || month > 12) return input;
  if (day < 1 || day > daysInMonth(year, month)) return input;
  if (!isValidTime(hours, minutes, seconds)) return input;

  return `${pad(month)}/${pad(day)}/${String(year).padStart(4, '0')}`;
}
