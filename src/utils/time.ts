import { ConfigurationError } from './errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Parse `YYYY-MM-DD` into UTC midnight epoch milliseconds.
 * Rejects impossible dates such as 2025-02-30.
 */
export function parseCalendarDate(value: string): number {
  const match = CALENDAR_DATE.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new ConfigurationError(`Invalid date "${value}", no such calendar day`);
  }
  return ms;
}

/** Inclusive list of UTC midnights between two calendar dates */
export function eachDay(startMs: number, endMs: number): number[] {
  const days: number[] = [];
  for (let current = startMs; current <= endMs; current += DAY_MS) {
    days.push(current);
  }
  return days;
}

export function formatDatePath(ms: number): string {
  const date = new Date(ms);
  return `${date.getUTCFullYear()}/${pad2(date.getUTCMonth() + 1)}/${pad2(date.getUTCDate())}`;
}

export function formatIsoDate(ms: number): string {
  return formatDatePath(ms).replace(/\//g, '-');
}

export function epochSecondsToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export interface LocalTimeParts {
  localDate: string;
  localTime: string;
}

export type LocalTimeFormatter = (epochSeconds: number) => LocalTimeParts;

/**
 * Build a formatter for the display-only local date/time columns.
 * Throws ConfigurationError for a zone name Intl does not know.
 */
export function createLocalTimeFormatter(timeZone: string): LocalTimeFormatter {
  let format: Intl.DateTimeFormat;
  try {
    format = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
  } catch (error) {
    throw new ConfigurationError(`Unknown time zone "${timeZone}": ${(error as Error).message}`);
  }

  return (epochSeconds: number): LocalTimeParts => {
    const parts: Record<string, string> = {};
    format.formatToParts(new Date(epochSeconds * 1000)).forEach((part) => {
      parts[part.type] = part.value;
    });
    return {
      localDate: `${parts.year}-${parts.month}-${parts.day}`,
      localTime: `${parts.hour}:${parts.minute}:${parts.second}`,
    };
  };
}
