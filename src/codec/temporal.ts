import * as pgTypes from 'pg-types';
import { TemporalParseError } from './errors';

/**
 * Calendar context for zone-less temporal text
 */
export interface TemporalCalendar {
  timeZone: 'local' | 'utc';
}

/**
 * Calendar-aware parser for date, time and timestamp text
 * Each method throws TemporalParseError for text it cannot read
 */
export interface TemporalParser {
  toDate(text: string, calendar?: TemporalCalendar): Date;
  toTime(text: string, calendar?: TemporalCalendar): Date;
  toTimestamp(text: string, calendar?: TemporalCalendar): Date;
}

const LOCAL_CALENDAR: TemporalCalendar = { timeZone: 'local' };

const DATE_ONLY = /^(\d+-\d{2}-\d{2})(\s+BC)?$/;

// Trailing zone on the time part, e.g. "10:00:00+02", "10:00:00.5-03:30", "10:00:00Z"
const EXPLICIT_ZONE = /\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2}){0,2})(\s+BC)?$/;

/**
 * Temporal parser built on the pg-types text parsers
 * Zone-less input is read in the calendar's zone; input with an explicit offset keeps it
 */
export class PgTemporalParser implements TemporalParser {
  private readonly parseTimestampText: (text: string) => unknown =
    pgTypes.getTypeParser(pgTypes.builtins.TIMESTAMPTZ, 'text');

  toDate(text: string, calendar: TemporalCalendar = LOCAL_CALENDAR): Date {
    const parsed = this.parse(text, 'date', calendar);
    if (calendar.timeZone === 'utc') {
      return utcDate(parsed.getUTCFullYear(), parsed.getUTCMonth(), parsed.getUTCDate(), 0, 0, 0, 0);
    }
    return localDate(parsed.getFullYear(), parsed.getMonth(), parsed.getDate(), 0, 0, 0, 0);
  }

  toTime(text: string, calendar: TemporalCalendar = LOCAL_CALENDAR): Date {
    return this.parse(`1970-01-01 ${text.trim()}`, 'time', calendar, text);
  }

  toTimestamp(text: string, calendar: TemporalCalendar = LOCAL_CALENDAR): Date {
    return this.parse(text, 'timestamp', calendar);
  }

  private parse(
    text: string,
    target: TemporalParseError['target'],
    calendar: TemporalCalendar,
    original: string = text,
  ): Date {
    const trimmed = text.trim();
    const dateOnly = DATE_ONLY.exec(trimmed);
    const parsed = this.parseTimestampText(dateOnly ? `${dateOnly[1]} 00:00:00${dateOnly[2] ?? ''}` : trimmed);
    if (!(parsed instanceof Date) || Number.isNaN(parsed.getTime())) {
      throw new TemporalParseError(target, original);
    }
    if (calendar.timeZone === 'utc' && !EXPLICIT_ZONE.test(trimmed)) {
      // pg-types reads zone-less text as local time; move the wall clock to UTC
      return utcDate(
        parsed.getFullYear(),
        parsed.getMonth(),
        parsed.getDate(),
        parsed.getHours(),
        parsed.getMinutes(),
        parsed.getSeconds(),
        parsed.getMilliseconds(),
      );
    }
    return parsed;
  }
}

function utcDate(year: number, month: number, day: number, hours: number, minutes: number, seconds: number, ms: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hours, minutes, seconds, ms);
  return date;
}

function localDate(year: number, month: number, day: number, hours: number, minutes: number, seconds: number, ms: number): Date {
  const date = new Date(0);
  date.setFullYear(year, month, day);
  date.setHours(hours, minutes, seconds, ms);
  return date;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

// Calendar fields of an instant as read in the calendar's zone
function fieldsOf(date: Date, calendar: TemporalCalendar) {
  if (calendar.timeZone === 'utc') {
    return {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth(),
      day: date.getUTCDate(),
      hours: date.getUTCHours(),
      minutes: date.getUTCMinutes(),
      seconds: date.getUTCSeconds(),
      ms: date.getUTCMilliseconds(),
    };
  }
  return {
    year: date.getFullYear(),
    month: date.getMonth(),
    day: date.getDate(),
    hours: date.getHours(),
    minutes: date.getMinutes(),
    seconds: date.getSeconds(),
    ms: date.getMilliseconds(),
  };
}

/**
 * Formatters read the instant in the same zone the parser used for zone-less text
 */
export function formatDate(date: Date, calendar: TemporalCalendar = LOCAL_CALENDAR): string {
  const { year, month, day } = fieldsOf(date, calendar);
  return `${pad(year, 4)}-${pad(month + 1, 2)}-${pad(day, 2)}`;
}

export function formatTime(date: Date, calendar: TemporalCalendar = LOCAL_CALENDAR): string {
  const { hours, minutes, seconds, ms } = fieldsOf(date, calendar);
  const time = `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}`;
  return ms === 0 ? time : `${time}.${pad(ms, 3)}`;
}

export function formatTimestamp(date: Date, calendar: TemporalCalendar = LOCAL_CALENDAR): string {
  return `${formatDate(date, calendar)} ${formatTime(date, calendar)}`;
}
