import {
  fromUTCDate,
  getDayOfWeek,
  getDayOfYear,
  toUTCDate,
  type CalendarDate,
} from './date.utils';

/**
 * strftime-style formatting for calendar dates.
 *
 * Names are English (C locale). A date has no time of day, so hour, minute
 * and second directives render midnight and zone directives render nothing.
 * Directives not listed below are copied to the output as written.
 */

const DAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export const DEFAULT_DATE_FORMAT = '%Y-%m-%d';

interface DateFields {
  date: CalendarDate;
  /** 0 = Sunday */
  weekday: number;
  /** 1-based */
  yearDay: number;
}

type DirectiveRenderer = (fields: DateFields) => string;

function pad(value: number, width: number, fill = '0'): string {
  return String(value).padStart(width, fill);
}

/**
 * ISO-8601 week-numbering year and week.
 * The ISO week belongs to the year that holds its Thursday.
 */
function isoWeek(fields: DateFields): { year: number; week: number } {
  const isoWeekday = ((fields.weekday + 6) % 7) + 1;
  const thursday =
    isoWeekday === 4 ? fields.date : shiftDays(fields.date, 4 - isoWeekday);
  return {
    year: thursday.year,
    week: Math.floor((getDayOfYear(thursday) - 1) / 7) + 1,
  };
}

// Unbounded shift: ISO week lookups may step past 9999-12-31
function shiftDays(date: CalendarDate, days: number): CalendarDate {
  const utc = toUTCDate(date);
  utc.setUTCDate(utc.getUTCDate() + days);
  return fromUTCDate(utc);
}

const DIRECTIVES: Record<string, DirectiveRenderer> = {
  a: ({ weekday }) => DAY_NAMES[weekday].slice(0, 3),
  A: ({ weekday }) => DAY_NAMES[weekday],
  b: ({ date }) => MONTH_NAMES[date.month - 1].slice(0, 3),
  h: ({ date }) => MONTH_NAMES[date.month - 1].slice(0, 3),
  B: ({ date }) => MONTH_NAMES[date.month - 1],
  C: ({ date }) => pad(Math.floor(date.year / 100), 2),
  d: ({ date }) => pad(date.day, 2),
  e: ({ date }) => pad(date.day, 2, ' '),
  f: () => '000000',
  G: (fields) => pad(isoWeek(fields).year, 4),
  g: (fields) => pad(isoWeek(fields).year % 100, 2),
  H: () => '00',
  I: () => '12',
  j: ({ yearDay }) => pad(yearDay, 3),
  m: ({ date }) => pad(date.month, 2),
  M: () => '00',
  n: () => '\n',
  p: () => 'AM',
  S: () => '00',
  t: () => '\t',
  u: ({ weekday }) => String(weekday === 0 ? 7 : weekday),
  U: ({ weekday, yearDay }) =>
    pad(Math.floor((yearDay - 1 + 7 - weekday) / 7), 2),
  V: (fields) => pad(isoWeek(fields).week, 2),
  w: ({ weekday }) => String(weekday),
  W: ({ weekday, yearDay }) =>
    pad(Math.floor((yearDay - 1 + 7 - ((weekday + 6) % 7)) / 7), 2),
  y: ({ date }) => pad(date.year % 100, 2),
  Y: ({ date }) => pad(date.year, 4),
  z: () => '',
  Z: () => '',
  '%': () => '%',
};

// Composite directives expand to other directives before rendering
const COMPOSITES: Record<string, string> = {
  c: '%a %b %e %H:%M:%S %Y',
  D: '%m/%d/%y',
  F: '%Y-%m-%d',
  x: '%m/%d/%y',
  X: '%H:%M:%S',
};

function render(pattern: string, fields: DateFields): string {
  return pattern.replace(/%([\s\S]?)/g, (token: string, directive: string) => {
    const composite = COMPOSITES[directive];
    if (composite !== undefined) {
      return render(composite, fields);
    }
    const renderer = DIRECTIVES[directive];
    return renderer ? renderer(fields) : token;
  });
}

/**
 * Format a calendar date with a strftime-style pattern, e.g. `%m/%d/%Y`.
 */
export function formatDate(date: CalendarDate, pattern: string): string {
  return render(pattern, {
    date,
    weekday: getDayOfWeek(date),
    yearDay: getDayOfYear(date),
  });
}
