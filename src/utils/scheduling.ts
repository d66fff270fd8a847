import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';

dayjs.extend(utc);
dayjs.extend(timezone);

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_RE = /^([01]\d|2[0-3]):[0-5]\d$/;

// Minute-level helpers
export const toMinutes = (hhmm: string) => {
  if (!TIME_RE.test(String(hhmm || ''))) return NaN;
  const [hh, mm] = hhmm.split(':').map(x => parseInt(x, 10));
  return hh * 60 + mm;
};

export const compareTimes = (a: string, b: string) => toMinutes(a) - toMinutes(b);

export const isValidTime = (hhmm: string) => TIME_RE.test(String(hhmm || ''));

// Rejects impossible dates such as 2024-02-30 as well as malformed strings
export const isValidDate = (d: string) => {
  if (!DATE_RE.test(String(d || ''))) return false;
  const parsed = dayjs.utc(d);
  return parsed.isValid() && parsed.format('YYYY-MM-DD') === d;
};

// Weekday of a calendar date with Monday = 0 .. Sunday = 6
export const weekdayOf = (d: string) => (dayjs.utc(d).day() + 6) % 7;

export const isValidTimeZone = (tz: string) => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
};

// Absolute instant of a wall-clock date/time in the given zone
export const slotInstant = (date: string, time: string, tz: string): Date =>
  dayjs.tz(`${date}T${time}:00`, tz).toDate();

// Calendar date of `now` as seen in the given zone
export const localDate = (now: Date, tz: string) => dayjs(now).tz(tz).format('YYYY-MM-DD');

// `count` consecutive calendar dates starting at `start` (inclusive)
export const dateRange = (start: string, count: number): string[] => {
  const out: string[] = [];
  let cursor = dayjs.utc(start);
  for (let i = 0; i < count; i++) {
    out.push(cursor.format('YYYY-MM-DD'));
    cursor = cursor.add(1, 'day');
  }
  return out;
};

export const compareSlots = (a: { date: string; time: string }, b: { date: string; time: string }) =>
  a.date === b.date ? compareTimes(a.time, b.time) : (a.date < b.date ? -1 : 1);

export default {
  toMinutes,
  compareTimes,
  isValidTime,
  isValidDate,
  weekdayOf,
  isValidTimeZone,
  slotInstant,
  localDate,
  dateRange,
  compareSlots,
};
