import {
  addDays,
  assertCalendarDate,
  compareDates,
  dayOfWeek,
  diffDays,
  type CalendarDate,
} from "../intel/dates";

/** Monday through Friday. Public holidays are not considered. */
export function isBusinessDay(date: CalendarDate): boolean {
  assertCalendarDate(date);
  const dow = dayOfWeek(date);
  return dow !== 0 && dow !== 6;
}

/** First business day strictly after `date`. */
export function nextBusinessDay(date: CalendarDate): CalendarDate {
  let d = addDays(date, 1);
  while (!isBusinessDay(d)) d = addDays(d, 1);
  return d;
}

/** Last business day strictly before `date`. */
export function previousBusinessDay(date: CalendarDate): CalendarDate {
  let d = addDays(date, -1);
  while (!isBusinessDay(d)) d = addDays(d, -1);
  return d;
}

/** Business days from `a` to `b`, both ends included, in either order. */
export function businessDaysBetween(a: CalendarDate, b: CalendarDate): number {
  assertCalendarDate(a, "start");
  assertCalendarDate(b, "end");
  const [start, end] = compareDates(a, b) <= 0 ? [a, b] : [b, a];
  const span = diffDays(start, end) + 1;
  const fullWeeks = Math.floor(span / 7);
  let count = fullWeeks * 5;
  let d = addDays(start, fullWeeks * 7);
  for (let i = 0; i < span % 7; i++) {
    if (isBusinessDay(d)) count += 1;
    d = addDays(d, 1);
  }
  return count;
}
