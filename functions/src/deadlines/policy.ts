import { DeadlineInputError } from "../lib/errors";
import {
  addDays,
  assertCalendarDate,
  compareDates,
  diffDays,
  todayISO,
  type CalendarDate,
} from "../intel/dates";
import {
  isBusinessDay,
  nextBusinessDay,
  previousBusinessDay,
} from "./businessDays";

export const DEFAULT_BUFFER_DAYS = 2;

export type Urgency = "critical" | "high" | "medium" | "low";

export type DeadlineState =
  | "overdue"
  | "due_today"
  | "due_soon"
  | "approaching"
  | "on_track";

export type DeadlineStatus = {
  deadline: CalendarDate;
  status: DeadlineState;
  urgency: Urgency;
  daysRemaining: number;
  isBusinessDay: boolean;
};

export type DeadlineDecision = {
  clientDeadline: CalendarDate;
  supplierDeadline: CalendarDate;
  urgency: Urgency;
  status: DeadlineState;
  /** Days until the supplier deadline. */
  daysRemaining: number;
  clientDaysRemaining: number;
  /** Smaller than the requested buffer when the deadline was clamped. */
  effectiveBufferDays: number;
};

export type PolicyOptions = {
  bufferDays?: number;
  today?: CalendarDate;
};

function assertBufferDays(bufferDays: number) {
  if (!Number.isInteger(bufferDays) || bufferDays < 0) {
    throw new DeadlineInputError(
      "bufferDays",
      `expected a non-negative whole number of days, got ${bufferDays}`
    );
  }
}

function assertComplexity(factor: number) {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new DeadlineInputError(
      "complexityFactor",
      `expected a positive number, got ${factor}`
    );
  }
}

const latest = (a: CalendarDate, b: CalendarDate) =>
  compareDates(a, b) >= 0 ? a : b;

/**
 * Client deadline minus the buffer, never earlier than today. Clamping eats
 * into the buffer; `deadlineStatus` is where that shows up.
 */
export function supplierDeadline(
  clientDeadline: CalendarDate,
  bufferDays: number = DEFAULT_BUFFER_DAYS,
  today: CalendarDate = todayISO()
): CalendarDate {
  assertCalendarDate(clientDeadline, "clientDeadline");
  assertCalendarDate(today, "today");
  assertBufferDays(bufferDays);
  return latest(addDays(clientDeadline, -bufferDays), today);
}

/**
 * Supplier deadline with the buffer scaled for project complexity (at least
 * one day), moved back off weekends. If that lands before today, the next
 * business day after today is used.
 */
export function optimalSupplierDeadline(
  clientDeadline: CalendarDate,
  complexityFactor = 1,
  { bufferDays = DEFAULT_BUFFER_DAYS, today = todayISO() }: PolicyOptions = {}
): CalendarDate {
  assertCalendarDate(clientDeadline, "clientDeadline");
  assertCalendarDate(today, "today");
  assertBufferDays(bufferDays);
  assertComplexity(complexityFactor);

  const buffer = Math.max(1, Math.floor(bufferDays * complexityFactor));
  let d = addDays(clientDeadline, -buffer);
  if (!isBusinessDay(d)) d = previousBusinessDay(d);
  if (compareDates(d, today) < 0) d = nextBusinessDay(today);
  return d;
}

function classify(daysRemaining: number): [DeadlineState, Urgency] {
  if (daysRemaining < 0) return ["overdue", "critical"];
  if (daysRemaining === 0) return ["due_today", "critical"];
  if (daysRemaining === 1) return ["due_soon", "high"];
  if (daysRemaining <= 3) return ["approaching", "medium"];
  return ["on_track", "low"];
}

export function deadlineStatus(
  deadline: CalendarDate,
  today: CalendarDate = todayISO()
): DeadlineStatus {
  assertCalendarDate(deadline, "deadline");
  assertCalendarDate(today, "today");
  const daysRemaining = diffDays(today, deadline);
  const [status, urgency] = classify(daysRemaining);
  return {
    deadline,
    status,
    urgency,
    daysRemaining,
    isBusinessDay: isBusinessDay(deadline),
  };
}

/** Supplier deadline for a client deadline, with its urgency. */
export function decideDeadlines(
  clientDeadline: CalendarDate,
  { bufferDays = DEFAULT_BUFFER_DAYS, today = todayISO() }: PolicyOptions = {}
): DeadlineDecision {
  const supplier = supplierDeadline(clientDeadline, bufferDays, today);
  const { status, urgency, daysRemaining } = deadlineStatus(supplier, today);
  return {
    clientDeadline,
    supplierDeadline: supplier,
    urgency,
    status,
    daysRemaining,
    clientDaysRemaining: diffDays(today, clientDeadline),
    effectiveBufferDays: diffDays(supplier, clientDeadline),
  };
}

/** Day the buyer chases suppliers that have not quoted. */
export function followUpDate(quoteDeadline: CalendarDate): CalendarDate {
  assertCalendarDate(quoteDeadline, "quoteDeadline");
  return addDays(quoteDeadline, 1);
}
