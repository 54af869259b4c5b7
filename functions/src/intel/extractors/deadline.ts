import {
  CONTEXT_WINDOW,
  DATE_GRAMMARS,
  DEADLINE_CONTEXTS,
} from "../patterns";
import {
  candidateFromMatch,
  diffDays,
  resolveCandidate,
  todayISO,
  type CalendarDate,
  type DateCandidate,
} from "../dates";

/**
 * Every date-shaped match in `text`, grammar by grammar and, within a
 * grammar, in document order. Candidates are not validated yet.
 */
export function findDateCandidates(text: string): DateCandidate[] {
  const out: DateCandidate[] = [];
  for (const { pattern, order } of DATE_GRAMMARS) {
    for (const match of text.matchAll(pattern)) {
      const candidate = candidateFromMatch(match, order);
      if (candidate) out.push(candidate);
    }
  }
  return out;
}

function firstValidDate(
  candidates: readonly DateCandidate[],
  accept: (c: DateCandidate, date: CalendarDate) => boolean
): CalendarDate | null {
  for (const candidate of candidates) {
    const date = resolveCandidate(candidate);
    if (date && accept(candidate, date)) return date;
  }
  return null;
}

/**
 * Phase 1: dates inside a window around a deadline phrase. Candidates come
 * from the whole text and must lie entirely within the window, so a date cut
 * by a window edge is never read as a shorter one.
 */
function contextAnchoredDeadline(
  text: string,
  candidates: readonly DateCandidate[]
): CalendarDate | null {
  for (const context of DEADLINE_CONTEXTS) {
    for (const match of text.matchAll(context)) {
      const at = match.index ?? 0;
      const start = Math.max(0, at - CONTEXT_WINDOW.before);
      const end = Math.min(
        text.length,
        at + match[0].length + CONTEXT_WINDOW.after
      );
      const found = firstValidDate(
        candidates,
        ({ sourceSpan }) => sourceSpan.start >= start && sourceSpan.end <= end
      );
      if (found) return found;
    }
  }
  return null;
}

/** Phase 2: first date anywhere in the text that is still ahead of us. */
function fallbackDeadline(
  candidates: readonly DateCandidate[],
  today: CalendarDate
): CalendarDate | null {
  return firstValidDate(candidates, (_, date) => diffDays(today, date) > 0);
}

/**
 * Client deadline stated in a tender text, or `null`.
 *
 * Dates near a deadline phrase win, phrases being tried in priority order.
 * Without one, the first future date anywhere in the text is taken; past
 * dates in the open text are company history, not deadlines.
 */
export function extractDeadline(
  text: string,
  today: CalendarDate = todayISO()
): CalendarDate | null {
  if (!text) return null;
  const candidates = findDateCandidates(text);
  return (
    contextAnchoredDeadline(text, candidates) ??
    fallbackDeadline(candidates, today)
  );
}
