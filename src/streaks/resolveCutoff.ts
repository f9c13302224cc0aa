import { isMonthEnd, minISODate, monthEndOf, previousMonthEnd } from "../dates";
import type { ClientRange } from "../types";

/**
 * Last complete month as of the reference date. A month counts only once its
 * last day has been reached, so a mid-month reference falls back to the
 * previous month end.
 */
export function baseMonthEnd(referenceDate: string): string {
  return isMonthEnd(referenceDate) ? monthEndOf(referenceDate) : previousMonthEnd(referenceDate);
}

// The client is inactive from the month of withdrawal onward.
export function withdrawalMonthEnd(withdrawalDate: string): string {
  return previousMonthEnd(withdrawalDate);
}

export function effectiveEnd(referenceDate: string, withdrawalDate: string | null): string {
  const base = baseMonthEnd(referenceDate);
  if (withdrawalDate == null) return base;
  return minISODate(base, withdrawalMonthEnd(withdrawalDate));
}

/**
 * Returns null when every observation of the client postdates the usable
 * window; such clients are left out of the timeline entirely.
 */
export function resolveClientRange(opts: {
  clientId: string;
  firstMonth: string;
  referenceDate: string;
  withdrawalDate: string | null;
}): ClientRange | null {
  const end = effectiveEnd(opts.referenceDate, opts.withdrawalDate);
  if (opts.firstMonth > end) return null;
  return { clientId: opts.clientId, firstMonth: opts.firstMonth, effectiveEnd: end };
}
