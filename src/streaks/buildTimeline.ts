import { config } from "../config";
import { monthEndOf, nextMonthEnd } from "../dates";
import type { ClientRange, TimelineEntry } from "../types";
import { classifyLevel } from "./classifyLevel";

/**
 * Expands a client range into one entry per calendar month, both ends
 * inclusive. Months without an observation get the default level.
 *
 * `balancesByMonth` is keyed by month end (YYYY-MM-DD) and holds only this
 * client's observations.
 */
export function buildTimeline(range: ClientRange, balancesByMonth: ReadonlyMap<string, number>): TimelineEntry[] {
  const out: TimelineEntry[] = [];
  let month = monthEndOf(range.firstMonth);

  while (month <= range.effectiveEnd) {
    const balance = balancesByMonth.get(month);
    out.push({
      clientId: range.clientId,
      monthEnd: month,
      level: balance === undefined ? config.levels.defaultLevel : classifyLevel(balance),
    });
    month = nextMonthEnd(month);
  }

  return out;
}
