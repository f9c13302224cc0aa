import { isISODate, isMonthEnd } from "../dates";
import { DataQualityError } from "../errors";
import type { BalanceObservation, ClientRange, StreakResult, WithdrawalRecord } from "../types";
import { buildTimeline } from "./buildTimeline";
import { parseStreakParams } from "./params";
import { resolveClientRange } from "./resolveCutoff";
import { collectStreaks } from "./segmentStreaks";
import { selectStreak } from "./selectStreak";

export type ClientHistory = {
  firstMonth: string;
  balancesByMonth: Map<string, number>;
};

function compareIds(a: string, b: string): number {
  // Binary order, same as SQLite's default collation for ORDER BY.
  return a < b ? -1 : a > b ? 1 : 0;
}

export function findDuplicateObservations(observations: BalanceObservation[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const o of observations) {
    const key = `${o.clientId}@${o.monthEnd}`;
    if (seen.has(key)) dupes.add(key);
    seen.add(key);
  }
  return Array.from(dupes).sort(compareIds);
}

function groupByClient(observations: BalanceObservation[]): Map<string, ClientHistory> {
  const invalid = observations
    .filter((o) => !isISODate(o.monthEnd) || !isMonthEnd(o.monthEnd))
    .map((o) => `${o.clientId}@${o.monthEnd}`);
  if (invalid.length > 0) {
    throw new DataQualityError("Observations must be dated at a month end", invalid);
  }

  const dupes = findDuplicateObservations(observations);
  if (dupes.length > 0) {
    throw new DataQualityError("Duplicate (client, month) observations", dupes);
  }

  const out = new Map<string, ClientHistory>();
  for (const o of observations) {
    const existing = out.get(o.clientId);
    if (existing) {
      existing.balancesByMonth.set(o.monthEnd, o.balance);
      if (o.monthEnd < existing.firstMonth) existing.firstMonth = o.monthEnd;
    } else {
      out.set(o.clientId, { firstMonth: o.monthEnd, balancesByMonth: new Map([[o.monthEnd, o.balance]]) });
    }
  }
  return out;
}

function indexWithdrawals(withdrawals: WithdrawalRecord[]): Map<string, string | null> {
  const out = new Map<string, string | null>();
  const dupes: string[] = [];
  const invalid: string[] = [];
  for (const w of withdrawals) {
    if (out.has(w.clientId)) dupes.push(w.clientId);
    if (w.withdrawalDate != null && !isISODate(w.withdrawalDate)) invalid.push(`${w.clientId}@${w.withdrawalDate}`);
    out.set(w.clientId, w.withdrawalDate);
  }
  if (dupes.length > 0) throw new DataQualityError("More than one withdrawal record per client", dupes);
  if (invalid.length > 0) throw new DataQualityError("Invalid withdrawal dates", invalid);
  return out;
}

export function resolveClientRanges(opts: {
  observations: BalanceObservation[];
  withdrawals: WithdrawalRecord[];
  referenceDate: string;
}): { ranges: ClientRange[]; histories: Map<string, ClientHistory> } {
  const histories = groupByClient(opts.observations);
  const withdrawalsByClient = indexWithdrawals(opts.withdrawals);

  const ranges: ClientRange[] = [];
  // Clients found only in the withdrawals table have no first month and never get here.
  for (const [clientId, history] of histories) {
    const range = resolveClientRange({
      clientId,
      firstMonth: history.firstMonth,
      referenceDate: opts.referenceDate,
      withdrawalDate: withdrawalsByClient.get(clientId) ?? null,
    });
    if (range) ranges.push(range);
  }
  ranges.sort((a, b) => compareIds(a.clientId, b.clientId));
  return { ranges, histories };
}

/**
 * In-memory streak engine: one pass per client, result sorted by client id.
 * Parameters are validated before anything else runs.
 */
export function computeStreaks(opts: {
  observations: BalanceObservation[];
  withdrawals: WithdrawalRecord[];
  referenceDate: unknown;
  minLength: unknown;
}): StreakResult[] {
  const { referenceDate, minLength } = parseStreakParams(opts);
  const { ranges, histories } = resolveClientRanges({
    observations: opts.observations,
    withdrawals: opts.withdrawals,
    referenceDate,
  });

  const results: StreakResult[] = [];
  for (const range of ranges) {
    const history = histories.get(range.clientId);
    if (!history) continue;
    const timeline = buildTimeline(range, history.balancesByMonth);
    const best = selectStreak(collectStreaks(timeline), minLength);
    if (!best) continue;
    results.push({
      identificacion: best.clientId,
      racha: best.length,
      fecha_fin: best.endMonth,
      nivel: best.level,
    });
  }
  return results;
}
