import type { StreakEngine } from "./config";
import { DataQualityError } from "./errors";
import { log } from "./log";
import { initDb } from "./storage/initDb";
import { listBalanceObservations, replaceBalanceObservations } from "./storage/balanceRepo";
import { runStreakQuery } from "./storage/streakQuery";
import { listWithdrawals, replaceWithdrawals } from "./storage/withdrawalRepo";
import { computeStreaks, findDuplicateObservations } from "./streaks/computeStreaks";
import type { StreakParams, StreakResult } from "./types";
import type { WorkbookData } from "./workbook/readWorkbook";

/**
 * Stores the workbook tables (replacing the previous run's data) and computes
 * the per-client streaks from what was stored.
 */
export async function runStreakPipeline(opts: {
  data: Pick<WorkbookData, "observations" | "withdrawals">;
  params: StreakParams;
  engine: StreakEngine;
}): Promise<StreakResult[]> {
  const { data, params, engine } = opts;

  const dupes = findDuplicateObservations(data.observations);
  if (dupes.length > 0) {
    throw new DataQualityError("Duplicate (client, month) observations in historia", dupes);
  }

  await initDb();
  await replaceBalanceObservations(data.observations);
  await replaceWithdrawals(data.withdrawals);
  log.debug(`stored ${data.observations.length} observations and ${data.withdrawals.length} withdrawals`);

  if (engine === "sql") {
    return runStreakQuery(params);
  }

  const [observations, withdrawals] = await Promise.all([listBalanceObservations(), listWithdrawals()]);
  return computeStreaks({ observations, withdrawals, ...params });
}
