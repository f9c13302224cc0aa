import { config } from "../config";
import type { DebtLevel } from "../types";

export function classifyLevel(balance: number): DebtLevel {
  let level: DebtLevel = config.levels.defaultLevel;
  for (const t of config.levels.thresholds) {
    if (balance >= t.minBalance) level = t.level;
  }
  return level;
}
