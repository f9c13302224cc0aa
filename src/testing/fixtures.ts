import { nextMonthEnd } from "../dates";
import type { BalanceObservation, WithdrawalRecord } from "../types";

// One observation per consecutive month starting at `firstMonthEnd`; null leaves the month unreported.
export function monthly(clientId: string, firstMonthEnd: string, balances: (number | null)[]): BalanceObservation[] {
  const out: BalanceObservation[] = [];
  let month = firstMonthEnd;
  for (const balance of balances) {
    if (balance !== null) out.push({ clientId, monthEnd: month, balance });
    month = nextMonthEnd(month);
  }
  return out;
}

/**
 * C1: N0 x2 then N1 x3 from Jan 2024, never withdrawn.
 * C2: N2 in Jan and Apr 2024, unreported in between.
 * C3: N1 from Oct 2024.
 * C4: N3 every month Jan-Oct 2024, withdrawn 2024-07-01.
 * C5: single N4 month in May 2024, withdrawn before it (2024-03-10).
 * C6: N1 x2 then N2 x2 from Jan 2024 (balances on the level boundaries).
 * X9: withdrawal record only.
 */
export function portfolio(): { observations: BalanceObservation[]; withdrawals: WithdrawalRecord[] } {
  return {
    observations: [
      ...monthly("C1", "2024-01-31", [250_000, 250_000, 400_000, 400_000, 400_000]),
      ...monthly("C2", "2024-01-31", [1_500_000, null, null, 1_200_000]),
      ...monthly("C3", "2024-10-31", [500_000, 500_000, 500_000]),
      ...monthly("C4", "2024-01-31", Array<number>(10).fill(3_500_000)),
      ...monthly("C5", "2024-05-31", [6_000_000]),
      ...monthly("C6", "2024-01-31", [300_000, 999_999, 1_000_000, 2_999_999]),
    ],
    withdrawals: [
      { clientId: "C1", withdrawalDate: null },
      { clientId: "C4", withdrawalDate: "2024-07-01" },
      { clientId: "C5", withdrawalDate: "2024-03-10" },
      { clientId: "X9", withdrawalDate: "2024-02-15" },
    ],
  };
}
