export type DebtLevel = "N0" | "N1" | "N2" | "N3" | "N4";

export const DEBT_LEVELS: readonly DebtLevel[] = ["N0", "N1", "N2", "N3", "N4"];

export interface BalanceObservation {
  clientId: string;
  monthEnd: string; // YYYY-MM-DD, last day of the month
  balance: number; // integer >= 0
}

export interface WithdrawalRecord {
  clientId: string;
  withdrawalDate: string | null; // YYYY-MM-DD; null while the client is active
}

export interface ClientRange {
  clientId: string;
  firstMonth: string;
  effectiveEnd: string;
}

export interface TimelineEntry {
  clientId: string;
  monthEnd: string;
  level: DebtLevel;
}

export interface SegmentedEntry extends TimelineEntry {
  streakId: number;
}

export interface Streak {
  clientId: string;
  level: DebtLevel;
  startMonth: string;
  endMonth: string;
  length: number;
}

// Column names match the CSV written for the downstream consumers.
export interface StreakResult {
  identificacion: string;
  racha: number;
  fecha_fin: string;
  nivel: DebtLevel;
}

export interface StreakParams {
  referenceDate: string; // YYYY-MM-DD (fecha_base)
  minLength: number; // n
}
