import type { DebtLevel } from "./types";

export type StreakEngine = "sql" | "memory";

type LevelThreshold = { level: DebtLevel; minBalance: number };

// Lower bound (inclusive) of each level above N0, ascending.
const thresholds: LevelThreshold[] = [
  { level: "N1", minBalance: 300_000 },
  { level: "N2", minBalance: 1_000_000 },
  { level: "N3", minBalance: 3_000_000 },
  { level: "N4", minBalance: 5_000_000 },
];

// Assumed for any month in range without an observation.
const defaultLevel: DebtLevel = "N0";

const defaultEngine: StreakEngine = "sql";

export const config = {
  levels: {
    thresholds,
    defaultLevel,
  },
  workbook: {
    historiaSheet: "historia",
    retirosSheet: "retiros",
    historiaColumns: ["identificacion", "corte_mes", "saldo"],
    retirosColumns: ["identificacion", "fecha_retiro"],
  },
  run: {
    excelPath: process.env.RACHAS_EXCEL_PATH || "Prueba Tecnica.xlsx",
    outPath: process.env.RACHAS_OUT_PATH || "resultados_rachas.csv",
    engine: defaultEngine,
    reportTopN: 20,
  },
  db: {
    url: process.env.RACHAS_DB_URL || "file:rachas.db",
    authToken: process.env.RACHAS_DB_AUTH_TOKEN || undefined,
  },
};
