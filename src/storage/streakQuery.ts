import type { Row, Value } from "@libsql/client";
import { config } from "../config";
import { parseStreakParams } from "../streaks/params";
import { DEBT_LEVELS, type DebtLevel, type StreakResult } from "../types";
import { dbGetAll } from "./libsqlClient";

function levelCaseSql(column: string): string {
  // Highest threshold first so the first matching WHEN wins.
  const whens = [...config.levels.thresholds]
    .sort((a, b) => b.minBalance - a.minBalance)
    .map((t) => `WHEN ${column} >= ${Math.trunc(t.minBalance)} THEN '${t.level}'`)
    .join(" ");
  return `CASE ${whens} ELSE '${config.levels.defaultLevel}' END`;
}

// Relational form of the streak engine over historia_saldos / retiros.
// :fecha_base is YYYY-MM-DD, :n the minimum streak length.
export const STREAK_QUERY = `
WITH RECURSIVE
params AS (
  SELECT date(:fecha_base) AS fecha_base, CAST(:n AS INTEGER) AS n
),
base_cut AS (
  SELECT CASE
      WHEN date(p.fecha_base, 'start of month', '+1 month', '-1 day') <= p.fecha_base
        THEN date(p.fecha_base, 'start of month', '+1 month', '-1 day')
      ELSE date(p.fecha_base, 'start of month', '-1 day')
    END AS base_month_end,
    p.n AS n
  FROM params p
),
leveled AS (
  SELECT identificacion, date(corte_mes) AS corte_mes, ${levelCaseSql("saldo")} AS nivel
  FROM historia_saldos
),
first_seen AS (
  SELECT identificacion, MIN(corte_mes) AS first_month
  FROM leveled
  GROUP BY identificacion
),
withdrawal_cut AS (
  SELECT identificacion,
    CASE WHEN fecha_retiro IS NULL OR TRIM(fecha_retiro) = '' THEN NULL
         ELSE date(fecha_retiro, 'start of month', '-1 day') END AS withdrawal_month_end
  FROM retiros
),
client_range AS (
  SELECT fs.identificacion, fs.first_month,
    CASE WHEN wc.withdrawal_month_end IS NULL THEN bc.base_month_end
         WHEN wc.withdrawal_month_end < bc.base_month_end THEN wc.withdrawal_month_end
         ELSE bc.base_month_end END AS effective_end
  FROM first_seen fs
  CROSS JOIN base_cut bc
  LEFT JOIN withdrawal_cut wc USING (identificacion)
),
usable_range AS (
  SELECT * FROM client_range WHERE first_month <= effective_end
),
months AS (
  SELECT identificacion, first_month AS corte_mes, effective_end FROM usable_range
  UNION ALL
  SELECT identificacion, date(corte_mes, 'start of month', '+2 months', '-1 day'), effective_end
  FROM months
  WHERE date(corte_mes, 'start of month', '+2 months', '-1 day') <= effective_end
),
timeline AS (
  SELECT m.identificacion, m.corte_mes, COALESCE(l.nivel, '${config.levels.defaultLevel}') AS nivel
  FROM months m
  LEFT JOIN leveled l ON l.identificacion = m.identificacion AND l.corte_mes = m.corte_mes
),
marks AS (
  SELECT t.*,
    CASE WHEN LAG(nivel) OVER w IS NULL OR nivel <> LAG(nivel) OVER w THEN 1 ELSE 0 END AS starts_run
  FROM timeline t
  WINDOW w AS (PARTITION BY identificacion ORDER BY corte_mes)
),
runs AS (
  SELECT m.*, SUM(starts_run) OVER (PARTITION BY identificacion ORDER BY corte_mes) AS run_id
  FROM marks m
),
run_totals AS (
  SELECT identificacion, nivel, run_id, COUNT(*) AS racha, MAX(corte_mes) AS fecha_fin
  FROM runs
  GROUP BY identificacion, nivel, run_id
),
ranked AS (
  SELECT rt.*,
    ROW_NUMBER() OVER (PARTITION BY identificacion ORDER BY racha DESC, fecha_fin DESC) AS rn
  FROM run_totals rt
  CROSS JOIN base_cut bc
  WHERE rt.racha >= bc.n
)
SELECT identificacion, racha, fecha_fin, nivel
FROM ranked
WHERE rn = 1
ORDER BY identificacion;
`;

function toDebtLevel(v: Value): DebtLevel {
  const level = DEBT_LEVELS.find((l) => l === v);
  if (!level) throw new Error(`Unexpected level from streak query: ${String(v)}`);
  return level;
}

function rowToResult(r: Row): StreakResult {
  return {
    identificacion: String(r.identificacion),
    racha: Number(r.racha),
    fecha_fin: String(r.fecha_fin),
    nivel: toDebtLevel(r.nivel),
  };
}

export async function runStreakQuery(params: { referenceDate: unknown; minLength: unknown }): Promise<StreakResult[]> {
  const { referenceDate, minLength } = parseStreakParams(params);
  const rows = await dbGetAll(STREAK_QUERY, { fecha_base: referenceDate, n: minLength });
  return rows.map(rowToResult);
}
