import * as XLSX from "xlsx";
import { config } from "../config";
import { monthEndOf } from "../dates";
import { DataQualityError } from "../errors";
import { log } from "../log";
import type { BalanceObservation, WithdrawalRecord } from "../types";
import { parseCellDate, parseCellInt, parseCellText } from "./parseCells";

type SheetRow = unknown[];

export interface WorkbookStats {
  historia: { loaded: number; skipped: number; negatives: number };
  retiros: { loaded: number; skipped: number };
}

export interface WorkbookData {
  observations: BalanceObservation[];
  withdrawals: WithdrawalRecord[];
  stats: WorkbookStats;
}

function isBlankRow(row: SheetRow): boolean {
  return row.every((c) => parseCellText(c) === "");
}

function sheetRows(wb: XLSX.WorkBook, name: string, expected: string[]): SheetRow[] {
  const ws = wb.Sheets[name];
  const rows = XLSX.utils.sheet_to_json<SheetRow>(ws, { header: 1, defval: null, raw: true, blankrows: true });
  if (rows.length === 0) throw new DataQualityError(`Sheet ${name}: missing header row`);

  const got = rows[0].slice(0, expected.length).map((c) => parseCellText(c).toLowerCase());
  const want = expected.map((e) => e.toLowerCase());
  if (got.length !== want.length || got.some((g, i) => g !== want[i])) {
    throw new DataQualityError(`Sheet ${name}: invalid headers`, rows[0].slice(0, expected.length).map(parseCellText));
  }
  return rows.slice(1);
}

function readHistoria(rows: SheetRow[]): { observations: BalanceObservation[]; stats: WorkbookStats["historia"] } {
  const observations: BalanceObservation[] = [];
  let skipped = 0;
  let negatives = 0;

  rows.forEach((row, i) => {
    const sheetRow = i + 2;
    if (isBlankRow(row)) {
      skipped += 1;
      log.warn(`historia row ${sheetRow}: blank`);
      return;
    }
    const clientId = parseCellText(row[0]);
    const date = parseCellDate(row[1]);
    let balance = parseCellInt(row[2]);

    if (!clientId || !date || balance === null) {
      skipped += 1;
      log.warn(`historia row ${sheetRow}: skipped`);
      return;
    }
    if (balance < 0) {
      negatives += 1;
      balance = 0;
    }
    observations.push({ clientId, monthEnd: monthEndOf(date), balance });
  });

  return { observations, stats: { loaded: observations.length, skipped, negatives } };
}

function readRetiros(rows: SheetRow[]): { withdrawals: WithdrawalRecord[]; stats: WorkbookStats["retiros"] } {
  // Later rows for the same client replace earlier ones.
  const byClient = new Map<string, WithdrawalRecord>();
  let skipped = 0;

  rows.forEach((row, i) => {
    if (isBlankRow(row)) {
      skipped += 1;
      log.warn(`retiros row ${i + 2}: blank`);
      return;
    }
    const clientId = parseCellText(row[0]);
    if (!clientId) {
      skipped += 1;
      log.warn(`retiros row ${i + 2}: empty identificacion`);
      return;
    }
    byClient.set(clientId, { clientId, withdrawalDate: parseCellDate(row[1]) });
  });

  const withdrawals = Array.from(byClient.values());
  return { withdrawals, stats: { loaded: withdrawals.length, skipped } };
}

/**
 * Reads the `historia` and `retiros` sheets. Rows that cannot be used are
 * skipped with a warning; a missing sheet or a wrong header is an error.
 */
export function readWorkbook(data: Buffer): WorkbookData {
  const wb = XLSX.read(data, { type: "buffer" });
  const { historiaSheet, retirosSheet, historiaColumns, retirosColumns } = config.workbook;
  if (!wb.SheetNames.includes(historiaSheet) || !wb.SheetNames.includes(retirosSheet)) {
    throw new DataQualityError(`Workbook must contain sheets '${historiaSheet}' and '${retirosSheet}'`);
  }

  const historia = readHistoria(sheetRows(wb, historiaSheet, historiaColumns));
  const retiros = readRetiros(sheetRows(wb, retirosSheet, retirosColumns));

  log.info(
    `historia: ${historia.stats.loaded} rows loaded (skipped: ${historia.stats.skipped}, negatives: ${historia.stats.negatives})`
  );
  log.info(`retiros: ${retiros.stats.loaded} rows loaded (skipped: ${retiros.stats.skipped})`);

  return {
    observations: historia.observations,
    withdrawals: retiros.withdrawals,
    stats: { historia: historia.stats, retiros: retiros.stats },
  };
}
