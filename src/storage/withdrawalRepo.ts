import type { Row } from "@libsql/client";
import type { WithdrawalRecord } from "../types";
import { dbBatch, dbGetAll } from "./libsqlClient";

function rowToWithdrawal(r: Row): WithdrawalRecord {
  return {
    clientId: String(r.identificacion),
    withdrawalDate: r.fecha_retiro == null ? null : String(r.fecha_retiro),
  };
}

export async function replaceWithdrawals(withdrawals: WithdrawalRecord[]): Promise<void> {
  await dbBatch([
    `DELETE FROM retiros;`,
    ...withdrawals.map((w) => ({
      sql: `INSERT INTO retiros(identificacion, fecha_retiro) VALUES (?, ?);`,
      args: [w.clientId, w.withdrawalDate],
    })),
  ]);
}

export async function listWithdrawals(): Promise<WithdrawalRecord[]> {
  const rows = await dbGetAll(`SELECT * FROM retiros ORDER BY identificacion ASC;`);
  return rows.map(rowToWithdrawal);
}
