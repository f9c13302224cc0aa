import type { Row } from "@libsql/client";
import type { BalanceObservation } from "../types";
import { dbBatch, dbGetAll } from "./libsqlClient";

function rowToObservation(r: Row): BalanceObservation {
  return {
    clientId: String(r.identificacion),
    monthEnd: String(r.corte_mes),
    balance: Number(r.saldo),
  };
}

// Clears historia_saldos and loads `observations` in a single transaction.
export async function replaceBalanceObservations(observations: BalanceObservation[]): Promise<void> {
  await dbBatch([
    `DELETE FROM historia_saldos;`,
    ...observations.map((o) => ({
      sql: `INSERT INTO historia_saldos(identificacion, corte_mes, saldo) VALUES (?, ?, ?);`,
      args: [o.clientId, o.monthEnd, Math.trunc(o.balance)],
    })),
  ]);
}

export async function listBalanceObservations(): Promise<BalanceObservation[]> {
  const rows = await dbGetAll(`SELECT * FROM historia_saldos ORDER BY identificacion ASC, corte_mes ASC;`);
  return rows.map(rowToObservation);
}
