import type { Client } from "@libsql/client";
import { getDb } from "./libsqlClient";
import { ensureMigrations } from "./migrations";

const ensured = new WeakSet<Client>();

export async function initDb(): Promise<void> {
  const db = await getDb();
  if (ensured.has(db)) return;
  await ensureMigrations();
  ensured.add(db);
}
