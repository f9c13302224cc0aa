import { createClient, type Client, type InArgs, type InStatement, type ResultSet, type Row } from "@libsql/client";
import { config } from "../config";

export type DbTarget = { url: string; authToken?: string };

let cachedClient: Client | null = null;

function create(target: DbTarget): Client {
  if (!target.url) throw new Error("Missing database url (set RACHAS_DB_URL or pass --db)");
  return createClient({ url: target.url, authToken: target.authToken });
}

/**
 * Points every repo at another database. Used by the CLI's --db flag and by
 * tests (":memory:"). The previous client, if any, is closed.
 */
export function useDb(target: DbTarget): Client {
  if (cachedClient) cachedClient.close();
  cachedClient = create(target);
  return cachedClient;
}

export async function getDb(): Promise<Client> {
  if (!cachedClient) cachedClient = create(config.db);
  return cachedClient;
}

export function closeDb(): void {
  if (!cachedClient) return;
  cachedClient.close();
  cachedClient = null;
}

export async function dbExec(sql: string, args: InArgs = []): Promise<ResultSet> {
  const db = await getDb();
  return db.execute({ sql, args });
}

export async function dbGetAll(sql: string, args: InArgs = []): Promise<Row[]> {
  const res = await dbExec(sql, args);
  return res.rows;
}

// Runs all statements in one write transaction; nothing is applied if one fails.
export async function dbBatch(stmts: InStatement[]): Promise<void> {
  const db = await getDb();
  await db.batch(stmts, "write");
}
