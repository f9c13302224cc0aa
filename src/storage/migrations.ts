import { dbExec, dbGetAll } from "./libsqlClient";

type Migration = { version: number; name: string; up: string[] };

const migrations: Migration[] = [
  {
    version: 1,
    name: "init_streak_tables",
    up: [
      `CREATE TABLE IF NOT EXISTS historia_saldos (
        identificacion TEXT NOT NULL,
        corte_mes TEXT NOT NULL, -- YYYY-MM-DD, month end
        saldo INTEGER NOT NULL,
        PRIMARY KEY (identificacion, corte_mes)
      );`,

      `CREATE TABLE IF NOT EXISTS retiros (
        identificacion TEXT PRIMARY KEY,
        fecha_retiro TEXT NULL -- YYYY-MM-DD or NULL while active
      );`,

      `CREATE INDEX IF NOT EXISTS idx_historia_id ON historia_saldos(identificacion);`,
      `CREATE INDEX IF NOT EXISTS idx_historia_mes ON historia_saldos(corte_mes);`,
    ],
  },
];

function nowISO() {
  return new Date().toISOString();
}

export async function ensureMigrations(): Promise<void> {
  await dbExec(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );`
  );

  const applied = await dbGetAll(`SELECT version FROM schema_migrations;`);
  const appliedSet = new Set<number>(applied.map((r) => Number(r.version)));

  for (const m of migrations) {
    if (appliedSet.has(m.version)) continue;
    for (const stmt of m.up) {
      await dbExec(stmt);
    }
    await dbExec(`INSERT INTO schema_migrations(version, name, applied_at) VALUES(?, ?, ?);`, [
      m.version,
      m.name,
      nowISO(),
    ]);
  }
}
