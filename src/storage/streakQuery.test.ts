import assert from "node:assert/strict";
import { after, before, describe, it } from "node:test";
import { ValidationError } from "../errors";
import { computeStreaks } from "../streaks/computeStreaks";
import { monthly, portfolio } from "../testing/fixtures";
import { listBalanceObservations, replaceBalanceObservations } from "./balanceRepo";
import { initDb } from "./initDb";
import { closeDb, useDb } from "./libsqlClient";
import { runStreakQuery } from "./streakQuery";
import { listWithdrawals, replaceWithdrawals } from "./withdrawalRepo";

describe("streak query", () => {
  before(async () => {
    useDb({ url: ":memory:" });
    await initDb();
  });

  after(() => {
    closeDb();
  });

  it("stores and lists the input tables", async () => {
    await replaceBalanceObservations(monthly("C2", "2024-01-31", [1_500_000, null, 10]));
    await replaceWithdrawals([{ clientId: "C2", withdrawalDate: null }]);

    assert.deepEqual(await listBalanceObservations(), [
      { clientId: "C2", monthEnd: "2024-01-31", balance: 1_500_000 },
      { clientId: "C2", monthEnd: "2024-03-31", balance: 10 },
    ]);
    assert.deepEqual(await listWithdrawals(), [{ clientId: "C2", withdrawalDate: null }]);
  });

  it("replaces previous rows on reload", async () => {
    const data = portfolio();
    await replaceBalanceObservations(data.observations);
    await replaceBalanceObservations(data.observations);
    await replaceWithdrawals(data.withdrawals);

    assert.equal((await listBalanceObservations()).length, data.observations.length);
    assert.deepEqual(
      (await listWithdrawals()).map((w) => w.clientId),
      ["C1", "C4", "C5", "X9"]
    );
  });

  it("returns the worked example row", async () => {
    await replaceBalanceObservations(monthly("C1", "2024-01-31", [250_000, 250_000, 400_000, 400_000, 400_000]));
    await replaceWithdrawals([]);

    const rows = await runStreakQuery({ referenceDate: "2024-05-31", minLength: 3 });
    assert.deepEqual(rows, [{ identificacion: "C1", racha: 3, fecha_fin: "2024-05-31", nivel: "N1" }]);
  });

  it("matches the in-memory engine on the portfolio", async () => {
    const data = portfolio();
    await replaceBalanceObservations(data.observations);
    await replaceWithdrawals(data.withdrawals);

    const cases: [string, number][] = [
      ["2024-12-15", 3],
      ["2024-04-30", 2],
      ["2024-11-30", 1],
      ["2024-06-01", 4],
      ["2025-03-31", 5],
      ["2023-12-31", 1],
    ];
    for (const [referenceDate, minLength] of cases) {
      const sql = await runStreakQuery({ referenceDate, minLength });
      const memory = computeStreaks({ ...data, referenceDate, minLength });
      assert.deepEqual(sql, memory, `fecha_base=${referenceDate} n=${minLength}`);
    }

    assert.deepEqual(await runStreakQuery({ referenceDate: "2024-04-30", minLength: 2 }), [
      { identificacion: "C1", racha: 2, fecha_fin: "2024-04-30", nivel: "N1" },
      { identificacion: "C2", racha: 2, fecha_fin: "2024-03-31", nivel: "N0" },
      { identificacion: "C4", racha: 4, fecha_fin: "2024-04-30", nivel: "N3" },
      { identificacion: "C6", racha: 2, fecha_fin: "2024-04-30", nivel: "N2" },
    ]);
  });

  it("rejects invalid parameters before querying", async () => {
    await assert.rejects(runStreakQuery({ referenceDate: "2024-12-32", minLength: 3 }), ValidationError);
    await assert.rejects(runStreakQuery({ referenceDate: "2024-12-15", minLength: -2 }), ValidationError);
  });
});
