import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DataQualityError, ValidationError } from "../errors";
import { monthly, portfolio } from "../testing/fixtures";
import { computeStreaks, findDuplicateObservations, resolveClientRanges } from "./computeStreaks";

describe("computeStreaks", () => {
  it("selects the three-month N1 streak from the worked example", () => {
    const rows = computeStreaks({
      observations: monthly("C1", "2024-01-31", [250_000, 250_000, 400_000, 400_000, 400_000]),
      withdrawals: [],
      referenceDate: "2024-05-31",
      minLength: 3,
    });
    assert.deepEqual(rows, [{ identificacion: "C1", racha: 3, fecha_fin: "2024-05-31", nivel: "N1" }]);
  });

  it("treats unreported months as N0 instead of bridging them", () => {
    const rows = computeStreaks({
      observations: monthly("C2", "2024-01-31", [1_500_000, null, null, 1_200_000]),
      withdrawals: [],
      referenceDate: "2024-04-30",
      minLength: 1,
    });
    assert.deepEqual(rows, [{ identificacion: "C2", racha: 2, fecha_fin: "2024-03-31", nivel: "N0" }]);
  });

  it("ignores the partially elapsed reference month", () => {
    const observations = monthly("C3", "2024-10-31", [500_000, 500_000, 500_000]);
    assert.deepEqual(computeStreaks({ observations, withdrawals: [], referenceDate: "2024-12-15", minLength: 1 }), [
      { identificacion: "C3", racha: 2, fecha_fin: "2024-11-30", nivel: "N1" },
    ]);
    assert.deepEqual(computeStreaks({ observations, withdrawals: [], referenceDate: "2024-12-31", minLength: 1 }), [
      { identificacion: "C3", racha: 3, fecha_fin: "2024-12-31", nivel: "N1" },
    ]);
  });

  it("computes the whole portfolio as of a mid-month reference date", () => {
    const rows = computeStreaks({ ...portfolio(), referenceDate: "2024-12-15", minLength: 3 });
    assert.deepEqual(rows, [
      { identificacion: "C1", racha: 6, fecha_fin: "2024-11-30", nivel: "N0" },
      { identificacion: "C2", racha: 7, fecha_fin: "2024-11-30", nivel: "N0" },
      { identificacion: "C4", racha: 6, fecha_fin: "2024-06-30", nivel: "N3" },
      { identificacion: "C6", racha: 7, fecha_fin: "2024-11-30", nivel: "N0" },
    ]);
  });

  it("breaks equal-length ties with the most recent streak", () => {
    const rows = computeStreaks({ ...portfolio(), referenceDate: "2024-04-30", minLength: 2 });
    assert.deepEqual(rows, [
      { identificacion: "C1", racha: 2, fecha_fin: "2024-04-30", nivel: "N1" },
      { identificacion: "C2", racha: 2, fecha_fin: "2024-03-31", nivel: "N0" },
      { identificacion: "C4", racha: 4, fecha_fin: "2024-04-30", nivel: "N3" },
      { identificacion: "C6", racha: 2, fecha_fin: "2024-04-30", nivel: "N2" },
    ]);
  });

  it("honours every row's minimum length and emits one row per client", () => {
    for (const minLength of [1, 2, 4, 7, 8]) {
      const rows = computeStreaks({ ...portfolio(), referenceDate: "2024-12-15", minLength });
      assert.ok(rows.every((r) => r.racha >= minLength));
      assert.equal(new Set(rows.map((r) => r.identificacion)).size, rows.length);
    }
    assert.deepEqual(computeStreaks({ ...portfolio(), referenceDate: "2024-12-15", minLength: 8 }), []);
  });

  it("returns identical output regardless of input order and across runs", () => {
    const data = portfolio();
    const first = computeStreaks({ ...data, referenceDate: "2024-12-15", minLength: 2 });
    const reversed = computeStreaks({
      observations: [...data.observations].reverse(),
      withdrawals: [...data.withdrawals].reverse(),
      referenceDate: "2024-12-15",
      minLength: 2,
    });
    assert.equal(JSON.stringify(reversed), JSON.stringify(first));
    assert.equal(JSON.stringify(computeStreaks({ ...data, referenceDate: "2024-12-15", minLength: 2 })), JSON.stringify(first));
  });

  it("sorts output by client id in binary order", () => {
    const observations = ["b", "a2", "A", "a10"].flatMap((id) => monthly(id, "2024-01-31", [100]));
    const rows = computeStreaks({ observations, withdrawals: [], referenceDate: "2024-01-31", minLength: 1 });
    assert.deepEqual(
      rows.map((r) => r.identificacion),
      ["A", "a10", "a2", "b"]
    );
  });

  it("validates parameters before looking at the data", () => {
    const observations = [...monthly("C1", "2024-01-31", [1]), ...monthly("C1", "2024-01-31", [2])];
    assert.throws(
      () => computeStreaks({ observations, withdrawals: [], referenceDate: "2024-12-15", minLength: 0 }),
      ValidationError
    );
  });

  it("rejects duplicate (client, month) observations", () => {
    const observations = [
      ...monthly("C1", "2024-01-31", [100, 200]),
      ...monthly("C1", "2024-01-31", [300]),
    ];
    assert.deepEqual(findDuplicateObservations(observations), ["C1@2024-01-31"]);
    assert.throws(
      () => computeStreaks({ observations, withdrawals: [], referenceDate: "2024-12-15", minLength: 1 }),
      (err: unknown) => err instanceof DataQualityError && err.details.join() === "C1@2024-01-31"
    );
  });

  it("rejects observations not dated at a month end", () => {
    assert.throws(
      () =>
        computeStreaks({
          observations: [{ clientId: "C1", monthEnd: "2024-01-15", balance: 1 }],
          withdrawals: [],
          referenceDate: "2024-12-15",
          minLength: 1,
        }),
      DataQualityError
    );
  });
});

describe("resolveClientRanges", () => {
  it("drops withdrawal-only clients and clients withdrawn before their first month", () => {
    const { ranges } = resolveClientRanges({ ...portfolio(), referenceDate: "2024-12-15" });
    assert.deepEqual(ranges, [
      { clientId: "C1", firstMonth: "2024-01-31", effectiveEnd: "2024-11-30" },
      { clientId: "C2", firstMonth: "2024-01-31", effectiveEnd: "2024-11-30" },
      { clientId: "C3", firstMonth: "2024-10-31", effectiveEnd: "2024-11-30" },
      { clientId: "C4", firstMonth: "2024-01-31", effectiveEnd: "2024-06-30" },
      { clientId: "C6", firstMonth: "2024-01-31", effectiveEnd: "2024-11-30" },
    ]);
  });
});
