import { describe, it, expect } from "vitest";
import { loadAccountMap } from "@/lib/config";
import { OdooClient } from "@/lib/data/odoo-client";
import {
  MOVE_LINE_FIELDS,
  OdooDataSource,
  buildMoveLineDomain,
  foldMoveLines,
  type MoveLine,
} from "@/lib/data/odoo-source";
import { silentLogger } from "@/lib/logger";
import type { AccountMap } from "@/lib/schemas";
import { fakeOdoo, testConfig } from "./fixtures";

const accountMap = loadAccountMap();

function line(fields: Partial<MoveLine> & Pick<MoveLine, "date" | "account_id">): MoveLine {
  return { debit: 0, credit: 0, ...fields };
}

const lines: MoveLine[] = [
  line({ date: "2024-03-05", balance: -1_000, account_id: [1, "800000 Coffee Sales"], analytic_distribution: { "101": 100 } }),
  line({ date: "2024-03-20", debit: 400, account_id: [2, "400000 COGS Coffee"], analytic_distribution: { "101,150": 100 } }),
  line({ date: "2024-03-10", balance: 250, account_id: [3, "420000 Rent"], analytic_distribution: false }),
  line({ date: "2024-03-11", balance: 5_000, account_id: [4, "021000 Coffee Machines"], analytic_distribution: { "102": 100 } }),
  line({ date: "2024-03-12", balance: 99, account_id: [5, "999999 Suspense"] }),
];

describe("buildMoveLineDomain", () => {
  it("filters a single year with a plain date range", () => {
    expect(buildMoveLineDomain(2, [2024], ["800000", "410000"])).toEqual([
      ["company_id", "=", 2],
      ["parent_state", "=", "posted"],
      ["date", ">=", "2024-01-01"],
      ["date", "<=", "2024-12-31"],
      "|",
      ["account_id.code", "=like", "800000%"],
      ["account_id.code", "=like", "410000%"],
    ]);
  });

  it("ors together one date range per year", () => {
    expect(buildMoveLineDomain(2, [2023, 2024], ["800000"])).toEqual([
      ["company_id", "=", 2],
      ["parent_state", "=", "posted"],
      "|",
      "&",
      ["date", ">=", "2023-01-01"],
      ["date", "<=", "2023-12-31"],
      "&",
      ["date", ">=", "2024-01-01"],
      ["date", "<=", "2024-12-31"],
      ["account_id.code", "=like", "800000%"],
    ]);
  });
});

describe("foldMoveLines", () => {
  it("folds journal items into store records", () => {
    const { records, unmapped } = foldMoveLines(lines, testConfig, accountMap);

    expect(unmapped).toBe(1);
    expect(records).toHaveLength(3);
    expect(records.find((r) => r.store_code === "AAA")).toEqual({
      store_code: "AAA",
      period: "2024-03",
      revenue: 1_000,
      revenue_by_category: { coffee: 1_000 },
      costs: { cogs_coffee: 400 },
      investment: 0,
    });
    expect(records.find((r) => r.store_code === "HQ")?.costs).toEqual({ rent: 250 });
    expect(records.find((r) => r.store_code === "BBB")?.investment).toBe(5_000);
  });

  it("skips lines on accounts without a cost category without opening a store month", () => {
    const withFees: AccountMap = { ...accountMap, opex: { bank_fees: { codes: ["490000"], label: "Bank Fees", sign: "debit" } } };
    const fee = line({ date: "2024-05-14", balance: 35, account_id: [6, "490000 Bank Fees"], analytic_distribution: { "101": 100 } });
    expect(foldMoveLines([fee], testConfig, withFees)).toEqual({ records: [], unmapped: 1 });
  });

  it("floors net credit notes at zero", () => {
    const refund = line({ date: "2024-03-06", balance: 1_500, account_id: [1, "800000 Coffee Sales"], analytic_distribution: { "101": 100 } });
    const { records } = foldMoveLines([lines[0], refund], testConfig, accountMap);
    expect(records[0].revenue).toBe(0);
  });
});

describe("OdooDataSource", () => {
  it("loads, folds and validates posted journal items", async () => {
    const { fetchFn, calls } = fakeOdoo({ result: 7 }, { result: lines.slice(0, 2) });
    const source = new OdooDataSource({
      client: new OdooClient({ url: "https://erp.example.test", db: "testdb", user: "tester", password: "test-secret", fetchFn }),
      config: testConfig,
      accountMap,
      companyId: 2,
      maxRecords: 10,
      logger: silentLogger(),
    });

    const records = await source.loadRecords([2024]);

    expect(source.kind).toBe("odoo");
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ store_code: "AAA", revenue: 1_000, costs: { cogs_coffee: 400 } });
    expect(calls[1].args).toEqual([
      "testdb",
      7,
      "test-secret",
      "account.move.line",
      "search_read",
      [buildMoveLineDomain(2, [2024], ["013000", "021000", "031000", "032000", "037000", "400000", "400100", "400200", "400300", "410000", "420000", "430000", "440000", "450000", "460000", "470000", "480000", "800000", "800100", "800200", "800300", "800400"])],
      { fields: MOVE_LINE_FIELDS, limit: 10 },
    ]);
  });

  it("propagates ERP failures", async () => {
    const { fetchFn } = fakeOdoo({ result: false });
    const source = new OdooDataSource({
      client: new OdooClient({ url: "https://erp.example.test", db: "testdb", user: "tester", password: "test-secret", fetchFn }),
      config: testConfig,
      accountMap,
      companyId: 2,
      maxRecords: 10,
      logger: silentLogger(),
    });
    await expect(source.loadRecords([2024])).rejects.toThrow("Odoo authentication failed");
  });
});
