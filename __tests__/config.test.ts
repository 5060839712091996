import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { loadAccountMap, loadEngineConfig, loadEnv } from "@/lib/config";
import { ConfigError } from "@/lib/errors";

describe("loadEnv", () => {
  it("applies defaults", () => {
    const env = loadEnv({});
    expect(env).toMatchObject({
      DATA_SOURCE: "demo",
      ODOO_COMPANY_ID: 2,
      ODOO_TIMEOUT_MS: 30_000,
      ODOO_MAX_RECORDS: 10_000,
      DEMO_SEED: 42,
      LOG_LEVEL: "info",
    });
    expect(env.ODOO_URL).toBeUndefined();
  });

  it("coerces numeric variables and treats blank strings as unset", () => {
    const env = loadEnv({ DATA_SOURCE: "odoo", ODOO_COMPANY_ID: "7", ODOO_URL: "https://erp.example.test", ODOO_USER: "  " });
    expect(env.DATA_SOURCE).toBe("odoo");
    expect(env.ODOO_COMPANY_ID).toBe(7);
    expect(env.ODOO_URL).toBe("https://erp.example.test");
    expect(env.ODOO_USER).toBeUndefined();
  });

  it("rejects an unknown data source", () => {
    expect(() => loadEnv({ DATA_SOURCE: "spreadsheet" })).toThrow(ConfigError);
  });
});

describe("loadEngineConfig", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("loads the bundled store directory and settings", () => {
    const config = loadEngineConfig();
    expect(config.overhead_store_code).toBe("OOH");
    expect(Object.keys(config.stores)).toHaveLength(21);
    expect(config.stores.LIN).toMatchObject({ sqm: 65, opened: "2021-03", odoo_analytic_id: 17046 });
    expect(config.targets.gross_margin_pct).toBe(68);
    expect(config.cost_classification.fixed).toEqual(["rent", "insurance", "depreciation"]);
  });

  it("raises a config error for malformed JSON", () => {
    dir = mkdtempSync(join(tmpdir(), "kpi-config-"));
    writeFileSync(join(dir, "stores.json"), "{ not json");
    writeFileSync(join(dir, "dashboard.json"), "{}");
    expect(() => loadEngineConfig(dir ?? "")).toThrow(ConfigError);
  });

  it("raises a config error when the overhead store is not listed", () => {
    dir = mkdtempSync(join(tmpdir(), "kpi-config-"));
    const settings = {
      targets: {},
      cost_classification: { cogs: [], fixed: [], depreciation: [], marketing: [] },
      cost_labels: {},
      cost_benchmarks: {},
      customer_lifespan: { cap_periods: 36, full_retention_periods: 24 },
      days_per_period: 30,
    };
    writeFileSync(join(dir, "stores.json"), JSON.stringify({ overhead_store_code: "HQ", stores: {} }));
    writeFileSync(join(dir, "dashboard.json"), JSON.stringify(settings));
    expect(() => loadEngineConfig(dir ?? "")).toThrow("Overhead store HQ is missing from stores.json");
  });
});

describe("loadAccountMap", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("rejects per-account fixed cost flags", () => {
    dir = mkdtempSync(join(tmpdir(), "kpi-accounts-"));
    const map = { opex: { rent: { codes: ["420000"], label: "Rent", sign: "debit", is_fixed: true } } };
    writeFileSync(join(dir, "account-map.json"), JSON.stringify(map));
    expect(() => loadAccountMap(dir ?? "")).toThrow(ConfigError);
    expect(() => loadAccountMap(dir ?? "")).toThrow(/opex\.rent: Unrecognized key/);
  });

  it("loads the bundled account map", () => {
    const map = loadAccountMap();
    expect(map.revenue?.coffee_sales).toEqual({
      codes: ["800000"],
      label: "Coffee Sales",
      sign: "credit",
      revenue_category: "coffee",
    });
    expect(map.capex?.coffee_machines?.sign).toBe("abs");
  });
});
