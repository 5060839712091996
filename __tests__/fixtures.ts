import { vi } from "vitest";
import type { FetchFn } from "@/lib/data/odoo-client";
import type { EngineConfig, StoreRecord } from "@/lib/schemas";

export const testConfig: EngineConfig = {
  overhead_store_code: "HQ",
  stores: {
    AAA: { name: "Alpha Street", city: "Utrecht", sqm: 50, opened: "2024-01", odoo_analytic_id: 101 },
    BBB: { name: "Beta Square", city: "Leiden", sqm: 100, opened: "2024-01", odoo_analytic_id: 102 },
    HQ: { name: "Head Office", city: "Utrecht", sqm: 0, opened: "2024-01", odoo_analytic_id: 199 },
  },
  targets: {
    gross_margin_pct: 68,
    net_margin_pct: 12,
    labor_cost_pct: 30,
    avg_transaction_value: 6.5,
    revenue_per_labor_hour: 55,
    retention_rate_pct: 45,
    inventory_turnover: 24,
    break_even_months: 18,
    clv_cac_ratio: 3,
  },
  cost_classification: {
    cogs: ["cogs_coffee", "cogs_food"],
    fixed: ["rent", "insurance", "depreciation"],
    depreciation: ["depreciation"],
    marketing: ["marketing"],
  },
  cost_labels: { cogs_coffee: "COGS - Coffee", labor: "Labor Costs", rent: "Rent" },
  cost_benchmarks: { labor: "labor_cost_pct" },
  customer_lifespan: { cap_periods: 36, full_retention_periods: 24 },
  days_per_period: 30,
};

export function record(fields: Partial<StoreRecord> & Pick<StoreRecord, "store_code" | "period">): StoreRecord {
  return { revenue: 0, revenue_by_category: {}, costs: {}, investment: 0, ...fields };
}

function alphaMonth(period: string, investment: number): StoreRecord {
  return record({
    store_code: "AAA",
    period,
    revenue: 10_000,
    revenue_by_category: { coffee: 6_000, food: 4_000 },
    costs: { cogs_coffee: 2_500, cogs_food: 1_500, labor: 2_500, rent: 1_200, marketing: 300, depreciation: 500 },
    investment,
    labor: { hours: 400, fte: 3 },
    customers: { transactions: 2_000, unique_customers: 1_000, new_customers: 200, returning_customers: 450 },
    inventory: { stock_value: 2_000, sold_units: 1_900, waste_units: 100, cost_of_sold: 4_000 },
    sustainability: {
      kg_coffee_sourced: 100,
      direct_trade_kg: 80,
      farmer_premium_paid: 200,
      cups_served: 5_000,
      co2_per_cup_grams: 60,
      farmers_supported: 40,
      farmer_premium_pct: 30,
      compostable_pct: 80,
    },
  });
}

/**
 * AAA: two identical profitable months (60% gross, 15% net) and 30k invested.
 * BBB: one loss-making month with 50k invested. HQ: overhead costs only.
 */
export function sampleRecords(): StoreRecord[] {
  return [
    alphaMonth("2024-01", 30_000),
    alphaMonth("2024-02", 0),
    record({
      store_code: "BBB",
      period: "2024-01",
      revenue: 5_000,
      revenue_by_category: { coffee: 5_000 },
      costs: { cogs_coffee: 2_000, labor: 2_500, rent: 1_500 },
      investment: 50_000,
    }),
    record({
      store_code: "HQ",
      period: "2024-01",
      costs: { marketing: 1_000, insurance: 500 },
    }),
  ];
}

export interface RpcCall {
  url: string;
  service: unknown;
  method: unknown;
  args: unknown;
}

/** Fake JSON-RPC endpoint answering each call with the next queued payload. */
export function fakeOdoo(...payloads: Array<Record<string, unknown>>) {
  const calls: RpcCall[] = [];
  const fetchFn = vi.fn<FetchFn>(async (url, init) => {
    const body = JSON.parse(String(init.body));
    calls.push({ url, service: body.params.service, method: body.params.method, args: body.params.args });
    return new Response(JSON.stringify({ jsonrpc: "2.0", id: body.id, ...payloads.shift() }), {
      status: 200,
      headers: { "Content-Type": "application/json" },
    });
  });
  return { fetchFn, calls };
}
