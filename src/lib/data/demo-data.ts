import type { Logger } from "../logger";
import { parseStoreRecords, type CostCategory, type EngineConfig, type StoreRecord, type StoreRecordInput } from "../schemas";
import type { DataSource } from "./types";

// Monthly revenue multipliers, busiest in winter
const SEASONALITY = [1.05, 1.02, 0.98, 0.95, 0.93, 0.88, 0.85, 0.87, 0.95, 1.02, 1.08, 1.15];

const CATEGORY_SPLIT = { coffee: 0.58, food: 0.25, merchandise: 0.07, subscription: 0.1 };

// Share of revenue and +/- variance per cost category; labor comes from hours worked
const COST_RATIOS: Array<[category: CostCategory, ratio: number, variance: number]> = [
  ["cogs_coffee", 0.18, 0.03],
  ["cogs_food", 0.09, 0.02],
  ["cogs_merchandise", 0.03, 0.01],
  ["cogs_packaging", 0.01, 0.003],
  ["rent", 0.11, 0.01],
  ["utilities", 0.035, 0.008],
  ["marketing", 0.025, 0.01],
  ["maintenance", 0.015, 0.005],
  ["supplies", 0.02, 0.005],
  ["insurance", 0.012, 0.002],
  ["depreciation", 0.04, 0.005],
];

const COGS_CATEGORIES: CostCategory[] = ["cogs_coffee", "cogs_food", "cogs_merchandise", "cogs_packaging"];
const IMPACT_BASE_YEAR = 2021;
const GRAMS_PER_CUP = 18;
const FARMERS_BASE = 500;

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const money = (value: number) => Math.round(Math.max(0, value) * 100) / 100;
const oneDecimal = (value: number) => Math.round(Math.max(0, value) * 10) / 10;

export interface DemoOptions {
  config: EngineConfig;
  years: readonly number[];
  seed?: number;
  /** Months after this date are not generated. */
  now?: Date;
}

function monthIndex(period: string): number {
  return Number(period.slice(0, 4)) * 12 + Number(period.slice(5, 7)) - 1;
}

/**
 * Deterministic demo records for every store from its opening month:
 * seasonality, a six-month ramp-up, organic growth, cost ratios with noise,
 * and operational blocks. The store's build-out lands as investment in its
 * opening month.
 */
export function generateDemoRecords({ config, years, seed = 42, now = new Date() }: DemoOptions): StoreRecord[] {
  const rng = createRng(seed);
  const uniform = (min: number, max: number) => min + (max - min) * rng();

  const codes = Object.keys(config.stores)
    .filter((c) => c !== config.overhead_store_code)
    .sort();
  const profiles = codes.map((code) => {
    const profile = config.stores[code];
    const sqm = profile.sqm;
    return {
      code,
      sqm,
      opened: monthIndex(profile.opened),
      baseRevenue: sqm * uniform(550, 750),
      investment: sqm * uniform(1200, 1800) + uniform(25_000, 45_000) + sqm * uniform(150, 300) + uniform(15_000, 30_000),
    };
  });
  const firstOpened = Math.min(...profiles.map((p) => p.opened));
  const lastMonth = now.getFullYear() * 12 + now.getMonth();

  const records: StoreRecordInput[] = [];
  for (const year of [...new Set(years)].sort((a, b) => a - b)) {
    for (let month = 1; month <= 12; month++) {
      const index = year * 12 + month - 1;
      if (index > lastMonth) continue;
      const period = `${year}-${String(month).padStart(2, "0")}`;
      const impactMonths = (year - IMPACT_BASE_YEAR) * 12 + month;
      // one sourcing network, split evenly across the stores open this month
      const openStores = profiles.filter((p) => p.opened <= index).length;
      const farmersPerStore = (FARMERS_BASE + 3 * impactMonths + uniform(-10, 10)) / Math.max(1, openStores);

      for (const store of profiles) {
        const monthsOpen = index - store.opened;
        if (monthsOpen < 0) continue;

        const ramp = monthsOpen < 6 ? Math.min(1, 0.4 + 0.1 * monthsOpen) : 1;
        const growth = 1 + 0.005 * Math.max(0, monthsOpen - 6);
        const target = store.baseRevenue * SEASONALITY[month - 1] * ramp * growth * uniform(0.88, 1.12);

        const byCategory = {
          coffee: money(target * CATEGORY_SPLIT.coffee * uniform(0.95, 1.05)),
          food: money(target * CATEGORY_SPLIT.food * uniform(0.95, 1.05)),
          merchandise: money(target * CATEGORY_SPLIT.merchandise * uniform(0.95, 1.05)),
          subscription: money(target * CATEGORY_SPLIT.subscription * uniform(0.95, 1.05)),
        };
        const revenue = money(byCategory.coffee + byCategory.food + byCategory.merchandise + byCategory.subscription);

        const costs: Partial<Record<CostCategory, number>> = {};
        for (const [category, ratio, variance] of COST_RATIOS) {
          costs[category] = money(revenue * (ratio + uniform(-variance, variance)));
        }

        const fte = Math.max(2, store.sqm / 18 + uniform(-0.5, 0.5));
        const hours = fte * uniform(140, 168);
        costs.labor = money(hours * uniform(14.5, 18.5));

        const transactions = Math.floor(revenue / uniform(5.2, 7.8));
        const unique = Math.floor(transactions * uniform(0.55, 0.72));
        const newCustomers = Math.floor(unique * uniform(0.25, 0.45));

        const cups = Math.floor(byCategory.coffee / uniform(3.2, 3.8));
        const kg = oneDecimal((cups * GRAMS_PER_CUP) / 1000);
        const directShare = Math.min(0.98, 0.8 + 0.001 * impactMonths + uniform(-0.02, 0.02));
        const premiumShare = 0.3 + 0.001 * impactMonths + uniform(-0.02, 0.02);

        records.push({
          store_code: store.code,
          period,
          revenue,
          revenue_by_category: byCategory,
          costs,
          investment: monthsOpen === 0 ? money(store.investment) : 0,
          labor: { hours: oneDecimal(hours), fte: oneDecimal(fte) },
          customers: {
            transactions,
            unique_customers: unique,
            new_customers: newCustomers,
            returning_customers: unique - newCustomers,
          },
          inventory: {
            stock_value: money(revenue * uniform(0.04, 0.08)),
            sold_units: transactions,
            waste_units: Math.floor(transactions * uniform(0.02, 0.08)),
            cost_of_sold: money(COGS_CATEGORIES.reduce((s, c) => s + (costs[c] ?? 0), 0)),
          },
          sustainability: {
            kg_coffee_sourced: kg,
            direct_trade_kg: oneDecimal(kg * directShare),
            farmer_premium_paid: money(kg * directShare * uniform(4.5, 6.5) * premiumShare),
            cups_served: cups,
            co2_per_cup_grams: oneDecimal(Math.max(55, 85 - 0.15 * impactMonths + uniform(-3, 3))),
            farmers_supported: Math.round(farmersPerStore),
            farmer_premium_pct: oneDecimal(premiumShare * 100),
            compostable_pct: oneDecimal(Math.min(98, 75 + 0.2 * impactMonths)),
          },
        });
      }

      if (index >= firstOpened) {
        records.push({
          store_code: config.overhead_store_code,
          period,
          revenue: 0,
          costs: {
            marketing: money(uniform(4_000, 6_000)),
            utilities: money(uniform(800, 1_200)),
            insurance: money(uniform(1_500, 2_000)),
          },
          investment: 0,
        });
      }
    }
  }

  return parseStoreRecords(records);
}

export interface DemoDataSourceOptions {
  seed?: number;
  now?: () => Date;
  logger: Logger;
}

export class DemoDataSource implements DataSource {
  readonly kind = "demo";

  constructor(
    private readonly config: EngineConfig,
    private readonly opts: DemoDataSourceOptions,
  ) {}

  async loadRecords(years: readonly number[]): Promise<StoreRecord[]> {
    const records = generateDemoRecords({
      config: this.config,
      years,
      seed: this.opts.seed,
      now: this.opts.now?.(),
    });
    this.opts.logger.info({ years, records: records.length, seed: this.opts.seed ?? 42 }, "demo records generated");
    return records;
  }
}
