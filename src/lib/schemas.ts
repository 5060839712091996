import { z } from "zod";
import { KpiValidationError, type ValidationIssue } from "./errors";

export const COST_CATEGORIES = [
  "cogs_coffee",
  "cogs_food",
  "cogs_merchandise",
  "cogs_packaging",
  "labor",
  "rent",
  "utilities",
  "marketing",
  "maintenance",
  "supplies",
  "insurance",
  "depreciation",
] as const;

export const PRODUCT_CATEGORIES = ["coffee", "food", "merchandise", "subscription"] as const;

export const TARGET_KEYS = [
  "gross_margin_pct",
  "net_margin_pct",
  "labor_cost_pct",
  "rent_cost_pct",
  "food_cost_pct",
  "beverage_cost_pct",
  "avg_transaction_value",
  "revenue_per_sqm_month",
  "revenue_per_labor_hour",
  "retention_rate_pct",
  "inventory_turnover",
  "break_even_months",
  "clv_cac_ratio",
] as const;

export type CostCategory = (typeof COST_CATEGORIES)[number];
export type ProductCategory = (typeof PRODUCT_CATEGORIES)[number];
export type TargetKey = (typeof TARGET_KEYS)[number];

const PERIOD_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

const amount = z.number().finite().nonnegative();
const count = z.number().int().nonnegative();
const percent = z.number().finite().min(0).max(100);

export const periodSchema = z
  .string()
  .regex(PERIOD_PATTERN, "Period must be formatted as YYYY-MM");

// === Store records ===

export const laborBlockSchema = z.object({
  hours: amount,
  fte: amount,
});

export const customerBlockSchema = z
  .object({
    transactions: count,
    unique_customers: count,
    new_customers: count,
    returning_customers: count,
  })
  .refine((c) => c.new_customers + c.returning_customers <= c.unique_customers, {
    message: "new_customers + returning_customers cannot exceed unique_customers",
  });

export const inventoryBlockSchema = z.object({
  stock_value: amount,
  sold_units: count,
  waste_units: count,
  cost_of_sold: amount,
});

export const sustainabilityBlockSchema = z
  .object({
    kg_coffee_sourced: amount,
    direct_trade_kg: amount,
    farmer_premium_paid: amount,
    cups_served: count,
    co2_per_cup_grams: amount,
    farmers_supported: count,
    /** Price paid above market for direct-trade beans, in percent. */
    farmer_premium_pct: amount,
    compostable_pct: percent,
  })
  .refine((s) => s.direct_trade_kg <= s.kg_coffee_sourced, {
    message: "direct_trade_kg cannot exceed kg_coffee_sourced",
  });

export const storeRecordSchema = z.object({
  store_code: z.string().min(1, "Store code is required"),
  period: periodSchema,
  revenue: amount,
  revenue_by_category: z.record(z.enum(PRODUCT_CATEGORIES), amount).default({}),
  costs: z.record(z.enum(COST_CATEGORIES), amount),
  investment: amount,
  labor: laborBlockSchema.optional(),
  customers: customerBlockSchema.optional(),
  inventory: inventoryBlockSchema.optional(),
  sustainability: sustainabilityBlockSchema.optional(),
});

export type StoreRecord = z.infer<typeof storeRecordSchema>;
export type StoreRecordInput = z.input<typeof storeRecordSchema>;

export function toIssues(error: z.ZodError, prefix = ""): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: [prefix, ...issue.path.map(String)].filter(Boolean).join("."),
    message: issue.message,
  }));
}

/**
 * Validate raw records coming from a data source. Every issue across the
 * batch is collected before throwing, and duplicate (store, period) keys are
 * rejected.
 */
export function parseStoreRecords(input: unknown): StoreRecord[] {
  const parsed = z.array(storeRecordSchema).safeParse(input);
  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    throw new KpiValidationError(`Invalid store records (${issues.length} issues)`, issues);
  }

  const seen = new Set<string>();
  const duplicates: ValidationIssue[] = [];
  parsed.data.forEach((record, index) => {
    const key = `${record.store_code}/${record.period}`;
    if (seen.has(key)) {
      duplicates.push({ path: String(index), message: `Duplicate record for ${key}` });
    }
    seen.add(key);
  });
  if (duplicates.length > 0) {
    throw new KpiValidationError(`Invalid store records (${duplicates.length} issues)`, duplicates);
  }

  return parsed.data;
}

// === Configuration ===

export const storeProfileSchema = z.object({
  name: z.string().min(1),
  city: z.string(),
  sqm: amount,
  opened: periodSchema,
  odoo_analytic_id: z.number().int().positive().optional(),
});

export type StoreProfile = z.infer<typeof storeProfileSchema>;

export const storeDirectorySchema = z.object({
  overhead_store_code: z.string().min(1),
  stores: z.record(z.string(), storeProfileSchema),
});

export const engineSettingsSchema = z.object({
  targets: z.record(z.enum(TARGET_KEYS), z.number().finite()),
  cost_classification: z.object({
    cogs: z.array(z.enum(COST_CATEGORIES)),
    fixed: z.array(z.enum(COST_CATEGORIES)),
    depreciation: z.array(z.enum(COST_CATEGORIES)),
    marketing: z.array(z.enum(COST_CATEGORIES)),
  }),
  cost_labels: z.record(z.enum(COST_CATEGORIES), z.string()),
  cost_benchmarks: z.record(z.enum(COST_CATEGORIES), z.enum(TARGET_KEYS)),
  customer_lifespan: z.object({
    cap_periods: z.number().positive(),
    full_retention_periods: z.number().positive(),
  }),
  days_per_period: z.number().int().positive(),
});

export const engineConfigSchema = storeDirectorySchema.merge(engineSettingsSchema);

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type BenchmarkTargets = EngineConfig["targets"];

export const ACCOUNT_SECTIONS = ["revenue", "cogs", "opex", "capex"] as const;
export type AccountSection = (typeof ACCOUNT_SECTIONS)[number];

/** Fixed versus variable costs are classified in `cost_classification.fixed`, not per account. */
export const accountMapEntrySchema = z
  .object({
    codes: z.array(z.string().min(1)).min(1),
    label: z.string(),
    sign: z.enum(["credit", "debit", "abs"]),
    revenue_category: z.enum(PRODUCT_CATEGORIES).optional(),
  })
  .strict();

export type AccountMapEntry = z.infer<typeof accountMapEntrySchema>;

export const accountMapSchema = z.record(
  z.enum(ACCOUNT_SECTIONS),
  z.record(z.string(), accountMapEntrySchema)
);

export type AccountMap = z.infer<typeof accountMapSchema>;
