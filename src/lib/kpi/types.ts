// === Enums as union types ===
export type MetricUnit = "currency" | "percentage" | "ratio" | "count" | "months" | "days" | "grams";
export type MetricStatus = "ok" | "undefined" | "unreachable";
export type MetricCategory =
  | "roi"
  | "profitability"
  | "revenue"
  | "cost"
  | "labor"
  | "inventory"
  | "customer"
  | "impact";
export type MetricDirection = "higher_is_better" | "lower_is_better" | "neutral";
export type BenchmarkStatus = "on_target" | "off_target" | "no_data";
export type PeriodGranularity = "month" | "quarter" | "year";
export type ClvCacTier = "healthy" | "marginal" | "unprofitable" | "unknown";

/**
 * A formula's raw output: a number, `null` when a denominator was zero, or
 * `Infinity` when the target can never be reached.
 */
export type RawMetric = number | null;

// === Results ===
export interface BenchmarkComparison {
  target: number;
  delta: number | null;
  status: BenchmarkStatus;
}

export interface KPIValue {
  value: number | null;
  unit: MetricUnit;
  status: MetricStatus;
  benchmark?: BenchmarkComparison;
}

export type KPIResult<K extends string = string> = Record<K, KPIValue>;

export interface StoreKpiRow<K extends string = string> {
  store_code: string;
  store_name: string;
  city: string;
  metrics: KPIResult<K>;
}

export interface RecordFilter {
  stores?: string[];
  from?: string;
  to?: string;
  years?: number[];
}

export interface RevenuePeriodRow {
  period: string;
  revenue: number;
}

export interface CostStructureRow {
  cost_category: string;
  cost_label: string;
  amount: number;
  pct_of_revenue: KPIValue;
  target_pct: number | null;
  vs_target: number | null;
}

export interface CashFlowRow {
  period: string;
  revenue: number;
  total_costs: number;
  net_profit: number;
  depreciation: number;
  operating_cash_flow: number;
  capex: number;
  free_cash_flow: number;
  cumulative_cash_flow: number;
}
