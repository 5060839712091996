import type { BenchmarkTargets, TargetKey } from "../schemas";
import type {
  BenchmarkComparison,
  ClvCacTier,
  KPIResult,
  KPIValue,
  MetricCategory,
  MetricDirection,
  MetricUnit,
  RawMetric,
} from "./types";

export interface MetricDefinition {
  label: string;
  unit: MetricUnit;
  category: MetricCategory;
  direction: MetricDirection;
  target?: TargetKey;
}

function metric(
  label: string,
  unit: MetricUnit,
  category: MetricCategory,
  direction: MetricDirection = "neutral",
  target?: TargetKey,
): MetricDefinition {
  return target ? { label, unit, category, direction, target } : { label, unit, category, direction };
}

const UP: MetricDirection = "higher_is_better";
const DOWN: MetricDirection = "lower_is_better";

export const METRIC_REGISTRY = {
  // ROI & break-even
  total_investment: metric("Total Investment", "currency", "roi"),
  total_revenue: metric("Total Revenue", "currency", "revenue", UP),
  total_costs: metric("Total Costs", "currency", "cost", DOWN),
  net_profit: metric("Net Profit", "currency", "profitability", UP),
  roi_pct: metric("ROI", "percentage", "roi", UP),
  annualized_roi_pct: metric("Annualized ROI", "percentage", "roi", UP),
  months_operating: metric("Months Operating", "months", "roi"),
  avg_monthly_revenue: metric("Avg Monthly Revenue", "currency", "revenue", UP),
  avg_monthly_profit: metric("Avg Monthly Profit", "currency", "profitability", UP),
  variable_cost_ratio: metric("Variable Cost Ratio", "ratio", "cost", DOWN),
  contribution_margin: metric("Contribution Margin", "ratio", "profitability", UP),
  break_even_revenue_monthly: metric("Break-even Revenue / Month", "currency", "roi", DOWN),
  be_performance_pct: metric("Revenue vs Break-even", "percentage", "roi", UP),
  months_to_payback: metric("Months to Payback", "months", "roi", DOWN, "break_even_months"),

  // Profitability
  cogs: metric("COGS", "currency", "cost", DOWN),
  gross_profit: metric("Gross Profit", "currency", "profitability", UP),
  gross_margin_pct: metric("Gross Margin", "percentage", "profitability", UP, "gross_margin_pct"),
  net_margin_pct: metric("Net Margin", "percentage", "profitability", UP, "net_margin_pct"),
  ebitda: metric("EBITDA", "currency", "profitability", UP),
  ebitda_margin_pct: metric("EBITDA Margin", "percentage", "profitability", UP),
  opex_ratio: metric("OpEx Ratio", "percentage", "cost", DOWN),
  cost_pct_of_revenue: metric("Cost % of Revenue", "percentage", "cost", DOWN),

  // Revenue
  months_of_data: metric("Months of Data", "months", "revenue"),
  revenue_per_sqm_month: metric("Revenue / m² / Month", "currency", "revenue", UP, "revenue_per_sqm_month"),
  growth_pct_3m: metric("Growth (3M vs prior 3M)", "percentage", "revenue", UP),
  avg_transaction_value: metric("Avg Transaction Value", "currency", "revenue", UP, "avg_transaction_value"),
  revenue_coffee_pct: metric("Coffee Share", "percentage", "revenue"),
  revenue_food_pct: metric("Food Share", "percentage", "revenue"),
  revenue_merchandise_pct: metric("Merchandise Share", "percentage", "revenue"),
  revenue_subscription_pct: metric("Subscription Share", "percentage", "revenue"),

  // Labor
  total_labor_hours: metric("Labor Hours", "count", "labor"),
  total_labor_cost: metric("Labor Cost", "currency", "labor", DOWN),
  avg_fte: metric("Avg FTE", "count", "labor"),
  revenue_per_labor_hour: metric("Revenue / Labor Hour", "currency", "labor", UP, "revenue_per_labor_hour"),
  labor_cost_pct: metric("Labor Cost %", "percentage", "labor", DOWN, "labor_cost_pct"),
  revenue_per_employee_month: metric("Revenue / FTE / Month", "currency", "labor", UP),

  // Inventory
  avg_stock_value: metric("Avg Stock Value", "currency", "inventory"),
  current_stock_value: metric("Current Stock Value", "currency", "inventory"),
  turnover_ratio: metric("Inventory Turnover", "ratio", "inventory", UP),
  annualized_turnover: metric("Annualized Turnover", "ratio", "inventory", UP, "inventory_turnover"),
  waste_rate_pct: metric("Waste Rate", "percentage", "inventory", DOWN),
  days_inventory_outstanding: metric("Days Inventory Outstanding", "days", "inventory", DOWN),
  total_sold_units: metric("Units Sold", "count", "inventory"),
  total_waste_units: metric("Units Wasted", "count", "inventory", DOWN),

  // Customers
  total_transactions: metric("Transactions", "count", "customer", UP),
  total_customers: metric("Customers", "count", "customer", UP),
  new_customers: metric("New Customers", "count", "customer", UP),
  returning_customers: metric("Returning Customers", "count", "customer", UP),
  retention_rate_pct: metric("Retention Rate", "percentage", "customer", UP, "retention_rate_pct"),
  new_customer_pct: metric("New Customer Share", "percentage", "customer"),
  visits_per_customer: metric("Visits per Customer", "ratio", "customer", UP),
  customer_acquisition_cost: metric("CAC", "currency", "customer", DOWN),
  customer_lifetime_value: metric("CLV", "currency", "customer", UP),
  clv_cac_ratio: metric("CLV:CAC", "ratio", "customer", UP, "clv_cac_ratio"),

  // Impact
  total_kg_sourced: metric("Coffee Sourced (kg)", "count", "impact", UP),
  total_premium_paid: metric("Farmer Premium Paid", "currency", "impact", UP),
  total_cups_served: metric("Cups Served", "count", "impact", UP),
  direct_trade_pct: metric("Direct Trade", "percentage", "impact", UP),
  avg_co2_per_cup_grams: metric("Avg CO2 / Cup", "grams", "impact", DOWN),
  current_co2_per_cup_grams: metric("Current CO2 / Cup", "grams", "impact", DOWN),
  premium_per_cup: metric("Premium / Cup", "currency", "impact", UP),
  premium_growth_pct: metric("Premium Growth (3M)", "percentage", "impact", UP),
  kg_per_month_latest: metric("Coffee Sourced, Latest Month (kg)", "count", "impact", UP),
  current_farmers_supported: metric("Farmers Supported, Latest Month", "count", "impact", UP),
  avg_farmer_premium_pct: metric("Avg Farmer Premium", "percentage", "impact", UP),
  avg_compostable_pct: metric("Compostable Packaging", "percentage", "impact", UP),

  // Executive summary
  avg_roi_pct: metric("Avg Store ROI", "percentage", "roi", UP),
  active_stores: metric("Active Stores", "count", "revenue"),
  farmers_supported: metric("Farmers Supported", "count", "impact", UP),
} satisfies Record<string, MetricDefinition>;

export type MetricId = keyof typeof METRIC_REGISTRY;

export function getMetricDefinition(id: MetricId): MetricDefinition {
  return METRIC_REGISTRY[id];
}

/** Tag a raw formula output with its unit and a status. */
export function toKpiValue(id: MetricId, raw: RawMetric): KPIValue {
  const { unit } = METRIC_REGISTRY[id];
  if (raw === null || Number.isNaN(raw)) return { value: null, unit, status: "undefined" };
  if (!Number.isFinite(raw)) return { value: null, unit, status: "unreachable" };
  return { value: raw, unit, status: "ok" };
}

export function buildResult<K extends MetricId>(values: Record<K, RawMetric>): KPIResult<K> {
  const result = {} as KPIResult<K>;
  for (const id in values) {
    result[id] = toKpiValue(id, values[id]);
  }
  return result;
}

/**
 * Compare a value against its target. For `neutral` metrics any value counts
 * as on target; the delta is always `value - target`.
 */
export function compareToBenchmark(
  value: number | null,
  target: number,
  direction: MetricDirection,
): BenchmarkComparison {
  if (value === null) return { target, delta: null, status: "no_data" };
  const delta = value - target;
  const onTarget =
    direction === "higher_is_better" ? delta >= 0 : direction === "lower_is_better" ? delta <= 0 : true;
  return { target, delta, status: onTarget ? "on_target" : "off_target" };
}

/** Attach benchmark comparisons to every metric that has a configured target. */
export function withBenchmarks<K extends MetricId>(result: KPIResult<K>, targets: BenchmarkTargets): KPIResult<K> {
  const annotated = { ...result };
  for (const id in result) {
    const def: MetricDefinition = METRIC_REGISTRY[id];
    const target = def.target !== undefined ? targets[def.target] : undefined;
    if (target === undefined) continue;
    annotated[id] = { ...result[id], benchmark: compareToBenchmark(result[id].value, target, def.direction) };
  }
  return annotated;
}

/** Display tier for CLV:CAC. The target only drives this classification. */
export function classifyClvCac(ratio: number | null, target: number): ClvCacTier {
  if (ratio === null) return "unknown";
  if (ratio >= target) return "healthy";
  if (ratio >= 1) return "marginal";
  return "unprofitable";
}
