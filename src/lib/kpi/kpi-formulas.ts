import { KpiValidationError } from "../errors";
import type { RawMetric } from "./types";

// ---------------------------------------------------------------------------
// Argument guards
// ---------------------------------------------------------------------------

function finite(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new KpiValidationError(`${name} must be a finite number`, [
      { path: name, message: `Expected a finite number, received ${value}` },
    ]);
  }
  return value;
}

function nonNegative(name: string, value: number): number {
  finite(name, value);
  if (value < 0) {
    throw new KpiValidationError(`${name} cannot be negative`, [
      { path: name, message: `Expected a value >= 0, received ${value}` },
    ]);
  }
  return value;
}

/** Division that yields `null` instead of dividing by zero. */
export function safeDivide(numerator: number, denominator: number): RawMetric {
  if (denominator === 0) return null;
  return numerator / denominator;
}

/** `part / whole * 100`, evaluated left to right. */
function percentOf(part: number, whole: number): RawMetric {
  if (whole === 0) return null;
  return (part / whole) * 100;
}

// ---------------------------------------------------------------------------
// ROI & break-even
// ---------------------------------------------------------------------------

export function netProfit(revenue: number, totalCosts: number): number {
  return nonNegative("revenue", revenue) - nonNegative("total_costs", totalCosts);
}

/** ROI = cumulative net profit / total investment x 100 */
export function roi(cumulativeNetProfit: number, totalInvestment: number): RawMetric {
  finite("cumulative_net_profit", cumulativeNetProfit);
  return percentOf(cumulativeNetProfit, nonNegative("total_investment", totalInvestment));
}

/** Annualized ROI = ROI / months operating x 12 */
export function annualizedRoi(roiPct: RawMetric, monthsOperating: number): RawMetric {
  nonNegative("months_operating", monthsOperating);
  if (roiPct === null || monthsOperating === 0) return null;
  return (finite("roi", roiPct) / monthsOperating) * 12;
}

export function variableCostRatio(variableCosts: number, revenue: number): RawMetric {
  return safeDivide(nonNegative("variable_costs", variableCosts), nonNegative("revenue", revenue));
}

export function contributionMargin(ratio: RawMetric): RawMetric {
  if (ratio === null) return null;
  return 1 - nonNegative("variable_cost_ratio", ratio);
}

/** Break-even revenue = fixed costs / (1 - variable cost ratio); unreachable once variable costs eat all revenue. */
export function breakEvenRevenue(fixedCosts: number, ratio: RawMetric): RawMetric {
  nonNegative("fixed_costs", fixedCosts);
  if (ratio === null) return null;
  if (nonNegative("variable_cost_ratio", ratio) >= 1) return Infinity;
  return fixedCosts / (1 - ratio);
}

/** Months to payback = total investment / average monthly net profit; unreachable without profit. */
export function monthsToPayback(totalInvestment: number, avgMonthlyNetProfit: number): RawMetric {
  nonNegative("total_investment", totalInvestment);
  if (finite("avg_monthly_net_profit", avgMonthlyNetProfit) <= 0) return Infinity;
  return totalInvestment / avgMonthlyNetProfit;
}

// ---------------------------------------------------------------------------
// Profitability
// ---------------------------------------------------------------------------

/** Gross margin = (revenue - COGS) / revenue x 100 */
export function grossMargin(revenue: number, cogs: number): RawMetric {
  nonNegative("cogs", cogs);
  return percentOf(nonNegative("revenue", revenue) - cogs, revenue);
}

/** Net margin = (revenue - total costs) / revenue x 100 */
export function netMargin(revenue: number, totalCosts: number): RawMetric {
  return percentOf(netProfit(revenue, totalCosts), revenue);
}

export function ebitda(netProfitValue: number, depreciation: number): number {
  return finite("net_profit", netProfitValue) + nonNegative("depreciation", depreciation);
}

/** OpEx ratio = (total costs - COGS) / revenue x 100 */
export function opexRatio(revenue: number, totalCosts: number, cogs: number): RawMetric {
  nonNegative("total_costs", totalCosts);
  nonNegative("cogs", cogs);
  return percentOf(totalCosts - cogs, nonNegative("revenue", revenue));
}

/** Share of a whole as a percentage (part / whole x 100). */
export function sharePct(part: number, whole: number): RawMetric {
  return percentOf(nonNegative("part", part), nonNegative("whole", whole));
}

export function percentOfRevenue(amount: number, revenue: number): RawMetric {
  return percentOf(finite("amount", amount), nonNegative("revenue", revenue));
}

// ---------------------------------------------------------------------------
// Revenue & labor
// ---------------------------------------------------------------------------

/** Growth = (current - previous) / previous x 100 */
export function growthRate(current: number, previous: number): RawMetric {
  return percentOf(finite("current", current) - nonNegative("previous", previous), previous);
}

export function revenuePerSquareMeter(revenue: number, sqm: number, months = 1): RawMetric {
  nonNegative("revenue", revenue);
  nonNegative("sqm", sqm);
  nonNegative("months", months);
  return safeDivide(revenue, sqm * months);
}

export function revenuePerLaborHour(revenue: number, laborHours: number): RawMetric {
  return safeDivide(nonNegative("revenue", revenue), nonNegative("labor_hours", laborHours));
}

export function laborCostPct(laborCosts: number, revenue: number): RawMetric {
  return percentOf(nonNegative("labor_costs", laborCosts), nonNegative("revenue", revenue));
}

// ---------------------------------------------------------------------------
// Inventory
// ---------------------------------------------------------------------------

export function inventoryTurnover(cogs: number, averageInventoryValue: number): RawMetric {
  return safeDivide(nonNegative("cogs", cogs), nonNegative("average_inventory_value", averageInventoryValue));
}

/** DIO = average stock value / (COGS / days in period) */
export function daysInventoryOutstanding(avgStockValue: number, cogs: number, daysInPeriod: number): RawMetric {
  nonNegative("avg_stock_value", avgStockValue);
  const dailyCogs = safeDivide(nonNegative("cogs", cogs), nonNegative("days_in_period", daysInPeriod));
  if (dailyCogs === null) return null;
  return safeDivide(avgStockValue, dailyCogs);
}

/** Waste rate = waste / (sold + waste) x 100 */
export function wasteRate(waste: number, sold: number): RawMetric {
  nonNegative("waste", waste);
  return percentOf(waste, waste + nonNegative("sold", sold));
}

// ---------------------------------------------------------------------------
// Customer economics
// ---------------------------------------------------------------------------

/** CAC = marketing spend / new customers */
export function customerAcquisitionCost(marketingSpend: number, newCustomers: number): RawMetric {
  return safeDivide(nonNegative("marketing_spend", marketingSpend), nonNegative("new_customers", newCustomers));
}

/** CLV = average revenue per customer x estimated lifespan in periods */
export function customerLifetimeValue(avgRevenuePerCustomer: RawMetric, lifespanPeriods: number): RawMetric {
  nonNegative("estimated_lifespan_periods", lifespanPeriods);
  if (avgRevenuePerCustomer === null) return null;
  return nonNegative("avg_revenue_per_customer", avgRevenuePerCustomer) * lifespanPeriods;
}

export function clvCacRatio(clv: RawMetric, cac: RawMetric): RawMetric {
  if (clv === null || cac === null) return null;
  return safeDivide(nonNegative("clv", clv), nonNegative("cac", cac));
}

/**
 * Expected customer lifespan from a retention fraction (0-1): 1 / churn,
 * capped. Full retention has no churn, so a fixed fallback is used.
 */
export function estimatedLifespanPeriods(
  retentionFraction: number,
  capPeriods: number,
  fullRetentionPeriods: number,
): number {
  nonNegative("retention", retentionFraction);
  if (retentionFraction >= 1) return fullRetentionPeriods;
  return Math.min(1 / (1 - retentionFraction), capPeriods);
}

export function retentionRate(returningCustomers: number, totalCustomers: number): RawMetric {
  return percentOf(nonNegative("returning_customers", returningCustomers), nonNegative("total_customers", totalCustomers));
}

export function visitFrequency(transactions: number, customers: number): RawMetric {
  return safeDivide(nonNegative("transactions", transactions), nonNegative("customers", customers));
}

// ---------------------------------------------------------------------------
// Impact
// ---------------------------------------------------------------------------

export function directTradePct(directTradeKg: number, totalKg: number): RawMetric {
  return percentOf(nonNegative("direct_trade_kg", directTradeKg), nonNegative("total_kg", totalKg));
}

export function perUnit(total: number, units: number): RawMetric {
  return safeDivide(nonNegative("total", total), nonNegative("units", units));
}
