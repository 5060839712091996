import { COST_CATEGORIES, type CostCategory, type EngineConfig, type ProductCategory, type StoreRecord } from "../schemas";
import {
  annualizedRoi,
  breakEvenRevenue,
  clvCacRatio,
  contributionMargin,
  customerAcquisitionCost,
  customerLifetimeValue,
  daysInventoryOutstanding,
  directTradePct,
  ebitda,
  estimatedLifespanPeriods,
  grossMargin,
  growthRate,
  inventoryTurnover,
  laborCostPct,
  monthsToPayback,
  netMargin,
  netProfit,
  opexRatio,
  percentOfRevenue,
  perUnit,
  retentionRate,
  revenuePerLaborHour,
  revenuePerSquareMeter,
  roi,
  safeDivide,
  sharePct,
  variableCostRatio,
  visitFrequency,
  wasteRate,
} from "./kpi-formulas";
import { buildResult, classifyClvCac, toKpiValue, withBenchmarks } from "./metric-registry";
import {
  bucketFor,
  costOf,
  distinctPeriods,
  filterRecords,
  storeCodes,
  sum,
  sumByPeriod,
  totalCosts,
  trailingWindows,
} from "./records";
import type {
  CashFlowRow,
  ClvCacTier,
  CostStructureRow,
  PeriodGranularity,
  RawMetric,
  RecordFilter,
  RevenuePeriodRow,
  StoreKpiRow,
} from "./types";

function storeInfo(config: EngineConfig, code: string): Omit<StoreKpiRow, "metrics"> {
  const profile = config.stores[code];
  return { store_code: code, store_name: profile?.name ?? code, city: profile?.city ?? "" };
}

function sumCosts(records: readonly StoreRecord[], categories?: readonly CostCategory[]): number {
  return categories ? sum(records, (r) => costOf(r, categories)) : sum(records, totalCosts);
}

function growthFor(totals: Map<string, number>): RawMetric {
  const windows = trailingWindows(totals);
  return windows ? growthRate(windows.recent, windows.prior) : null;
}

function lastValue(totals: Map<string, number>): RawMetric {
  const values = [...totals.values()];
  return values.length > 0 ? values[values.length - 1] : null;
}

// ---------------------------------------------------------------------------
// Store-level ROI & break-even
// ---------------------------------------------------------------------------

/**
 * Capital invested in a store up to the end of the filter window. Investment
 * is cumulative, so periods before `from` (or outside `years`) still count.
 */
function investmentToDate(records: readonly StoreRecord[], code: string, filter: RecordFilter): number {
  const lastYear = filter.years && filter.years.length > 0 ? Math.max(...filter.years) : undefined;
  return sum(
    records.filter(
      (r) =>
        r.store_code === code &&
        (!filter.to || r.period <= filter.to) &&
        (lastYear === undefined || Number(r.period.slice(0, 4)) <= lastYear),
    ),
    (r) => r.investment,
  );
}

/** ROI = (cumulative net profit / total investment) x 100, annualized over months operating. */
export function calculateStoreRoi(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const scoped = filterRecords(records, filter);
  return storeCodes(scoped, config.overhead_store_code).map((code) => {
    const own = scoped.filter((r) => r.store_code === code);
    const totalInvestment = investmentToDate(records, code, filter);
    const revenue = sum(own, (r) => r.revenue);
    const costs = sumCosts(own);
    const profit = netProfit(revenue, costs);
    const monthsOperating = distinctPeriods(own).length;
    const roiPct = roi(profit, totalInvestment);

    return {
      ...storeInfo(config, code),
      metrics: buildResult({
        total_investment: totalInvestment,
        total_revenue: revenue,
        total_costs: costs,
        net_profit: profit,
        roi_pct: roiPct,
        annualized_roi_pct: annualizedRoi(roiPct, monthsOperating),
        months_operating: monthsOperating,
      }),
    };
  });
}

/**
 * Break-even revenue = fixed costs / (1 - variable cost ratio), on monthly
 * averages. Payback months = total investment / average monthly net profit.
 */
export function calculateBreakEven(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const scoped = filterRecords(records, filter);
  return storeCodes(scoped, config.overhead_store_code).map((code) => {
    const own = scoped.filter((r) => r.store_code === code);
    const months = distinctPeriods(own).length;
    const totalInvestment = investmentToDate(records, code, filter);
    const revenue = sum(own, (r) => r.revenue);
    const costs = sumCosts(own);
    const fixedCategories = config.cost_classification.fixed;
    const fixed = sumCosts(own, fixedCategories);
    const variable = sumCosts(own, COST_CATEGORIES.filter((c) => !fixedCategories.includes(c)));

    const vcr = variableCostRatio(variable, revenue);
    const avgMonthlyRevenue = revenue / months;
    const avgMonthlyProfit = netProfit(revenue, costs) / months;
    const breakEven = breakEvenRevenue(fixed / months, vcr);
    const performance =
      breakEven === null || !Number.isFinite(breakEven) ? null : sharePct(avgMonthlyRevenue, breakEven);

    return {
      ...storeInfo(config, code),
      metrics: withBenchmarks(
        buildResult({
          total_investment: totalInvestment,
          avg_monthly_revenue: avgMonthlyRevenue,
          avg_monthly_profit: avgMonthlyProfit,
          variable_cost_ratio: vcr,
          contribution_margin: contributionMargin(vcr),
          break_even_revenue_monthly: breakEven,
          be_performance_pct: performance,
          months_to_payback: monthsToPayback(totalInvestment, avgMonthlyProfit),
        }),
        config.targets,
      ),
    };
  });
}

// ---------------------------------------------------------------------------
// Profitability
// ---------------------------------------------------------------------------

/**
 * Gross margin = (revenue - COGS) / revenue, net margin = (revenue - all
 * costs) / revenue, EBITDA = net profit + depreciation.
 */
export function calculateProfitability(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const scoped = filterRecords(records, filter);
  const revenue = sum(scoped, (r) => r.revenue);
  const cogs = sumCosts(scoped, config.cost_classification.cogs);
  const costs = sumCosts(scoped);
  const depreciation = sumCosts(scoped, config.cost_classification.depreciation);
  const profit = netProfit(revenue, costs);
  const ebitdaValue = ebitda(profit, depreciation);

  return withBenchmarks(
    buildResult({
      total_revenue: revenue,
      cogs,
      gross_profit: revenue - cogs,
      gross_margin_pct: grossMargin(revenue, cogs),
      net_profit: profit,
      net_margin_pct: netMargin(revenue, costs),
      ebitda: ebitdaValue,
      ebitda_margin_pct: percentOfRevenue(ebitdaValue, revenue),
      total_costs: costs,
      opex_ratio: opexRatio(revenue, costs, cogs),
    }),
    config.targets,
  );
}

export function calculateProfitabilityByStore(
  records: readonly StoreRecord[],
  config: EngineConfig,
  filter: RecordFilter = {},
) {
  const scoped = filterRecords(records, filter);
  return storeCodes(scoped, config.overhead_store_code).map((code) => ({
    ...storeInfo(config, code),
    metrics: calculateProfitability(scoped, config, { stores: [code] }),
  }));
}

// ---------------------------------------------------------------------------
// Revenue
// ---------------------------------------------------------------------------

function categoryShare(records: readonly StoreRecord[], category: ProductCategory, revenue: number): RawMetric {
  return percentOfRevenue(sum(records, (r) => r.revenue_by_category[category] ?? 0), revenue);
}

export function calculateRevenueMetrics(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const scoped = filterRecords(records, filter);
  const revenue = sum(scoped, (r) => r.revenue);
  const monthly = sumByPeriod(scoped, (r) => r.revenue);
  const months = monthly.size;
  const floorArea = sum(storeCodes(scoped, config.overhead_store_code), (code) => config.stores[code]?.sqm ?? 0);

  const withCustomers = scoped.filter((r) => r.customers);
  const transactions = sum(withCustomers, (r) => r.customers?.transactions ?? 0);

  return withBenchmarks(
    buildResult({
      total_revenue: revenue,
      avg_monthly_revenue: safeDivide(revenue, months),
      months_of_data: months,
      revenue_per_sqm_month: revenuePerSquareMeter(revenue, floorArea, months),
      growth_pct_3m: growthFor(monthly),
      avg_transaction_value: safeDivide(sum(withCustomers, (r) => r.revenue), transactions),
      total_customers: sum(withCustomers, (r) => r.customers?.unique_customers ?? 0),
      revenue_coffee_pct: categoryShare(scoped, "coffee", revenue),
      revenue_food_pct: categoryShare(scoped, "food", revenue),
      revenue_merchandise_pct: categoryShare(scoped, "merchandise", revenue),
      revenue_subscription_pct: categoryShare(scoped, "subscription", revenue),
    }),
    config.targets,
  );
}

export function calculateRevenueByPeriod(
  records: readonly StoreRecord[],
  granularity: PeriodGranularity = "month",
  filter: RecordFilter = {},
): RevenuePeriodRow[] {
  const buckets = new Map<string, number>();
  for (const r of filterRecords(records, filter)) {
    const key = bucketFor(r.period, granularity);
    buckets.set(key, (buckets.get(key) ?? 0) + r.revenue);
  }
  return [...buckets.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([period, revenue]) => ({ period, revenue }));
}

// ---------------------------------------------------------------------------
// Cost structure
// ---------------------------------------------------------------------------

/** Each cost category as a share of revenue, next to its configured target. */
export function calculateCostStructure(
  records: readonly StoreRecord[],
  config: EngineConfig,
  filter: RecordFilter = {},
): CostStructureRow[] {
  const scoped = filterRecords(records, filter);
  const revenue = sum(scoped, (r) => r.revenue);

  return COST_CATEGORIES.filter((category) => scoped.some((r) => r.costs[category] !== undefined))
    .map((category) => {
      const amount = sumCosts(scoped, [category]);
      const pct = toKpiValue("cost_pct_of_revenue", percentOfRevenue(amount, revenue));
      const targetKey = config.cost_benchmarks[category];
      const target = targetKey ? config.targets[targetKey] ?? null : null;
      return {
        cost_category: category,
        cost_label: config.cost_labels[category] ?? category,
        amount,
        pct_of_revenue: pct,
        target_pct: target,
        vs_target: pct.value !== null && target !== null ? pct.value - target : null,
      };
    })
    .sort((a, b) => b.amount - a.amount || a.cost_category.localeCompare(b.cost_category));
}

// ---------------------------------------------------------------------------
// Labor
// ---------------------------------------------------------------------------

/**
 * Revenue per labor hour and labor cost share, over records that carry labor
 * data. FTE figures are per period, so revenue per FTE-month divides by their sum.
 */
export function calculateLaborEfficiency(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const withLabor = filterRecords(records, filter).filter((r) => r.labor);
  const revenue = sum(withLabor, (r) => r.revenue);
  const hours = sum(withLabor, (r) => r.labor?.hours ?? 0);
  const fteMonths = sum(withLabor, (r) => r.labor?.fte ?? 0);
  const laborCost = sumCosts(withLabor, ["labor"]);

  return withBenchmarks(
    buildResult({
      total_labor_hours: hours,
      total_labor_cost: laborCost,
      avg_fte: safeDivide(fteMonths, distinctPeriods(withLabor).length),
      revenue_per_labor_hour: revenuePerLaborHour(revenue, hours),
      labor_cost_pct: laborCostPct(laborCost, revenue),
      revenue_per_employee_month: safeDivide(revenue, fteMonths),
    }),
    config.targets,
  );
}

// ---------------------------------------------------------------------------
// Inventory
// ---------------------------------------------------------------------------

/** Turnover = cost of goods sold / average inventory value; waste rate = waste / (sold + waste). */
export function calculateInventoryMetrics(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const withStock = filterRecords(records, filter).filter((r) => r.inventory);
  const stockByPeriod = sumByPeriod(withStock, (r) => r.inventory?.stock_value ?? 0);
  const months = stockByPeriod.size;
  const avgStock = safeDivide([...stockByPeriod.values()].reduce((s, v) => s + v, 0), months);
  const costOfSold = sum(withStock, (r) => r.inventory?.cost_of_sold ?? 0);
  const sold = sum(withStock, (r) => r.inventory?.sold_units ?? 0);
  const waste = sum(withStock, (r) => r.inventory?.waste_units ?? 0);

  const turnover = avgStock === null ? null : inventoryTurnover(costOfSold, avgStock);

  return withBenchmarks(
    buildResult({
      avg_stock_value: avgStock,
      current_stock_value: lastValue(stockByPeriod),
      turnover_ratio: turnover,
      annualized_turnover: turnover === null ? null : (turnover / months) * 12,
      waste_rate_pct: wasteRate(waste, sold),
      days_inventory_outstanding:
        avgStock === null ? null : daysInventoryOutstanding(avgStock, costOfSold, months * config.days_per_period),
      total_sold_units: sold,
      total_waste_units: waste,
    }),
    config.targets,
  );
}

// ---------------------------------------------------------------------------
// Customers
// ---------------------------------------------------------------------------

/**
 * CAC = marketing spend / new customers; CLV = revenue per customer x
 * expected lifespan, where lifespan follows from the retention rate.
 */
export function calculateCustomerMetrics(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const withCustomers = filterRecords(records, filter).filter((r) => r.customers);
  const revenue = sum(withCustomers, (r) => r.revenue);
  const transactions = sum(withCustomers, (r) => r.customers?.transactions ?? 0);
  const customers = sum(withCustomers, (r) => r.customers?.unique_customers ?? 0);
  const newCustomers = sum(withCustomers, (r) => r.customers?.new_customers ?? 0);
  const returning = sum(withCustomers, (r) => r.customers?.returning_customers ?? 0);
  const marketing = sumCosts(withCustomers, config.cost_classification.marketing);

  const retention = retentionRate(returning, customers);
  const cac = customerAcquisitionCost(marketing, newCustomers);
  const clv =
    retention === null
      ? null
      : customerLifetimeValue(
          safeDivide(revenue, customers),
          estimatedLifespanPeriods(
            retention / 100,
            config.customer_lifespan.cap_periods,
            config.customer_lifespan.full_retention_periods,
          ),
        );

  return withBenchmarks(
    buildResult({
      total_transactions: transactions,
      total_customers: customers,
      new_customers: newCustomers,
      returning_customers: returning,
      retention_rate_pct: retention,
      new_customer_pct: sharePct(newCustomers, customers),
      avg_transaction_value: safeDivide(revenue, transactions),
      visits_per_customer: visitFrequency(transactions, customers),
      customer_acquisition_cost: cac,
      customer_lifetime_value: clv,
      clv_cac_ratio: clvCacRatio(clv, cac),
    }),
    config.targets,
  );
}

// ---------------------------------------------------------------------------
// Cash flow
// ---------------------------------------------------------------------------

/** Operating cash flow = net profit + depreciation; free cash flow subtracts the period's capex. */
export function calculateCashFlow(
  records: readonly StoreRecord[],
  config: EngineConfig,
  filter: RecordFilter = {},
): CashFlowRow[] {
  const scoped = filterRecords(records, filter);
  let cumulative = 0;

  return distinctPeriods(scoped).map((period) => {
    const inPeriod = scoped.filter((r) => r.period === period);
    const revenue = sum(inPeriod, (r) => r.revenue);
    const costs = sumCosts(inPeriod);
    const depreciation = sumCosts(inPeriod, config.cost_classification.depreciation);
    const capex = sum(inPeriod, (r) => r.investment);
    const profit = netProfit(revenue, costs);
    const operating = profit + depreciation;
    cumulative += operating;

    return {
      period,
      revenue,
      total_costs: costs,
      net_profit: profit,
      depreciation,
      operating_cash_flow: operating,
      capex,
      free_cash_flow: operating - capex,
      cumulative_cash_flow: cumulative,
    };
  });
}

// ---------------------------------------------------------------------------
// Impact
// ---------------------------------------------------------------------------

/**
 * Mission metrics over records with sustainability data. Farmer premium is
 * weighted by kg sourced, packaging and CO2 by cups served; farmer counts
 * come from the latest period only.
 */
export function calculateImpactSummary(records: readonly StoreRecord[], filter: RecordFilter = {}) {
  const withImpact = filterRecords(records, filter).filter((r) => r.sustainability);
  const kg = sum(withImpact, (r) => r.sustainability?.kg_coffee_sourced ?? 0);
  const premium = sum(withImpact, (r) => r.sustainability?.farmer_premium_paid ?? 0);
  const cups = sum(withImpact, (r) => r.sustainability?.cups_served ?? 0);
  const co2 = (r: StoreRecord) => (r.sustainability ? r.sustainability.co2_per_cup_grams * r.sustainability.cups_served : 0);
  const premiumPct = (r: StoreRecord) =>
    r.sustainability ? r.sustainability.farmer_premium_pct * r.sustainability.kg_coffee_sourced : 0;
  const compostable = (r: StoreRecord) =>
    r.sustainability ? r.sustainability.compostable_pct * r.sustainability.cups_served : 0;

  const periods = distinctPeriods(withImpact);
  const latest = withImpact.filter((r) => r.period === periods[periods.length - 1]);
  const latestCups = sum(latest, (r) => r.sustainability?.cups_served ?? 0);

  return buildResult({
    total_kg_sourced: kg,
    total_premium_paid: premium,
    total_cups_served: cups,
    direct_trade_pct: directTradePct(sum(withImpact, (r) => r.sustainability?.direct_trade_kg ?? 0), kg),
    avg_co2_per_cup_grams: perUnit(sum(withImpact, co2), cups),
    current_co2_per_cup_grams: perUnit(sum(latest, co2), latestCups),
    premium_per_cup: perUnit(premium, cups),
    premium_growth_pct: growthFor(sumByPeriod(withImpact, (r) => r.sustainability?.farmer_premium_paid ?? 0)),
    kg_per_month_latest: latest.length > 0 ? sum(latest, (r) => r.sustainability?.kg_coffee_sourced ?? 0) : null,
    current_farmers_supported: latest.length > 0 ? sum(latest, (r) => r.sustainability?.farmers_supported ?? 0) : null,
    avg_farmer_premium_pct: perUnit(sum(withImpact, premiumPct), kg),
    avg_compostable_pct: perUnit(sum(withImpact, compostable), cups),
  });
}

// ---------------------------------------------------------------------------
// Executive summary & full dashboard
// ---------------------------------------------------------------------------

export function calculateExecutiveSummary(records: readonly StoreRecord[], config: EngineConfig, filter: RecordFilter = {}) {
  const profit = calculateProfitability(records, config, filter);
  const revenue = calculateRevenueMetrics(records, config, filter);
  const impact = calculateImpactSummary(records, filter);
  const roiRows = calculateStoreRoi(records, config, filter);

  const roiValues = roiRows.flatMap((row) => (row.metrics.roi_pct.value === null ? [] : [row.metrics.roi_pct.value]));

  return withBenchmarks(
    buildResult({
      total_revenue: profit.total_revenue.value,
      gross_margin_pct: profit.gross_margin_pct.value,
      net_margin_pct: profit.net_margin_pct.value,
      ebitda: profit.ebitda.value,
      avg_roi_pct: safeDivide(roiValues.reduce((s, v) => s + v, 0), roiValues.length),
      total_investment: sum(roiRows, (row) => row.metrics.total_investment.value ?? 0),
      growth_pct_3m: revenue.growth_pct_3m.value,
      avg_transaction_value: revenue.avg_transaction_value.value,
      total_customers: revenue.total_customers.value,
      active_stores: roiRows.length,
      total_premium_paid: impact.total_premium_paid.value,
      farmers_supported: impact.current_farmers_supported.value,
    }),
    config.targets,
  );
}

export interface DashboardKpis {
  executive: ReturnType<typeof calculateExecutiveSummary>;
  store_roi: ReturnType<typeof calculateStoreRoi>;
  break_even: ReturnType<typeof calculateBreakEven>;
  profitability: ReturnType<typeof calculateProfitability>;
  profitability_by_store: ReturnType<typeof calculateProfitabilityByStore>;
  revenue: ReturnType<typeof calculateRevenueMetrics>;
  revenue_by_period: RevenuePeriodRow[];
  cost_structure: CostStructureRow[];
  labor: ReturnType<typeof calculateLaborEfficiency>;
  inventory: ReturnType<typeof calculateInventoryMetrics>;
  customers: ReturnType<typeof calculateCustomerMetrics>;
  clv_cac_tier: ClvCacTier;
  cash_flow: CashFlowRow[];
  impact: ReturnType<typeof calculateImpactSummary>;
}

/** Every dashboard section for one filter. Recomputed on each call. */
export function calculateDashboard(
  records: readonly StoreRecord[],
  config: EngineConfig,
  filter: RecordFilter = {},
  granularity: PeriodGranularity = "month",
): DashboardKpis {
  const customers = calculateCustomerMetrics(records, config, filter);
  return {
    executive: calculateExecutiveSummary(records, config, filter),
    store_roi: calculateStoreRoi(records, config, filter),
    break_even: calculateBreakEven(records, config, filter),
    profitability: calculateProfitability(records, config, filter),
    profitability_by_store: calculateProfitabilityByStore(records, config, filter),
    revenue: calculateRevenueMetrics(records, config, filter),
    revenue_by_period: calculateRevenueByPeriod(records, granularity, filter),
    cost_structure: calculateCostStructure(records, config, filter),
    labor: calculateLaborEfficiency(records, config, filter),
    inventory: calculateInventoryMetrics(records, config, filter),
    customers,
    clv_cac_tier: classifyClvCac(customers.clv_cac_ratio.value, config.targets.clv_cac_ratio ?? 3),
    cash_flow: calculateCashFlow(records, config, filter),
    impact: calculateImpactSummary(records, filter),
  };
}
