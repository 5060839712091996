import type { KPIValue, MetricUnit } from "./kpi/types";

/** Display precision per unit. Values are rounded half-to-even. */
export const DISPLAY_DECIMALS: Record<MetricUnit, number> = {
  currency: 0,
  percentage: 1,
  ratio: 2,
  count: 0,
  months: 1,
  days: 1,
  grams: 1,
};

const HALF_TOLERANCE = 1e-9;

export function roundHalfEven(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const rounded =
    Math.abs(scaled - floor - 0.5) < HALF_TOLERANCE ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  // adding 0 normalises -0
  return rounded / factor + 0;
}

function fixed(value: number, decimals: number): string {
  return roundHalfEven(value, decimals).toFixed(decimals);
}

export function formatCurrency(value: number): string {
  const sign = value < 0 ? "-" : "";
  const abs = Math.abs(value);
  if (abs >= 1_000_000_000) {
    return `${sign}€${fixed(abs / 1_000_000_000, 1)}B`;
  }
  if (abs >= 1_000_000) {
    return `${sign}€${fixed(abs / 1_000_000, 1)}M`;
  }
  if (abs >= 10_000) {
    return `${sign}€${fixed(abs / 1_000, 0)}K`;
  }
  if (abs >= 100) {
    return `${sign}€${formatNumber(abs, 0)}`;
  }
  return `${sign}€${fixed(abs, 2)}`;
}

export function formatPercent(value: number, decimals = DISPLAY_DECIMALS.percentage): string {
  return `${fixed(value, decimals)}%`;
}

export function formatRatio(value: number): string {
  return `${fixed(value, DISPLAY_DECIMALS.ratio)}x`;
}

export function formatNumber(value: number, decimals = 0): string {
  const [whole, fraction] = fixed(value, decimals).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return fraction ? `${grouped}.${fraction}` : grouped;
}

export function formatKpiValue(kpi: KPIValue): string {
  if (kpi.status === "unreachable") return "∞";
  if (kpi.value === null) return "—";

  switch (kpi.unit) {
    case "currency":
      return formatCurrency(kpi.value);
    case "percentage":
      return formatPercent(kpi.value);
    case "ratio":
      return formatRatio(kpi.value);
    case "months":
      return `${fixed(kpi.value, DISPLAY_DECIMALS.months)} mo`;
    case "days":
      return `${fixed(kpi.value, DISPLAY_DECIMALS.days)} d`;
    case "grams":
      return `${fixed(kpi.value, DISPLAY_DECIMALS.grams)} g`;
    default:
      return formatNumber(kpi.value, DISPLAY_DECIMALS.count);
  }
}
