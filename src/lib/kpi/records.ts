import type { CostCategory, StoreRecord } from "../schemas";
import type { PeriodGranularity, RecordFilter } from "./types";

export function filterRecords(records: readonly StoreRecord[], filter: RecordFilter = {}): StoreRecord[] {
  const stores = filter.stores && filter.stores.length > 0 ? new Set(filter.stores) : null;
  const years = filter.years && filter.years.length > 0 ? new Set(filter.years) : null;
  return records.filter((r) => {
    if (stores && !stores.has(r.store_code)) return false;
    if (years && !years.has(Number(r.period.slice(0, 4)))) return false;
    if (filter.from && r.period < filter.from) return false;
    if (filter.to && r.period > filter.to) return false;
    return true;
  });
}

export function sum<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((s, item) => s + pick(item), 0);
}

export function totalCosts(record: StoreRecord): number {
  return Object.values(record.costs).reduce((s, v) => s + (v ?? 0), 0);
}

export function costOf(record: StoreRecord, categories: readonly CostCategory[]): number {
  return categories.reduce((s, c) => s + (record.costs[c] ?? 0), 0);
}

export function distinctPeriods(records: readonly StoreRecord[]): string[] {
  return [...new Set(records.map((r) => r.period))].sort();
}

export function storeCodes(records: readonly StoreRecord[], overheadCode: string): string[] {
  return [...new Set(records.map((r) => r.store_code))].filter((c) => c !== overheadCode).sort();
}

/** Sum a field per period, keyed in ascending period order. */
export function sumByPeriod(records: readonly StoreRecord[], pick: (r: StoreRecord) => number): Map<string, number> {
  const totals = new Map<string, number>();
  for (const period of distinctPeriods(records)) totals.set(period, 0);
  for (const r of records) totals.set(r.period, (totals.get(r.period) ?? 0) + pick(r));
  return totals;
}

export function bucketFor(period: string, granularity: PeriodGranularity): string {
  const year = period.slice(0, 4);
  if (granularity === "year") return year;
  if (granularity === "quarter") return `${year}-Q${Math.floor((Number(period.slice(5, 7)) - 1) / 3) + 1}`;
  return period;
}

/**
 * Split ascending per-period totals into the latest `window` periods and the
 * `window` before them. Returns null when there is not enough history.
 */
export function trailingWindows(
  totals: Map<string, number>,
  window = 3,
): { recent: number; prior: number } | null {
  const values = [...totals.values()];
  if (values.length < window * 2) return null;
  const recent = values.slice(-window).reduce((s, v) => s + v, 0);
  const prior = values.slice(-window * 2, -window).reduce((s, v) => s + v, 0);
  return { recent, prior };
}
