import { z } from "zod";
import type { Logger } from "../logger";
import {
  COST_CATEGORIES,
  parseStoreRecords,
  type AccountMap,
  type CostCategory,
  type EngineConfig,
  type ProductCategory,
  type StoreRecord,
} from "../schemas";
import { getAllAccountCodes, getCategoryForAccountCode, signedAmount } from "./account-map";
import type { OdooClient } from "./odoo-client";
import type { DataSource, OdooDomain } from "./types";

export const MOVE_LINE_FIELDS = ["date", "debit", "credit", "balance", "account_id", "analytic_distribution"];

export const moveLineSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
  debit: z.number().default(0),
  credit: z.number().default(0),
  balance: z.number().optional(),
  account_id: z.union([z.tuple([z.number(), z.string()]), z.literal(false)]),
  analytic_distribution: z.union([z.record(z.string(), z.number()), z.literal(false), z.null()]).optional(),
});

export type MoveLine = z.infer<typeof moveLineSchema>;

/** Posted journal items of one company, within the given years, on any of the account code prefixes. */
export function buildMoveLineDomain(companyId: number, years: readonly number[], accountCodes: readonly string[]): OdooDomain {
  const domain: OdooDomain = [
    ["company_id", "=", companyId],
    ["parent_state", "=", "posted"],
  ];

  if (years.length === 1) {
    domain.push(["date", ">=", `${years[0]}-01-01`], ["date", "<=", `${years[0]}-12-31`]);
  } else if (years.length > 1) {
    for (let i = 1; i < years.length; i++) domain.push("|");
    for (const year of years) {
      domain.push("&", ["date", ">=", `${year}-01-01`], ["date", "<=", `${year}-12-31`]);
    }
  }

  for (let i = 1; i < accountCodes.length; i++) domain.push("|");
  for (const code of accountCodes) domain.push(["account_id.code", "=like", `${code}%`]);

  return domain;
}

interface RecordDraft {
  store_code: string;
  period: string;
  revenue: number;
  revenue_by_category: Partial<Record<ProductCategory, number>>;
  costs: Partial<Record<CostCategory, number>>;
  investment: number;
}

function storeForLine(line: MoveLine, analyticToStore: Map<number, string>, overhead: string): string {
  // keys may combine several analytic ids, e.g. "17046,19878"
  for (const key of Object.keys(line.analytic_distribution || {})) {
    for (const id of key.split(",")) {
      const store = analyticToStore.get(Number(id));
      if (store) return store;
    }
  }
  return overhead;
}

const cents = (value: number) => Math.max(0, Math.round(value * 100) / 100);

export interface FoldResult {
  records: StoreRecord[];
  unmapped: number;
}

/**
 * Fold journal items into one record per (store, period). Lines on unmapped
 * accounts are counted and skipped; lines without a store analytic go to the
 * overhead store.
 */
export function foldMoveLines(lines: readonly MoveLine[], config: EngineConfig, accountMap: AccountMap): FoldResult {
  const analyticToStore = new Map<number, string>();
  for (const [code, profile] of Object.entries(config.stores)) {
    if (profile.odoo_analytic_id !== undefined) analyticToStore.set(profile.odoo_analytic_id, code);
  }

  const drafts = new Map<string, RecordDraft>();
  let unmapped = 0;

  const draftFor = (line: MoveLine): RecordDraft => {
    const store_code = storeForLine(line, analyticToStore, config.overhead_store_code);
    const period = line.date.slice(0, 7);
    const key = `${store_code}/${period}`;
    const existing = drafts.get(key);
    if (existing) return existing;
    const draft: RecordDraft = { store_code, period, revenue: 0, revenue_by_category: {}, costs: {}, investment: 0 };
    drafts.set(key, draft);
    return draft;
  };

  for (const line of lines) {
    const accountCode = line.account_id ? line.account_id[1].split(/\s+/)[0] : "";
    const match = getCategoryForAccountCode(accountMap, accountCode);
    const costCategory = COST_CATEGORIES.find((c) => c === match?.category);
    if (!match || (match.section !== "revenue" && match.section !== "capex" && !costCategory)) {
      unmapped++;
      continue;
    }

    const draft = draftFor(line);
    const amount = signedAmount(match.entry, line.balance ?? line.debit - line.credit);
    if (match.section === "revenue") {
      draft.revenue += amount;
      const category = match.entry.revenue_category;
      if (category) draft.revenue_by_category[category] = (draft.revenue_by_category[category] ?? 0) + amount;
    } else if (match.section === "capex") {
      draft.investment += amount;
    } else if (costCategory) {
      draft.costs[costCategory] = (draft.costs[costCategory] ?? 0) + amount;
    }
  }

  const records = parseStoreRecords(
    [...drafts.values()].map((d) => ({
      ...d,
      revenue: cents(d.revenue),
      investment: cents(d.investment),
      revenue_by_category: Object.fromEntries(Object.entries(d.revenue_by_category).map(([k, v]) => [k, cents(v)])),
      costs: Object.fromEntries(Object.entries(d.costs).map(([k, v]) => [k, cents(v)])),
    })),
  );
  return { records, unmapped };
}

export interface OdooDataSourceOptions {
  client: OdooClient;
  config: EngineConfig;
  accountMap: AccountMap;
  companyId: number;
  maxRecords: number;
  logger: Logger;
}

export class OdooDataSource implements DataSource {
  readonly kind = "odoo";

  constructor(private readonly opts: OdooDataSourceOptions) {}

  async loadRecords(years: readonly number[]): Promise<StoreRecord[]> {
    const { client, config, accountMap, companyId, maxRecords, logger } = this.opts;
    const domain = buildMoveLineDomain(companyId, years, getAllAccountCodes(accountMap));
    logger.info({ years, companyId }, "loading journal items from odoo");

    try {
      const lines = await client.searchRead("account.move.line", domain, MOVE_LINE_FIELDS, moveLineSchema, maxRecords);
      if (lines.length >= maxRecords) {
        logger.warn({ limit: maxRecords }, "odoo result hit the record limit; totals may be incomplete");
      }

      const { records, unmapped } = foldMoveLines(lines, config, accountMap);
      if (unmapped > 0) logger.warn({ unmapped }, "skipped journal items on unmapped accounts");
      logger.info({ lines: lines.length, records: records.length }, "odoo records loaded");
      return records;
    } catch (err) {
      logger.error({ err }, "odoo load failed");
      throw err;
    }
  }
}
