import type { StoreRecord } from "../schemas";

export type DataSourceKind = "demo" | "odoo";

/** Where store records come from. Implementations return records already validated by `parseStoreRecords`. */
export interface DataSource {
  readonly kind: DataSourceKind;
  loadRecords(years: readonly number[]): Promise<StoreRecord[]>;
}

export type DomainOperator = "|" | "&" | "!";
export type DomainCondition = [field: string, operator: string, value: string | number | boolean];
export type OdooDomain = Array<DomainOperator | DomainCondition>;
