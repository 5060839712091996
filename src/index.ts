export * from "./lib/errors";
export * from "./lib/schemas";
export * from "./lib/config";
export { createLogger, silentLogger, type Logger, type LoggerConfig } from "./lib/logger";
export * from "./lib/utils";

export type * from "./lib/kpi/types";
export * from "./lib/kpi/kpi-formulas";
export * from "./lib/kpi/metric-registry";
export * from "./lib/kpi/calculation-engine";
export { filterRecords, bucketFor } from "./lib/kpi/records";

export type { DataSource, DataSourceKind, OdooDomain } from "./lib/data/types";
export * from "./lib/data/account-map";
export { OdooClient, type FetchFn, type OdooClientOptions } from "./lib/data/odoo-client";
export * from "./lib/data/odoo-source";
export * from "./lib/data/demo-data";
export * from "./lib/data/source";

export * from "./stores/dashboard-store";
export * from "./lib/bootstrap";
