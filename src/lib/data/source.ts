import type { AppEnv } from "../config";
import type { Logger } from "../logger";
import type { AccountMap, EngineConfig } from "../schemas";
import { DemoDataSource } from "./demo-data";
import { OdooClient, type FetchFn } from "./odoo-client";
import { OdooDataSource } from "./odoo-source";
import type { DataSource } from "./types";

export interface DataSourceDeps {
  env: AppEnv;
  config: EngineConfig;
  accountMap: AccountMap;
  logger: Logger;
  fetchFn?: FetchFn;
  now?: () => Date;
}

/**
 * Pick the record source named by `DATA_SOURCE`. An Odoo source without
 * credentials falls back to demo data.
 *
 * @example
 * ```ts
 * const source = createDataSource({ env: loadEnv(), config, accountMap, logger });
 * const records = await source.loadRecords([2024, 2025]);
 * ```
 */
export function createDataSource({ env, config, accountMap, logger, fetchFn, now }: DataSourceDeps): DataSource {
  const demo = () => new DemoDataSource(config, { seed: env.DEMO_SEED, now, logger: logger.child({ source: "demo" }) });

  switch (env.DATA_SOURCE) {
    case "odoo": {
      const { ODOO_URL, ODOO_DB, ODOO_USER, ODOO_PASSWORD } = env;
      if (!ODOO_URL || !ODOO_DB || !ODOO_USER || !ODOO_PASSWORD) {
        logger.warn("Odoo credentials incomplete; falling back to demo data");
        return demo();
      }
      const odooLogger = logger.child({ source: "odoo" });
      return new OdooDataSource({
        client: new OdooClient({
          url: ODOO_URL,
          db: ODOO_DB,
          user: ODOO_USER,
          password: ODOO_PASSWORD,
          timeoutMs: env.ODOO_TIMEOUT_MS,
          fetchFn,
          logger: odooLogger,
        }),
        config,
        accountMap,
        companyId: env.ODOO_COMPANY_ID,
        maxRecords: env.ODOO_MAX_RECORDS,
        logger: odooLogger,
      });
    }

    case "demo":
      return demo();
  }
}
