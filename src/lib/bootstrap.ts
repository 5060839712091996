import { loadAccountMap, loadEngineConfig, loadEnv, type AppEnv } from "./config";
import { createDataSource } from "./data/source";
import type { FetchFn } from "./data/odoo-client";
import type { DataSource } from "./data/types";
import { createLogger, type Logger } from "./logger";
import type { AccountMap, EngineConfig } from "./schemas";
import { createDashboardStore, type DashboardStore } from "../stores/dashboard-store";

export interface DashboardContext {
  env: AppEnv;
  config: EngineConfig;
  accountMap: AccountMap;
  logger: Logger;
  source: DataSource;
  store: DashboardStore;
}

export interface BootstrapOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fetchFn?: FetchFn;
  now?: () => Date;
}

/** Wire environment, configuration files, logger, data source and store together. */
export function bootstrapDashboard(opts: BootstrapOptions = {}): DashboardContext {
  const env = loadEnv(opts.env);
  const logger = opts.logger ?? createLogger({ service: "kpi-dashboard", level: env.LOG_LEVEL });
  const config = loadEngineConfig(env.DASHBOARD_CONFIG_DIR);
  const accountMap = loadAccountMap(env.DASHBOARD_CONFIG_DIR);
  const source = createDataSource({ env, config, accountMap, logger, fetchFn: opts.fetchFn, now: opts.now });

  logger.info({ source: source.kind, stores: Object.keys(config.stores).length }, "dashboard ready");
  return { env, config, accountMap, logger, source, store: createDashboardStore(logger.child({ component: "store" })) };
}
