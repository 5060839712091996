import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors";
import {
  accountMapSchema,
  engineConfigSchema,
  toIssues,
  type AccountMap,
  type EngineConfig,
} from "./schemas";

const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

export const envSchema = z.object({
  DATA_SOURCE: z.enum(["demo", "odoo"]).default("demo"),
  ODOO_URL: optionalString.pipe(z.string().url().optional()),
  ODOO_DB: optionalString,
  ODOO_USER: optionalString,
  ODOO_PASSWORD: optionalString,
  ODOO_COMPANY_ID: z.coerce.number().int().positive().default(2),
  ODOO_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ODOO_MAX_RECORDS: z.coerce.number().int().positive().default(10_000),
  DEMO_SEED: z.coerce.number().int().default(42),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DASHBOARD_CONFIG_DIR: optionalString,
});

export type AppEnv = z.infer<typeof envSchema>;

function describe(error: z.ZodError): string {
  return toIssues(error)
    .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describe(parsed.error)}`);
  }
  return parsed.data;
}

function readJson(dir: string, file: string): unknown {
  const path = join(dir, file);
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read ${path}: ${message}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Malformed JSON in ${path}: ${message}`);
  }
}

function asObject(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}

/** Store directory (`stores.json`) merged with targets and engine settings (`dashboard.json`). */
export function loadEngineConfig(dir: string = DEFAULT_CONFIG_DIR): EngineConfig {
  const merged = { ...asObject(readJson(dir, "stores.json")), ...asObject(readJson(dir, "dashboard.json")) };
  const parsed = engineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid dashboard configuration: ${describe(parsed.error)}`);
  }

  const { stores, overhead_store_code } = parsed.data;
  if (!(overhead_store_code in stores)) {
    throw new ConfigError(`Overhead store ${overhead_store_code} is missing from stores.json`);
  }
  return parsed.data;
}

export function loadAccountMap(dir: string = DEFAULT_CONFIG_DIR): AccountMap {
  const parsed = accountMapSchema.safeParse(readJson(dir, "account-map.json"));
  if (!parsed.success) {
    throw new ConfigError(`Invalid account map: ${describe(parsed.error)}`);
  }
  return parsed.data;
}
