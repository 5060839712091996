import { z } from "zod";
import { ErpError } from "../errors";
import type { Logger } from "../logger";
import type { OdooDomain } from "./types";

const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface OdooClientOptions {
  url: string;
  db: string;
  user: string;
  password: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

const rpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string(),
      data: z.object({ name: z.string().optional(), message: z.string().optional() }).passthrough().optional(),
    })
    .optional(),
});

/**
 * Minimal Odoo JSON-RPC client. Authenticates once against the `common`
 * service and reuses the uid for `execute_kw` calls on the `object` service.
 */
export class OdooClient {
  private uid: Promise<number> | null = null;
  private requestId = 0;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(private readonly opts: OdooClientOptions) {
    this.fetchFn = opts.fetchFn ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private get endpoint(): string {
    return `${this.opts.url.replace(/\/+$/, "")}/jsonrpc`;
  }

  async call(service: "common" | "object", method: string, args: unknown[]): Promise<unknown> {
    const id = ++this.requestId;
    let res: Response;
    try {
      res = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ jsonrpc: "2.0", method: "call", params: { service, method, args }, id }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new ErpError(`Odoo request timed out after ${this.timeoutMs}ms`);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ErpError(`Odoo request failed: ${message}`);
    }

    if (!res.ok) {
      throw new ErpError(`Odoo responded with HTTP ${res.status}`, res.status);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch {
      throw new ErpError("Odoo returned a non-JSON response", res.status);
    }

    const parsed = rpcResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ErpError("Odoo returned a malformed JSON-RPC envelope", res.status);
    }
    if (parsed.data.error) {
      const detail = parsed.data.error.data?.message ?? parsed.data.error.message;
      throw new ErpError(`Odoo ${service}.${method} failed: ${detail}`);
    }

    this.opts.logger?.debug({ service, method, id }, "odoo rpc ok");
    return parsed.data.result;
  }

  /** Concurrent callers share one login; a failed login is retried on the next call. */
  authenticate(): Promise<number> {
    if (this.uid === null) {
      this.uid = this.login().catch((err: unknown) => {
        this.uid = null;
        throw err;
      });
    }
    return this.uid;
  }

  private async login(): Promise<number> {
    const result = await this.call("common", "authenticate", [this.opts.db, this.opts.user, this.opts.password, {}]);
    if (typeof result !== "number" || result <= 0) {
      throw new ErpError(`Odoo authentication failed for ${this.opts.user}`, 401);
    }
    this.opts.logger?.info({ db: this.opts.db, uid: result }, "odoo authenticated");
    return result;
  }

  async executeKw(model: string, method: string, args: unknown[], kwargs: Record<string, unknown> = {}): Promise<unknown> {
    const uid = await this.authenticate();
    return this.call("object", "execute_kw", [this.opts.db, uid, this.opts.password, model, method, args, kwargs]);
  }

  async searchRead<T>(
    model: string,
    domain: OdooDomain,
    fields: string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    limit?: number,
  ): Promise<T[]> {
    const result = await this.executeKw(model, "search_read", [domain], {
      fields,
      ...(limit !== undefined ? { limit } : {}),
    });
    const rows = z.array(schema).safeParse(result);
    if (!rows.success) {
      throw new ErpError(`Unexpected ${model} rows: ${rows.error.issues[0]?.message ?? "invalid shape"}`);
    }
    return rows.data;
  }
}
