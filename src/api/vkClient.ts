import { z } from "zod";
import type { Response } from "undici";
import type { AppConfig } from "../config";
import { defaultFetch, getFetchDispatcher, sleep } from "../core/fetch";
import type { HttpFetch } from "../core/fetch";
import type { Logger, MetricsRegistry } from "../observability";
import { ApiError, AUTH_FAILED_CODE, AuthError, isRateLimited, TransportError } from "./errors";
import type { ApiParams, ApiTransport, PagedResult } from "./types";

const envelopeSchema = z.object({
  response: z.unknown().optional(),
  error: z
    .object({
      error_code: z.number(),
      error_msg: z.string().default(""),
    })
    .optional(),
});

const pageSchema = z.object({
  count: z.number(),
  items: z.array(z.unknown()),
});

interface VkApiClientDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: HttpFetch;
  sleepFn?: (ms: number) => Promise<void>;
}

function encodeParams(params: ApiParams): URLSearchParams {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    body.set(key, typeof value === "boolean" ? (value ? "1" : "0") : String(value));
  }
  return body;
}

export class VkApiClient implements ApiTransport {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: HttpFetch;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private lastCallAt = 0;

  constructor(deps: VkApiClientDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.sleepFn = deps.sleepFn ?? sleep;
  }

  async call(method: string, params: ApiParams): Promise<unknown> {
    const token = this.config.accessToken;
    if (!token) {
      throw new AuthError(method, AUTH_FAILED_CODE, "access token is not configured");
    }

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.request(method, params, token);
      } catch (error) {
        if (!isRateLimited(error) || attempt > this.config.maxRateLimitRetries) {
          throw error;
        }
        this.metrics.incrementCounter("api_rate_limited", 1);
        this.logger.warn("api_rate_limited", { method, attempt });
        await this.sleepFn(Math.max(this.config.apiRequestIntervalMs, 1000) * attempt);
      }
    }
  }

  async paginate(method: string, pageSize: number, params: ApiParams): Promise<PagedResult> {
    const items: unknown[] = [];
    let count = 0;
    let offset = 0;

    for (;;) {
      const raw = await this.call(method, { ...params, offset, count: pageSize });
      const page = pageSchema.safeParse(raw);
      if (!page.success) {
        throw new TransportError(method, "paginated response has no count/items");
      }

      count = page.data.count;
      items.push(...page.data.items);
      offset += pageSize;
      this.logger.debug("api_page_fetched", { method, offset, total: count, pageItems: page.data.items.length });

      if (page.data.items.length === 0 || offset >= count) {
        break;
      }
    }

    return { count, items };
  }

  private async throttle(): Promise<void> {
    const waitMs = this.lastCallAt + this.config.apiRequestIntervalMs - Date.now();
    if (waitMs > 0) {
      await this.sleepFn(waitMs);
    }
    this.lastCallAt = Date.now();
  }

  private async request(method: string, params: ApiParams, token: string): Promise<unknown> {
    await this.throttle();

    const body = encodeParams(params);
    body.set("access_token", token);
    body.set("v", this.config.apiVersion);

    const url = `${this.config.apiBaseUrl.replace(/\/+$/, "")}/${method}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    const stopTimer = this.metrics.startTimer("api_call_ms");
    this.metrics.incrementCounter("api_calls", 1);

    let payload: unknown;
    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: "POST",
          headers: {
            "user-agent": this.config.userAgent,
            "content-type": "application/x-www-form-urlencoded",
            accept: "application/json",
          },
          body: body.toString(),
          dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
          signal: controller.signal,
        });
      } catch (error) {
        throw new TransportError(method, error instanceof Error ? error.message : String(error));
      }

      if (!response.ok) {
        throw new TransportError(method, `HTTP ${response.status}`, response.status);
      }

      try {
        payload = await response.json();
      } catch (error) {
        throw new TransportError(method, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
      }
    } finally {
      clearTimeout(timeout);
      const durationMs = stopTimer();
      this.logger.debug("api_call_complete", { method, durationMs });
    }

    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new TransportError(method, "response is not an API envelope");
    }

    const { error } = envelope.data;
    if (error) {
      if (error.error_code === AUTH_FAILED_CODE) {
        throw new AuthError(method, error.error_code, error.error_msg);
      }
      throw new ApiError(method, error.error_code, error.error_msg);
    }

    return envelope.data.response;
  }
}
