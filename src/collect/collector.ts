import { AuthError } from "../api";
import type { ApiTransport } from "../api";
import type { Logger, MetricsRegistry } from "../observability";
import type { DumpStore } from "../store";
import type { CollectionSummary } from "../types";
import { buildMethodRequests } from "./methods";
import type { MethodRequest } from "./methods";
import { PaginatedFetcher } from "./paginatedFetcher";

interface CollectDependencies {
  api: ApiTransport;
  store: DumpStore;
  logger: Logger;
  metrics: MetricsRegistry;
}

interface CollectOptions {
  ownerId: number;
  statsFromTimestamp?: number;
  requests?: MethodRequest[];
}

/**
 * Fetches, enriches and dumps every top-level method in turn. A failed method
 * is logged and left undumped; only an auth failure stops the loop.
 */
export async function collectContent(deps: CollectDependencies, options: CollectOptions): Promise<CollectionSummary> {
  const { api, store, logger, metrics } = deps;
  const { ownerId } = options;
  const fetcher = new PaginatedFetcher({ api, logger, metrics });
  const requests = options.requests ?? buildMethodRequests(ownerId, options.statsFromTimestamp);
  let dumped = 0;
  let failed = 0;

  for (const request of requests) {
    const stopTimer = metrics.startTimer("method_ms");
    logger.info("collect_method_start", { method: request.method, ownerId, pageSize: request.pageSize });

    try {
      const result = await fetcher.fetch(request.method, request.params, request.pageSize);
      if (request.enrich) {
        await request.enrich(result, { fetcher, ownerId, logger });
      }
      const outPath = await store.writeMethodResult(ownerId, request.method, result);
      dumped += 1;
      metrics.incrementCounter("methods_dumped", 1);
      logger.info("collect_method_dumped", { method: request.method, outPath, durationMs: stopTimer() });
    } catch (error) {
      const durationMs = stopTimer();
      if (error instanceof AuthError) {
        throw error;
      }
      failed += 1;
      metrics.incrementCounter("methods_failed", 1);
      logger.warn("collect_method_failed", {
        method: request.method,
        durationMs,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  logger.info("collect_finished", { ownerId, dumped, failed });
  return { dumped, failed };
}
