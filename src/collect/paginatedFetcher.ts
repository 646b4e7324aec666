import { isPayloadTooLarge } from "../api";
import type { ApiParams, ApiTransport } from "../api";
import type { Logger, MetricsRegistry } from "../observability";

interface PaginatedFetcherDeps {
  api: ApiTransport;
  logger: Logger;
  metrics: MetricsRegistry;
}

/** Next page size after a "response too large" rejection. */
export function reducePageSize(pageSize: number): number {
  return Math.max(1, Math.ceil(pageSize / 5));
}

/**
 * Issues one logical API call. Paginated calls shrink their page size and
 * start over whenever the API rejects a page as too large.
 */
export class PaginatedFetcher {
  private readonly api: ApiTransport;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(deps: PaginatedFetcherDeps) {
    this.api = deps.api;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
  }

  async fetch(method: string, params: ApiParams, pageSize?: number): Promise<unknown> {
    if (pageSize === undefined) {
      return this.api.call(method, params);
    }

    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
    }

    let currentSize = pageSize;
    for (;;) {
      try {
        return await this.api.paginate(method, currentSize, params);
      } catch (error) {
        if (!isPayloadTooLarge(error) || currentSize === 1) {
          throw error;
        }
        currentSize = reducePageSize(currentSize);
        this.metrics.incrementCounter("page_size_reductions", 1);
        this.logger.info("page_size_reduced", { method, pageSize: currentSize });
      }
    }
  }
}
