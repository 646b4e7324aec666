import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { ApiParams, ApiTransport, PagedResult } from "../api";
import { Logger, MetricsRegistry } from "../observability";

export function createQuietLogger(component = "test"): Logger {
  // Only errors would reach the console; tests spy on the level they assert.
  return new Logger({ component, runId: "run_test", minLevel: "error" });
}

export function createMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}

export function makeTempDir(prefix = "vk-archiver-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export type CallHandler = (method: string, params: ApiParams) => unknown;
export type PaginateHandler = (method: string, pageSize: number, params: ApiParams) => PagedResult;

export class FakeApi implements ApiTransport {
  readonly call = vi.fn(async (method: string, params: ApiParams): Promise<unknown> => this.onCall(method, params));
  readonly paginate = vi.fn(
    async (method: string, pageSize: number, params: ApiParams): Promise<PagedResult> =>
      this.onPaginate(method, pageSize, params),
  );

  constructor(
    private readonly onCall: CallHandler = () => ({}),
    private readonly onPaginate: PaginateHandler = () => ({ count: 0, items: [] }),
  ) {}
}
