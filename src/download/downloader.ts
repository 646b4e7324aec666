import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Response } from "undici";
import type { AppConfig } from "../config";
import { defaultFetch, getFetchDispatcher } from "../core/fetch";
import type { HttpFetch } from "../core/fetch";
import type { Logger, MetricsRegistry } from "../observability";
import type { DownloadSummary, DownloadTask } from "../types";

type DownloaderConfig = Pick<AppConfig, "userAgent" | "ignoreHttpsErrors" | "downloadTimeoutMs" | "downloadConcurrency">;

interface DownloaderDeps {
  config: DownloaderConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: HttpFetch;
}

async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

/** Keeps the last task for every destination name, in original order. */
function dropCollisions(tasks: readonly DownloadTask[]): { unique: DownloadTask[]; dropped: DownloadTask[] } {
  const lastIndexByName = new Map<string, number>();
  tasks.forEach((task, index) => lastIndexByName.set(task.fileName, index));

  const unique: DownloadTask[] = [];
  const dropped: DownloadTask[] = [];
  tasks.forEach((task, index) => {
    if (lastIndexByName.get(task.fileName) === index) {
      unique.push(task);
    } else {
      dropped.push(task);
    }
  });
  return { unique, dropped };
}

function taskFields(task: DownloadTask): Record<string, unknown> {
  return {
    parentKind: task.parentKind,
    parentId: task.parentId,
    attachmentId: task.attachmentId,
    url: task.sourceUrl,
  };
}

/**
 * Fetches one batch of files into one directory. Every task of the batch runs
 * concurrently (bounded by `downloadConcurrency` when it is set) and the call
 * resolves once all of them have settled. Failures are logged and counted,
 * never thrown.
 */
export class BulkDownloader {
  private readonly config: DownloaderConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: HttpFetch;

  constructor(deps: DownloaderDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
  }

  async download(directory: string, tasks: readonly DownloadTask[]): Promise<DownloadSummary> {
    await fs.promises.mkdir(directory, { recursive: true });

    const { unique, dropped } = dropCollisions(tasks);
    for (const task of dropped) {
      this.logger.warn("download_destination_collision", { ...taskFields(task), fileName: task.fileName, directory });
    }

    let ok = 0;
    let failed = 0;
    const width = this.config.downloadConcurrency > 0 ? this.config.downloadConcurrency : unique.length;

    await processWithConcurrency(unique, width, async (task) => {
      const succeeded = await this.downloadOne(directory, task);
      if (succeeded) {
        ok += 1;
        this.metrics.incrementCounter("downloads_ok", 1);
      } else {
        failed += 1;
        this.metrics.incrementCounter("downloads_failed", 1);
      }
    });

    this.logger.info("download_batch_complete", { directory, requested: tasks.length, ok, failed });
    return { requested: tasks.length, ok, failed, collisions: dropped.length };
  }

  private async downloadOne(directory: string, task: DownloadTask): Promise<boolean> {
    const outputPath = path.join(directory, task.fileName);
    const tempPath = `${outputPath}.part`;
    const stopTimer = this.metrics.startTimer("download_ms");
    try {
      const response = await this.fetchHeaders(task.sourceUrl);

      if (!response.ok || !response.body) {
        await response.body?.cancel();
        this.logger.warn("download_failed_http", {
          ...taskFields(task),
          statusCode: response.status,
          durationMs: stopTimer(),
        });
        return false;
      }

      await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(tempPath, { flags: "w" }));
      await fs.promises.rename(tempPath, outputPath);
      this.logger.debug("download_item_ok", { ...taskFields(task), fileName: task.fileName, durationMs: stopTimer() });
      return true;
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      this.logger.warn("download_error", {
        ...taskFields(task),
        durationMs: stopTimer(),
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  // The timeout bounds the wait for response headers only; body stalls are
  // left to the dispatcher's own body timeout.
  private async fetchHeaders(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.downloadTimeoutMs);
    try {
      return await this.fetchFn(url, {
        method: "GET",
        headers: { "user-agent": this.config.userAgent },
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
