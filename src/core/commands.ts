import { resolveOwnerId } from "../api";
import type { ApiTransport } from "../api";
import { collectContent } from "../collect";
import type { AppConfig } from "../config";
import type { BulkDownloader } from "../download";
import { collectFiles } from "../files";
import type { Logger, MetricsRegistry } from "../observability";
import type { DumpStore } from "../store";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  api: ApiTransport;
  store: DumpStore;
  downloader: BulkDownloader;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface OwnerOptions {
  ownerRef: string;
  statsFromTimestamp?: number;
}

export async function runFetch(ctx: CommandContext, options: OwnerOptions): Promise<number> {
  const ownerId = await resolveOwnerId(options.ownerRef, ctx.api);
  ctx.logger.info("fetch_start", { ownerId, statsFromTimestamp: options.statsFromTimestamp });
  const summary = await collectContent(
    { api: ctx.api, store: ctx.store, logger: ctx.logger, metrics: ctx.metrics },
    { ownerId, statsFromTimestamp: options.statsFromTimestamp },
  );
  ctx.logger.info("fetch_complete", { ownerId, ...summary });
  return ownerId;
}

export async function runFiles(ctx: CommandContext, options: OwnerOptions): Promise<number> {
  const ownerId = await resolveOwnerId(options.ownerRef, ctx.api);
  ctx.logger.info("files_start", { ownerId, ownerDir: ctx.store.ownerDir(ownerId) });
  const summary = await collectFiles(
    { store: ctx.store, downloader: ctx.downloader, logger: ctx.logger, metrics: ctx.metrics },
    ownerId,
  );
  ctx.logger.info("files_complete", {
    ownerId,
    bannerDownloaded: (summary.banner?.ok ?? 0) > 0,
    attachmentsOk: summary.attachments?.ok ?? 0,
    attachmentsFailed: summary.attachments?.failed ?? 0,
    albums: summary.photos.length,
    photosOk: summary.photos.reduce((total, album) => total + album.ok, 0),
    docsOk: summary.docs?.ok ?? 0,
    noFileRecords: summary.noFileRecords,
  });
  return ownerId;
}

export async function runPipeline(ctx: CommandContext, options: OwnerOptions): Promise<void> {
  const ownerId = await runFetch({ ...ctx, logger: ctx.logger.child("fetch") }, options);
  await runFiles({ ...ctx, logger: ctx.logger.child("files") }, { ...options, ownerRef: String(ownerId) });
}
