import path from "node:path";
import type { BulkDownloader } from "../download";
import type { Logger, MetricsRegistry } from "../observability";
import { NoFileAttachmentSink } from "../sink";
import { ATTACHMENTS_DIR, DOCS_DIR, PHOTOS_DIR } from "../store";
import type { DumpStore } from "../store";
import { albumSchema, describeZodError, docSchema, groupSchema, photoSchema } from "../types";
import type { DownloadSummary, DownloadTask } from "../types";
import { AttachmentClassifier } from "./classifier";
import type { ClassifierWarning } from "./classifier";
import { collectContentNodes, itemsOf } from "./contentNodes";
import { albumDirName, albumPhotoFileName, libraryDocFileName, selectPhotoSize, urlExtension } from "./fileNames";

export interface FilesDependencies {
  store: DumpStore;
  downloader: BulkDownloader;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface FilesSummary {
  banner: DownloadSummary | undefined;
  attachments: DownloadSummary | undefined;
  photos: DownloadSummary[];
  docs: DownloadSummary | undefined;
  noFileRecords: number;
}

export interface AttachmentStageResult {
  summary: DownloadSummary;
  noFileRecords: number;
}

function reportWarning(logger: Logger, metrics: MetricsRegistry, warning: ClassifierWarning): void {
  metrics.incrementCounter("attachments_skipped", 1);
  switch (warning.code) {
    case "unsupported_kind":
      logger.warn("attachment_type_not_supported", {
        type: warning.type,
        parentKind: warning.parentKind,
        parentId: warning.parentId,
      });
      return;
    case "empty_photo":
      logger.warn("attachment_photo_without_sizes", {
        parentKind: warning.parentKind,
        parentId: warning.parentId,
        attachmentId: warning.attachmentId,
      });
      return;
    case "missing_url":
      logger.warn("attachment_without_url", {
        parentKind: warning.parentKind,
        parentId: warning.parentId,
        attachmentId: warning.attachmentId,
      });
      return;
    case "malformed_attachment":
      logger.warn("attachment_malformed", {
        type: warning.type,
        parentKind: warning.parentKind,
        parentId: warning.parentId,
        reason: warning.reason,
      });
      return;
  }
}

/** Downloads the widest cover image of the community, if the group dump has one. */
export async function downloadBanner(deps: FilesDependencies, ownerId: number): Promise<DownloadSummary | undefined> {
  const { store, downloader, logger } = deps;
  const groups = await store.readMethodResult(ownerId, "groups.getById");
  if (!Array.isArray(groups) || groups.length === 0) {
    logger.info("files_banner_no_group_dump", { ownerId });
    return undefined;
  }

  const group = groupSchema.safeParse(groups[0]);
  if (!group.success) {
    logger.warn("files_banner_group_malformed", { ownerId, reason: describeZodError(group.error) });
    return undefined;
  }

  const images = [...(group.data.cover?.images ?? [])].filter((image) => image.url).sort((a, b) => b.width - a.width);
  if (images.length === 0) {
    logger.info("files_banner_absent", { ownerId });
    return undefined;
  }

  const [widest] = images;
  const task: DownloadTask = {
    parentKind: "group",
    parentId: Math.abs(ownerId),
    attachmentKind: "banner",
    attachmentId: Math.abs(ownerId),
    sourceUrl: widest.url,
    fileName: `banner${urlExtension(widest.url)}`,
  };
  return downloader.download(store.ownerDir(ownerId), [task]);
}

/**
 * Classifies the attachments of posts, comments, topics and topic comments,
 * writes the no-file descriptions and downloads the rest in one batch.
 */
export async function downloadAttachments(
  deps: FilesDependencies,
  ownerId: number,
): Promise<AttachmentStageResult> {
  const { store, downloader, logger, metrics } = deps;
  const wall = await store.readMethodResult(ownerId, "wall.get");
  const board = await store.readMethodResult(ownerId, "board.getTopics");

  const walk = collectContentNodes(wall, board);
  for (const issue of walk.issues) {
    logger.warn("files_content_node_malformed", { parentKind: issue.kind, reason: issue.reason });
  }

  const classifier = new AttachmentClassifier();
  const sink = new NoFileAttachmentSink(store.ownerDir(ownerId));
  const tasks: DownloadTask[] = [];

  for (const node of walk.nodes) {
    const result = classifier.classify(node);
    tasks.push(...result.tasks);
    sink.add(...result.records);
    for (const warning of result.warnings) {
      reportWarning(logger, metrics, warning);
    }
  }

  const outPath = await sink.flush();
  metrics.incrementCounter("nofile_records", sink.size);
  logger.info("files_nofile_attachments_saved", { outPath, records: sink.size });

  const summary = await downloader.download(path.join(store.ownerDir(ownerId), ATTACHMENTS_DIR), tasks);
  return { summary, noFileRecords: sink.size };
}

/** Downloads every album into its own directory, one batch per album. */
export async function downloadPhotos(deps: FilesDependencies, ownerId: number): Promise<DownloadSummary[]> {
  const { store, downloader, logger } = deps;
  const albums = await store.readMethodResult(ownerId, "photos.getAlbums");
  if (albums === undefined) {
    logger.info("files_photos_no_albums_dump", { ownerId });
    return [];
  }

  const summaries: DownloadSummary[] = [];
  for (const rawAlbum of itemsOf(albums)) {
    const album = albumSchema.safeParse(rawAlbum);
    if (!album.success) {
      logger.warn("files_album_malformed", { reason: describeZodError(album.error) });
      continue;
    }
    if (!album.data.photos_list) {
      logger.warn("files_album_without_photos", { albumId: album.data.id });
      continue;
    }

    const tasks: DownloadTask[] = [];
    for (const rawPhoto of album.data.photos_list.items) {
      const photo = photoSchema.safeParse(rawPhoto);
      if (!photo.success) {
        logger.warn("files_album_photo_malformed", { albumId: album.data.id, reason: describeZodError(photo.error) });
        continue;
      }
      const size = selectPhotoSize(photo.data.sizes);
      if (!size) {
        logger.warn("files_album_photo_without_sizes", { albumId: album.data.id, attachmentId: photo.data.id });
        continue;
      }
      tasks.push({
        parentKind: "album",
        parentId: album.data.id,
        attachmentKind: "album_photo",
        attachmentId: photo.data.id,
        sourceUrl: size.url,
        fileName: albumPhotoFileName(album.data.id, photo.data.id, urlExtension(size.url)),
      });
    }

    const directory = path.join(store.ownerDir(ownerId), PHOTOS_DIR, albumDirName(album.data.id, album.data.title));
    summaries.push(await downloader.download(directory, tasks));
  }
  return summaries;
}

/** Downloads the whole document library into one shared directory. */
export async function downloadDocs(deps: FilesDependencies, ownerId: number): Promise<DownloadSummary | undefined> {
  const { store, downloader, logger } = deps;
  const docs = await store.readMethodResult(ownerId, "docs.get");
  if (docs === undefined) {
    logger.info("files_docs_no_dump", { ownerId });
    return undefined;
  }

  const tasks: DownloadTask[] = [];
  for (const rawDoc of itemsOf(docs)) {
    const doc = docSchema.safeParse(rawDoc);
    if (!doc.success) {
      logger.warn("files_doc_malformed", { reason: describeZodError(doc.error) });
      continue;
    }
    if (!doc.data.url) {
      logger.warn("files_doc_without_url", { attachmentId: doc.data.id });
      continue;
    }
    tasks.push({
      parentKind: "docs",
      parentId: null,
      attachmentKind: "doc",
      attachmentId: doc.data.id,
      sourceUrl: doc.data.url,
      fileName: libraryDocFileName(doc.data.id, doc.data.title, doc.data.ext),
    });
  }

  return downloader.download(path.join(store.ownerDir(ownerId), DOCS_DIR), tasks);
}

async function runStage<T>(logger: Logger, stage: string, fallback: T, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    logger.warn("files_stage_failed", { stage, error: error instanceof Error ? error.message : String(error) });
    return fallback;
  }
}

/** Runs every stage in turn; a stage that throws is logged and the next one still runs. */
export async function collectFiles(deps: FilesDependencies, ownerId: number): Promise<FilesSummary> {
  const { logger } = deps;
  const banner = await runStage<DownloadSummary | undefined>(logger, "banner", undefined, () => downloadBanner(deps, ownerId));
  const attachments = await runStage<AttachmentStageResult | undefined>(logger, "attachments", undefined, () => downloadAttachments(deps, ownerId));
  const photos = await runStage<DownloadSummary[]>(logger, "photos", [], () => downloadPhotos(deps, ownerId));
  const docs = await runStage<DownloadSummary | undefined>(logger, "docs", undefined, () => downloadDocs(deps, ownerId));
  return {
    banner,
    attachments: attachments?.summary,
    photos,
    docs,
    noFileRecords: attachments?.noFileRecords ?? 0,
  };
}
