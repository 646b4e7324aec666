import type { Logger } from "../observability";
import type { PaginatedFetcher } from "./paginatedFetcher";

export const LIKES_PAGE_SIZE = 1000;
export const COMMENTS_PAGE_SIZE = 100;
export const PHOTOS_PAGE_SIZE = 1000;

export interface EnrichContext {
  fetcher: PaginatedFetcher;
  ownerId: number;
  logger: Logger;
}

/** Mutates a freshly fetched top-level result, attaching follow-up data to its items. */
export type Enricher = (result: unknown, ctx: EnrichContext) => Promise<void>;

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function listItems(result: unknown): JsonRecord[] {
  let source: unknown[] = [];
  if (Array.isArray(result)) {
    source = result;
  } else if (isRecord(result) && Array.isArray(result.items)) {
    source = result.items;
  }
  return source.filter(isRecord);
}

function readCount(item: JsonRecord, key: string): number {
  const nested = item[key];
  return isRecord(nested) && typeof nested.count === "number" ? nested.count : 0;
}

function itemsWithIds(result: unknown, method: string, logger: Logger): Array<{ id: number; item: JsonRecord }> {
  const withIds: Array<{ id: number; item: JsonRecord }> = [];
  for (const item of listItems(result)) {
    if (typeof item.id !== "number") {
      logger.debug("enrich_item_without_id", { method });
      continue;
    }
    withIds.push({ id: item.id, item });
  }
  return withIds;
}

async function attachCommentLikes(
  comments: unknown,
  likeType: "comment" | "topic_comment",
  { fetcher, ownerId, logger }: EnrichContext,
): Promise<void> {
  for (const { id, item } of itemsWithIds(comments, likeType, logger)) {
    if (readCount(item, "likes") === 0) {
      continue;
    }
    item.likes_info = await fetcher.fetch(
      "likes.getList",
      { owner_id: ownerId, item_id: id, type: likeType },
      LIKES_PAGE_SIZE,
    );
  }
}

export const enrichWall: Enricher = async (result, ctx) => {
  const { fetcher, ownerId, logger } = ctx;
  for (const { id, item: post } of itemsWithIds(result, "wall.get", logger)) {
    if (readCount(post, "likes") > 0) {
      post.likes_info = await fetcher.fetch(
        "likes.getList",
        { owner_id: ownerId, item_id: id, type: "post" },
        LIKES_PAGE_SIZE,
      );
    }

    if (readCount(post, "comments") > 0) {
      const comments = await fetcher.fetch(
        "wall.getComments",
        { owner_id: ownerId, post_id: id, need_likes: 1 },
        COMMENTS_PAGE_SIZE,
      );
      post.comments_list = comments;
      await attachCommentLikes(comments, "comment", ctx);
    }
  }
};

export const enrichTopics: Enricher = async (result, ctx) => {
  const { fetcher, ownerId, logger } = ctx;
  for (const { id, item: topic } of itemsWithIds(result, "board.getTopics", logger)) {
    const comments = await fetcher.fetch(
      "board.getComments",
      { group_id: Math.abs(ownerId), topic_id: id, need_likes: 1 },
      COMMENTS_PAGE_SIZE,
    );
    topic.topics_info = comments;
    await attachCommentLikes(comments, "topic_comment", ctx);
  }
};

export const enrichPages: Enricher = async (result, { fetcher, ownerId, logger }) => {
  for (const { id, item: title } of itemsWithIds(result, "pages.getTitles", logger)) {
    title.page = await fetcher.fetch("pages.get", {
      owner_id: ownerId,
      page_id: id,
      need_source: 1,
      need_html: 1,
    });
  }
};

export const enrichAlbums: Enricher = async (result, { fetcher, ownerId, logger }) => {
  for (const { id, item: album } of itemsWithIds(result, "photos.getAlbums", logger)) {
    album.photos_list = await fetcher.fetch(
      "photos.get",
      { owner_id: ownerId, album_id: id, photo_sizes: 1 },
      PHOTOS_PAGE_SIZE,
    );
  }
};
