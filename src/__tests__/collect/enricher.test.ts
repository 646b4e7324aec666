import { describe, expect, it } from "vitest";
import type { ApiParams } from "../../api";
import { enrichAlbums, enrichPages, enrichTopics, enrichWall, listItems, PaginatedFetcher } from "../../collect";
import { createMetrics, createQuietLogger, FakeApi } from "../helpers";

const OWNER_ID = -42;

function setup(onPaginate: (method: string, pageSize: number, params: ApiParams) => unknown[], onCall?: (method: string, params: ApiParams) => unknown) {
  const api = new FakeApi(onCall, (method, pageSize, params) => {
    const items = onPaginate(method, pageSize, params);
    return { count: items.length, items };
  });
  const logger = createQuietLogger();
  const fetcher = new PaginatedFetcher({ api, logger, metrics: createMetrics() });
  return { api, ctx: { fetcher, ownerId: OWNER_ID, logger } };
}

describe("listItems", () => {
  it("reads items from lists and from { items } results", () => {
    expect(listItems([{ id: 1 }, 2, null])).toEqual([{ id: 1 }]);
    expect(listItems({ count: 1, items: [{ id: 2 }] })).toEqual([{ id: 2 }]);
    expect(listItems({ count: 0 })).toEqual([]);
    expect(listItems(undefined)).toEqual([]);
  });
});

describe("enrichWall", () => {
  it("attaches likes and comments only when counted, and likes of liked comments", async () => {
    const { api, ctx } = setup((method, _pageSize, params) => {
      if (method === "wall.getComments") {
        return [
          { id: 100, likes: { count: 2 } },
          { id: 101, likes: { count: 0 } },
          { id: 102 },
        ];
      }
      if (method === "likes.getList") {
        return [`${params.type}:${params.item_id}`];
      }
      return [];
    });
    const wall = {
      count: 2,
      items: [
        { id: 1, likes: { count: 3 }, comments: { count: 3 } },
        { id: 2, likes: { count: 0 }, comments: { count: 0 } },
      ],
    };

    await enrichWall(wall, ctx);

    const [liked, quiet] = wall.items;
    expect(liked).toMatchObject({
      likes_info: { count: 1, items: ["post:1"] },
      comments_list: {
        count: 3,
        items: [
          { id: 100, likes_info: { count: 1, items: ["comment:100"] } },
          { id: 101 },
          { id: 102 },
        ],
      },
    });
    expect(quiet).toEqual({ id: 2, likes: { count: 0 }, comments: { count: 0 } });

    expect(api.paginate.mock.calls).toEqual([
      ["likes.getList", 1000, { owner_id: OWNER_ID, item_id: 1, type: "post" }],
      ["wall.getComments", 100, { owner_id: OWNER_ID, post_id: 1, need_likes: 1 }],
      ["likes.getList", 1000, { owner_id: OWNER_ID, item_id: 100, type: "comment" }],
    ]);
  });

  it("lets a follow-up failure propagate", async () => {
    const { ctx } = setup(() => {
      throw new Error("boom");
    });
    await expect(enrichWall({ items: [{ id: 1, likes: { count: 1 } }] }, ctx)).rejects.toThrow("boom");
  });
});

describe("enrichTopics", () => {
  it("always fetches topic comments and likes of liked comments", async () => {
    const { api, ctx } = setup((method, _pageSize, params) => {
      if (method === "board.getComments") {
        return [{ id: 7, likes: { count: 1 } }];
      }
      return [`${params.type}:${params.item_id}`];
    });
    const topics = { items: [{ id: 9 }] };

    await enrichTopics(topics, ctx);

    expect(topics.items[0]).toEqual({
      id: 9,
      topics_info: {
        count: 1,
        items: [{ id: 7, likes: { count: 1 }, likes_info: { count: 1, items: ["topic_comment:7"] } }],
      },
    });
    expect(api.paginate.mock.calls[0]).toEqual(["board.getComments", 100, { group_id: 42, topic_id: 9, need_likes: 1 }]);
  });
});

describe("enrichPages", () => {
  it("fetches the full page for every title without pagination", async () => {
    const { api, ctx } = setup(
      () => [],
      (_method, params) => ({ id: params.page_id, source: "text" }),
    );
    const titles = [{ id: 3, title: "Rules" }, { title: "no id" }];

    await enrichPages(titles, ctx);

    expect(titles[0]).toEqual({ id: 3, title: "Rules", page: { id: 3, source: "text" } });
    expect(titles[1]).toEqual({ title: "no id" });
    expect(api.call).toHaveBeenCalledWith("pages.get", { owner_id: OWNER_ID, page_id: 3, need_source: 1, need_html: 1 });
    expect(api.paginate).not.toHaveBeenCalled();
  });
});

describe("enrichAlbums", () => {
  it("attaches the photo list of every album", async () => {
    const { api, ctx } = setup((_method, _pageSize, params) => [{ id: 1, album_id: params.album_id }]);
    const albums = { items: [{ id: -7 }, { id: 11 }] };

    await enrichAlbums(albums, ctx);

    expect(albums.items).toEqual([
      { id: -7, photos_list: { count: 1, items: [{ id: 1, album_id: -7 }] } },
      { id: 11, photos_list: { count: 1, items: [{ id: 1, album_id: 11 }] } },
    ]);
    expect(api.paginate).toHaveBeenCalledWith("photos.get", 1000, { owner_id: OWNER_ID, album_id: -7, photo_sizes: 1 });
  });
});
