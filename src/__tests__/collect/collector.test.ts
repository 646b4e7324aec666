import { describe, expect, it, vi } from "vitest";
import { ApiError, AuthError, PAYLOAD_TOO_LARGE_CODE } from "../../api";
import { buildMethodRequests, collectContent } from "../../collect";
import { InMemoryDumpStore } from "../../store";
import { createMetrics, createQuietLogger, FakeApi } from "../helpers";

const OWNER_ID = -42;

describe("buildMethodRequests", () => {
  it("lists the fixed methods in order with their page sizes", () => {
    const requests = buildMethodRequests(OWNER_ID);
    expect(requests.map((request) => [request.method, request.pageSize])).toEqual([
      ["groups.getById", undefined],
      ["wall.get", 100],
      ["board.getTopics", 100],
      ["video.get", 100],
      ["docs.get", 2000],
      ["groups.getMembers", 1000],
      ["pages.getTitles", undefined],
      ["photos.getAlbums", undefined],
    ]);
    expect(requests[1].params).toEqual({ owner_id: -42 });
    expect(requests[2].params).toEqual({ group_id: 42 });
  });

  it("appends statistics when a start timestamp is given", () => {
    const requests = buildMethodRequests(OWNER_ID, 1_700_000_000);
    expect(requests[requests.length - 1]).toEqual({
      method: "stats.get",
      params: { group_id: 42, timestamp_from: 1_700_000_000 },
    });
  });
});

describe("collectContent", () => {
  it("dumps every method that succeeds and skips the ones that fail", async () => {
    const api = new FakeApi(
      (method) => (method === "groups.getById" ? [{ id: 42, name: "Club" }] : []),
      (method) => {
        if (method === "video.get") {
          throw new ApiError(method, 15, "Access denied");
        }
        return { count: 0, items: [] };
      },
    );
    const store = new InMemoryDumpStore();
    const logger = createQuietLogger();
    const warn = vi.spyOn(logger, "warn");
    const metrics = createMetrics();

    const summary = await collectContent({ api, store, logger, metrics }, { ownerId: OWNER_ID });

    expect(summary).toEqual({ dumped: 7, failed: 1 });
    expect(await store.readMethodResult(OWNER_ID, "groups.getById")).toEqual([{ id: 42, name: "Club" }]);
    expect(await store.readMethodResult(OWNER_ID, "video.get")).toBeUndefined();
    expect(store.listMethods(OWNER_ID)).not.toContain("video.get");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("collect_method_failed");
    expect(warn.mock.calls[0][1]).toMatchObject({ method: "video.get", error: "video.get failed with API error 15: Access denied" });
    expect(metrics.getCounters()).toMatchObject({ methods_dumped: 7, methods_failed: 1 });
  });

  it("persists the enriched tree", async () => {
    const api = new FakeApi(undefined, (method) => {
      if (method === "wall.get") {
        return { count: 1, items: [{ id: 5, likes: { count: 0 }, comments: { count: 1 } }] };
      }
      if (method === "wall.getComments") {
        return { count: 1, items: [{ id: 6, text: "hi" }] };
      }
      return { count: 0, items: [] };
    });
    const store = new InMemoryDumpStore();

    await collectContent(
      { api, store, logger: createQuietLogger(), metrics: createMetrics() },
      { ownerId: OWNER_ID, requests: buildMethodRequests(OWNER_ID).filter((request) => request.method === "wall.get") },
    );

    expect(await store.readMethodResult(OWNER_ID, "wall.get")).toEqual({
      count: 1,
      items: [
        {
          id: 5,
          likes: { count: 0 },
          comments: { count: 1 },
          comments_list: { count: 1, items: [{ id: 6, text: "hi" }] },
        },
      ],
    });
  });

  it("skips a method whose enrichment fails at page size 1", async () => {
    const api = new FakeApi(undefined, (method) => {
      if (method === "wall.get") {
        return { count: 1, items: [{ id: 5, likes: { count: 4 } }] };
      }
      throw new ApiError(method, PAYLOAD_TOO_LARGE_CODE, "Response size is too big");
    });
    const store = new InMemoryDumpStore();

    const summary = await collectContent(
      { api, store, logger: createQuietLogger(), metrics: createMetrics() },
      { ownerId: OWNER_ID, requests: buildMethodRequests(OWNER_ID).slice(1, 2) },
    );

    expect(summary).toEqual({ dumped: 0, failed: 1 });
    expect(await store.readMethodResult(OWNER_ID, "wall.get")).toBeUndefined();
  });

  it("stops the run on an auth failure", async () => {
    const api = new FakeApi(() => {
      throw new AuthError("groups.getById", 5, "User authorization failed");
    });
    const store = new InMemoryDumpStore();

    await expect(
      collectContent({ api, store, logger: createQuietLogger(), metrics: createMetrics() }, { ownerId: OWNER_ID }),
    ).rejects.toBeInstanceOf(AuthError);
    expect(api.paginate).not.toHaveBeenCalled();
  });
});
