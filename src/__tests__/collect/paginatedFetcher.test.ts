import { describe, expect, it, vi } from "vitest";
import { ApiError, PAYLOAD_TOO_LARGE_CODE, TransportError } from "../../api";
import { PaginatedFetcher, reducePageSize } from "../../collect";
import { createMetrics, createQuietLogger, FakeApi } from "../helpers";

describe("reducePageSize", () => {
  it("divides by five rounding up", () => {
    expect(reducePageSize(1000)).toBe(200);
    expect(reducePageSize(100)).toBe(20);
    expect(reducePageSize(7)).toBe(2);
    expect(reducePageSize(2)).toBe(1);
    expect(reducePageSize(1)).toBe(1);
  });

  it("never grows and reaches 1 in a bounded number of steps", () => {
    for (let start = 1; start <= 5000; start += 1) {
      let size = start;
      let steps = 0;
      while (size > 1) {
        const next = reducePageSize(size);
        expect(next).toBeLessThan(size);
        size = next;
        steps += 1;
      }
      expect(steps).toBeLessThanOrEqual(Math.ceil(Math.log(start) / Math.log(5)) + 1);
    }
  });
});

describe("PaginatedFetcher", () => {
  const tooLarge = (method: string) => new ApiError(method, PAYLOAD_TOO_LARGE_CODE, "Response size is too big");

  it("makes a single plain call when no page size is given", async () => {
    const api = new FakeApi(() => [{ id: 1 }]);
    const fetcher = new PaginatedFetcher({ api, logger: createQuietLogger(), metrics: createMetrics() });

    const result = await fetcher.fetch("pages.getTitles", { group_id: 5 });

    expect(result).toEqual([{ id: 1 }]);
    expect(api.call).toHaveBeenCalledWith("pages.getTitles", { group_id: 5 });
    expect(api.paginate).not.toHaveBeenCalled();
  });

  it("paginates at the requested size when it succeeds", async () => {
    const api = new FakeApi(undefined, () => ({ count: 2, items: ["a", "b"] }));
    const fetcher = new PaginatedFetcher({ api, logger: createQuietLogger(), metrics: createMetrics() });

    await expect(fetcher.fetch("wall.get", { owner_id: -1 }, 100)).resolves.toEqual({ count: 2, items: ["a", "b"] });
    expect(api.paginate).toHaveBeenCalledTimes(1);
    expect(api.paginate).toHaveBeenCalledWith("wall.get", 100, { owner_id: -1 });
  });

  it("shrinks the page size and restarts when the response is too large", async () => {
    const api = new FakeApi(undefined, (method, pageSize) => {
      if (pageSize > 8) {
        throw tooLarge(method);
      }
      return { count: 1, items: [pageSize] };
    });
    const metrics = createMetrics();
    const logger = createQuietLogger();
    const info = vi.spyOn(logger, "info");
    const fetcher = new PaginatedFetcher({ api, logger, metrics });

    const result = await fetcher.fetch("wall.getComments", { post_id: 3 }, 1000);

    expect(result).toEqual({ count: 1, items: [8] });
    expect(api.paginate.mock.calls.map(([, size]) => size)).toEqual([1000, 200, 40, 8]);
    for (const [, , params] of api.paginate.mock.calls) {
      expect(params).toEqual({ post_id: 3 });
    }
    expect(metrics.getCounters().page_size_reductions).toBe(3);
    expect(info).toHaveBeenCalledWith("page_size_reduced", { method: "wall.getComments", pageSize: 8 });
  });

  it("gives up once the page size is 1 and still too large", async () => {
    const api = new FakeApi(undefined, (method) => {
      throw tooLarge(method);
    });
    const fetcher = new PaginatedFetcher({ api, logger: createQuietLogger(), metrics: createMetrics() });

    await expect(fetcher.fetch("likes.getList", {}, 10)).rejects.toMatchObject({ code: PAYLOAD_TOO_LARGE_CODE });
    expect(api.paginate.mock.calls.map(([, size]) => size)).toEqual([10, 2, 1]);
  });

  it("propagates other errors without retrying", async () => {
    const api = new FakeApi(undefined, (method) => {
      throw new ApiError(method, 15, "Access denied");
    });
    const fetcher = new PaginatedFetcher({ api, logger: createQuietLogger(), metrics: createMetrics() });

    await expect(fetcher.fetch("video.get", {}, 100)).rejects.toBeInstanceOf(ApiError);
    expect(api.paginate).toHaveBeenCalledTimes(1);
  });

  it("does not retry transport failures", async () => {
    const api = new FakeApi(undefined, (method) => {
      throw new TransportError(method, "HTTP 502", 502);
    });
    const fetcher = new PaginatedFetcher({ api, logger: createQuietLogger(), metrics: createMetrics() });

    await expect(fetcher.fetch("docs.get", {}, 2000)).rejects.toBeInstanceOf(TransportError);
    expect(api.paginate).toHaveBeenCalledTimes(1);
  });

  it("rejects page sizes below 1", async () => {
    const fetcher = new PaginatedFetcher({ api: new FakeApi(), logger: createQuietLogger(), metrics: createMetrics() });
    await expect(fetcher.fetch("wall.get", {}, 0)).rejects.toBeInstanceOf(RangeError);
  });
});
