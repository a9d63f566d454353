import { describe, it, expect, vi } from "vitest";
import { Crawler } from "../server/audit/crawler";
import { InvalidUrlError } from "../server/audit/errors";
import type { PageFetcher } from "../server/audit/fetcher";
import type { Sleep } from "../server/audit/pacing";
import type { PageRecord } from "../server/audit/types";
import { FakeFetcher, makePage, type SiteMap } from "./helpers";

const ROOT = "https://example.com";

const SITE: SiteMap = {
  [ROOT]: { links: [`${ROOT}/a`, `${ROOT}/b/`, "https://other.com/x"] },
  [`${ROOT}/a`]: { links: [`${ROOT}/c`, `${ROOT}/`] },
  [`${ROOT}/b`]: { links: [`${ROOT}/a#top`] },
  [`${ROOT}/c`]: { links: [] },
};

const noSleep: Sleep = async () => {};

function summary(pages: PageRecord[]): Array<[string, number, boolean]> {
  return pages.map((page) => [page.url, page.depth, page.ok]);
}

describe("Crawler", () => {
  it("crawls same-host pages breadth-first", async () => {
    const fetcher = new FakeFetcher(SITE);
    const crawler = new Crawler({ fetcher, pacing: "off" });

    const result = await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 10 });

    expect(result.cancelled).toBe(false);
    expect(summary(result.pages)).toEqual([
      [ROOT, 0, true],
      [`${ROOT}/a`, 1, true],
      [`${ROOT}/b`, 1, true],
      [`${ROOT}/c`, 2, true],
    ]);
    expect(fetcher.calls).not.toContain("https://other.com/x");
    expect(crawler.state).toBe("done");
  });

  it("does not follow links past maxDepth", async () => {
    const crawler = new Crawler({ fetcher: new FakeFetcher(SITE), pacing: "off" });
    const result = await crawler.crawl(ROOT, { maxDepth: 1, maxPages: 10 });
    expect(result.pages.map((page) => page.url)).toEqual([ROOT, `${ROOT}/a`, `${ROOT}/b`]);
  });

  it("only fetches the start page at depth 0", async () => {
    const crawler = new Crawler({ fetcher: new FakeFetcher(SITE), pacing: "off" });
    const result = await crawler.crawl(ROOT, { maxDepth: 0, maxPages: 10 });
    expect(result.pages.map((page) => page.url)).toEqual([ROOT]);
  });

  it("stops at maxPages attempts", async () => {
    const fetcher = new FakeFetcher(SITE);
    const crawler = new Crawler({ fetcher, pacing: "off", concurrency: 4 });
    const result = await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 2 });
    expect(result.pages.map((page) => page.url)).toEqual([ROOT, `${ROOT}/a`]);
    expect(fetcher.calls).toHaveLength(2);
  });

  it("records a failing start page and stops", async () => {
    const fetcher = new FakeFetcher({ [ROOT]: { error: "HTTP 503", status: 503 } });
    const crawler = new Crawler({ fetcher, pacing: "off" });
    const result = await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 10 });

    expect(result.pages).toHaveLength(1);
    expect(result.pages[0]).toMatchObject({ url: ROOT, ok: false, statusCode: 503, error: "HTTP 503" });
  });

  it("counts failures against the page budget", async () => {
    const fetcher = new FakeFetcher({ [ROOT]: { links: [`${ROOT}/gone`, `${ROOT}/a`] }, [`${ROOT}/a`]: {} });
    const crawler = new Crawler({ fetcher, pacing: "off" });
    const result = await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 2 });
    expect(summary(result.pages)).toEqual([
      [ROOT, 0, true],
      [`${ROOT}/gone`, 1, false],
    ]);
  });

  it("turns a throwing fetcher into a failed record", async () => {
    const fetcher: PageFetcher = {
      fetch: async () => {
        throw new Error("socket hang up");
      },
    };
    const result = await new Crawler({ fetcher, pacing: "off" }).crawl(ROOT, { maxDepth: 1, maxPages: 5 });

    expect(result.pages).toHaveLength(1);
    expect(result.pages[0]).toMatchObject({ ok: false, statusCode: null, error: "Fetcher failed: socket hang up" });
  });

  it("paces every fetch after the first", async () => {
    const sleep = vi.fn<Sleep>(async () => {});
    const crawler = new Crawler({ fetcher: new FakeFetcher(SITE), pacing: "medium", sleep, random: () => 0 });

    await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 10 });

    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(1000, undefined);
  });

  it("keeps discovery order with concurrent fetches finishing out of order", async () => {
    const delays: Record<string, number> = { [`${ROOT}/a`]: 30, [`${ROOT}/b`]: 1 };
    const inner = new FakeFetcher(SITE);
    const fetcher: PageFetcher = {
      fetch: async (url, depth) => {
        await new Promise((resolve) => setTimeout(resolve, delays[url] ?? 0));
        return inner.fetch(url, depth);
      },
    };

    const crawler = new Crawler({ fetcher, pacing: "off", concurrency: 2, sleep: noSleep });
    const result = await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 10 });

    expect(result.pages.map((page) => page.url)).toEqual([ROOT, `${ROOT}/a`, `${ROOT}/b`, `${ROOT}/c`]);
  });

  it("returns what it has when cancelled", async () => {
    const controller = new AbortController();
    const fetcher = new FakeFetcher(SITE);
    fetcher.onFetch = () => controller.abort();

    const crawler = new Crawler({ fetcher, pacing: "off" });
    const result = await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 10, signal: controller.signal });

    expect(result.cancelled).toBe(true);
    expect(result.pages.map((page) => page.url)).toEqual([ROOT]);
    expect(crawler.state).toBe("done");
  });

  it("fetches nothing when cancelled before starting", async () => {
    const fetcher = new FakeFetcher(SITE);
    const crawler = new Crawler({ fetcher, pacing: "off" });
    const result = await crawler.crawl(ROOT, { maxDepth: 10, maxPages: 10, signal: AbortSignal.abort() });

    expect(result).toEqual({ pages: [], cancelled: true });
    expect(fetcher.calls).toEqual([]);
  });

  it("rejects a start URL it cannot crawl", async () => {
    const crawler = new Crawler({ fetcher: new FakeFetcher(SITE), pacing: "off" });
    await expect(crawler.crawl("ftp://example.com", { maxDepth: 1, maxPages: 1 })).rejects.toBeInstanceOf(
      InvalidUrlError
    );
    expect(crawler.state).toBe("idle");
  });

  it("is single-use", async () => {
    const crawler = new Crawler({ fetcher: new FakeFetcher(SITE), pacing: "off" });
    await crawler.crawl(ROOT, { maxDepth: 0, maxPages: 1 });
    await expect(crawler.crawl(ROOT, { maxDepth: 0, maxPages: 1 })).rejects.toThrow(
      "Crawler is single-use (state: done)"
    );
  });

  it("follows links returned by the fetcher as given", async () => {
    const fetcher: PageFetcher = {
      fetch: async (url, depth) =>
        makePage(url, { depth, links: url === ROOT ? ["https://EXAMPLE.com/Docs/"] : [] }),
    };
    const result = await new Crawler({ fetcher, pacing: "off" }).crawl(`${ROOT}/`, { maxDepth: 2, maxPages: 5 });
    expect(result.pages.map((page) => page.url)).toEqual([ROOT, `${ROOT}/Docs`]);
  });
});
