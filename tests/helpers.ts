import type { BrowserPage, BrowserSession, NavigationResult, PageFetcher } from "../server/audit/fetcher";
import type { PageFailure, PageMeta, PageSuccess } from "../server/audit/types";

// ─── Page records ───────────────────────────────────────────────────────────

export function makeMeta(overrides: Partial<PageMeta> = {}): PageMeta {
  return {
    description: "A page description long enough to fall inside the recommended snippet range.",
    canonical: null,
    robots: null,
    viewport: "width=device-width, initial-scale=1",
    lang: "en",
    charset: "utf-8",
    openGraph: { title: "Example", description: "Example site", image: "https://example.com/og.png" },
    h1: ["Welcome"],
    headings: [{ level: 1, text: "Welcome" }],
    imageCount: 0,
    imagesWithoutAlt: [],
    jsonLdTypes: ["Organization"],
    wordCount: 400,
    insecureResources: [],
    ...overrides,
  };
}

/** A page that passes every check, with a title and description unique to its URL. */
export function makePage(url: string, overrides: Partial<Omit<PageSuccess, "ok">> = {}): PageSuccess {
  return {
    ok: true,
    url,
    depth: 0,
    statusCode: 200,
    fetchedAt: "2026-01-01T00:00:00.000Z",
    elapsedMs: 120,
    html: "<html></html>",
    links: [],
    title: `Example page for ${url}`,
    meta: makeMeta({
      description: `Description of ${url} written long enough for the snippet range.`,
      canonical: url,
    }),
    ...overrides,
  };
}

export function makeFailure(url: string, error: string, statusCode: number | null = null, depth = 0): PageFailure {
  return {
    ok: false,
    url,
    depth,
    statusCode,
    fetchedAt: "2026-01-01T00:00:00.000Z",
    elapsedMs: 35,
    error,
  };
}

// ─── Fetchers ───────────────────────────────────────────────────────────────

export type SiteMap = Record<string, { links?: string[]; error?: string; status?: number }>;

/** Serves clean pages from a URL map; unknown URLs come back as HTTP 404 failures. */
export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];
  onFetch: ((url: string) => void) | null = null;

  constructor(private readonly site: SiteMap) {}

  async fetch(url: string, depth: number): Promise<PageSuccess | PageFailure> {
    this.calls.push(url);
    this.onFetch?.(url);
    const entry = this.site[url];
    if (!entry) return makeFailure(url, "HTTP 404", 404, depth);
    if (entry.error) return makeFailure(url, entry.error, entry.status ?? null, depth);
    return makePage(url, { depth, links: entry.links ?? [] });
  }
}

export function htmlNavigation(html: string, finalUrl: string): NavigationResult {
  return { status: 200, html, finalUrl, contentType: "text/html; charset=utf-8", error: null };
}

export class FakeBrowserPage implements BrowserPage {
  closed = false;
  readonly visited: string[] = [];

  constructor(private readonly navigate: (url: string) => NavigationResult) {}

  async goto(url: string): Promise<NavigationResult> {
    this.visited.push(url);
    return this.navigate(url);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeBrowserSession implements BrowserSession {
  closed = false;
  readonly opened: FakeBrowserPage[] = [];

  constructor(private readonly navigate: (url: string) => NavigationResult) {}

  async newPage(): Promise<BrowserPage> {
    const page = new FakeBrowserPage(this.navigate);
    this.opened.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Clock that advances by `stepMs` on every reading. */
export function steppingClock(startIso: string, stepMs: number): () => Date {
  let current = new Date(startIso).getTime();
  return () => {
    current += stepMs;
    return new Date(current);
  };
}
