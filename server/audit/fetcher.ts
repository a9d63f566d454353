import puppeteer, { TimeoutError, type Browser, type HTTPRequest, type Page } from "puppeteer-core";
import { errorMessage } from "./errors";
import { extractPageData } from "./extractor";
import { silentLogger, type Logger } from "./logger";
import type { PageFailure, PageRecord } from "./types";
import { getHost } from "./url-utils";

export interface NavigationResult {
  status: number | null;
  html: string | null;
  finalUrl: string;
  contentType: string | null;
  error: string | null;
}

export interface BrowserPage {
  goto(url: string, timeoutMs: number): Promise<NavigationResult>;
  close(): Promise<void>;
}

/** The only browser capability the crawler needs. Fingerprint setup is fixed at launch. */
export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface PageFetcher {
  fetch(url: string, depth: number): Promise<PageRecord>;
}

export interface PageFetcherOptions {
  timeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

const HTML_CONTENT_TYPES = ["text/html", "application/xhtml"];

export class BrowserPageFetcher implements PageFetcher {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly session: BrowserSession,
    private readonly options: PageFetcherOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(url: string, depth: number): Promise<PageRecord> {
    const started = this.now();
    const fetchedAt = started.toISOString();
    const elapsed = () => this.now().getTime() - started.getTime();

    const fail = (error: string, statusCode: number | null = null): PageFailure => ({
      ok: false,
      url,
      depth,
      statusCode,
      fetchedAt,
      elapsedMs: elapsed(),
      error,
    });

    let page: BrowserPage;
    try {
      page = await this.session.newPage();
    } catch (error) {
      return fail(`Could not open browser page: ${errorMessage(error)}`);
    }

    let result: NavigationResult;
    try {
      result = await page.goto(url, this.options.timeoutMs);
    } catch (error) {
      return fail(errorMessage(error));
    } finally {
      await page.close().catch((error: unknown) => {
        this.logger.debug(`closing page for ${url} failed: ${errorMessage(error)}`);
      });
    }

    if (result.error) return fail(result.error, result.status);
    if (result.status === null) return fail("No response received", null);
    if (result.status < 200 || result.status >= 300) {
      return fail(`HTTP ${result.status}`, result.status);
    }

    const contentType = result.contentType?.toLowerCase() ?? "";
    if (contentType && !HTML_CONTENT_TYPES.some((t) => contentType.includes(t))) {
      return fail(`Non-HTML content type: ${result.contentType}`, result.status);
    }
    if (result.html === null) return fail("Empty document", result.status);

    const finalUrl = result.finalUrl || url;
    if (depth === 0 && getHost(finalUrl) !== getHost(url)) {
      this.logger.warn(
        `${url} redirected to ${finalUrl}; only links on ${getHost(url)} will be followed`
      );
    }

    const extracted = extractPageData(result.html, finalUrl);

    return {
      ok: true,
      url,
      depth,
      statusCode: result.status,
      fetchedAt,
      elapsedMs: elapsed(),
      html: result.html,
      links: extracted.links,
      title: extracted.title,
      meta: extracted.meta,
    };
  }
}

// ─── puppeteer-core session ────────────────────────────────────────────────

export interface BrowserLaunchOptions {
  executablePath: string;
  headless: boolean;
  userAgent: string;
  viewport?: { width: number; height: number };
  blockResourceTypes?: string[];
  logger?: Logger;
}

const DEFAULT_VIEWPORT = { width: 1366, height: 900 };
const DEFAULT_BLOCKED_RESOURCES = ["image", "media", "font"];

const LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-blink-features=AutomationControlled",
  "--disable-extensions",
  "--mute-audio",
  "--lang=en-US",
];

/** Opens a tab and runs `prepare` on it; a tab whose setup fails is closed before the error propagates. */
export async function openPreparedPage<T extends { close(): Promise<void> }>(
  open: () => Promise<T>,
  prepare: (page: T) => Promise<void>,
  logger: Logger = silentLogger
): Promise<T> {
  const page = await open();
  try {
    await prepare(page);
  } catch (error) {
    await page.close().catch((closeError: unknown) => {
      logger.debug(`closing unprepared page failed: ${errorMessage(closeError)}`);
    });
    throw error;
  }
  return page;
}

class PuppeteerPage implements BrowserPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<NavigationResult> {
    try {
      const response = await this.page.goto(url, { waitUntil: "networkidle2", timeout: timeoutMs });
      const html = await this.page.content();

      return {
        status: response ? response.status() : null,
        html,
        finalUrl: this.page.url(),
        contentType: response ? response.headers()["content-type"] ?? null : null,
        error: null,
      };
    } catch (error) {
      const message =
        error instanceof TimeoutError ? `Navigation timeout after ${timeoutMs}ms` : errorMessage(error);
      return { status: null, html: null, finalUrl: url, contentType: null, error: message };
    }
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

class PuppeteerSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly options: BrowserLaunchOptions
  ) {}

  async newPage(): Promise<BrowserPage> {
    const logger = this.options.logger ?? silentLogger;
    const page = await openPreparedPage(
      () => this.browser.newPage(),
      (tab) => this.prepare(tab),
      logger
    );
    return new PuppeteerPage(page);
  }

  private async prepare(page: Page): Promise<void> {
    const blocked = this.options.blockResourceTypes ?? DEFAULT_BLOCKED_RESOURCES;

    await page.setUserAgent(this.options.userAgent);
    await page.setViewport(this.options.viewport ?? DEFAULT_VIEWPORT);
    await page.setExtraHTTPHeaders({ "Accept-Language": "en-US,en;q=0.9" });
    await page.evaluateOnNewDocument(() => {
      Object.defineProperty(navigator, "webdriver", { get: () => undefined });
    });

    if (blocked.length > 0) {
      const logger = this.options.logger ?? silentLogger;
      const onInterceptError = (error: unknown) => {
        logger.debug(`request interception failed: ${errorMessage(error)}`);
      };

      await page.setRequestInterception(true);
      page.on("request", (req: HTTPRequest) => {
        if (req.isInterceptResolutionHandled()) return;
        const handled = blocked.includes(req.resourceType()) ? req.abort() : req.continue();
        handled.catch(onInterceptError);
      });
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export async function launchBrowserSession(options: BrowserLaunchOptions): Promise<BrowserSession> {
  const browser = await puppeteer.launch({
    executablePath: options.executablePath,
    headless: options.headless,
    args: LAUNCH_ARGS,
    defaultViewport: options.viewport ?? DEFAULT_VIEWPORT,
  });
  return new PuppeteerSession(browser, options);
}
