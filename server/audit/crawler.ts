import pLimit from "p-limit";
import { InvalidUrlError, errorMessage } from "./errors";
import type { PageFetcher } from "./fetcher";
import { Frontier, type FrontierEntry } from "./frontier";
import { silentLogger, type Logger } from "./logger";
import { abortableSleep, drawDelay, type Sleep } from "./pacing";
import type { CrawlLimits, CrawlResult, PacingLevel, PageRecord } from "./types";
import { normalizeUrl } from "./url-utils";

export type CrawlerState = "idle" | "running" | "draining" | "cancelled" | "done";

export interface CrawlerOptions {
  fetcher: PageFetcher;
  pacing: PacingLevel;
  concurrency?: number;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
}

export interface CrawlParams extends CrawlLimits {
  signal?: AbortSignal;
}

export class Crawler {
  private readonly fetcher: PageFetcher;
  private readonly pacing: PacingLevel;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  private currentState: CrawlerState = "idle";
  private fetchesStarted = 0;

  constructor(options: CrawlerOptions) {
    this.fetcher = options.fetcher;
    this.pacing = options.pacing;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
  }

  get state(): CrawlerState {
    return this.currentState;
  }

  /**
   * Breadth-first crawl of the start URL's host. Returns every attempted page in
   * fetch order, failures included. Stops early, keeping what it has, when
   * `signal` aborts.
   */
  async crawl(startUrl: string, params: CrawlParams): Promise<CrawlResult> {
    if (this.currentState !== "idle") {
      throw new Error(`Crawler is single-use (state: ${this.currentState})`);
    }

    const start = normalizeUrl(startUrl);
    if (start === null) throw new InvalidUrlError(startUrl);

    const { maxDepth, maxPages, signal } = params;
    const frontier = new Frontier(start, { maxDepth, maxPages });
    frontier.enqueue(start, 0);

    const limit = pLimit(this.concurrency);
    const pages: PageRecord[] = [];

    this.transition("running");
    this.logger.debug(`crawling ${start} (depth ${maxDepth}, max ${maxPages} pages, pacing ${this.pacing})`);

    while (!frontier.shouldStop()) {
      if (signal?.aborted) break;

      const batch: FrontierEntry[] = [];
      const batchSize = Math.min(this.concurrency, frontier.remainingBudget);
      while (batch.length < batchSize) {
        const entry = frontier.next();
        if (!entry) break;
        batch.push(entry);
      }

      const results = await Promise.all(batch.map((entry) => limit(() => this.fetchEntry(entry, signal))));

      // Append and discover in dequeue order so output and frontier order do not
      // depend on which worker finished first.
      for (const record of results) {
        if (record === null) continue;
        frontier.markFetched();
        pages.push(record);
        this.logProgress(record, frontier.fetchedCount, maxPages);

        if (record.ok && record.depth < maxDepth) {
          for (const link of record.links) {
            frontier.enqueue(link, record.depth + 1);
          }
        }
      }
    }

    const cancelled = signal?.aborted ?? false;
    this.transition(cancelled ? "cancelled" : "draining");
    this.transition("done");

    return { pages, cancelled };
  }

  private async fetchEntry(entry: FrontierEntry, signal: AbortSignal | undefined): Promise<PageRecord | null> {
    if (signal?.aborted) return null;

    if (this.fetchesStarted++ > 0) {
      const delay = drawDelay(this.pacing, this.random);
      if (delay > 0) {
        this.logger.debug(`pacing ${delay}ms before ${entry.url}`);
        await this.sleep(delay, signal);
      }
      if (signal?.aborted) return null;
    }

    try {
      return await this.fetcher.fetch(entry.url, entry.depth);
    } catch (error) {
      return {
        ok: false,
        url: entry.url,
        depth: entry.depth,
        statusCode: null,
        fetchedAt: new Date().toISOString(),
        elapsedMs: 0,
        error: `Fetcher failed: ${errorMessage(error)}`,
      };
    }
  }

  private logProgress(record: PageRecord, fetched: number, maxPages: number): void {
    const status = record.statusCode ?? "---";
    const detail = record.ok ? `${record.links.length} links` : record.error;
    this.logger.debug(`[${fetched}/${maxPages}] ${status} ${record.url} (depth ${record.depth}, ${record.elapsedMs}ms, ${detail})`);
  }

  private transition(next: CrawlerState): void {
    this.logger.debug(`state ${this.currentState} -> ${next}`);
    this.currentState = next;
  }
}
