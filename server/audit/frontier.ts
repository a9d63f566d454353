import type { CrawlLimits } from "./types";
import { getHost, normalizeUrl } from "./url-utils";

export interface FrontierEntry {
  url: string;
  depth: number;
}

/**
 * Crawl state for one session: a FIFO queue of (url, depth) entries plus every
 * URL ever queued. Entries come out in discovery order, so a breadth-first
 * crawl falls out of enqueueing children only after their parent is fetched.
 */
export class Frontier {
  private readonly queue: FrontierEntry[] = [];
  private readonly seen = new Set<string>();
  private readonly startHost: string;
  private attempts = 0;

  constructor(
    startUrl: string,
    private readonly limits: CrawlLimits
  ) {
    const host = getHost(startUrl);
    if (host === null) {
      throw new TypeError(`Frontier needs an absolute start URL, got: ${startUrl}`);
    }
    this.startHost = host;
  }

  /** Returns true when the URL was admitted. Cross-host, over-depth and repeat URLs are ignored. */
  enqueue(url: string, depth: number): boolean {
    if (!Number.isInteger(depth) || depth < 0 || depth > this.limits.maxDepth) return false;

    const normalized = normalizeUrl(url);
    if (normalized === null) return false;
    if (getHost(normalized) !== this.startHost) return false;
    if (this.seen.has(normalized)) return false;

    this.seen.add(normalized);
    this.queue.push({ url: normalized, depth });
    return true;
  }

  next(): FrontierEntry | null {
    return this.queue.shift() ?? null;
  }

  /** Counts one fetch attempt, successful or not, against `maxPages`. */
  markFetched(): void {
    this.attempts++;
  }

  shouldStop(): boolean {
    return this.attempts >= this.limits.maxPages || this.queue.length === 0;
  }

  get remainingBudget(): number {
    return Math.max(0, this.limits.maxPages - this.attempts);
  }

  get size(): number {
    return this.queue.length;
  }

  get fetchedCount(): number {
    return this.attempts;
  }

  get seenCount(): number {
    return this.seen.size;
  }
}
