import { checkSetForMode, runChecks } from "./checks";
import { resolveCrawlLimits } from "./config";
import { Crawler } from "./crawler";
import { ConfigError, NoSuccessfulPagesError, errorMessage } from "./errors";
import { BrowserPageFetcher, type BrowserSession, type PageFetcher } from "./fetcher";
import type { LlmClient } from "./llm";
import { silentLogger, type Logger } from "./logger";
import type { Sleep } from "./pacing";
import { generateReport } from "./report";
import { AuditOptionsSchema, type AuditOptions, type AuditOptionsInput, type AuditOutcome } from "./types";

export interface AuditDependencies {
  fetcher: PageFetcher;
  llmClient?: LlmClient | null;
  planContent?: string | null;
  signal?: AbortSignal;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

export function parseAuditOptions(input: AuditOptionsInput): AuditOptions {
  const parsed = AuditOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid audit options",
      parsed.error.errors.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Crawl, check and report. Throws NoSuccessfulPagesError when not a single page
 * could be fetched; every other failure ends up in the report instead.
 */
export async function runAudit(input: AuditOptionsInput, deps: AuditDependencies): Promise<AuditOutcome> {
  const options = parseAuditOptions(input);
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());
  const startTime = now().getTime();

  const limits = resolveCrawlLimits(options.mode, options.maxDepth, options.maxPages);
  const crawler = new Crawler({
    fetcher: deps.fetcher,
    pacing: options.pacing,
    concurrency: options.concurrency,
    logger: logger.child("crawler"),
    sleep: deps.sleep,
    random: deps.random,
  });

  logger.info(`auditing ${options.url} (mode ${options.mode}, depth ${limits.maxDepth}, max ${limits.maxPages} pages)`);
  const { pages, cancelled } = await crawler.crawl(options.url, { ...limits, signal: deps.signal });

  const successCount = pages.filter((page) => page.ok).length;
  if (cancelled) {
    logger.warn(`crawl cancelled after ${pages.length} page(s)`);
  }
  if (successCount === 0) {
    throw new NoSuccessfulPagesError(pages.length);
  }

  const findings = runChecks(pages, checkSetForMode(options.mode), logger.child("checks"));
  logger.info(`${pages.length} page(s) crawled, ${findings.length} finding(s)`);

  const report = await generateReport(
    {
      startUrl: options.url,
      pages,
      findings,
      mode: options.mode,
      llmClient: deps.llmClient,
      planContent: deps.planContent,
      generatedAt: now(),
      cancelled,
    },
    logger.child("report")
  );

  return {
    status: cancelled || report.narrative === "unavailable" ? "partial" : "complete",
    report: report.text,
    pages,
    findings,
    meta: {
      durationMs: now().getTime() - startTime,
      pageCount: pages.length,
      successCount,
      errorCount: pages.length - successCount,
      findingCount: findings.length,
      cancelled,
      narrative: report.narrative,
    },
  };
}

/** Runs an audit on a browser session launched for the parsed options and always closes it. */
export async function runAuditWithBrowser(
  input: AuditOptionsInput,
  launch: (options: AuditOptions) => Promise<BrowserSession>,
  deps: Omit<AuditDependencies, "fetcher">
): Promise<AuditOutcome> {
  const options = parseAuditOptions(input);
  const logger = deps.logger ?? silentLogger;
  const session = await launch(options);

  try {
    const fetcher = new BrowserPageFetcher(session, {
      timeoutMs: options.timeoutMs,
      logger: logger.child("fetcher"),
      now: deps.now,
    });
    return await runAudit(options, { ...deps, fetcher });
  } finally {
    await session.close().catch((error: unknown) => {
      logger.warn(`closing browser failed: ${errorMessage(error)}`);
    });
  }
}

export { AuditOptionsSchema } from "./types";
export type {
  AuditOptions,
  AuditOptionsInput,
  AuditOutcome,
  Finding,
  PageRecord,
  PageSuccess,
  PageFailure,
  Severity,
} from "./types";
export { CHECK_REGISTRY, CHECK_SETS, checkSetForMode, defineCheckSet, runChecks } from "./checks";
export { Crawler } from "./crawler";
export { Frontier } from "./frontier";
export { generateReport } from "./report";
export { createLlmClient } from "./llm";
export { launchBrowserSession, BrowserPageFetcher } from "./fetcher";
