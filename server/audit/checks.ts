import { errorMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { createFinding, type Check, type PageCheck, type SiteCheck } from "./rules/define";
import { PAGE_RULES } from "./rules/page-rules";
import { SITE_RULES } from "./rules/site-rules";
import type { AuditMode, Finding, PageFailure, PageRecord } from "./types";

export { createFinding } from "./rules/define";
export type { Check, PageCheck, SiteCheck } from "./rules/define";

export interface CheckSet {
  readonly name: string;
  readonly checks: readonly Check[];
}

export const UNREACHABLE_CHECK_ID = "page-unreachable";

/** Competitor scans stay on single-page checks that cost nothing beyond the fetch. */
const COMPETITOR_CHECK_IDS = [
  "title-missing",
  "title-length",
  "meta-description-missing",
  "meta-description-length",
  "h1-missing",
  "canonical-missing",
  "noindex",
  "structured-data-missing",
  "open-graph-missing",
] as const;

export function defineCheckSet(name: string, checks: readonly Check[]): CheckSet {
  const ids = new Set<string>();
  for (const check of checks) {
    if (ids.has(check.id)) throw new Error(`Duplicate check id in set "${name}": ${check.id}`);
    ids.add(check.id);
  }
  return Object.freeze({ name, checks: Object.freeze([...checks]) });
}

const COMPETITOR_IDS: ReadonlySet<string> = new Set(COMPETITOR_CHECK_IDS);

const ALL_CHECKS: readonly Check[] = [...PAGE_RULES, ...SITE_RULES];

export const CHECK_REGISTRY: ReadonlyMap<string, Check> = new Map(
  ALL_CHECKS.map((check): [string, Check] => [check.id, check])
);

export const CHECK_SETS: Readonly<Record<AuditMode, CheckSet>> = Object.freeze({
  own: defineCheckSet("own", ALL_CHECKS),
  competitor: defineCheckSet(
    "competitor",
    PAGE_RULES.filter((check) => COMPETITOR_IDS.has(check.id))
  ),
});

export function checkSetForMode(mode: AuditMode): CheckSet {
  return CHECK_SETS[mode];
}

function unreachableFinding(page: PageFailure): Finding {
  const status = page.statusCode === null ? "no response" : `status ${page.statusCode}`;
  return createFinding(UNREACHABLE_CHECK_ID, page, "critical", `Page could not be fetched (${status}).`, page.error);
}

/**
 * Applies every check in `checkSet`. Output is grouped by page in input order;
 * within a page, findings follow check registration order, page checks before
 * site-wide ones. Site findings for URLs outside the crawl come last. Failed
 * pages get the unreachable finding instead of page checks. A check that
 * throws is skipped for that input.
 */
export function runChecks(pages: readonly PageRecord[], checkSet: CheckSet, logger: Logger = silentLogger): Finding[] {
  const pageChecks = checkSet.checks.filter((c): c is PageCheck => c.scope === "page");
  const siteChecks = checkSet.checks.filter((c): c is SiteCheck => c.scope === "site");

  const siteFindings = new Map<string, Finding[]>();
  for (const check of siteChecks) {
    try {
      for (const finding of check.run(pages)) {
        const bucket = siteFindings.get(finding.url);
        if (bucket) bucket.push(finding);
        else siteFindings.set(finding.url, [finding]);
      }
    } catch (error) {
      logger.debug(`site check ${check.id} skipped: ${errorMessage(error)}`);
    }
  }

  const findings: Finding[] = [];
  for (const page of pages) {
    if (!page.ok) {
      findings.push(unreachableFinding(page));
    } else {
      for (const check of pageChecks) {
        try {
          findings.push(...check.run(page));
        } catch (error) {
          logger.debug(`check ${check.id} skipped ${page.url}: ${errorMessage(error)}`);
        }
      }
    }

    findings.push(...(siteFindings.get(page.url) ?? []));
    siteFindings.delete(page.url);
  }

  for (const rest of siteFindings.values()) findings.push(...rest);
  return findings;
}
