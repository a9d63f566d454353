import type { Finding, PageRecord, PageSuccess } from "../types";
import { createFinding, excerpt, siteCheck, successfulPages, type SiteCheck } from "./define";

function groupBy(pages: readonly PageSuccess[], key: (page: PageSuccess) => string | null): Map<string, PageSuccess[]> {
  const groups = new Map<string, PageSuccess[]>();
  for (const page of pages) {
    const value = key(page);
    if (!value) continue;
    const group = groups.get(value) ?? [];
    group.push(page);
    groups.set(value, group);
  }
  return groups;
}

function duplicates(
  checkId: string,
  pages: readonly PageRecord[],
  key: (page: PageSuccess) => string | null,
  describe: (others: number) => string,
  severity: "warning" | "info"
): Finding[] {
  const successful = successfulPages(pages);
  const groups = groupBy(successful, (page) => key(page)?.trim().toLowerCase() ?? null);
  const findings: Finding[] = [];

  for (const page of successful) {
    const value = key(page)?.trim().toLowerCase();
    if (!value) continue;
    const group = groups.get(value) ?? [];
    if (group.length < 2) continue;
    const others = group.filter((other) => other !== page).map((other) => other.url);
    findings.push(createFinding(checkId, page, severity, describe(others.length), excerpt(others)));
  }

  return findings;
}

const duplicateTitle = siteCheck("duplicate-title", "Each page has a unique title", (pages) =>
  duplicates("duplicate-title", pages, (page) => page.title, (n) => `Title is shared with ${n} other page(s).`, "warning")
);

const duplicateMetaDescription = siteCheck(
  "duplicate-meta-description",
  "Each page has a unique meta description",
  (pages) =>
    duplicates(
      "duplicate-meta-description",
      pages,
      (page) => page.meta.description,
      (n) => `Meta description is shared with ${n} other page(s).`,
      "info"
    )
);

const brokenInternalLink = siteCheck("broken-internal-link", "Internal links resolve to fetchable pages", (pages) => {
  const failed = new Set(pages.filter((page) => !page.ok).map((page) => page.url));
  if (failed.size === 0) return [];

  const findings: Finding[] = [];
  for (const page of successfulPages(pages)) {
    const broken = page.links.filter((link) => failed.has(link));
    if (broken.length === 0) continue;
    findings.push(
      createFinding(
        "broken-internal-link",
        page,
        "warning",
        `Links to ${broken.length} page(s) that could not be fetched.`,
        excerpt(broken)
      )
    );
  }
  return findings;
});

export const SITE_RULES: readonly SiteCheck[] = [duplicateTitle, duplicateMetaDescription, brokenInternalLink];
