import type { Finding, PageRecord, PageSuccess, Severity } from "../types";

export interface PageCheck {
  id: string;
  scope: "page";
  description: string;
  run(page: PageSuccess): Finding[];
}

/** Sees every record, failures included, but reports only against successful pages. */
export interface SiteCheck {
  id: string;
  scope: "site";
  description: string;
  run(pages: readonly PageRecord[]): Finding[];
}

export type Check = PageCheck | SiteCheck;

export function pageCheck(id: string, description: string, run: PageCheck["run"]): PageCheck {
  return { id, scope: "page", description, run };
}

export function siteCheck(id: string, description: string, run: SiteCheck["run"]): SiteCheck {
  return { id, scope: "site", description, run };
}

export function successfulPages(pages: readonly PageRecord[]): PageSuccess[] {
  return pages.filter((page): page is PageSuccess => page.ok);
}

export function createFinding(
  checkId: string,
  page: { url: string },
  severity: Severity,
  message: string,
  evidence?: string
): Finding {
  return evidence === undefined
    ? { checkId, url: page.url, severity, message }
    : { checkId, url: page.url, severity, message, evidence };
}

/** Shortens long evidence so one page cannot flood the report. */
export function excerpt(values: readonly string[], limit = 5): string {
  const shown = values.slice(0, limit).join(", ");
  return values.length > limit ? `${shown} (+${values.length - limit} more)` : shown;
}
