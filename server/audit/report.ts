import { errorMessage } from "./errors";
import type { LlmClient } from "./llm";
import { silentLogger, type Logger } from "./logger";
import {
  SEVERITIES,
  SEVERITY_RANK,
  type AuditMode,
  type Finding,
  type NarrativeStatus,
  type PageRecord,
  type ReportResult,
  type Severity,
} from "./types";

export interface ReportInput {
  startUrl: string;
  pages: readonly PageRecord[];
  findings: readonly Finding[];
  mode: AuditMode;
  llmClient?: LlmClient | null;
  planContent?: string | null;
  generatedAt?: Date;
  cancelled?: boolean;
}

const SEVERITY_TITLES: Record<Severity, string> = {
  critical: "Critical",
  warning: "Warning",
  info: "Info",
};

const SEVERITIES_DESCENDING: readonly Severity[] = [...SEVERITIES].reverse();

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Severity descending, then URL ascending; ties keep their original order. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] || compareText(a.url, b.url)
  );
}

export function escapeText(text: string): string {
  return text.replace(/\r?\n/g, " ").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeCell(text: string): string {
  return escapeText(text).replace(/\|/g, "\\|");
}

export function inlineCode(text: string): string {
  const flat = text.replace(/\r?\n/g, " ");
  const longestRun = Math.max(0, ...(flat.match(/`+/g) ?? []).map((run) => run.length));
  if (longestRun === 0) return `\`${flat}\``;
  const fence = "`".repeat(longestRun + 1);
  return `${fence} ${flat} ${fence}`;
}

function countBySeverity(findings: readonly Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, warning: 0, info: 0 };
  for (const finding of findings) counts[finding.severity]++;
  return counts;
}

function renderHeader(input: ReportInput, generatedAt: Date): string[] {
  const successCount = input.pages.filter((page) => page.ok).length;
  const failureCount = input.pages.length - successCount;
  const counts = countBySeverity(input.findings);

  const lines = [
    `# Site Audit Report: ${input.startUrl}`,
    "",
    "| Field | Value |",
    "|-------|-------|",
    `| Start URL | ${escapeCell(input.startUrl)} |`,
    `| Mode | ${input.mode} |`,
    `| Generated | ${generatedAt.toISOString()} |`,
    `| Pages crawled | ${input.pages.length} (${successCount} ok, ${failureCount} failed) |`,
    `| Findings | ${counts.critical} critical, ${counts.warning} warning, ${counts.info} info |`,
  ];

  if (input.cancelled) {
    lines.push(
      "",
      `> **INCOMPLETE:** the crawl was cancelled before it finished. Results cover the ${input.pages.length} page(s) fetched so far.`
    );
  }

  return lines;
}

function renderFindings(findings: readonly Finding[]): string[] {
  const lines = ["## Findings", ""];
  if (findings.length === 0) {
    lines.push("_No findings._");
    return lines;
  }

  const sorted = sortFindings(findings);
  for (const severity of SEVERITIES_DESCENDING) {
    const group = sorted.filter((finding) => finding.severity === severity);
    if (group.length === 0) continue;

    lines.push(`### ${SEVERITY_TITLES[severity]} (${group.length})`, "");
    let currentUrl: string | null = null;
    for (const finding of group) {
      if (finding.url !== currentUrl) {
        if (currentUrl !== null) lines.push("");
        lines.push(`#### ${finding.url}`, "");
        currentUrl = finding.url;
      }
      lines.push(`- **${finding.checkId}**: ${escapeText(finding.message)}`);
      if (finding.evidence) {
        lines.push(`  - Evidence: ${inlineCode(finding.evidence)}`);
      }
    }
    lines.push("");
  }

  // Drop the trailing blank line of the last group; sections are joined with one.
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function renderPages(pages: readonly PageRecord[]): string[] {
  const lines = ["## Pages Crawled", ""];
  if (pages.length === 0) {
    lines.push("_No pages were fetched._");
    return lines;
  }

  lines.push("| # | URL | Depth | Status | Time (ms) | Result |", "|---|-----|-------|--------|-----------|--------|");
  pages.forEach((page, index) => {
    const status = page.statusCode === null ? "-" : String(page.statusCode);
    const result = page.ok ? "ok" : escapeCell(page.error);
    lines.push(`| ${index + 1} | ${escapeCell(page.url)} | ${page.depth} | ${status} | ${page.elapsedMs} | ${result} |`);
  });
  return lines;
}

async function renderNarrative(
  input: ReportInput,
  logger: Logger
): Promise<{ status: NarrativeStatus; lines: string[] }> {
  if (!input.llmClient) return { status: "omitted", lines: [] };

  const heading = "## Narrative Analysis";
  try {
    const narrative = await input.llmClient.synthesize({
      startUrl: input.startUrl,
      mode: input.mode,
      findings: input.findings,
      planContent: input.planContent ?? null,
    });
    return { status: "included", lines: [heading, "", `_Model: ${input.llmClient.id}_`, "", narrative.trim()] };
  } catch (error) {
    const reason = errorMessage(error);
    logger.warn(`narrative analysis unavailable: ${reason}`);
    return {
      status: "unavailable",
      lines: [heading, "", `> **Narrative analysis unavailable:** ${escapeText(reason)}`],
    };
  }
}

/**
 * Builds the Markdown report. The header, findings and page table depend only
 * on the input; the narrative section, when an LLM client is given, always sits
 * between the findings and the page table. Never throws on LLM failure.
 */
export async function generateReport(input: ReportInput, logger: Logger = silentLogger): Promise<ReportResult> {
  const generatedAt = input.generatedAt ?? new Date();
  const narrative = await renderNarrative(input, logger);

  const sections = [
    renderHeader(input, generatedAt),
    renderFindings(input.findings),
    narrative.lines,
    renderPages(input.pages),
    ["---", "", "_Generated by Site Audit Agent._"],
  ].filter((section) => section.length > 0);

  const text = sections.map((section) => section.join("\n")).join("\n\n") + "\n";
  return { text, narrative: narrative.status };
}
