import { z } from "zod";

export const AUDIT_MODES = ["own", "competitor"] as const;
export type AuditMode = (typeof AUDIT_MODES)[number];

export const PACING_LEVELS = ["off", "low", "medium", "high"] as const;
export type PacingLevel = (typeof PACING_LEVELS)[number];

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36";

export const AuditOptionsSchema = z.object({
  url: z.string().url(),
  mode: z.enum(AUDIT_MODES).default("own"),
  maxDepth: z.number().int().nonnegative().optional(),
  maxPages: z.number().int().positive().optional(),
  pacing: z.enum(PACING_LEVELS).default("medium"),
  concurrency: z.number().int().positive().max(8).default(1),
  timeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type AuditOptions = z.infer<typeof AuditOptionsSchema>;
export type AuditOptionsInput = z.input<typeof AuditOptionsSchema>;

export interface CrawlLimits {
  maxDepth: number;
  maxPages: number;
}

export interface PageHeading {
  level: number;
  text: string;
}

export interface OpenGraphMeta {
  title: string | null;
  description: string | null;
  image: string | null;
}

export interface PageMeta {
  description: string | null;
  canonical: string | null;
  robots: string | null;
  viewport: string | null;
  lang: string | null;
  charset: string | null;
  openGraph: OpenGraphMeta;
  h1: string[];
  headings: PageHeading[];
  imageCount: number;
  imagesWithoutAlt: string[];
  jsonLdTypes: string[];
  wordCount: number;
  insecureResources: string[];
}

interface PageRecordBase {
  url: string;
  depth: number;
  statusCode: number | null;
  fetchedAt: string;
  elapsedMs: number;
}

export interface PageSuccess extends PageRecordBase {
  ok: true;
  html: string;
  links: string[];
  title: string | null;
  meta: PageMeta;
}

export interface PageFailure extends PageRecordBase {
  ok: false;
  error: string;
}

export type PageRecord = PageSuccess | PageFailure;

export const SEVERITIES = ["info", "warning", "critical"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

export interface Finding {
  checkId: string;
  url: string;
  severity: Severity;
  message: string;
  evidence?: string;
}

export interface CrawlResult {
  pages: PageRecord[];
  cancelled: boolean;
}

export type NarrativeStatus = "included" | "unavailable" | "omitted";

export interface ReportResult {
  text: string;
  narrative: NarrativeStatus;
}

export type AuditStatus = "complete" | "partial";

export interface AuditMeta {
  durationMs: number;
  pageCount: number;
  successCount: number;
  errorCount: number;
  findingCount: number;
  cancelled: boolean;
  narrative: NarrativeStatus;
}

export interface AuditOutcome {
  status: AuditStatus;
  report: string;
  pages: PageRecord[];
  findings: Finding[];
  meta: AuditMeta;
}
