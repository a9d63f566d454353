import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";
import { AUDIT_MODES, DEFAULT_USER_AGENT, PACING_LEVELS, type AuditMode, type CrawlLimits } from "./types";
import { hostForFilename } from "./url-utils";

export const CONFIG_DIR_NAME = ".saa";

export const MODE_DEFAULTS: Record<AuditMode, CrawlLimits> = {
  own: { maxDepth: 10, maxPages: 200 },
  competitor: { maxDepth: 1, maxPages: 20 },
};

const BooleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

export const SettingsSchema = z.object({
  chromiumPath: z.string().min(1).optional(),
  headless: BooleanFlag.default("true"),
  defaultLlm: z.string().min(1).default("xai:grok"),
  mode: z.enum(AUDIT_MODES).default("own"),
  pacing: z.enum(PACING_LEVELS).default("medium"),
  concurrency: z.coerce.number().int().positive().max(8).default(1),
  timeoutMs: z.coerce.number().int().positive().default(30000),
  llmTimeoutMs: z.coerce.number().int().positive().default(120000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  defaultPlan: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  keys: z.object({
    xai: z.string().min(1).optional(),
    anthropic: z.string().min(1).optional(),
  }),
});

export type Settings = z.infer<typeof SettingsSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

/** Files read in order; a later file overrides an earlier one, and real environment variables override all. */
export function configFiles(cwd: string, homeDir: string): string[] {
  const globalDir = join(homeDir, CONFIG_DIR_NAME);
  return [join(globalDir, ".env"), join(globalDir, ".keys"), join(cwd, ".env"), join(cwd, ".keys")];
}

function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  try {
    return parseDotenv(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read ${path}`, [String(error)]);
  }
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(options: LoadConfigOptions = {}): Settings {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? homedir();
  const env = options.env ?? process.env;

  const merged: Record<string, string | undefined> = {};
  for (const file of configFiles(cwd, homeDir)) {
    Object.assign(merged, readEnvFile(file));
  }
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value;
  }

  const raw = {
    chromiumPath: blankToUndefined(merged.SAA_CHROMIUM_PATH),
    headless: blankToUndefined(merged.SAA_HEADLESS)?.toLowerCase(),
    defaultLlm: blankToUndefined(merged.SAA_DEFAULT_LLM),
    mode: blankToUndefined(merged.SAA_MODE),
    pacing: blankToUndefined(merged.SAA_PACING),
    concurrency: blankToUndefined(merged.SAA_CONCURRENCY),
    timeoutMs: blankToUndefined(merged.SAA_TIMEOUT_MS),
    llmTimeoutMs: blankToUndefined(merged.SAA_LLM_TIMEOUT_MS),
    userAgent: blankToUndefined(merged.SAA_USER_AGENT),
    defaultPlan: blankToUndefined(merged.SAA_DEFAULT_PLAN),
    outputDir: blankToUndefined(merged.SAA_OUTPUT_DIR),
    keys: {
      xai: blankToUndefined(merged.XAI_API_KEY),
      anthropic: blankToUndefined(merged.ANTHROPIC_API_KEY),
    },
  };

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function resolveCrawlLimits(mode: AuditMode, maxDepth?: number, maxPages?: number): CrawlLimits {
  const defaults = MODE_DEFAULTS[mode];
  return {
    maxDepth: maxDepth ?? defaults.maxDepth,
    maxPages: maxPages ?? defaults.maxPages,
  };
}

export interface Resolved {
  path: string | null;
  warning?: string;
}

/** `false` means the plan was explicitly disabled. */
export function resolvePlanPath(
  cliPlan: string | false | undefined,
  defaultPlan: string | undefined,
  exists: (path: string) => boolean = existsSync
): Resolved {
  if (cliPlan === false) return { path: null };
  if (cliPlan) return { path: cliPlan };
  if (!defaultPlan) return { path: null };
  if (exists(defaultPlan)) return { path: defaultPlan };
  return { path: null, warning: `Configured plan not found: ${defaultPlan}` };
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/** `<host>_<YYYY-MM-DD_HHmm>.md` in local time. */
export function reportFilename(url: string, date: Date): string {
  const stamp = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}`;
  return `${hostForFilename(url)}_${stamp}.md`;
}

export function resolveOutputPath(
  cliOutput: string | undefined,
  outputDir: string | undefined,
  url: string,
  date: Date,
  exists: (path: string) => boolean = existsSync
): Resolved {
  if (cliOutput) return { path: cliOutput };
  if (!outputDir) return { path: null };
  if (exists(outputDir)) return { path: join(outputDir, reportFilename(url, date)) };
  return { path: null, warning: `Output dir not found: ${outputDir}` };
}

const SETTING_KEYS = [
  "chromiumPath",
  "headless",
  "defaultLlm",
  "mode",
  "pacing",
  "concurrency",
  "timeoutMs",
  "llmTimeoutMs",
  "userAgent",
  "defaultPlan",
  "outputDir",
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number] | "xaiApiKey" | "anthropicApiKey";

/** Display form of every setting; API keys only show whether they are set. */
export function describeSettings(settings: Settings): Array<[SettingKey, string]> {
  const rows = SETTING_KEYS.map((key): [SettingKey, string] => {
    const value = settings[key];
    return [key, value === undefined ? "(unset)" : String(value)];
  });
  rows.push(["xaiApiKey", settings.keys.xai ? "set" : "unset"]);
  rows.push(["anthropicApiKey", settings.keys.anthropic ? "set" : "unset"]);
  return rows;
}
