#!/usr/bin/env node
import { writeFile } from "fs/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import { runAuditWithBrowser } from "./audit";
import { describeSettings, loadConfig, resolveOutputPath, resolvePlanPath, type Settings } from "./audit/config";
import { AuditError, ConfigError, LlmUnavailableError, NoSuccessfulPagesError, errorMessage } from "./audit/errors";
import { launchBrowserSession } from "./audit/fetcher";
import { createLlmClient, type LlmClient } from "./audit/llm";
import { createLogger, type Logger } from "./audit/logger";
import { loadPlan } from "./audit/plan";
import { AUDIT_MODES, PACING_LEVELS, type AuditMode, type PacingLevel } from "./audit/types";

const VERSION = "0.1.0";

interface AuditCommandOptions {
  plan?: string | false;
  mode?: AuditMode;
  depth?: number;
  maxPages?: number;
  llm?: string | false;
  output?: string;
  verbose?: boolean;
  pacing?: PacingLevel;
  concurrency?: number;
  timeout?: number;
}

interface ConfigCommandOptions {
  list?: boolean;
  get?: string;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) throw new InvalidArgumentError("Expected a positive integer.");
  return parsed;
}

function resolveLlmClient(spec: string | false | undefined, settings: Settings, logger: Logger): LlmClient | null {
  if (spec === false) return null;
  try {
    const client = createLlmClient(spec ?? settings.defaultLlm, settings.keys, { timeoutMs: settings.llmTimeoutMs });
    logger.debug(`using LLM ${client.id}`);
    return client;
  } catch (error) {
    if (error instanceof LlmUnavailableError) {
      logger.info(`LLM not available: ${error.message}. Generating basic report without LLM analysis.`);
      return null;
    }
    throw error;
  }
}

async function runAuditCommand(url: string, opts: AuditCommandOptions): Promise<number> {
  const logger = createLogger("saa", { verbose: opts.verbose ?? false });
  const controller = new AbortController();
  let interrupts = 0;

  const onInterrupt = () => {
    interrupts++;
    if (interrupts > 1) {
      logger.error("interrupted again, exiting");
      process.exit(130);
    }
    logger.warn("cancelling crawl, finishing the current page (press Ctrl+C again to quit)");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    const settings = loadConfig();
    if (!settings.chromiumPath) {
      throw new ConfigError("SAA_CHROMIUM_PATH is not set; point it at a Chrome or Chromium binary");
    }
    const chromiumPath = settings.chromiumPath;

    const plan = resolvePlanPath(opts.plan, settings.defaultPlan);
    if (plan.warning) logger.debug(plan.warning);
    const planContent = plan.path ? await loadPlan(plan.path) : null;
    if (plan.path && planContent !== null) {
      logger.debug(`loaded audit plan ${plan.path} (${planContent.length} chars)`);
    }

    const output = resolveOutputPath(opts.output, settings.outputDir, url, new Date());
    if (output.warning) logger.debug(output.warning);

    const llmClient = resolveLlmClient(opts.llm, settings, logger);

    const outcome = await runAuditWithBrowser(
      {
        url,
        mode: opts.mode ?? settings.mode,
        maxDepth: opts.depth,
        maxPages: opts.maxPages,
        pacing: opts.pacing ?? settings.pacing,
        concurrency: opts.concurrency ?? settings.concurrency,
        timeoutMs: opts.timeout ?? settings.timeoutMs,
        userAgent: settings.userAgent,
      },
      (options) =>
        launchBrowserSession({
          executablePath: chromiumPath,
          headless: settings.headless,
          userAgent: options.userAgent,
          logger: logger.child("browser"),
        }),
      { llmClient, planContent, signal: controller.signal, logger }
    );

    if (output.path) {
      await writeFile(output.path, outcome.report, "utf-8");
      logger.info(`report saved to ${output.path}`);
    } else {
      process.stdout.write(outcome.report);
    }

    if (outcome.status === "partial") {
      const reasons = [
        outcome.meta.cancelled ? "crawl cancelled" : null,
        outcome.meta.narrative === "unavailable" ? "narrative analysis unavailable" : null,
      ].filter((reason): reason is string => reason !== null);
      logger.warn(`audit finished with partial results (${reasons.join(", ")})`);
    }
    return 0;
  } catch (error) {
    if (error instanceof NoSuccessfulPagesError) {
      logger.error(`${error.message} (${error.attempted} attempted)`);
    } else if (error instanceof AuditError) {
      logger.error(error.message);
    } else {
      logger.error(errorMessage(error));
    }
    return 1;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

function runConfigCommand(opts: ConfigCommandOptions): number {
  const logger = createLogger("saa");
  let rows: ReturnType<typeof describeSettings>;
  try {
    rows = describeSettings(loadConfig());
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }

  if (opts.get) {
    const row = rows.find(([key]) => key === opts.get);
    if (!row) {
      console.log(`Unknown config key: ${opts.get}`);
      return 1;
    }
    console.log(`${row[0]}: ${row[1]}`);
    return 0;
  }

  if (opts.list) {
    console.log("Current configuration:");
    for (const [key, value] of rows) console.log(`  ${key}: ${value}`);
    return 0;
  }

  console.log("Use --list to see all config, --get KEY to get a value");
  return 0;
}

const program = new Command();

program
  .name("saa")
  .description("Site Audit Agent - crawl a site, run checks and write an audit report")
  .version(VERSION);

program
  .command("audit")
  .description("Run an audit on URL")
  .argument("<url>", "Start URL of the site to audit")
  .option("-p, --plan <path>", "Markdown audit plan for the LLM (overrides config)")
  .option("--no-plan", "Skip the audit plan even if one is configured")
  .addOption(
    new Option("-m, --mode <mode>", "own (deep audit) or competitor (light scan), default from config").choices(AUDIT_MODES)
  )
  .option("-d, --depth <n>", "Max crawl depth (default: 10 for own, 1 for competitor)", parseCount)
  .option("--max-pages <n>", "Max pages to fetch (default: 200 for own, 20 for competitor)", parsePositive)
  .option("-l, --llm <provider:model>", "LLM provider:model, e.g. xai:grok or anthropic:sonnet")
  .option("--no-llm", "Skip LLM analysis (deterministic report only)")
  .option("-o, --output <path>", "Write the report to this file (overrides config)")
  .option("-v, --verbose", "Verbose output")
  .addOption(new Option("--pacing <level>", "Delay between page fetches").choices(PACING_LEVELS))
  .option("--concurrency <n>", "Pages fetched in parallel", parsePositive)
  .option("--timeout <ms>", "Per-page navigation timeout in milliseconds", parsePositive)
  .action(async (url: string, opts: AuditCommandOptions) => {
    process.exitCode = await runAuditCommand(url, opts);
  });

program
  .command("config")
  .description("View configuration")
  .option("--list", "List all config")
  .option("--get <key>", "Get a config value")
  .action((opts: ConfigCommandOptions) => {
    process.exitCode = runConfigCommand(opts);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`[saa] error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
