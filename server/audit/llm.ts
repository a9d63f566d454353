import { z } from "zod";
import { LlmRequestError, LlmUnavailableError, errorMessage } from "./errors";
import type { AuditMode, Finding } from "./types";

export const LLM_PROVIDERS = ["xai", "anthropic"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export const MODEL_ALIASES: Record<LlmProvider, Record<string, string>> = {
  xai: {
    grok: "grok-4",
  },
  anthropic: {
    sonnet: "claude-sonnet-4-5",
    opus: "claude-opus-4-1",
    haiku: "claude-haiku-4-5",
  },
};

const ENDPOINTS: Record<LlmProvider, string> = {
  xai: "https://api.x.ai/v1/chat/completions",
  anthropic: "https://api.anthropic.com/v1/messages",
};

const ANTHROPIC_VERSION = "2023-06-01";
const MAX_OUTPUT_TOKENS = 4096;
export const DEFAULT_LLM_TIMEOUT_MS = 120_000;

export interface SynthesisRequest {
  startUrl: string;
  mode: AuditMode;
  findings: readonly Finding[];
  planContent?: string | null;
}

export interface LlmClient {
  /** `provider:model` after alias resolution, e.g. `xai:grok-4`. */
  readonly id: string;
  synthesize(request: SynthesisRequest): Promise<string>;
}

export interface LlmKeys {
  xai?: string;
  anthropic?: string;
}

export interface LlmClientOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export interface LlmSpec {
  provider: LlmProvider;
  model: string;
}

const PROVIDER_NAMES: ReadonlySet<string> = new Set(LLM_PROVIDERS);

function isProvider(value: string): value is LlmProvider {
  return PROVIDER_NAMES.has(value);
}

export function parseLlmSpec(spec: string): LlmSpec {
  const separator = spec.indexOf(":");
  if (separator <= 0 || separator === spec.length - 1) {
    throw new LlmUnavailableError(`LLM must be given as provider:model, got "${spec}"`);
  }

  const provider = spec.slice(0, separator).trim().toLowerCase();
  const model = spec.slice(separator + 1).trim();
  if (!isProvider(provider)) {
    throw new LlmUnavailableError(`Unknown LLM provider "${provider}" (expected one of: ${LLM_PROVIDERS.join(", ")})`);
  }

  return { provider, model: MODEL_ALIASES[provider][model.toLowerCase()] ?? model };
}

// ─── Prompt ─────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = [
  "You are a senior technical SEO and web quality auditor.",
  "You receive the deterministic findings of an automated crawl and write the narrative analysis section of an audit report in Markdown.",
  "Use level-3 headings (###) or lower. Do not repeat the findings list verbatim; prioritise, explain impact and recommend concrete fixes.",
  "Only make claims supported by the findings provided.",
].join("\n");

const MODE_BRIEF: Record<AuditMode, string> = {
  own: "This is the operator's own site: be thorough and give an actionable remediation plan.",
  competitor: "This is a competitor's site scanned lightly: focus on strengths and weaknesses worth learning from.",
};

export function formatFindingsForPrompt(findings: readonly Finding[]): string {
  if (findings.length === 0) return "(no findings)";
  return findings
    .map((f) => {
      const evidence = f.evidence ? ` | evidence: ${f.evidence}` : "";
      return `- [${f.severity}] ${f.checkId} @ ${f.url}: ${f.message}${evidence}`;
    })
    .join("\n");
}

export function buildSynthesisPrompt(request: SynthesisRequest): { system: string; user: string } {
  const sections = [
    `Site: ${request.startUrl}`,
    `Audit mode: ${request.mode}. ${MODE_BRIEF[request.mode]}`,
  ];

  if (request.planContent) {
    sections.push(
      "Audit plan (address every item it asks for; say explicitly when the findings give no evidence for an item):",
      request.planContent
    );
  }

  sections.push(`Findings (${request.findings.length}):`, formatFindingsForPrompt(request.findings));

  return { system: SYSTEM_PROMPT, user: sections.join("\n\n") };
}

// ─── Provider clients ───────────────────────────────────────────────────────

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

const AnthropicMessageSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

abstract class HttpLlmClient implements LlmClient {
  readonly id: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    protected readonly provider: LlmProvider,
    protected readonly model: string,
    protected readonly apiKey: string,
    options: LlmClientOptions
  ) {
    this.id = `${provider}:${model}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  abstract synthesize(request: SynthesisRequest): Promise<string>;

  protected async postJson(headers: Record<string, string>, body: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(ENDPOINTS[this.provider], {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new LlmRequestError(`${this.id} request timed out after ${this.timeoutMs}ms`, null, { cause: error });
      }
      throw new LlmRequestError(`${this.id} request failed: ${errorMessage(error)}`, null, { cause: error });
    }

    if (!response.ok) {
      const detail = (await response.text().catch(() => "")).slice(0, 300);
      throw new LlmRequestError(
        `${this.id} returned HTTP ${response.status}${detail ? `: ${detail}` : ""}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new LlmRequestError(`${this.id} returned invalid JSON`, response.status, { cause: error });
    }
  }

  protected requireText(text: string | null | undefined): string {
    const trimmed = text?.trim();
    if (!trimmed) throw new LlmRequestError(`${this.id} returned an empty response`);
    return trimmed;
  }
}

/** xAI exposes an OpenAI-compatible chat completions endpoint. */
class XaiClient extends HttpLlmClient {
  async synthesize(request: SynthesisRequest): Promise<string> {
    const prompt = buildSynthesisPrompt(request);
    const json = await this.postJson(
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: this.model,
        temperature: 0.2,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      }
    );

    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmRequestError(`${this.id} returned an unexpected response shape`);
    }
    return this.requireText(parsed.data.choices[0].message.content);
  }
}

class AnthropicClient extends HttpLlmClient {
  async synthesize(request: SynthesisRequest): Promise<string> {
    const prompt = buildSynthesisPrompt(request);
    const json = await this.postJson(
      { "x-api-key": this.apiKey, "anthropic-version": ANTHROPIC_VERSION },
      {
        model: this.model,
        max_tokens: MAX_OUTPUT_TOKENS,
        system: prompt.system,
        messages: [{ role: "user", content: prompt.user }],
      }
    );

    const parsed = AnthropicMessageSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmRequestError(`${this.id} returned an unexpected response shape`);
    }
    const text = parsed.data.content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("\n");
    return this.requireText(text);
  }
}

/**
 * Resolves a `provider:model` identifier to a client. Throws LlmUnavailableError
 * when the identifier is malformed or the provider has no API key.
 */
export function createLlmClient(spec: string, keys: LlmKeys, options: LlmClientOptions = {}): LlmClient {
  const { provider, model } = parseLlmSpec(spec);
  const apiKey = keys[provider]?.trim();
  if (!apiKey) {
    const envName = provider === "xai" ? "XAI_API_KEY" : "ANTHROPIC_API_KEY";
    throw new LlmUnavailableError(`No API key for ${provider} (set ${envName})`);
  }

  switch (provider) {
    case "xai":
      return new XaiClient(provider, model, apiKey, options);
    case "anthropic":
      return new AnthropicClient(provider, model, apiKey, options);
  }
}
