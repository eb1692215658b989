// queue-pump/src/ai.ts
// Provider-agnostic JSON generation for the worker (Anthropic, OpenAI, deterministic fake).

import { z } from "zod";
import type { AIConfig } from "../../src/server/config";
import {
  AppError,
  PermanentProviderError,
  TransientProviderError,
  errorMessage,
  isRetryableError,
} from "../../src/lib/errors";
import { safeJsonParse } from "../../src/server/env";

export type GenerationTask = "outline" | "lesson" | "component" | "sme_summary";

export interface GenerateJsonRequest {
  /** What is being generated. Real providers ignore it; the fake keys its output on it. */
  task: GenerationTask;
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface GenerateJsonResult {
  text: string;
  tokensUsed: number;
}

export interface ContentProvider {
  readonly name: string;
  readonly model: string;
  /**
   * @throws TransientProviderError for timeouts, rate limits and 5xx responses
   * @throws PermanentProviderError for anything the provider will keep refusing
   */
  generateJson(request: GenerateJsonRequest): Promise<GenerateJsonResult>;
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

async function fetchWithTimeout(fetchImpl: FetchLike, url: string, init: RequestInit, ms: number): Promise<Response> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), ms);
  try {
    return await fetchImpl(url, { ...init, signal: ctrl.signal });
  } catch (error) {
    const reason = ctrl.signal.aborted ? `timed out after ${ms}ms` : errorMessage(error);
    throw new TransientProviderError(`Provider request failed: ${reason}`);
  } finally {
    clearTimeout(t);
  }
}

/** Map a non-2xx provider response onto the retry taxonomy. */
export function classifyProviderFailure(provider: string, status: number, body: string): AppError {
  const message = `${provider} ${status}: ${body.slice(0, 500)}`;
  if (status === 408 || status === 429 || status >= 500 || isRetryableError(new Error(body))) {
    return new TransientProviderError(message, { status });
  }
  return new PermanentProviderError(message, { status });
}

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

const OpenAIResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable(), refusal: z.string().nullable().optional() }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

async function readJson(provider: string, resp: Response): Promise<unknown> {
  const text = await resp.text();
  if (!resp.ok) throw classifyProviderFailure(provider, resp.status, text);
  const parsed = safeJsonParse(text);
  if (parsed === null) throw new TransientProviderError(`${provider} returned a non-JSON body`);
  return parsed;
}

export class AnthropicProvider implements ContentProvider {
  readonly name = "anthropic";
  readonly model: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(opts: HttpProviderOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs ?? 110_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async generateJson(request: GenerateJsonRequest): Promise<GenerateJsonResult> {
    const resp = await fetchWithTimeout(
      this.fetchImpl,
      "https://api.anthropic.com/v1/messages",
      {
        method: "POST",
        headers: {
          "x-api-key": this.apiKey,
          "content-type": "application/json",
          "anthropic-version": "2023-06-01",
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: request.maxTokens ?? 3600,
          temperature: request.temperature ?? 0.3,
          system: request.system,
          // Prefill forces the reply to start inside a JSON object.
          messages: [
            { role: "user", content: [{ type: "text", text: request.prompt }] },
            { role: "assistant", content: [{ type: "text", text: "{" }] },
          ],
        }),
      },
      this.timeoutMs
    );
    const data = AnthropicResponseSchema.safeParse(await readJson(this.name, resp));
    if (!data.success) throw new PermanentProviderError("anthropic response did not match the messages API shape");
    const text = data.data.content
      .filter((b) => b.type === "text" && b.text)
      .map((b) => b.text ?? "")
      .join("\n");
    if (!text.trim()) throw new PermanentProviderError("anthropic returned an empty response");
    const usage = data.data.usage;
    return { text: `{${text}`, tokensUsed: usage ? usage.input_tokens + usage.output_tokens : 0 };
  }
}

export class OpenAIProvider implements ContentProvider {
  readonly name = "openai";
  readonly model: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(opts: HttpProviderOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs ?? 110_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async generateJson(request: GenerateJsonRequest): Promise<GenerateJsonResult> {
    const resp = await fetchWithTimeout(
      this.fetchImpl,
      "https://api.openai.com/v1/chat/completions",
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          response_format: { type: "json_object" },
          temperature: request.temperature ?? 0.3,
          max_tokens: request.maxTokens ?? 3600,
        }),
      },
      this.timeoutMs
    );
    const data = OpenAIResponseSchema.safeParse(await readJson(this.name, resp));
    if (!data.success) throw new PermanentProviderError("openai response did not match the chat completions shape");
    const choice = data.data.choices[0];
    if (choice?.message.refusal) throw new PermanentProviderError(`openai refused: ${choice.message.refusal}`);
    const text = choice?.message.content ?? "";
    if (!text.trim()) throw new PermanentProviderError("openai returned an empty response");
    const usage = data.data.usage;
    return { text, tokensUsed: usage ? usage.prompt_tokens + usage.completion_tokens : 0 };
  }
}

/** Pull the outermost JSON object out of a reply that may carry prose or code fences. */
export function extractJsonObject(text: string): unknown | null {
  const direct = safeJsonParse(text.trim());
  if (direct !== null) return direct;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return safeJsonParse(text.slice(start, end + 1));
}

export interface StructuredResult<T> {
  value: T;
  tokensUsed: number;
}

/**
 * Generate and validate a JSON object. A reply that fails to parse or
 * validate gets one repair round-trip before the call fails permanently.
 */
export async function generateStructured<T>(
  provider: ContentProvider,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  request: GenerateJsonRequest
): Promise<StructuredResult<T>> {
  const first = await provider.generateJson(request);
  const parsed = schema.safeParse(extractJsonObject(first.text));
  if (parsed.success) return { value: parsed.data, tokensUsed: first.tokensUsed };

  const problem = parsed.error.issues
    .slice(0, 5)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
  const repaired = await provider.generateJson({
    ...request,
    prompt: [
      request.prompt,
      "",
      "Your previous reply was not valid for the required JSON shape.",
      `Problems: ${problem}`,
      "Previous reply:",
      first.text.slice(0, 4000),
      "",
      "Reply again with only the corrected JSON object.",
    ].join("\n"),
  });
  const second = schema.safeParse(extractJsonObject(repaired.text));
  const tokensUsed = first.tokensUsed + repaired.tokensUsed;
  if (second.success) return { value: second.data, tokensUsed };
  throw new PermanentProviderError(`${provider.name} returned invalid ${request.task} JSON after one repair attempt`, {
    problem,
  });
}

export function createContentProvider(config: AIConfig, fetchImpl?: FetchLike): ContentProvider {
  switch (config.provider) {
    case "anthropic":
    case "openai": {
      if (!config.apiKey) throw new Error(`BLOCKED: API key for ${config.provider} is REQUIRED`);
      const opts: HttpProviderOptions = { apiKey: config.apiKey, model: config.model, timeoutMs: config.timeoutMs, fetchImpl };
      return config.provider === "anthropic" ? new AnthropicProvider(opts) : new OpenAIProvider(opts);
    }
    case "fake":
      return new FakeContentProvider();
  }
}

type FakeStep = { kind: "error"; error: Error } | { kind: "text"; text: string };

/**
 * Deterministic provider for tests and `AI_PROVIDER=fake`. Replies are
 * derived from the task and the `Title:` line of the prompt; queued steps
 * (errors or raw text) are served first.
 */
export class FakeContentProvider implements ContentProvider {
  readonly name = "fake";
  readonly model = "fake";
  readonly requests: GenerateJsonRequest[] = [];
  private readonly script: FakeStep[] = [];

  failNext(error: Error, times = 1): this {
    for (let i = 0; i < times; i++) this.script.push({ kind: "error", error });
    return this;
  }

  replyNext(text: string): this {
    this.script.push({ kind: "text", text });
    return this;
  }

  async generateJson(request: GenerateJsonRequest): Promise<GenerateJsonResult> {
    this.requests.push(request);
    const step = this.script.shift();
    if (step?.kind === "error") throw step.error;
    if (step?.kind === "text") return { text: step.text, tokensUsed: 10 };
    return { text: JSON.stringify(fakeReply(request)), tokensUsed: 100 };
  }
}

function promptTitle(prompt: string): string {
  const line = prompt.split("\n").find((l) => l.startsWith("Title: "));
  return line ? line.slice("Title: ".length).trim() : "Untitled";
}

function fakeReply(request: GenerateJsonRequest): unknown {
  const title = promptTitle(request.prompt);
  switch (request.task) {
    case "outline":
      return {
        sections: [
          {
            title: "Foundations",
            description: `Core ideas behind ${title}`,
            lessons: [
              { title: "Key Concepts", description: "Vocabulary and principles", estimatedDurationMinutes: 10, learningObjectives: ["Define the key concepts"] },
              { title: "Why It Matters", description: "Business context", estimatedDurationMinutes: 8, learningObjectives: ["Explain the impact"] },
            ],
          },
          {
            title: "Practice",
            description: "Applying the material",
            lessons: [
              { title: "Worked Scenario", description: "A guided example", estimatedDurationMinutes: 12, learningObjectives: ["Apply the process"] },
            ],
          },
        ],
      };
    case "lesson":
      return {
        title,
        segueText: `Next, we look at ${title}.`,
        components: [
          { type: "heading", content: { level: 2, text: title } },
          { type: "text", content: { html: `<p>${title} explained.</p>`, plaintext: `${title} explained.` } },
          {
            type: "quiz",
            content: {
              question: `Which statement about ${title} is correct?`,
              questionType: "multiple_choice",
              options: [
                { id: "a", text: "The correct statement" },
                { id: "b", text: "A distractor" },
              ],
              correctAnswerId: "a",
              explanation: "Option a restates the lesson.",
            },
          },
        ],
      };
    case "component":
      return { type: "text", content: { html: `<p>Revised: ${title}</p>`, plaintext: `Revised: ${title}` } };
    case "sme_summary":
      return { summary: `Summary of ${title}`, keyPoints: [`${title} key point`] };
  }
}
