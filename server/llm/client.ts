import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import { providerForModel } from "../config/models";
import type { LLMProvider } from "../config/models";
import { TIMEOUT_CONSTANTS } from "../config/constants";

let _openai: OpenAI | null = null;
export function getOpenAI(): OpenAI {
  if (!_openai) {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) throw new LLMError("unavailable", "[LLM Client] OPENAI_API_KEY is not set");
    _openai = new OpenAI({ apiKey, maxRetries: 1 });
  }
  return _openai;
}

let _gemini: GoogleGenAI | null = null;
function getGemini(): GoogleGenAI {
  if (!_gemini) {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) throw new LLMError("unavailable", "[LLM Client] GEMINI_API_KEY is not set");
    _gemini = new GoogleGenAI({ apiKey });
  }
  return _gemini;
}

let _claude: InstanceType<typeof import("@anthropic-ai/sdk").default> | null = null;
async function getClaude() {
  if (!_claude) {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) throw new LLMError("unavailable", "[LLM Client] ANTHROPIC_API_KEY is not set");
    const Anthropic = (await import("@anthropic-ai/sdk")).default;
    _claude = new Anthropic({ apiKey, maxRetries: 1 });
  }
  return _claude;
}

type Provider = LLMProvider;

export function detectProvider(model: string): Provider {
  const provider = providerForModel(model);
  if (!provider) {
    throw new LLMError(
      "unavailable",
      `[LLM Client] Unknown model "${model}", cannot determine provider. Add it to the model registry in server/config/models.ts`,
    );
  }
  return provider;
}

export type LLMErrorKind = "timeout" | "unavailable" | "empty";

/**
 * Every failure of generateText surfaces as an LLMError, never as a raw
 * SDK or transport exception.
 */
export class LLMError extends Error {
  kind: LLMErrorKind;
  provider?: Provider;
  constructor(kind: LLMErrorKind, message: string, provider?: Provider) {
    super(message);
    this.name = "LLMError";
    this.kind = kind;
    this.provider = provider;
  }
}

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** "json" asks the provider for a JSON object response. */
  responseFormat?: "text" | "json";
  /** Defaults to TIMEOUT_CONSTANTS.LLM_TIMEOUT_MS. */
  timeoutMs?: number;
};

export type LLMResponse = {
  text: string;
  provider: Provider;
  model: string;
};

export type GenerateTextFn = (opts: LLMRequestOptions) => Promise<LLMResponse>;

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError" || error.name === "TimeoutError");
}

export async function generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
  const provider = detectProvider(opts.model);
  const timeoutMs = opts.timeoutMs ?? TIMEOUT_CONSTANTS.LLM_TIMEOUT_MS;
  const signal = AbortSignal.timeout(timeoutMs);

  let response: LLMResponse;
  try {
    switch (provider) {
      case "openai":
        response = await callOpenAI(opts, signal);
        break;
      case "gemini":
        response = await callGemini(opts, signal);
        break;
      case "claude":
        response = await callClaude(opts, signal);
        break;
      default: {
        const _exhaustive: never = provider;
        throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
      }
    }
  } catch (error) {
    if (error instanceof LLMError) throw error;
    if (signal.aborted || isAbortError(error)) {
      throw new LLMError("timeout", `[LLM Client] ${opts.model} timed out after ${timeoutMs}ms`, provider);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new LLMError("unavailable", `[LLM Client] ${opts.model} request failed: ${message}`, provider);
  }

  if (!response.text.trim()) {
    throw new LLMError("empty", `[LLM Client] ${opts.model} returned an empty response`, provider);
  }
  return response;
}

async function callOpenAI(opts: LLMRequestOptions, signal: AbortSignal): Promise<LLMResponse> {
  const response = await getOpenAI().chat.completions.create(
    {
      model: opts.model,
      messages: opts.messages,
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
      ...(opts.responseFormat === "json" && { response_format: { type: "json_object" as const } }),
    },
    { signal },
  );

  return {
    text: response.choices[0]?.message?.content || "",
    provider: "openai",
    model: opts.model,
  };
}

async function callGemini(opts: LLMRequestOptions, signal: AbortSignal): Promise<LLMResponse> {
  const systemParts = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content);

  const nonSystemMessages = opts.messages.filter(m => m.role !== "system");

  const contents = nonSystemMessages.map(m => ({
    role: m.role === "assistant" ? "model" as const : "user" as const,
    parts: [{ text: m.content }],
  }));

  const systemInstruction = systemParts.length > 0
    ? systemParts.join("\n\n")
    : undefined;

  const response = await getGemini().models.generateContent({
    model: opts.model,
    config: {
      abortSignal: signal,
      ...(systemInstruction && { systemInstruction }),
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
      ...(opts.responseFormat === "json" && { responseMimeType: "application/json" }),
    },
    contents,
  });

  return {
    text: response.text || "",
    provider: "gemini",
    model: opts.model,
  };
}

async function callClaude(opts: LLMRequestOptions, signal: AbortSignal): Promise<LLMResponse> {
  const client = await getClaude();

  const systemContent = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content)
    .join("\n\n");

  const nonSystemMessages = opts.messages
    .filter(m => m.role !== "system")
    .map(m => ({
      role: m.role === "assistant" ? "assistant" as const : "user" as const,
      content: m.content,
    }));

  const response = await client.messages.create(
    {
      model: opts.model,
      max_tokens: opts.maxTokens || 4096,
      ...(systemContent && { system: systemContent }),
      messages: nonSystemMessages,
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
    },
    { signal },
  );

  const textBlock = response.content.find(b => b.type === "text");

  return {
    text: textBlock?.type === "text" ? textBlock.text : "",
    provider: "claude",
    model: opts.model,
  };
}
