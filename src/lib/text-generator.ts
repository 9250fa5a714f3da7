import Anthropic from "@anthropic-ai/sdk";
import { errorMessage } from "./logger";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type GenerateOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export type GenerateResult =
  | { ok: true; text: string }
  | { ok: false; error: string };

/**
 * Single-shot, non-streaming text completion. Implementations never throw:
 * transport, timeout and decoding problems come back as `{ ok: false }`.
 */
export type TextGenerator = {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<GenerateResult>;
};

const MAX_OUTPUT_TOKENS = 1024;

function requestSignal(options: GenerateOptions): AbortSignal {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  return options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
}

// ---------------------------------------------------------------------------
// Anthropic Messages API
// ---------------------------------------------------------------------------

export function createAnthropicGenerator(opts: {
  apiKey: string;
  model: string;
  maxTokens?: number;
}): TextGenerator {
  // Retries are left to the caller; a failed call degrades to a fallback
  const client = new Anthropic({ apiKey: opts.apiKey, maxRetries: 0 });

  return {
    name: `anthropic:${opts.model}`,
    async generate(prompt, options) {
      try {
        const message = await client.messages.create(
          {
            model: opts.model,
            max_tokens: opts.maxTokens ?? MAX_OUTPUT_TOKENS,
            messages: [{ role: "user", content: prompt }],
          },
          { timeout: options.timeoutMs, signal: options.signal }
        );

        const textBlock = message.content.find((b) => b.type === "text");
        if (!textBlock || textBlock.type !== "text") {
          return { ok: false, error: "Response contained no text block" };
        }
        return { ok: true, text: textBlock.text };
      } catch (error) {
        return { ok: false, error: errorMessage(error) };
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Local Ollama server (POST /api/generate)
// ---------------------------------------------------------------------------

function readOllamaResponse(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("response" in body)) return null;
  return typeof body.response === "string" ? body.response : null;
}

export function createOllamaGenerator(opts: {
  baseUrl: string;
  model: string;
}): TextGenerator {
  const endpoint = new URL("/api/generate", opts.baseUrl).href;

  return {
    name: `ollama:${opts.model}`,
    async generate(prompt, options) {
      try {
        const res = await fetch(endpoint, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ model: opts.model, prompt, stream: false }),
          signal: requestSignal(options),
        });
        if (!res.ok) {
          return { ok: false, error: `Ollama returned HTTP ${res.status}` };
        }

        const text = readOllamaResponse(await res.json());
        if (text === null) {
          return { ok: false, error: "Ollama response has no 'response' field" };
        }
        return { ok: true, text };
      } catch (error) {
        return { ok: false, error: errorMessage(error) };
      }
    },
  };
}
