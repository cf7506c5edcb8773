/**
 * Chat Completions Client
 *
 * HTTP client for OpenAI-compatible `/chat/completions` endpoints (Groq by
 * default). Uses native fetch with a per-request timeout and typed errors.
 * Retrying is left to the caller.
 */

import { z } from "zod";
import type { CompletionProvider, CompletionRequest } from "./types";

/**
 * Configuration for the chat completions client
 */
export interface ChatCompletionsClientConfig {
  apiKey: string;
  model: string;
  /** Base URL without the trailing `/chat/completions` */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Injected fetch implementation */
  fetchImpl?: typeof fetch;
}

/**
 * Error returned by the provider API
 */
export interface ProviderApiError {
  message: string;
  statusCode: number;
  code?: string;
}

/**
 * Custom error class for provider API errors
 */
export class ProviderApiException extends Error {
  public readonly statusCode: number;
  public readonly code?: string;

  constructor(error: ProviderApiError) {
    super(error.message);
    this.name = "ProviderApiException";
    this.statusCode = error.statusCode;
    this.code = error.code;
  }
}

const DEFAULT_BASE_URL = "https://api.groq.com/openai/v1";
const DEFAULT_TIMEOUT = 30000;

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

const errorBodySchema = z.object({
  error: z
    .union([z.string(), z.object({ message: z.string().optional(), code: z.string().optional() })])
    .optional(),
  message: z.string().optional(),
});

/**
 * Pull a readable message out of an error body
 */
export function parseErrorBody(body: string, fallback: string): { message: string; code?: string } {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    return { message: body.trim() !== "" ? body.trim() : fallback };
  }
  const parsed = errorBodySchema.safeParse(decoded);
  if (!parsed.success) {
    return { message: fallback };
  }
  const { error, message } = parsed.data;
  if (typeof error === "string") {
    return { message: error };
  }
  return { message: error?.message ?? message ?? fallback, code: error?.code };
}

/**
 * Chat completions client
 *
 * @example
 * ```typescript
 * const client = new ChatCompletionsClient({ apiKey, model: "llama-3.1-8b-instant" });
 * const text = await client.complete({ system, prompt, temperature: 0.2, maxTokens: 900 });
 * ```
 */
export class ChatCompletionsClient implements CompletionProvider {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: ChatCompletionsClientConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  public getModel(): string {
    return this.model;
  }

  public getEndpoint(): string {
    return `${this.baseUrl}/chat/completions`;
  }

  /**
   * Send one chat request and return the first choice's text
   *
   * @throws ProviderApiException on non-2xx responses
   * @throws Error on timeout, transport failure or an unexpected body
   */
  public async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(this.getEndpoint(), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        }),
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        const { message, code } = parseErrorBody(text, `HTTP ${response.status}: ${response.statusText}`);
        throw new ProviderApiException({ message, statusCode: response.status, code });
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(text);
      } catch {
        throw new Error("Provider response was not valid JSON");
      }

      const parsed = completionResponseSchema.safeParse(decoded);
      if (!parsed.success) {
        throw new Error("Provider response had no completion choices");
      }
      return (parsed.data.choices[0]?.message.content ?? "").trim();
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        if (signal?.aborted) {
          throw new Error("Request cancelled");
        }
        throw new Error(`Request timeout after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
